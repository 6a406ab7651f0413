/**
 * @fileoverview docfacts - deterministic function facts and safe documentation injection
 *
 * ## Quick Start
 *
 * ```typescript
 * import { FileDiscovery, createDefaultRegistry, createDefaultOrchestrator, DocumentationPipeline, StaticNarrativeProvider } from 'docfacts';
 *
 * const registry = createDefaultRegistry({ discovery: new FileDiscovery() });
 * const pipeline = new DocumentationPipeline({
 *   registry,
 *   orchestrator: createDefaultOrchestrator(),
 *   provider: new StaticNarrativeProvider('Loads the settings file.'),
 * });
 * const report = await pipeline.documentFile('src/settings.py');
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// DATA MODEL & ERRORS
// ============================================================================

export * from './types.js';
export * from './core/errors.js';
export { Ok, Err, type Result, safeUnlink } from './core/result.js';
export { DOCFACTS_VERSION } from './version.js';

// ============================================================================
// CONFIGURATION & LOGGING
// ============================================================================

export * from './config/index.js';
export { setLogLevel, getLogLevel, type LogLevel } from './telemetry/logger.js';

// ============================================================================
// LANGUAGES, DISCOVERY, GIT
// ============================================================================

export * from './langs/types.js';
export { LanguageRegistry, createDefaultRegistry, normalizeExtension } from './langs/registry.js';
export { TreeSitterAdapter } from './langs/base_adapter.js';
export { readSourceFile } from './langs/source_text.js';
export { PythonAdapter } from './langs/python_adapter.js';
export { JavaScriptAdapter } from './langs/javascript_adapter.js';
export { FileDiscovery, findRepositoryRoot, type FileDiscoveryOptions } from './discovery/file_discovery.js';
export { IgnoreRules } from './discovery/ignore_rules.js';
export * from './git/types.js';
export { ExecaGitClient, type ExecaGitClientOptions } from './git/execa_git_client.js';

// ============================================================================
// COLLECTION, FACTS, APPLY
// ============================================================================

export * from './collectors/index.js';
export * from './metadata/index.js';
export * from './apply/index.js';
export * from './pipeline/index.js';
export * from './blocks/index.js';
