/**
 * @fileoverview Wiring shared by every command: settings, logging, git,
 * discovery and the language registry for one workspace.
 */

import * as path from 'node:path';
import { createDefaultOrchestrator } from '../collectors/index.js';
import type { CollectorOrchestrator } from '../collectors/orchestrator.js';
import { loadConfig, type DocfactsConfig } from '../config/index.js';
import { FileDiscovery } from '../discovery/file_discovery.js';
import { ExecaGitClient } from '../git/execa_git_client.js';
import { createDefaultRegistry, type LanguageRegistry } from '../langs/registry.js';
import { setLogLevel } from '../telemetry/logger.js';

export interface GlobalOptions {
  workspace: string;
  json: boolean;
  verbose: boolean;
}

export interface CliRuntime {
  readonly workspace: string;
  readonly config: DocfactsConfig;
  readonly git: ExecaGitClient | null;
  readonly discovery: FileDiscovery;
  readonly registry: LanguageRegistry;
  readonly orchestrator: CollectorOrchestrator;
}

export async function createRuntime(options: GlobalOptions): Promise<CliRuntime> {
  const workspace = path.resolve(options.workspace);
  const config = await loadConfig(workspace);
  setLogLevel(options.verbose ? 'debug' : config.logLevel);

  const git = config.git.enabled
    ? new ExecaGitClient({ probeTimeoutMs: config.git.probeTimeoutMs, commandTimeoutMs: config.git.commandTimeoutMs })
    : null;
  const discovery = new FileDiscovery({
    ignoreOracle: git ?? undefined,
    checkIgnoreBatchSize: config.git.checkIgnoreBatchSize,
    extraExcludeDirs: config.discovery.extraExcludeDirs,
    ignoreFileName: config.discovery.ignoreFileName,
    useBuiltinIgnore: config.discovery.useBuiltinIgnore,
  });
  const registry = createDefaultRegistry({ discovery });
  const orchestrator = createDefaultOrchestrator({ git: git ?? undefined, maxCommits: config.git.maxCommits });

  return { workspace, config, git, discovery, registry, orchestrator };
}

export function resolveTarget(runtime: Pick<CliRuntime, 'workspace'>, target: string): string {
  return path.isAbsolute(target) ? target : path.resolve(runtime.workspace, target);
}

/** Supported source files under `target`, after ignore rules. */
export function discoverSources(runtime: CliRuntime, target: string): Promise<string[]> {
  return runtime.discovery.collectFiles(resolveTarget(runtime, target), runtime.registry.supportedExtensions());
}
