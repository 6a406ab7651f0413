/**
 * @fileoverview tree-sitter engine loading and tree helpers
 *
 * The native `tree-sitter` binding and grammar packages are optional at
 * import time: a missing module surfaces as ToolUnavailableError when a
 * parse is first requested.
 */

import { createRequire } from 'node:module';
import { ToolUnavailableError, getErrorMessage } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { warnOnce } from '../telemetry/logger.js';
import { SourceText, leadingWhitespace, type OffsetUnit } from './source_text.js';

// ============================================================================
// TYPES
// ============================================================================

export type SyntaxPoint = { row: number; column: number };

export interface SyntaxNode {
  readonly type: string;
  readonly startIndex: number;
  readonly endIndex: number;
  readonly startPosition: SyntaxPoint;
  readonly endPosition: SyntaxPoint;
  readonly children: SyntaxNode[];
  readonly namedChildren: SyntaxNode[];
  readonly parent: SyntaxNode | null;
  readonly previousNamedSibling: SyntaxNode | null;
  readonly nextNamedSibling: SyntaxNode | null;
  readonly isMissing?: boolean | (() => boolean);
  childForFieldName(field: string): SyntaxNode | null;
}

export interface SyntaxTree {
  readonly rootNode: SyntaxNode;
}

type TreeSitterLanguage = { name?: string };
type ParseOptions = { bufferSize?: number };
type TreeSitterParser = {
  setLanguage: (language: TreeSitterLanguage) => void;
  parse: (input: string, oldTree?: SyntaxTree, options?: ParseOptions) => SyntaxTree;
};
type TreeSitterModule = new () => TreeSitterParser;

export interface GrammarSpec {
  /** npm package providing the grammar */
  readonly moduleName: string;
  /** export holding the language when the package ships several dialects */
  readonly exportName?: string;
}

export interface TreeSitterEngine {
  readonly key: string;
  readonly unit: OffsetUnit;
  parse(text: string): SyntaxTree;
}

// ============================================================================
// LOADING
// ============================================================================

const require = createRequire(import.meta.url);

/** Parsed to learn which offset unit the binding reports. */
const CALIBRATION_SOURCE = '"é";x\n';

const engines = new Map<string, Result<TreeSitterEngine, ToolUnavailableError>>();

function loadParserConstructor(): TreeSitterModule | null {
  try {
    return require('tree-sitter') as TreeSitterModule;
  } catch {
    return null;
  }
}

function loadLanguage(spec: GrammarSpec): TreeSitterLanguage | null {
  try {
    const mod = require(spec.moduleName) as Record<string, TreeSitterLanguage | undefined> & TreeSitterLanguage;
    if (spec.exportName) {
      return mod[spec.exportName] ?? null;
    }
    return mod.default ?? mod;
  } catch {
    return null;
  }
}

function grammarKey(spec: GrammarSpec): string {
  return spec.exportName ? `${spec.moduleName}#${spec.exportName}` : spec.moduleName;
}

export function loadEngine(spec: GrammarSpec): Result<TreeSitterEngine, ToolUnavailableError> {
  const key = grammarKey(spec);
  const cached = engines.get(key);
  if (cached) return cached;

  const result = createEngine(spec, key);
  if (!result.ok) {
    warnOnce(`tree-sitter:${key}`, '[docfacts] parser engine unavailable', { grammar: key, error: result.error.message });
  }
  engines.set(key, result);
  return result;
}

function createEngine(spec: GrammarSpec, key: string): Result<TreeSitterEngine, ToolUnavailableError> {
  const Parser = loadParserConstructor();
  if (!Parser) {
    return Err(new ToolUnavailableError('tree-sitter', false, 'native module could not be loaded'));
  }
  const language = loadLanguage(spec);
  if (!language) {
    return Err(new ToolUnavailableError(key, false, 'grammar package could not be loaded'));
  }
  try {
    const parser = new Parser();
    parser.setLanguage(language);
    const parse = (text: string): SyntaxTree =>
      parser.parse(text, undefined, { bufferSize: Math.max(32 * 1024, text.length * 2 + 2) });
    const unit = calibrateOffsetUnit(parse(CALIBRATION_SOURCE).rootNode);
    return Ok({ key, unit, parse });
  } catch (error) {
    return Err(new ToolUnavailableError(key, false, getErrorMessage(error)));
  }
}

/**
 * `x` starts at UTF-16 offset 4 and UTF-8 byte offset 5 in the probe source.
 */
export function calibrateOffsetUnit(root: SyntaxNode): OffsetUnit {
  const identifiers: SyntaxNode[] = [];
  walkNamed(root, (node) => {
    if (node.type === 'identifier') identifiers.push(node);
  });
  const probe = identifiers[identifiers.length - 1];
  return probe !== undefined && probe.startIndex === 5 ? 'utf8' : 'utf16';
}

// ============================================================================
// PARSED SOURCE
// ============================================================================

export class ParsedSource {
  constructor(
    readonly source: SourceText,
    readonly tree: SyntaxTree,
    readonly unit: OffsetUnit,
  ) {}

  get root(): SyntaxNode {
    return this.tree.rootNode;
  }

  text(node: SyntaxNode): string {
    return this.source.slice(node.startIndex, node.endIndex, this.unit);
  }

  range(start: number, end: number): string {
    return this.source.slice(start, end, this.unit);
  }

  lineText(row: number): string {
    return this.source.lineAt(row);
  }

  indentOf(row: number): string {
    return leadingWhitespace(this.source.lineAt(row));
  }

  /** True when nothing but whitespace precedes `node` on its first line. */
  startsLine(node: SyntaxNode): boolean {
    const line = this.source.lineAt(node.startPosition.row);
    const head = this.range(this.lineStartOffset(node), node.startIndex);
    return head.trim().length === 0 && line.trim().length > 0;
  }

  private lineStartOffset(node: SyntaxNode): number {
    const column = node.startPosition.column;
    return Math.max(0, node.startIndex - column);
  }
}

// ============================================================================
// TREE HELPERS
// ============================================================================

/**
 * Depth-first walk over named nodes. Returning `false` from the visitor
 * skips that node's children.
 */
export function walkNamed(node: SyntaxNode, visitor: (node: SyntaxNode) => boolean | void): void {
  if (visitor(node) === false) return;
  for (const child of node.namedChildren) {
    walkNamed(child, visitor);
  }
}

function readFlag(node: SyntaxNode): boolean {
  const flag = node.isMissing;
  if (typeof flag === 'function') return flag.call(node);
  return flag === true;
}

/** First ERROR or MISSING node, searching anonymous nodes as well. */
export function findSyntaxProblem(node: SyntaxNode): SyntaxNode | null {
  if (node.type === 'ERROR' || readFlag(node)) return node;
  for (const child of node.children) {
    const problem = findSyntaxProblem(child);
    if (problem) return problem;
  }
  return null;
}

export function hasChildOfType(node: SyntaxNode, type: string): boolean {
  return node.children.some((child) => child.type === type);
}

export function stripQuotes(literal: string): string {
  const match = /^(['"`])([\s\S]*)\1$/.exec(literal);
  return match ? match[2] : literal;
}
