import type { DocfactsError, SourceSyntaxError, ToolUnavailableError } from '../core/errors.js';
import type { Result } from '../core/result.js';
import type {
  DecoratorInfo,
  DependencyFacts,
  ExceptionInfo,
  LanguageId,
  ParameterInfo,
  ParsedFunction,
  ParsedModule,
} from '../types.js';
import type { ParsedSource, SyntaxNode } from './tree_sitter.js';

export type ValidationTarget = { readonly path: string } | { readonly source: string };

export type ValidationResult = Result<void, SourceSyntaxError | ToolUnavailableError>;

export interface InsertReport {
  /** 1-based line of the declaration after the edit. */
  readonly declarationLine: number;
  readonly docStartLine: number;
  readonly docEndLine: number;
  /** True when an existing documentation block was replaced. */
  readonly replaced: boolean;
}

/** A parsed function paired with the node it came from. */
export interface FunctionSite {
  readonly fn: ParsedFunction;
  readonly node: SyntaxNode;
}

/** Enumerates candidate source files. Implemented by FileDiscovery. */
export interface SourceDiscovery {
  collectFiles(target: string, extensions?: readonly string[]): Promise<string[]>;
}

/**
 * Per-language tree queries shared by the adapters and the collectors.
 */
export interface SyntaxProfile {
  parameters(fn: SyntaxNode, parsed: ParsedSource): ParameterInfo[];
  returnType(fn: SyntaxNode, parsed: ParsedSource): string | null;
  isAsync(fn: SyntaxNode): boolean;
  isGenerator(fn: SyntaxNode): boolean;
  decorators(fn: SyntaxNode, parsed: ParsedSource): DecoratorInfo[];
  raises(fn: SyntaxNode, parsed: ParsedSource): ExceptionInfo[];
  /** Decision points contributed by a single node. */
  branchWeight(node: SyntaxNode): number;
  isNesting(node: SyntaxNode): boolean;
  isFunction(node: SyntaxNode): boolean;
  calls(scope: SyntaxNode, parsed: ParsedSource): string[];
  imports(root: SyntaxNode, parsed: ParsedSource): string[];
  body(fn: SyntaxNode): SyntaxNode | null;
}

export interface LanguageAdapter {
  readonly language: LanguageId;
  readonly extensions: readonly string[];
  readonly commentDelimiters: readonly [string, string];
  readonly profile: SyntaxProfile;

  /** Source files under `target` that this adapter handles. */
  discover(target: string): Promise<string[]>;
  /** Documentation attached to the declaration starting at `line`, if any. */
  extractDoc(filePath: string, line: number): Promise<string | null>;
  /** Replace or insert the documentation of the declaration at `line`. */
  insertDoc(filePath: string, line: number, text: string): Promise<Result<InsertReport, DocfactsError>>;
  /**
   * Calls inside the named function (the whole file when no name is given)
   * and the file's top-level imports. Never throws.
   */
  gatherFacts(filePath: string, functionName?: string): Promise<DependencyFacts>;
  validate(target: ValidationTarget): Promise<ValidationResult>;
  /** Throws ToolUnavailableError when the parser engine cannot load. */
  parse(source: string): ParsedSource;
  parseModule(filePath: string, source: string): ParsedModule;
  functionSites(parsed: ParsedSource, filePath: string): FunctionSite[];

  renderDoc(text: string, indent: string): string[];
  readDoc(raw: string): string;
}
