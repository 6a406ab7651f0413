/**
 * @fileoverview Shared data model
 *
 * Line numbers are 1-based and inclusive. A ParsedFunction's line range is
 * only valid for the exact file content it was parsed from.
 */

export type LanguageId = 'python' | 'javascript' | 'typescript';

/** One read of a file: the exact bytes and their strict UTF-8 decoding. */
export interface SourceFile {
  readonly path: string;
  readonly language: LanguageId;
  readonly bytes: Buffer;
  readonly text: string;
}

export interface ParsedFunction {
  readonly name: string;
  readonly signature: string;
  readonly body: string;
  readonly docstring: string | null;
  readonly startLine: number;
  readonly endLine: number;
  readonly decorators: readonly string[];
  readonly isAsync: boolean;
  readonly isMethod: boolean;
  readonly isPrivate: boolean;
  readonly isGenerator: boolean;
  readonly parentType: string | null;
  readonly calls: readonly string[];
  readonly imports: readonly string[];
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface ParsedModule {
  readonly filePath: string;
  readonly language: LanguageId;
  readonly functions: readonly ParsedFunction[];
  readonly types: readonly string[];
  readonly moduleDoc: string | null;
  readonly imports: readonly string[];
}

export interface DependencyFacts {
  readonly calls: readonly string[];
  readonly imports: readonly string[];
}

export interface Facts extends DependencyFacts {
  /** Entries formatted `- <date>: <subject> (<hash>)`. */
  readonly changelog: readonly string[];
}

export type ParameterKind =
  | 'positional'
  | 'positional_only'
  | 'positional_or_keyword'
  | 'var_positional'
  | 'keyword_only'
  | 'var_keyword'
  | 'rest';

export interface ParameterInfo {
  readonly name: string;
  readonly type: string | null;
  readonly default: string | null;
  readonly kind: ParameterKind;
}

export interface DecoratorInfo {
  readonly name: string;
  readonly args: readonly string[];
  readonly full: string;
}

export interface ExceptionInfo {
  readonly type: string | null;
  readonly message: string | null;
  readonly conditional: boolean;
}

export type MetadataCategory =
  | 'code_analysis'
  | 'git_analysis'
  | 'test_analysis'
  | 'runtime_analysis'
  | 'api_analysis';

export type MetadataBucket = Record<string, unknown>;

export interface CollectedMetadata {
  readonly functionName: string;
  readonly filePath: string;
  readonly codeAnalysis: MetadataBucket;
  readonly gitAnalysis: MetadataBucket;
  readonly testAnalysis: MetadataBucket;
  readonly runtimeAnalysis: MetadataBucket;
  readonly apiAnalysis: MetadataBucket;
  readonly raw: MetadataBucket;
}

export type DocStyle = 'flat' | 'fenced';

export interface DocumentSection {
  /** Header line as written, or null for text before the first header. */
  readonly header: string | null;
  /** Normalized label used for matching, e.g. `DEPENDENCIES` or `deps`. */
  readonly key: string | null;
  readonly lines: readonly string[];
}

export interface DocumentBlock {
  readonly delimiters: readonly [string, string];
  readonly narrative: string;
  readonly facts: Facts | null;
}
