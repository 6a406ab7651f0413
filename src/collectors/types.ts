import type { LanguageAdapter, SyntaxProfile } from '../langs/types.js';
import type { ParsedSource, SyntaxNode } from '../langs/tree_sitter.js';
import type { LanguageId, MetadataCategory, ParsedFunction } from '../types.js';

/** Everything a collector may inspect about one function. */
export interface FunctionHandle {
  readonly fn: ParsedFunction;
  readonly node: SyntaxNode;
  readonly parsed: ParsedSource;
  readonly profile: SyntaxProfile;
  readonly adapter: LanguageAdapter;
}

export interface CollectorContext {
  readonly filePath: string;
  /** Nearest ancestor holding `.git`, else the file's directory. */
  readonly repoRoot: string;
  readonly functionName: string;
  readonly language: LanguageId;
}

export type CollectorOutput = Record<string, unknown>;

/** Unknown categories are accepted and routed to the raw bucket. */
export type CollectorCategory = MetadataCategory | (string & {});

export interface CollectorDescriptor {
  readonly name: string;
  readonly category: CollectorCategory;
  /** Lower runs first. */
  readonly priority: number;
  appliesTo(context: CollectorContext): boolean | Promise<boolean>;
  collect(handle: FunctionHandle, context: CollectorContext): CollectorOutput | Promise<CollectorOutput>;
}

export type PriorityBand = 'critical' | 'standard' | 'optional';
