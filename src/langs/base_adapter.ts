import * as fs from 'node:fs/promises';
import {
  DocInsertionError,
  FileIoError,
  SourceSyntaxError,
  ToolUnavailableError,
  getErrorMessage,
  type DocfactsError,
} from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import type { DependencyFacts, LanguageId, ParsedModule } from '../types.js';
import { SourceText, readSourceFile } from './source_text.js';
import { ParsedSource, findSyntaxProblem, loadEngine, walkNamed, type GrammarSpec, type SyntaxNode } from './tree_sitter.js';
import type {
  FunctionSite,
  InsertReport,
  LanguageAdapter,
  SourceDiscovery,
  SyntaxProfile,
  ValidationResult,
  ValidationTarget,
} from './types.js';

/** A declaration that can carry documentation. */
export interface DeclarationSite {
  /** Function, method or class node. */
  readonly node: SyntaxNode;
  /** Outermost node starting on the declaration line (export wrapper, variable statement). */
  readonly anchor: SyntaxNode;
  /** 0-based row the caller asked for. */
  readonly row: number;
}

/** Replace `deleteCount` lines starting at `startRow` with `lines`. */
export interface DocEdit {
  readonly startRow: number;
  readonly deleteCount: number;
  readonly lines: readonly string[];
}

export interface ModuleSummary {
  readonly types: string[];
  readonly moduleDoc: string | null;
}

/**
 * Shared plumbing for adapters backed by a tree-sitter grammar: file I/O,
 * syntax validation, fact gathering and line-based doc edits. Subclasses
 * supply the language rules.
 */
export abstract class TreeSitterAdapter implements LanguageAdapter {
  abstract readonly language: LanguageId;
  abstract readonly extensions: readonly string[];
  abstract readonly commentDelimiters: readonly [string, string];
  abstract readonly profile: SyntaxProfile;

  protected constructor(
    protected readonly grammar: GrammarSpec,
    private readonly discovery: SourceDiscovery,
  ) {}

  // ==========================================================================
  // LANGUAGE RULES
  // ==========================================================================

  /** Declaration starting at 0-based `row`, if any. */
  abstract locate(parsed: ParsedSource, row: number): DeclarationSite | null;
  /** Existing documentation node of a declaration. */
  abstract docNode(parsed: ParsedSource, site: DeclarationSite): SyntaxNode | null;
  abstract planDoc(parsed: ParsedSource, site: DeclarationSite, text: string): Result<DocEdit, string>;
  abstract nameOf(node: SyntaxNode, parsed: ParsedSource): string | null;
  abstract functionSites(parsed: ParsedSource, filePath: string): FunctionSite[];
  abstract summarize(parsed: ParsedSource): ModuleSummary;
  abstract renderDoc(text: string, indent: string): string[];
  abstract readDoc(raw: string): string;

  // ==========================================================================
  // OPERATIONS
  // ==========================================================================

  discover(target: string): Promise<string[]> {
    return this.discovery.collectFiles(target, this.extensions);
  }

  parse(source: string): ParsedSource {
    const engine = loadEngine(this.grammar);
    if (!engine.ok) {
      throw engine.error;
    }
    return new ParsedSource(new SourceText(source), engine.value.parse(source), engine.value.unit);
  }

  parseModule(filePath: string, source: string): ParsedModule {
    const parsed = this.parse(source);
    const summary = this.summarize(parsed);
    return {
      filePath,
      language: this.language,
      functions: this.functionSites(parsed, filePath).map((site) => site.fn),
      types: summary.types,
      moduleDoc: summary.moduleDoc,
      imports: this.profile.imports(parsed.root, parsed),
    };
  }

  async extractDoc(filePath: string, line: number): Promise<string | null> {
    const parsed = await this.parseFile(filePath);
    if (!parsed) return null;
    const site = this.locate(parsed, line - 1);
    if (!site) return null;
    const doc = this.docNode(parsed, site);
    return doc ? this.readDoc(parsed.text(doc)) : null;
  }

  async insertDoc(filePath: string, line: number, text: string): Promise<Result<InsertReport, DocfactsError>> {
    const file = await readSourceFile(filePath, this.language);
    if (!file.ok) return file;
    const source = file.value.text;

    let parsed: ParsedSource;
    try {
      parsed = this.parse(source);
    } catch (error) {
      if (error instanceof ToolUnavailableError) return Err(error);
      throw error;
    }

    const site = this.locate(parsed, line - 1);
    if (!site) {
      return Err(new DocInsertionError('no declaration starts on this line', filePath, line));
    }
    const planned = this.planDoc(parsed, site, text);
    if (!planned.ok) {
      return Err(new DocInsertionError(planned.error, filePath, line));
    }

    const edit = planned.value;
    const lines = [...parsed.source.lines];
    lines.splice(edit.startRow, edit.deleteCount, ...edit.lines);
    try {
      await fs.writeFile(filePath, SourceText.join(lines, parsed.source.eol), 'utf8');
    } catch (error) {
      return Err(new FileIoError('write', filePath, true, getErrorMessage(error)));
    }

    const shift = edit.lines.length - edit.deleteCount;
    const declarationRow = site.row >= edit.startRow + edit.deleteCount ? site.row + shift : site.row;
    return Ok({
      declarationLine: declarationRow + 1,
      docStartLine: edit.startRow + 1,
      docEndLine: edit.startRow + edit.lines.length,
      replaced: edit.deleteCount > 0,
    });
  }

  async gatherFacts(filePath: string, functionName?: string): Promise<DependencyFacts> {
    const parsed = await this.parseFile(filePath);
    if (!parsed) return { calls: [], imports: [] };
    const imports = this.profile.imports(parsed.root, parsed);
    if (functionName === undefined) {
      return { calls: this.profile.calls(parsed.root, parsed), imports };
    }
    const scope = this.findFunction(parsed, functionName);
    return { calls: scope ? this.profile.calls(scope, parsed) : [], imports };
  }

  async validate(target: ValidationTarget): Promise<ValidationResult> {
    let source: string;
    let filePath: string | undefined;
    if ('path' in target) {
      filePath = target.path;
      try {
        source = await fs.readFile(target.path, 'utf8');
      } catch (error) {
        return Err(new SourceSyntaxError(`file could not be read: ${getErrorMessage(error)}`, filePath));
      }
    } else {
      source = target.source;
    }
    return this.validateSource(source, filePath);
  }

  validateSource(source: string, filePath?: string): ValidationResult {
    let parsed: ParsedSource;
    try {
      parsed = this.parse(source);
    } catch (error) {
      if (error instanceof ToolUnavailableError) return Err(error);
      throw error;
    }
    const problem = findSyntaxProblem(parsed.root);
    if (problem) {
      const detail = problem.type === 'ERROR' ? 'unexpected syntax' : `missing ${problem.type}`;
      return Err(new SourceSyntaxError(detail, filePath, problem.startPosition.row + 1));
    }
    return Ok(undefined);
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  protected async parseFile(filePath: string): Promise<ParsedSource | null> {
    let source: string;
    try {
      source = await fs.readFile(filePath, 'utf8');
    } catch {
      return null;
    }
    try {
      return this.parse(source);
    } catch (error) {
      if (error instanceof ToolUnavailableError) return null;
      throw error;
    }
  }

  /** First function, in source order, whose name is `name`. */
  protected findFunction(parsed: ParsedSource, name: string): SyntaxNode | null {
    let found: SyntaxNode | null = null;
    walkNamed(parsed.root, (node) => {
      if (found) return false;
      if (this.profile.isFunction(node) && this.nameOf(node, parsed) === name) {
        found = node;
        return false;
      }
      return true;
    });
    return found;
  }
}
