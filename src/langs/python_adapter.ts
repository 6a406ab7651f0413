/**
 * @fileoverview Python adapter (tree-sitter-python)
 *
 * Documentation lives in the docstring: the first statement of a def/class
 * body when it is a string literal.
 */

import { Err, Ok, type Result } from '../core/result.js';
import type { DecoratorInfo, ExceptionInfo, ParameterInfo, ParameterKind, ParsedFunction } from '../types.js';
import { TreeSitterAdapter, type DeclarationSite, type DocEdit, type ModuleSummary } from './base_adapter.js';
import { dedentDocLines, normalizeDocText } from './doc_text.js';
import { hasChildOfType, walkNamed, type ParsedSource, type SyntaxNode } from './tree_sitter.js';
import type { FunctionSite, SourceDiscovery, SyntaxProfile } from './types.js';

const FUNCTION_TYPES = new Set(['function_definition', 'lambda']);
const SCOPE_TYPES = new Set(['function_definition', 'lambda', 'class_definition']);
const BRANCH_TYPES = new Set([
  'if_statement',
  'elif_clause',
  'for_statement',
  'while_statement',
  'except_clause',
  'conditional_expression',
  'if_clause',
  'case_clause',
  'boolean_operator',
]);
const NESTING_TYPES = new Set([
  'if_statement',
  'for_statement',
  'while_statement',
  'try_statement',
  'with_statement',
  'match_statement',
]);
const CONDITIONAL_CONTEXT_TYPES = new Set([
  'if_statement',
  'elif_clause',
  'else_clause',
  'for_statement',
  'while_statement',
  'except_clause',
  'case_clause',
  'conditional_expression',
]);

// ============================================================================
// STRING LITERALS
// ============================================================================

/** Decode a Python string literal's source text (prefix, quotes, escapes). */
export function decodePythonString(literal: string): string {
  const match = /^([rRuUbBfF]*)("""|'''|"|')([\s\S]*)\2$/.exec(literal.trim());
  if (!match) return literal;
  const [, prefix, , inner] = match;
  if (/[rR]/.test(prefix)) return inner;
  return inner.replace(/\\(["'\\])/g, '$1');
}

// ============================================================================
// PROFILE
// ============================================================================

function firstStatement(block: SyntaxNode): SyntaxNode | null {
  return block.namedChildren.find((child) => child.type !== 'comment') ?? null;
}

function docstringNode(definition: SyntaxNode): SyntaxNode | null {
  const body = definition.childForFieldName('body');
  if (!body) return null;
  return leadingString(body);
}

function leadingString(container: SyntaxNode): SyntaxNode | null {
  const first = firstStatement(container);
  if (!first || first.type !== 'expression_statement') return null;
  const expressions = first.namedChildren.filter((child) => child.type !== 'comment');
  if (expressions.length !== 1 || expressions[0].type !== 'string') return null;
  return expressions[0];
}

function unwrapDecorated(node: SyntaxNode): SyntaxNode {
  if (node.type !== 'decorated_definition') return node;
  return node.childForFieldName('definition') ?? node;
}

function walkOwnScope(fn: SyntaxNode, visitor: (node: SyntaxNode) => void): void {
  const body = fn.childForFieldName('body');
  if (!body) return;
  walkNamed(body, (node) => {
    if (SCOPE_TYPES.has(node.type)) return false;
    visitor(node);
    return true;
  });
}

function callName(call: SyntaxNode, parsed: ParsedSource): string | null {
  const target = call.childForFieldName('function');
  if (!target) return null;
  if (target.type === 'identifier') return parsed.text(target);
  if (target.type !== 'attribute') return null;
  const attr = target.childForFieldName('attribute');
  const object = target.childForFieldName('object');
  if (!attr) return null;
  const name = parsed.text(attr);
  if (object?.type === 'identifier') return `${parsed.text(object)}.${name}`;
  if (object?.type === 'attribute') {
    const base = object.childForFieldName('attribute');
    return base ? `${parsed.text(base)}.${name}` : name;
  }
  return name;
}

function isUnder(node: SyntaxNode, stop: SyntaxNode, types: ReadonlySet<string>): boolean {
  let current = node.parent;
  while (current && current.startIndex >= stop.startIndex && current.endIndex <= stop.endIndex) {
    if (current.startIndex === stop.startIndex && current.type === stop.type) return false;
    if (types.has(current.type)) return true;
    current = current.parent;
  }
  return false;
}

type MutableParameter = { name: string; type: string | null; default: string | null; kind: ParameterKind };

export const pythonProfile: SyntaxProfile = {
  parameters(fn, parsed) {
    const list = fn.childForFieldName('parameters');
    if (!list) return [];
    const params: MutableParameter[] = [];
    let keywordOnly = false;
    const plainKind = (): ParameterKind => (keywordOnly ? 'keyword_only' : 'positional_or_keyword');
    const fieldText = (node: SyntaxNode, field: string): string | null => {
      const child = node.childForFieldName(field);
      return child ? parsed.text(child) : null;
    };

    for (const child of list.children) {
      switch (child.type) {
        case 'identifier':
          params.push({ name: parsed.text(child), type: null, default: null, kind: plainKind() });
          break;
        case 'typed_parameter': {
          const inner = child.namedChildren[0];
          const type = fieldText(child, 'type');
          if (inner?.type === 'list_splat_pattern') {
            params.push({ name: parsed.text(inner).replace(/^\*/, ''), type, default: null, kind: 'var_positional' });
            keywordOnly = true;
          } else if (inner?.type === 'dictionary_splat_pattern') {
            params.push({ name: parsed.text(inner).replace(/^\*\*/, ''), type, default: null, kind: 'var_keyword' });
          } else if (inner) {
            params.push({ name: parsed.text(inner), type, default: null, kind: plainKind() });
          }
          break;
        }
        case 'default_parameter':
          params.push({
            name: fieldText(child, 'name') ?? '',
            type: null,
            default: fieldText(child, 'value'),
            kind: plainKind(),
          });
          break;
        case 'typed_default_parameter':
          params.push({
            name: fieldText(child, 'name') ?? '',
            type: fieldText(child, 'type'),
            default: fieldText(child, 'value'),
            kind: plainKind(),
          });
          break;
        case 'list_splat_pattern':
          params.push({ name: parsed.text(child).replace(/^\*/, ''), type: null, default: null, kind: 'var_positional' });
          keywordOnly = true;
          break;
        case 'dictionary_splat_pattern':
          params.push({ name: parsed.text(child).replace(/^\*\*/, ''), type: null, default: null, kind: 'var_keyword' });
          break;
        case '*':
        case 'keyword_separator':
          keywordOnly = true;
          break;
        case '/':
        case 'positional_separator':
          for (const param of params) param.kind = 'positional_only';
          break;
        default:
          break;
      }
    }
    return params;
  },

  returnType(fn, parsed) {
    const node = fn.childForFieldName('return_type');
    return node ? parsed.text(node) : null;
  },

  isAsync(fn) {
    return hasChildOfType(fn, 'async');
  },

  isGenerator(fn) {
    let found = false;
    walkOwnScope(fn, (node) => {
      if (node.type === 'yield') found = true;
    });
    return found;
  },

  decorators(fn, parsed) {
    const wrapper = fn.parent;
    if (!wrapper || wrapper.type !== 'decorated_definition') return [];
    const result: DecoratorInfo[] = [];
    for (const decorator of wrapper.namedChildren) {
      if (decorator.type !== 'decorator') continue;
      const expression = decorator.namedChildren.find((child) => child.type !== 'comment');
      if (!expression) continue;
      const full = parsed.text(decorator).replace(/^@\s*/, '');
      if (expression.type === 'call') {
        const target = expression.childForFieldName('function');
        const args = expression.childForFieldName('arguments');
        result.push({
          name: target ? parsed.text(target) : full,
          args: args ? args.namedChildren.filter((arg) => arg.type !== 'comment').map((arg) => parsed.text(arg)) : [],
          full,
        });
      } else {
        result.push({ name: parsed.text(expression), args: [], full });
      }
    }
    return result;
  },

  raises(fn, parsed) {
    const result: ExceptionInfo[] = [];
    walkOwnScope(fn, (node) => {
      if (node.type !== 'raise_statement') return;
      const conditional = isUnder(node, fn, CONDITIONAL_CONTEXT_TYPES);
      const expression = node.namedChildren.find((child) => child.type !== 'comment');
      if (!expression) {
        result.push({ type: null, message: null, conditional });
        return;
      }
      if (expression.type === 'call') {
        const target = expression.childForFieldName('function');
        const first = expression.childForFieldName('arguments')?.namedChildren[0];
        result.push({
          type: target ? parsed.text(target) : null,
          message: first?.type === 'string' ? decodePythonString(parsed.text(first)) : null,
          conditional,
        });
        return;
      }
      result.push({ type: parsed.text(expression), message: null, conditional });
    });
    return result;
  },

  branchWeight(node) {
    return BRANCH_TYPES.has(node.type) ? 1 : 0;
  },

  isNesting(node) {
    return NESTING_TYPES.has(node.type);
  },

  isFunction(node) {
    return FUNCTION_TYPES.has(node.type);
  },

  calls(scope, parsed) {
    const names = new Set<string>();
    walkNamed(scope, (node) => {
      if (node.type !== 'call') return;
      const name = callName(node, parsed);
      if (name) names.add(name);
    });
    return [...names].sort();
  },

  imports(root, parsed) {
    const names = new Set<string>();
    const importedName = (node: SyntaxNode): string | null => {
      if (node.type === 'dotted_name') return parsed.text(node);
      if (node.type === 'aliased_import') {
        const name = node.childForFieldName('name');
        return name ? parsed.text(name) : null;
      }
      if (node.type === 'wildcard_import') return '*';
      return null;
    };

    for (const statement of root.namedChildren) {
      if (statement.type === 'import_statement') {
        for (const child of statement.namedChildren) {
          const name = importedName(child);
          if (name) names.add(name);
        }
      } else if (statement.type === 'import_from_statement' || statement.type === 'future_import_statement') {
        const moduleNode = statement.childForFieldName('module_name');
        const module = statement.type === 'future_import_statement'
          ? '__future__'
          : moduleNode ? parsed.text(moduleNode).replace(/^\.+/, '') : '';
        for (const child of statement.namedChildren) {
          if (moduleNode && child.startIndex === moduleNode.startIndex) continue;
          const name = importedName(child);
          if (name) names.add(module ? `${module}.${name}` : name);
        }
      }
    }
    return [...names].sort();
  },

  body(fn) {
    return fn.childForFieldName('body');
  },
};

// ============================================================================
// ADAPTER
// ============================================================================

export class PythonAdapter extends TreeSitterAdapter {
  readonly language = 'python' as const;
  readonly extensions = ['.py', '.pyi'] as const;
  readonly commentDelimiters = ['"""', '"""'] as const;
  readonly profile = pythonProfile;

  constructor(discovery: SourceDiscovery) {
    super({ moduleName: 'tree-sitter-python' }, discovery);
  }

  locate(parsed: ParsedSource, row: number): DeclarationSite | null {
    let site: DeclarationSite | null = null;
    walkNamed(parsed.root, (node) => {
      if (site || node.startPosition.row > row || node.endPosition.row < row) return false;
      if ((node.type === 'function_definition' || node.type === 'class_definition') && node.startPosition.row === row) {
        const anchor = node.parent?.type === 'decorated_definition' ? node.parent : node;
        site = { node, anchor, row };
        return false;
      }
      return true;
    });
    return site;
  }

  docNode(_parsed: ParsedSource, site: DeclarationSite): SyntaxNode | null {
    return docstringNode(site.node);
  }

  planDoc(parsed: ParsedSource, site: DeclarationSite, text: string): Result<DocEdit, string> {
    const body = site.node.childForFieldName('body');
    const first = body ? firstStatement(body) : null;
    if (!first) {
      return Err('declaration has no body');
    }
    if (!parsed.startsLine(first)) {
      return Err('body shares a line with the declaration header');
    }

    const existing = docstringNode(site.node);
    const statement = existing?.parent ?? null;
    if (existing && statement) {
      const next = statement.nextNamedSibling;
      if (!parsed.startsLine(statement) || (next && next.startPosition.row === statement.endPosition.row)) {
        return Err('docstring shares a line with other code');
      }
      const startRow = statement.startPosition.row;
      return Ok({
        startRow,
        deleteCount: statement.endPosition.row - startRow + 1,
        lines: this.renderDoc(text, parsed.indentOf(startRow)),
      });
    }

    const startRow = first.startPosition.row;
    return Ok({ startRow, deleteCount: 0, lines: this.renderDoc(text, parsed.indentOf(startRow)) });
  }

  nameOf(node: SyntaxNode, parsed: ParsedSource): string | null {
    const name = node.childForFieldName('name');
    return name ? parsed.text(name) : null;
  }

  renderDoc(text: string, indent: string): string[] {
    const lines = normalizeDocText(text).map((line) =>
      line.replace(/\\/g, '\\\\').replace(/"""/g, '\\"\\"\\"'),
    );
    return [`${indent}"""`, ...lines.map((line) => (line ? `${indent}${line}` : '')), `${indent}"""`];
  }

  readDoc(raw: string): string {
    return dedentDocLines(decodePythonString(raw).split(/\r?\n/)).join('\n');
  }

  functionSites(parsed: ParsedSource, _filePath: string): FunctionSite[] {
    const imports = this.profile.imports(parsed.root, parsed);
    const sites: FunctionSite[] = [];
    for (const child of parsed.root.namedChildren) {
      const definition = unwrapDecorated(child);
      if (definition.type === 'function_definition') {
        sites.push({ node: definition, fn: this.buildFunction(parsed, definition, null, imports) });
      } else if (definition.type === 'class_definition') {
        const className = this.nameOf(definition, parsed);
        const body = definition.childForFieldName('body');
        for (const member of body?.namedChildren ?? []) {
          const method = unwrapDecorated(member);
          if (method.type !== 'function_definition') continue;
          sites.push({ node: method, fn: this.buildFunction(parsed, method, className, imports) });
        }
      }
    }
    return sites;
  }

  summarize(parsed: ParsedSource): ModuleSummary {
    const types: string[] = [];
    for (const child of parsed.root.namedChildren) {
      const definition = unwrapDecorated(child);
      if (definition.type !== 'class_definition') continue;
      const name = this.nameOf(definition, parsed);
      if (name) types.push(name);
    }
    const moduleDoc = leadingString(parsed.root);
    return { types, moduleDoc: moduleDoc ? this.readDoc(parsed.text(moduleDoc)) : null };
  }

  private buildFunction(
    parsed: ParsedSource,
    node: SyntaxNode,
    parentType: string | null,
    imports: string[],
  ): ParsedFunction {
    const name = this.nameOf(node, parsed) ?? '<anonymous>';
    const body = node.childForFieldName('body');
    const doc = docstringNode(node);
    const dunder = name.startsWith('__') && name.endsWith('__');
    return {
      name,
      signature: body ? parsed.range(node.startIndex, body.startIndex).trim() : parsed.text(node),
      body: body ? parsed.text(body) : '',
      docstring: doc ? this.readDoc(parsed.text(doc)) : null,
      startLine: node.startPosition.row + 1,
      endLine: node.endPosition.row + 1,
      decorators: this.profile.decorators(node, parsed).map((decorator) => decorator.name),
      isAsync: this.profile.isAsync(node),
      isMethod: parentType !== null,
      isPrivate: name.startsWith('_') && !dunder,
      isGenerator: this.profile.isGenerator(node),
      parentType,
      calls: this.profile.calls(node, parsed),
      imports,
      metadata: { kind: parentType ? 'method' : 'function' },
    };
  }
}
