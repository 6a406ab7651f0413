/**
 * @fileoverview JavaScript / TypeScript adapter (tree-sitter-javascript, tree-sitter-typescript)
 *
 * Documentation is the JSDoc block on the lines directly above a
 * declaration. The anchor is the outermost node starting on the declaration
 * line, so `export function` keeps its comment above `export`.
 */

import { Err, Ok, type Result } from '../core/result.js';
import type { DecoratorInfo, ExceptionInfo, LanguageId, ParameterInfo, ParsedFunction } from '../types.js';
import { TreeSitterAdapter, type DeclarationSite, type DocEdit, type ModuleSummary } from './base_adapter.js';
import { normalizeDocText, trimBlankEdges } from './doc_text.js';
import { hasChildOfType, stripQuotes, walkNamed, type GrammarSpec, type ParsedSource, type SyntaxNode } from './tree_sitter.js';
import type { FunctionSite, SourceDiscovery, SyntaxProfile } from './types.js';

const FUNCTION_TYPES = new Set([
  'function_declaration',
  'generator_function_declaration',
  'function_expression',
  'function',
  'generator_function',
  'arrow_function',
  'method_definition',
]);
const FUNCTION_VALUE_TYPES = new Set(['arrow_function', 'function_expression', 'function', 'generator_function']);
const CLASS_TYPES = new Set(['class_declaration', 'abstract_class_declaration']);
const TYPE_DECLARATION_TYPES = new Set([
  'class_declaration',
  'abstract_class_declaration',
  'interface_declaration',
  'type_alias_declaration',
  'enum_declaration',
]);
const VARIABLE_TYPES = new Set(['lexical_declaration', 'variable_declaration']);
const FIELD_TYPES = new Set(['field_definition', 'public_field_definition']);
const SCOPE_TYPES = new Set([...FUNCTION_TYPES, 'class_declaration', 'class', 'abstract_class_declaration']);
const BRANCH_TYPES = new Set([
  'if_statement',
  'for_statement',
  'for_in_statement',
  'while_statement',
  'do_statement',
  'catch_clause',
  'ternary_expression',
  'switch_case',
]);
const LOGICAL_OPERATORS = new Set(['&&', '||', '??']);
const NESTING_TYPES = new Set([
  'if_statement',
  'for_statement',
  'for_in_statement',
  'while_statement',
  'do_statement',
  'try_statement',
  'switch_statement',
]);
const CONDITIONAL_CONTEXT_TYPES = new Set([
  'if_statement',
  'else_clause',
  'for_statement',
  'for_in_statement',
  'while_statement',
  'do_statement',
  'catch_clause',
  'switch_case',
  'switch_default',
  'ternary_expression',
]);

// ============================================================================
// DIALECTS
// ============================================================================

export type EcmaDialect = 'javascript' | 'typescript' | 'tsx';

interface DialectSpec {
  readonly language: LanguageId;
  readonly extensions: readonly string[];
  readonly grammar: GrammarSpec;
}

const DIALECTS: Record<EcmaDialect, DialectSpec> = {
  javascript: {
    language: 'javascript',
    extensions: ['.js', '.mjs', '.cjs', '.jsx'],
    grammar: { moduleName: 'tree-sitter-javascript' },
  },
  typescript: {
    language: 'typescript',
    extensions: ['.ts', '.mts', '.cts'],
    grammar: { moduleName: 'tree-sitter-typescript', exportName: 'typescript' },
  },
  tsx: {
    language: 'typescript',
    extensions: ['.tsx'],
    grammar: { moduleName: 'tree-sitter-typescript', exportName: 'tsx' },
  },
};

// ============================================================================
// PROFILE
// ============================================================================

function walkOwnScope(fn: SyntaxNode, visitor: (node: SyntaxNode) => void): void {
  const body = fn.childForFieldName('body');
  if (!body) return;
  walkNamed(body, (node) => {
    if (SCOPE_TYPES.has(node.type)) return false;
    visitor(node);
    return true;
  });
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

/** `name`, `object.prop`, or `prop` for a callee or constructor expression. */
function calleeName(node: SyntaxNode, parsed: ParsedSource): string | null {
  if (node.type === 'identifier') return parsed.text(node);
  if (node.type !== 'member_expression') return null;
  const property = node.childForFieldName('property');
  const object = node.childForFieldName('object');
  if (!property) return null;
  const name = parsed.text(property);
  if (object && (object.type === 'identifier' || object.type === 'this' || object.type === 'super')) {
    return `${parsed.text(object)}.${name}`;
  }
  if (object?.type === 'member_expression') {
    const base = object.childForFieldName('property');
    return base ? `${parsed.text(base)}.${name}` : name;
  }
  return name;
}

function stringArgument(args: SyntaxNode | null, parsed: ParsedSource): string | null {
  const first = args?.namedChildren.find((child) => child.type !== 'comment');
  if (!first || (first.type !== 'string' && first.type !== 'template_string')) return null;
  return stripQuotes(parsed.text(first));
}

function requireTarget(node: SyntaxNode, parsed: ParsedSource): string | null {
  if (node.type !== 'call_expression') return null;
  const callee = node.childForFieldName('function');
  if (!callee || callee.type !== 'identifier' || parsed.text(callee) !== 'require') return null;
  return stringArgument(node.childForFieldName('arguments'), parsed);
}

function typeAnnotationText(node: SyntaxNode | null, parsed: ParsedSource): string | null {
  if (!node) return null;
  return parsed.text(node).replace(/^:\s*/, '').trim();
}

/** The TypeScript grammar keeps member decorators as siblings before the member. */
function leadingDecorators(node: SyntaxNode): SyntaxNode[] {
  const found: SyntaxNode[] = [];
  let previous = node.previousNamedSibling;
  while (previous?.type === 'decorator') {
    found.unshift(previous);
    previous = previous.previousNamedSibling;
  }
  return found;
}

function decoratorInfo(decorator: SyntaxNode, parsed: ParsedSource): DecoratorInfo | null {
  const expression = decorator.namedChildren.find((child) => child.type !== 'comment');
  if (!expression) return null;
  const full = parsed.text(decorator).replace(/^@\s*/, '');
  if (expression.type === 'call_expression') {
    const callee = expression.childForFieldName('function');
    const args = expression.childForFieldName('arguments');
    return {
      name: callee ? parsed.text(callee) : full,
      args: args ? args.namedChildren.filter((arg) => arg.type !== 'comment').map((arg) => parsed.text(arg)) : [],
      full,
    };
  }
  return { name: parsed.text(expression), args: [], full };
}

function parameterInfo(node: SyntaxNode, parsed: ParsedSource): ParameterInfo | null {
  switch (node.type) {
    case 'identifier':
    case 'object_pattern':
    case 'array_pattern':
      return { name: parsed.text(node), type: null, default: null, kind: 'positional' };
    case 'assignment_pattern': {
      const left = node.childForFieldName('left');
      const right = node.childForFieldName('right');
      return {
        name: left ? parsed.text(left) : parsed.text(node),
        type: null,
        default: right ? parsed.text(right) : null,
        kind: 'positional',
      };
    }
    case 'rest_pattern':
      return { name: parsed.text(node).replace(/^\.\.\./, ''), type: null, default: null, kind: 'rest' };
    case 'required_parameter':
    case 'optional_parameter': {
      const pattern = node.childForFieldName('pattern');
      if (!pattern || pattern.type === 'this') return null;
      const value = node.childForFieldName('value');
      return {
        name: parsed.text(pattern).replace(/^\.\.\./, ''),
        type: typeAnnotationText(node.childForFieldName('type'), parsed),
        default: value ? parsed.text(value) : null,
        kind: pattern.type === 'rest_pattern' ? 'rest' : 'positional',
      };
    }
    default:
      return null;
  }
}

export const ecmaProfile: SyntaxProfile = {
  parameters(fn, parsed) {
    const single = fn.childForFieldName('parameter');
    if (single) {
      return [{ name: parsed.text(single), type: null, default: null, kind: 'positional' }];
    }
    const list = fn.childForFieldName('parameters');
    if (!list) return [];
    const params: ParameterInfo[] = [];
    for (const child of list.namedChildren) {
      const info = parameterInfo(child, parsed);
      if (info) params.push(info);
    }
    return params;
  },

  returnType(fn, parsed) {
    return typeAnnotationText(fn.childForFieldName('return_type'), parsed);
  },

  isAsync(fn) {
    return hasChildOfType(fn, 'async');
  },

  isGenerator(fn) {
    return fn.type.includes('generator') || hasChildOfType(fn, '*');
  },

  decorators(fn, parsed) {
    const holders = [fn];
    if (fn.parent?.type === 'export_statement') holders.push(fn.parent);
    const result: DecoratorInfo[] = [];
    for (const decorator of leadingDecorators(fn)) {
      const info = decoratorInfo(decorator, parsed);
      if (info) result.push(info);
    }
    for (const holder of holders) {
      for (const child of holder.namedChildren) {
        if (child.type !== 'decorator') continue;
        const info = decoratorInfo(child, parsed);
        if (info) result.push(info);
      }
    }
    return result;
  },

  raises(fn, parsed) {
    const result: ExceptionInfo[] = [];
    walkOwnScope(fn, (node) => {
      if (node.type !== 'throw_statement') return;
      const conditional = isUnder(node, fn, CONDITIONAL_CONTEXT_TYPES);
      const expression = node.namedChildren.find((child) => child.type !== 'comment');
      if (!expression) {
        result.push({ type: null, message: null, conditional });
        return;
      }
      if (expression.type === 'new_expression' || expression.type === 'call_expression') {
        const callee = expression.childForFieldName(expression.type === 'new_expression' ? 'constructor' : 'function');
        result.push({
          type: callee ? parsed.text(callee) : null,
          message: stringArgument(expression.childForFieldName('arguments'), parsed),
          conditional,
        });
        return;
      }
      result.push({ type: parsed.text(expression), message: null, conditional });
    });
    return result;
  },

  branchWeight(node) {
    if (BRANCH_TYPES.has(node.type)) return 1;
    if (node.type === 'binary_expression') {
      const operator = node.childForFieldName('operator');
      return operator && LOGICAL_OPERATORS.has(operator.type) ? 1 : 0;
    }
    return 0;
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
      let callee: SyntaxNode | null = null;
      if (node.type === 'call_expression') callee = node.childForFieldName('function');
      else if (node.type === 'new_expression') callee = node.childForFieldName('constructor');
      if (!callee) return;
      const name = calleeName(callee, parsed);
      if (name) names.add(name);
    });
    return [...names].sort();
  },

  imports(root, parsed) {
    const names = new Set<string>();
    for (const statement of root.namedChildren) {
      if (statement.type === 'import_statement' || statement.type === 'export_statement') {
        const source = statement.childForFieldName('source');
        if (source) names.add(stripQuotes(parsed.text(source)));
      } else if (VARIABLE_TYPES.has(statement.type)) {
        for (const declarator of statement.namedChildren) {
          const value = declarator.childForFieldName('value');
          const target = value ? requireTarget(value, parsed) : null;
          if (target) names.add(target);
        }
      } else if (statement.type === 'expression_statement') {
        const expression = statement.namedChildren[0];
        const target = expression ? requireTarget(expression, parsed) : null;
        if (target) names.add(target);
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

/** Function value of a variable statement or class field, if it holds one. */
function functionValue(node: SyntaxNode): SyntaxNode | null {
  if (VARIABLE_TYPES.has(node.type)) {
    const declarator = node.namedChildren.find((child) => child.type === 'variable_declarator');
    const value = declarator?.childForFieldName('value');
    return value && FUNCTION_VALUE_TYPES.has(value.type) ? value : null;
  }
  if (FIELD_TYPES.has(node.type)) {
    const value = node.childForFieldName('value');
    return value && FUNCTION_VALUE_TYPES.has(value.type) ? value : null;
  }
  return null;
}

function unwrapExport(node: SyntaxNode): SyntaxNode {
  if (node.type !== 'export_statement') return node;
  return node.childForFieldName('declaration') ?? node;
}

export class JavaScriptAdapter extends TreeSitterAdapter {
  readonly language: LanguageId;
  readonly extensions: readonly string[];
  readonly commentDelimiters = ['/**', '*/'] as const;
  readonly profile = ecmaProfile;

  constructor(discovery: SourceDiscovery, readonly dialect: EcmaDialect = 'javascript') {
    super(DIALECTS[dialect].grammar, discovery);
    this.language = DIALECTS[dialect].language;
    this.extensions = DIALECTS[dialect].extensions;
  }

  locate(parsed: ParsedSource, row: number): DeclarationSite | null {
    let site: DeclarationSite | null = null;
    walkNamed(parsed.root, (node) => {
      if (site || node.startPosition.row > row || node.endPosition.row < row) return false;
      if (node.startPosition.row !== row) return true;
      const anchorOf = (declaration: SyntaxNode): SyntaxNode => {
        if (declaration.parent?.type === 'export_statement' && declaration.parent.startPosition.row === row) {
          return declaration.parent;
        }
        return leadingDecorators(declaration)[0] ?? declaration;
      };

      if (
        node.type === 'function_declaration' ||
        node.type === 'generator_function_declaration' ||
        node.type === 'method_definition' ||
        CLASS_TYPES.has(node.type)
      ) {
        site = { node, anchor: anchorOf(node), row };
        return false;
      }
      const value = functionValue(node);
      if (value) {
        site = { node: value, anchor: anchorOf(node), row };
        return false;
      }
      return true;
    });
    return site;
  }

  docNode(parsed: ParsedSource, site: DeclarationSite): SyntaxNode | null {
    const previous = site.anchor.previousNamedSibling;
    if (!previous || previous.type !== 'comment') return null;
    if (previous.endPosition.row !== site.anchor.startPosition.row - 1) return null;
    if (!parsed.text(previous).startsWith('/**') || !parsed.startsLine(previous)) return null;
    return previous;
  }

  planDoc(parsed: ParsedSource, site: DeclarationSite, text: string): Result<DocEdit, string> {
    if (!parsed.startsLine(site.anchor)) {
      return Err('declaration does not start its line');
    }
    const anchorRow = site.anchor.startPosition.row;
    const lines = this.renderDoc(text, parsed.indentOf(anchorRow));
    const existing = this.docNode(parsed, site);
    if (existing) {
      const startRow = existing.startPosition.row;
      return Ok({ startRow, deleteCount: anchorRow - startRow, lines });
    }
    return Ok({ startRow: anchorRow, deleteCount: 0, lines });
  }

  nameOf(node: SyntaxNode, parsed: ParsedSource): string | null {
    const own = node.childForFieldName('name');
    if (own) return parsed.text(own);
    const parent = node.parent;
    if (!parent) return null;
    if (parent.type === 'variable_declarator') {
      const name = parent.childForFieldName('name');
      return name ? parsed.text(name) : null;
    }
    if (FIELD_TYPES.has(parent.type)) {
      const name = parent.childForFieldName('property') ?? parent.childForFieldName('name');
      return name ? parsed.text(name) : null;
    }
    return null;
  }

  renderDoc(text: string, indent: string): string[] {
    const lines = normalizeDocText(text).map((line) => line.replace(/\*\//g, '*\\/'));
    return [`${indent}/**`, ...lines.map((line) => (line ? `${indent} * ${line}` : `${indent} *`)), `${indent} */`];
  }

  readDoc(raw: string): string {
    const inner = raw.replace(/^\/\*\*/, '').replace(/\*\/$/, '');
    const lines = inner
      .split(/\r?\n/)
      .map((line, index) => (index === 0 ? line.trim() : line.replace(/^\s*\*( |$)?/, '').trimEnd()))
      .map((line) => line.replace(/\*\\\//g, '*/'));
    return trimBlankEdges(lines).join('\n');
  }

  functionSites(parsed: ParsedSource, _filePath: string): FunctionSite[] {
    const imports = this.profile.imports(parsed.root, parsed);
    const sites: FunctionSite[] = [];
    for (const child of parsed.root.namedChildren) {
      const statement = unwrapExport(child);
      if (statement.type === 'function_declaration' || statement.type === 'generator_function_declaration') {
        sites.push(this.site(parsed, statement, statement, null, imports));
        continue;
      }
      const value = functionValue(statement);
      if (value) {
        sites.push(this.site(parsed, value, statement, null, imports));
        continue;
      }
      if (!CLASS_TYPES.has(statement.type)) continue;
      const className = this.nameOf(statement, parsed);
      const body = statement.childForFieldName('body');
      for (const member of body?.namedChildren ?? []) {
        if (member.type === 'method_definition') {
          sites.push(this.site(parsed, member, member, className, imports));
        } else {
          const fieldValue = functionValue(member);
          if (fieldValue) sites.push(this.site(parsed, fieldValue, member, className, imports));
        }
      }
    }
    return sites;
  }

  summarize(parsed: ParsedSource): ModuleSummary {
    const types: string[] = [];
    for (const child of parsed.root.namedChildren) {
      const statement = unwrapExport(child);
      if (!TYPE_DECLARATION_TYPES.has(statement.type)) continue;
      const name = statement.childForFieldName('name');
      if (name) types.push(parsed.text(name));
    }

    let moduleDoc: string | null = null;
    const first = parsed.root.namedChildren[0];
    if (first?.type === 'comment' && parsed.text(first).startsWith('/**')) {
      const next = first.nextNamedSibling;
      if (!next || next.startPosition.row > first.endPosition.row + 1) {
        moduleDoc = this.readDoc(parsed.text(first));
      }
    }
    return { types, moduleDoc };
  }

  /**
   * @param node function node the profile inspects
   * @param head node whose first line is the declaration line
   */
  private site(
    parsed: ParsedSource,
    node: SyntaxNode,
    head: SyntaxNode,
    parentType: string | null,
    imports: string[],
  ): FunctionSite {
    const name = this.nameOf(node, parsed) ?? '<anonymous>';
    const body = node.childForFieldName('body');
    const located = this.locate(parsed, head.startPosition.row);
    const doc = located ? this.docNode(parsed, located) : null;
    const fn: ParsedFunction = {
      name,
      signature: body ? parsed.range(head.startIndex, body.startIndex).trim() : parsed.text(head),
      body: body ? parsed.text(body) : '',
      docstring: doc ? this.readDoc(parsed.text(doc)) : null,
      startLine: head.startPosition.row + 1,
      endLine: Math.max(head.endPosition.row, node.endPosition.row) + 1,
      decorators: this.profile.decorators(node, parsed).map((decorator) => decorator.name),
      isAsync: this.profile.isAsync(node),
      isMethod: parentType !== null,
      isPrivate: name.startsWith('_') || name.startsWith('#'),
      isGenerator: this.profile.isGenerator(node),
      parentType,
      calls: this.profile.calls(node, parsed),
      imports,
      metadata: { kind: parentType ? 'method' : FUNCTION_VALUE_TYPES.has(node.type) ? 'expression' : 'function' },
    };
    return { fn, node };
  }
}
