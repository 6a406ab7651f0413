/**
 * @fileoverview Static-analysis collectors
 *
 * All of these read the syntax tree only. They apply to every function.
 */

import type { ParameterInfo } from '../types.js';
import type { SyntaxNode } from '../langs/tree_sitter.js';
import type { SyntaxProfile } from '../langs/types.js';
import type { CollectorDescriptor } from './types.js';

const VARIADIC_KINDS = new Set(['var_positional', 'var_keyword', 'rest']);
const RECEIVER_NAMES = new Set(['self', 'cls']);

const always = (): boolean => true;

export const signatureCollector: CollectorDescriptor = {
  name: 'signature',
  category: 'code_analysis',
  priority: 10,
  appliesTo: always,
  collect({ fn, node, parsed, profile }) {
    const parameters = profile.parameters(node, parsed);
    const returnType = profile.returnType(node, parsed);
    return {
      signature: {
        raw: fn.signature,
        parameters,
        returnType,
        isAsync: fn.isAsync,
        isGenerator: fn.isGenerator,
        hasTypeHints: returnType !== null || parameters.some((param) => param.type !== null),
      },
    };
  },
};

export const dependenciesCollector: CollectorDescriptor = {
  name: 'dependencies',
  category: 'code_analysis',
  priority: 15,
  appliesTo: always,
  collect({ fn }) {
    return { dependencies: { calls: [...fn.calls], imports: [...fn.imports] } };
  },
};

export const decoratorsCollector: CollectorDescriptor = {
  name: 'decorators',
  category: 'code_analysis',
  priority: 20,
  appliesTo: always,
  collect({ node, parsed, profile }) {
    return { decorators: profile.decorators(node, parsed) };
  },
};

/** Parameters that count toward type coverage. */
export function coverageParameters(parameters: readonly ParameterInfo[], isMethod: boolean): ParameterInfo[] {
  return parameters.filter((param, index) => {
    if (VARIADIC_KINDS.has(param.kind)) return false;
    return !(isMethod && index === 0 && RECEIVER_NAMES.has(param.name));
  });
}

export const typeCoverageCollector: CollectorDescriptor = {
  name: 'type_coverage',
  category: 'code_analysis',
  priority: 25,
  appliesTo: always,
  collect({ fn, node, parsed, profile }) {
    const counted = coverageParameters(profile.parameters(node, parsed), fn.isMethod);
    const typed = counted.filter((param) => param.type !== null).length;
    const percent = counted.length === 0 ? 0 : Math.round((typed / counted.length) * 1000) / 10;
    return {
      typeAnalysis: {
        parametersTyped: typed,
        parametersTotal: counted.length,
        parameterCoveragePercent: percent,
        hasReturnType: profile.returnType(node, parsed) !== null,
      },
    };
  },
};

export const exceptionsCollector: CollectorDescriptor = {
  name: 'exceptions',
  category: 'code_analysis',
  priority: 30,
  appliesTo: always,
  collect({ node, parsed, profile }) {
    return { exceptions: profile.raises(node, parsed) };
  },
};

export interface ComplexityMetrics {
  readonly linesOfCode: number;
  readonly cyclomaticComplexity: number;
  readonly maxNestingDepth: number;
}

export function measureComplexity(
  fn: { startLine: number; endLine: number },
  node: SyntaxNode,
  profile: SyntaxProfile,
): ComplexityMetrics {
  let decisions = 0;
  const visit = (current: SyntaxNode): void => {
    decisions += profile.branchWeight(current);
    for (const child of current.namedChildren) visit(child);
  };
  visit(node);

  const depthOf = (current: SyntaxNode, depth: number): number => {
    let deepest = depth;
    for (const child of current.namedChildren) {
      if (profile.isFunction(child)) continue;
      const next = profile.isNesting(child) ? depth + 1 : depth;
      deepest = Math.max(deepest, depthOf(child, next));
    }
    return deepest;
  };
  const body = profile.body(node);

  return {
    linesOfCode: fn.endLine - fn.startLine + 1,
    cyclomaticComplexity: 1 + decisions,
    maxNestingDepth: body ? depthOf(body, 0) : 0,
  };
}

export const complexityCollector: CollectorDescriptor = {
  name: 'complexity',
  category: 'code_analysis',
  priority: 40,
  appliesTo: always,
  collect({ fn, node, profile }) {
    return { complexity: measureComplexity(fn, node, profile) };
  },
};

export const CODE_COLLECTORS: readonly CollectorDescriptor[] = [
  signatureCollector,
  dependenciesCollector,
  decoratorsCollector,
  typeCoverageCollector,
  exceptionsCollector,
  complexityCollector,
];
