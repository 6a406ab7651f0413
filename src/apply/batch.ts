import type { DocStyle, Facts } from '../types.js';
import type { ApplyOutcome, TwoPhaseApplier } from './two_phase.js';

export interface LineRequest {
  line: number;
  narrative: string;
  facts: Facts;
  style: DocStyle;
  dryRun?: boolean;
}

/**
 * Highest line first: an edit only moves the lines below it, so every
 * request still waiting in the queue keeps a valid line number.
 */
export function orderForApply<T extends { line: number }>(requests: readonly T[]): T[] {
  return [...requests].sort((a, b) => b.line - a.line);
}

/**
 * Apply several documentation edits to one file. Outcomes come back in
 * processing order; a rejection does not stop the rest.
 */
export async function applyBatch(
  applier: TwoPhaseApplier,
  filePath: string,
  requests: readonly LineRequest[],
): Promise<ApplyOutcome[]> {
  const outcomes: ApplyOutcome[] = [];
  for (const request of orderForApply(requests)) {
    outcomes.push(await applier.apply({ ...request, filePath }));
  }
  return outcomes;
}
