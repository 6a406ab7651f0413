/**
 * @fileoverview Two-phase documentation apply
 *
 * The target file is never written in place. All edits happen on a sibling
 * temp file which replaces the original by rename once both checkpoints
 * pass:
 *
 *   1. narrative inserted, temp file re-validated
 *   2. narrative + facts inserted at the same declaration, re-validated
 *
 * Any failure removes the temp file and leaves the original bytes as they
 * were. A dry run goes through both checkpoints and then discards the temp
 * file instead of renaming it.
 */

import { randomBytes } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
  FileIoError,
  UnsupportedLanguageError,
  getErrorMessage,
  type DocfactsError,
} from '../core/errors.js';
import { safeUnlink } from '../core/result.js';
import type { LanguageRegistry } from '../langs/registry.js';
import { readSourceFile } from '../langs/source_text.js';
import type { LanguageAdapter } from '../langs/types.js';
import { inject } from '../metadata/injector.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { DocStyle, Facts } from '../types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ApplyRequest {
  filePath: string;
  /** 1-based line of the declaration to document. */
  line: number;
  narrative: string;
  facts: Facts;
  style: DocStyle;
  dryRun?: boolean;
}

export type ApplyPhase = 'source' | 'narrative' | 'facts';

interface OutcomeBase {
  readonly filePath: string;
  readonly line: number;
}

export interface AppliedOutcome extends OutcomeBase {
  readonly status: 'applied';
  /** Declaration line after the edit. */
  readonly declarationLine: number;
  /** Documentation text written, facts included. */
  readonly text: string;
}

/** Dry run: both checkpoints passed, nothing written. */
export interface PlannedOutcome extends OutcomeBase {
  readonly status: 'planned';
  readonly declarationLine: number;
  readonly text: string;
}

export interface SyntaxRejection extends OutcomeBase {
  readonly status: 'rejected-syntax';
  readonly phase: ApplyPhase;
  readonly error: DocfactsError;
}

export interface IoRejection extends OutcomeBase {
  readonly status: 'rejected-io';
  readonly error: DocfactsError;
}

export type ApplyOutcome = AppliedOutcome | PlannedOutcome | SyntaxRejection | IoRejection;

export const TEMP_SUFFIX = '.docfacts.tmp';

export function tempPathFor(filePath: string): string {
  const dir = path.dirname(filePath);
  const base = path.basename(filePath);
  return path.join(dir, `.${base}.${process.pid}.${randomBytes(6).toString('hex')}${TEMP_SUFFIX}`);
}

// ============================================================================
// APPLIER
// ============================================================================

export class TwoPhaseApplier {
  constructor(private readonly registry: LanguageRegistry) {}

  async apply(request: ApplyRequest): Promise<ApplyOutcome> {
    const { filePath, line } = request;
    const syntax = (phase: ApplyPhase, error: DocfactsError): SyntaxRejection => {
      logDebug('[docfacts] apply rejected', { filePath, line, phase, error: error.message });
      return { status: 'rejected-syntax', filePath, line, phase, error };
    };
    const io = (error: DocfactsError): IoRejection => {
      logDebug('[docfacts] apply rejected', { filePath, line, error: error.message });
      return { status: 'rejected-io', filePath, line, error };
    };

    const adapter = this.registry.resolve(filePath);
    if (!adapter) {
      return io(new UnsupportedLanguageError(filePath));
    }

    const file = await readSourceFile(filePath, adapter.language);
    if (!file.ok) {
      return io(file.error);
    }
    const original = file.value.bytes;
    let mode: number;
    try {
      mode = (await fs.stat(filePath)).mode & 0o777;
    } catch (error) {
      return io(new FileIoError('stat', filePath, false, getErrorMessage(error)));
    }

    const sourceCheck = await adapter.validate({ source: file.value.text });
    if (!sourceCheck.ok) {
      return syntax('source', sourceCheck.error);
    }

    const tempPath = tempPathFor(filePath);
    try {
      await fs.writeFile(tempPath, original, { flag: 'wx', mode });
      await fs.chmod(tempPath, mode);
    } catch (error) {
      await this.discard(tempPath);
      return io(new FileIoError('create-temp', tempPath, true, getErrorMessage(error)));
    }

    let outcome: ApplyOutcome;
    try {
      outcome = await this.runPhases(adapter, tempPath, request, syntax, io);
    } catch (error) {
      await this.discard(tempPath);
      throw error;
    }
    if (outcome.status !== 'applied') {
      await this.discard(tempPath);
    }
    return outcome;
  }

  private async runPhases(
    adapter: LanguageAdapter,
    tempPath: string,
    request: ApplyRequest,
    syntax: (phase: ApplyPhase, error: DocfactsError) => SyntaxRejection,
    io: (error: DocfactsError) => IoRejection,
  ): Promise<ApplyOutcome> {
    const { filePath, line } = request;

    const narrative = await adapter.insertDoc(tempPath, line, request.narrative);
    if (!narrative.ok) {
      return narrative.error instanceof FileIoError ? io(narrative.error) : syntax('narrative', narrative.error);
    }
    const narrativeCheck = await adapter.validate({ path: tempPath });
    if (!narrativeCheck.ok) {
      return syntax('narrative', narrativeCheck.error);
    }

    const text = inject(request.narrative, request.facts, request.style);
    const withFacts = await adapter.insertDoc(tempPath, narrative.value.declarationLine, text);
    if (!withFacts.ok) {
      return withFacts.error instanceof FileIoError ? io(withFacts.error) : syntax('facts', withFacts.error);
    }
    const factsCheck = await adapter.validate({ path: tempPath });
    if (!factsCheck.ok) {
      return syntax('facts', factsCheck.error);
    }

    if (request.dryRun) {
      return { status: 'planned', filePath, line, declarationLine: withFacts.value.declarationLine, text };
    }
    try {
      await fs.rename(tempPath, filePath);
    } catch (error) {
      return io(new FileIoError('rename', filePath, true, getErrorMessage(error)));
    }
    return { status: 'applied', filePath, line, declarationLine: withFacts.value.declarationLine, text };
  }

  private async discard(tempPath: string): Promise<void> {
    const removed = await safeUnlink(tempPath);
    if (!removed.ok) {
      logWarning('[docfacts] failed to remove temp file', { tempPath, error: removed.error.message });
    }
  }
}
