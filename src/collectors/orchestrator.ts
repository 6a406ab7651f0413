/**
 * @fileoverview Collector orchestrator
 *
 * Runs registered collectors in priority order and folds their output into
 * one CollectedMetadata record. A failing collector is recorded under
 * `raw['<name>_error']` and never stops the others.
 */

import { CollectorError, RegistrationError, getErrorMessage } from '../core/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { CollectedMetadata, MetadataBucket, MetadataCategory } from '../types.js';
import type { CollectorContext, CollectorDescriptor, FunctionHandle, PriorityBand } from './types.js';

const CATEGORY_BUCKETS: Record<MetadataCategory, Exclude<keyof CollectedMetadata, 'functionName' | 'filePath' | 'raw'>> = {
  code_analysis: 'codeAnalysis',
  git_analysis: 'gitAnalysis',
  test_analysis: 'testAnalysis',
  runtime_analysis: 'runtimeAnalysis',
  api_analysis: 'apiAnalysis',
};

function isKnownCategory(category: string): category is MetadataCategory {
  return Object.prototype.hasOwnProperty.call(CATEGORY_BUCKETS, category);
}

/** Negative priorities are critical, above 100 optional. Not enforced. */
export function priorityBand(priority: number): PriorityBand {
  if (priority < 0) return 'critical';
  if (priority > 100) return 'optional';
  return 'standard';
}

export class CollectorOrchestrator {
  private readonly collectors: CollectorDescriptor[] = [];

  register(descriptor: CollectorDescriptor): this {
    if (descriptor.name.trim().length === 0) {
      throw new RegistrationError('collector name must not be empty');
    }
    if (!Number.isInteger(descriptor.priority)) {
      throw new RegistrationError(`collector ${descriptor.name} has non-integer priority ${descriptor.priority}`);
    }
    if (this.collectors.some((existing) => existing.name === descriptor.name)) {
      logWarning('[docfacts] duplicate collector skipped', { collector: descriptor.name });
      return this;
    }
    this.collectors.push(descriptor);
    return this;
  }

  registerAll(descriptors: Iterable<CollectorDescriptor>): this {
    for (const descriptor of descriptors) {
      this.register(descriptor);
    }
    return this;
  }

  /** Registered collectors in execution order. */
  ordered(): CollectorDescriptor[] {
    return this.collectors
      .map((descriptor, index) => ({ descriptor, index }))
      .sort((a, b) => a.descriptor.priority - b.descriptor.priority || a.index - b.index)
      .map((entry) => entry.descriptor);
  }

  names(): string[] {
    return this.ordered().map((descriptor) => descriptor.name);
  }

  async collectAll(handle: FunctionHandle, context: CollectorContext): Promise<CollectedMetadata> {
    const metadata: CollectedMetadata = {
      functionName: context.functionName,
      filePath: context.filePath,
      codeAnalysis: {},
      gitAnalysis: {},
      testAnalysis: {},
      runtimeAnalysis: {},
      apiAnalysis: {},
      raw: {},
    };

    for (const collector of this.ordered()) {
      let applies: boolean;
      try {
        applies = await collector.appliesTo(context);
      } catch (error) {
        metadata.raw[`${collector.name}_error`] = getErrorMessage(error);
        logDebug('[docfacts] collector applicability check failed', {
          collector: collector.name,
          error: getErrorMessage(error),
        });
        continue;
      }
      if (!applies) continue;

      logDebug('[docfacts] running collector', {
        collector: collector.name,
        band: priorityBand(collector.priority),
        function: context.functionName,
      });

      let output: unknown;
      try {
        output = await collector.collect(handle, context);
      } catch (error) {
        const failure = new CollectorError(collector.name, getErrorMessage(error), error instanceof Error ? error : undefined);
        metadata.raw[`${collector.name}_error`] = getErrorMessage(error);
        logDebug(`[docfacts] ${failure.message}`, failure.toJSON().details);
        continue;
      }
      if (!isPlainRecord(output)) {
        const detail = `returned ${describeOutput(output)} instead of an object`;
        const failure = new CollectorError(collector.name, detail);
        metadata.raw[`${collector.name}_error`] = detail;
        logDebug(`[docfacts] ${failure.message}`, failure.toJSON().details);
        continue;
      }

      if (isKnownCategory(collector.category)) {
        mergeInto(metadata[CATEGORY_BUCKETS[collector.category]], output);
      } else {
        metadata.raw[collector.name] = output;
      }
    }

    return metadata;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeOutput(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return typeof value;
}

function mergeInto(bucket: MetadataBucket, output: Record<string, unknown>): void {
  for (const [key, value] of Object.entries(output)) {
    bucket[key] = value;
  }
}
