import type { CollectedMetadata, Facts, LanguageId, ParsedFunction } from '../types.js';

export interface NarrativeRequest {
  readonly filePath: string;
  readonly language: LanguageId;
  readonly fn: ParsedFunction;
  readonly facts: Facts;
  readonly metadata: CollectedMetadata;
}

/**
 * Source of the free-text part of a function's documentation. The text is
 * untrusted: the apply protocol validates the file after inserting it.
 */
export interface NarrativeProvider {
  generate(request: NarrativeRequest): Promise<string>;
}

export class StaticNarrativeProvider implements NarrativeProvider {
  constructor(private readonly text: string | ((request: NarrativeRequest) => string)) {}

  async generate(request: NarrativeRequest): Promise<string> {
    return typeof this.text === 'string' ? this.text : this.text(request);
  }
}
