import * as fs from 'node:fs/promises';
import { FileIoError, getErrorMessage } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import type { LanguageId, SourceFile } from '../types.js';

export type OffsetUnit = 'utf16' | 'utf8';

/** Decodes UTF-8, refusing invalid byte sequences instead of substituting U+FFFD. */
export function decodeUtf8(bytes: Uint8Array): Result<string, string> {
  try {
    return Ok(new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes));
  } catch (error) {
    return Err(getErrorMessage(error));
  }
}

/** Files that are not valid UTF-8 fail with a `decode` FileIoError. */
export async function readSourceFile(filePath: string, language: LanguageId): Promise<Result<SourceFile, FileIoError>> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (error) {
    return Err(new FileIoError('read', filePath, false, getErrorMessage(error)));
  }
  const decoded = decodeUtf8(bytes);
  if (!decoded.ok) {
    return Err(new FileIoError('decode', filePath, false, `not valid UTF-8: ${decoded.error}`));
  }
  return Ok({ path: filePath, language, bytes, text: decoded.value });
}

/**
 * Decoded source plus a lazily encoded UTF-8 view.
 *
 * Parser offsets are only meaningful in the unit the engine reports, so all
 * range extraction goes through `slice` with an explicit unit.
 */
export class SourceText {
  readonly lines: string[];
  readonly eol: '\n' | '\r\n';
  private bytes: Buffer | null = null;

  constructor(readonly text: string) {
    this.eol = text.includes('\r\n') ? '\r\n' : '\n';
    this.lines = text.split(/\r?\n/);
  }

  slice(start: number, end: number, unit: OffsetUnit): string {
    if (unit === 'utf16') {
      return this.text.slice(start, end);
    }
    this.bytes ??= Buffer.from(this.text, 'utf8');
    return this.bytes.subarray(start, end).toString('utf8');
  }

  lineAt(row: number): string {
    return this.lines[row] ?? '';
  }

  static join(lines: readonly string[], eol: '\n' | '\r\n'): string {
    return lines.join(eol);
  }
}

export function leadingWhitespace(line: string): string {
  const match = /^[ \t]*/.exec(line);
  return match ? match[0] : '';
}
