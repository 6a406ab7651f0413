/**
 * @fileoverview Result type for explicit error handling
 *
 * Operations whose failure is ordinary data (validation, doc insertion,
 * collector runs) return Result<T, E> instead of throwing.
 */

import * as fs from 'node:fs/promises';

// ============================================================================
// CORE RESULT TYPE
// ============================================================================

export type OkResult<T> = { readonly ok: true; readonly value: T };
export type ErrResult<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ============================================================================
// SAFE FILE OPERATIONS
// ============================================================================

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Safe file unlink - doesn't fail if the file is already gone
 */
export async function safeUnlink(path: string): Promise<Result<void, Error>> {
  try {
    await fs.unlink(path);
    return Ok(undefined);
  } catch (e) {
    if (isErrnoException(e) && e.code === 'ENOENT') {
      return Ok(undefined);
    }
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
}
