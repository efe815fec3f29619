/**
 * Parse result types
 *
 * Only a fatal problem (bad options, unreadable root file) produces a failed
 * result. Everything recoverable is reported through diagnostics and the
 * mesh is still returned.
 */

import type { Diagnostic } from './diagnostics.js';

/**
 * Error category for a failed parse
 */
export type ParseErrorCategory =
  | `invalidInput` // Options failed validation
  | `fileNotFound` // Root file does not exist
  | `ioError`; // Root file exists but could not be read

export interface ParseError {
  category: ParseErrorCategory;
  message: string;
  /** Root file (or source name) of the run */
  file: string;
}

/**
 * Result of flattening a part.
 *
 * Usage:
 * ```ts
 * const result = parsePart(`car.ldr`, { libraryPath: `/opt/ldraw` });
 * if (result.ok) {
 *   const stl = exportMeshToStl(result.value);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export type ParseResult<T> =
  | { ok: true; value: T; diagnostics: Diagnostic[] }
  | { ok: false; error: ParseError; diagnostics: Diagnostic[] };

export function success<T>(value: T, diagnostics: Diagnostic[] = []): ParseResult<T> {
  return { ok: true, value, diagnostics };
}

export function failure<T>(error: ParseError, diagnostics: Diagnostic[] = []): ParseResult<T> {
  return { ok: false, error, diagnostics };
}

/**
 * Thrown by {@link unwrapParseResult}
 */
export class PartParseError extends Error {
  readonly category: ParseErrorCategory;
  readonly file: string;

  constructor(error: ParseError) {
    super(error.message);
    this.name = `PartParseError`;
    this.category = error.category;
    this.file = error.file;
  }
}

/**
 * Extract the value from a result, throwing if it's a failure
 */
export function unwrapParseResult<T>(result: ParseResult<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw new PartParseError(result.error);
}
