/**
 * Parser diagnostics and logging
 *
 * Recoverable problems found while flattening a part never stop the parse.
 * They are recorded as diagnostics, handed to the logger as they happen and
 * returned alongside the mesh.
 */

export type DiagnosticCode =
  | `UNKNOWN_LINE_TYPE` // Leading integer outside 0-5
  | `MALFORMED_LINE` // Missing or non-numeric fields
  | `MALFORMED_META` // Empty or unknown BFC command
  | `SUSPICIOUS_FILENAME` // Zero or several filename tokens on a reference
  | `SUBPART_NOT_FOUND` // No search root holds the referenced file
  | `SUBPART_UNREADABLE` // Resolved, but reading it failed
  | `CYCLIC_REFERENCE` // Referenced file is already open on the stack
  | `DEGENERATE_TRIANGLE`; // Collinear vertices, exports with a zero normal

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  /** File (or source name) the problem was found in */
  file: string;
  /** 1-based line number */
  line?: number;
  /** Sub-part nesting depth, 0 for the root */
  depth: number;
}

/**
 * Side channel for parser output that is not geometry
 */
export interface ParserLogger {
  debug(message: string, depth: number): void;
  warn(diagnostic: Diagnostic): void;
}

/**
 * Append-only record of the diagnostics of one run
 */
export class DiagnosticLog {
  private readonly _entries: Diagnostic[] = [];
  private readonly _counts = new Map<DiagnosticCode, number>();

  constructor(private readonly logger: ParserLogger) {}

  report(diagnostic: Diagnostic): void {
    this._entries.push(diagnostic);
    this._counts.set(diagnostic.code, (this._counts.get(diagnostic.code) ?? 0) + 1);
    this.logger.warn(diagnostic);
  }

  count(code: DiagnosticCode): number {
    return this._counts.get(code) ?? 0;
  }

  toArray(): Diagnostic[] {
    return [...this._entries];
  }
}

/**
 * Number of diagnostics per code
 */
export function summarizeDiagnostics(
  diagnostics: readonly Diagnostic[]
): Partial<Record<DiagnosticCode, number>> {
  const summary: Partial<Record<DiagnosticCode, number>> = {};
  for (const d of diagnostics) {
    summary[d.code] = (summary[d.code] ?? 0) + 1;
  }
  return summary;
}

function indent(depth: number): string {
  return ` `.repeat(depth * 2);
}

/**
 * One-line rendering, indented by nesting depth:
 * `  WARN: [SUBPART_NOT_FOUND] 3001.dat (parts/2x4.dat:7)`
 */
export function formatDiagnostic(d: Diagnostic): string {
  const where = d.line === undefined ? d.file : `${d.file}:${d.line}`;
  return `${indent(d.depth)}WARN: [${d.code}] ${d.message} (${where})`;
}

export function formatDebug(message: string, depth: number): string {
  return `${indent(depth)}DEBUG: ${message}`;
}

/**
 * Logger writing to stderr. Debug lines are dropped unless `debug` is set.
 */
export function createConsoleLogger(options: { debug?: boolean } = {}): ParserLogger {
  const { debug = false } = options;
  return {
    debug(message, depth) {
      if (debug) {
        console.error(formatDebug(message, depth));
      }
    },
    warn(diagnostic) {
      console.warn(formatDiagnostic(diagnostic));
    },
  };
}

export const silentLogger: ParserLogger = {
  debug() {},
  warn() {},
};
