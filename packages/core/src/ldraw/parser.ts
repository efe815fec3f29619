/**
 * Recursive part parser
 *
 * Flattens a part and everything it references into one triangle list in
 * the root file's coordinate space. Parsing is depth-first and synchronous:
 * each referenced file is parsed into its own mesh, transformed by the
 * reference matrix and appended to the parent's mesh once complete.
 */

import * as path from 'node:path';
import type { TriangleMesh } from '../mesh/types.js';
import { appendTransformed, meshBounds } from '../mesh/types.js';
import { determinant4 } from '../num/mat4.js';
import { isCollinear3 } from '../num/predicates.js';
import type { Vec3 } from '../num/vec3.js';
import type { DiagnosticCode, ParserLogger } from './diagnostics.js';
import { DiagnosticLog, createConsoleLogger } from './diagnostics.js';
import type { PartFileSystem } from './fileSystem.js';
import { nodeFileSystem } from './fileSystem.js';
import type { BfcCommand, LineCommand, LineCommandHandlers } from './lineCommands.js';
import { classifyLine, dispatchLine } from './lineCommands.js';
import type { ParseConfig, ParseOptions } from './options.js';
import { describeIssues, parseOptionsSchema } from './options.js';
import { PartResolver } from './resolver.js';
import type { ParseResult } from './result.js';
import { failure, success } from './result.js';
import type { WindingState } from './winding.js';
import {
  clearInvertNext,
  computeChildInvert,
  createWindingState,
  orientTriangle,
  requestInvertNext,
  setDeclaredWinding,
  splitQuad,
} from './winding.js';

/**
 * Per-file parameters, fixed for the whole file
 */
export interface ParseContext {
  /** Path of the file, or the source name of a text root */
  readonly file: string;
  /** Inherited inversion */
  readonly invert: boolean;
  /** 0 for the root */
  readonly depth: number;
  /** Resolved paths of the files currently open above this one */
  readonly ancestors: ReadonlySet<string>;
}

/**
 * Shared by every file of one run
 */
interface PartEnvironment {
  readonly resolver: PartResolver;
  readonly fileSystem: PartFileSystem;
  readonly metaIgnore: ReadonlySet<string>;
  readonly logger: ParserLogger;
  readonly diagnostics: DiagnosticLog;
  readonly debug: boolean;
}

type SubfileCommand = Extract<LineCommand, { kind: `subfile` }>;
type Report = (code: DiagnosticCode, message: string) => void;

function debug(env: PartEnvironment, depth: number, message: string): void {
  if (env.debug) {
    env.logger.debug(message, depth);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function flag(value: boolean): number {
  return value ? 1 : 0;
}

// ============================================================================
// Meta commands
// ============================================================================

function applyBfc(
  state: WindingState,
  command: BfcCommand,
  env: PartEnvironment,
  depth: number
): WindingState {
  switch (command.type) {
    case `invertNext`:
      debug(env, depth, `META: INVERTNEXT found while invert[${flag(state.invert)}]`);
      return requestInvertNext(state);
    case `certify`:
      if (command.winding === undefined) {
        debug(env, depth, `META: CERTIFY with no winding - default CCW`);
        return state;
      }
      return setDeclaredWinding(state, command.winding);
    case `clip`:
      return command.winding === undefined ? state : setDeclaredWinding(state, command.winding);
    case `noCertify`:
      return state;
  }
}

// ============================================================================
// Sub-part references
// ============================================================================

function includeSubPart(
  reference: SubfileCommand,
  state: WindingState,
  context: ParseContext,
  env: PartEnvironment,
  mesh: TriangleMesh,
  report: Report
): void {
  const { filename, filenameTokens } = reference;

  if (filenameTokens.length !== 1) {
    report(
      `SUSPICIOUS_FILENAME`,
      filename === undefined
        ? `sub-part reference without a filename`
        : `filename is made up of ${filenameTokens.length} parts, using ${filename}`
    );
  }
  if (filename === undefined) {
    return;
  }

  const resolved = env.resolver.resolve(filename);
  if (!resolved.found) {
    report(
      `SUBPART_NOT_FOUND`,
      `unable to find ${filename} in ${env.resolver.libraryPath} (tried ${resolved.tried.join(`, `)})`
    );
    return;
  }

  const key = path.resolve(resolved.path);
  if (context.ancestors.has(key)) {
    report(`CYCLIC_REFERENCE`, `${filename} is already being parsed, skipping`);
    return;
  }

  let text: string;
  try {
    text = env.fileSystem.readText(resolved.path);
  } catch (error) {
    report(`SUBPART_UNREADABLE`, `${resolved.path}: ${errorMessage(error)}`);
    return;
  }

  const child: ParseContext = {
    file: resolved.path,
    invert: computeChildInvert(state, reference.matrix),
    depth: context.depth + 1,
    ancestors: new Set([...context.ancestors, key]),
  };
  debug(env, context.depth, `${filename} -> ${resolved.path} invert[${flag(child.invert)}]`);

  const childMesh = parseLines(text, child, env);
  // A singular matrix flattens everything it places onto a plane, line or point
  if (childMesh.length > 0 && determinant4(reference.matrix) === 0) {
    report(
      `DEGENERATE_TRIANGLE`,
      `${filename} is placed with a singular matrix, its ${childMesh.length} triangles have no area`
    );
  }
  appendTransformed(mesh, childMesh, reference.matrix);
}

// ============================================================================
// File body
// ============================================================================

function parseLines(text: string, context: ParseContext, env: PartEnvironment): TriangleMesh {
  const mesh: TriangleMesh = [];
  let state = createWindingState(context.invert);
  let lineNumber = 0;

  const report: Report = (code, message) => {
    env.diagnostics.report({ code, message, file: context.file, line: lineNumber, depth: context.depth });
  };

  const checkDegenerate = (a: Vec3, b: Vec3, c: Vec3): void => {
    if (isCollinear3(a, b, c)) {
      report(`DEGENERATE_TRIANGLE`, `collinear vertices, normal will be zero`);
    }
  };

  // Each handler returns the winding state for the next line
  const handlers: LineCommandHandlers<WindingState> = {
    comment: () => state,
    meta: ({ command }) => applyBfc(state, command, env, context.depth),
    subfile: (reference) => {
      includeSubPart(reference, state, context, env, mesh, report);
      return clearInvertNext(state);
    },
    line: () => state,
    triangle: ({ vertices: [p1, p2, p3] }) => {
      checkDegenerate(p1, p2, p3);
      mesh.push(orientTriangle(state, p1, p2, p3));
      return state;
    },
    quad: ({ vertices: [v1, v2, v3, v4] }) => {
      checkDegenerate(v1, v2, v3);
      checkDegenerate(v3, v4, v1);
      mesh.push(...splitQuad(state, v1, v2, v3, v4));
      return state;
    },
    optional: () => state,
    unknown: ({ lineType }) => {
      report(`UNKNOWN_LINE_TYPE`, `unhandled line type: ${lineType}`);
      return state;
    },
    malformed: ({ lineType, reason }) => {
      report(lineType === 0 ? `MALFORMED_META` : `MALFORMED_LINE`, reason);
      // A broken reference still uses up a pending INVERTNEXT
      return lineType === 1 ? clearInvertNext(state) : state;
    },
  };

  debug(env, context.depth, `parsing ${context.file} invert[${flag(context.invert)}]`);

  for (const line of text.split(/\r?\n/)) {
    lineNumber++;
    const command = classifyLine(line, env.metaIgnore);
    if (command !== undefined) {
      state = dispatchLine(command, handlers);
    }
  }

  return mesh;
}

// ============================================================================
// Entry points
// ============================================================================

type Prepared =
  | { ok: true; config: ParseConfig; fileSystem: PartFileSystem; logger: ParserLogger }
  | { ok: false; message: string };

function prepare(options: ParseOptions): Prepared {
  const { fileSystem = nodeFileSystem, logger, ...rest } = options;
  const parsed = parseOptionsSchema.safeParse(rest);
  if (!parsed.success) {
    return { ok: false, message: describeIssues(parsed.error) };
  }
  return {
    ok: true,
    config: parsed.data,
    fileSystem,
    logger: logger ?? createConsoleLogger({ debug: parsed.data.debug }),
  };
}

function flatten(
  text: string,
  file: string,
  ancestors: string[],
  prepared: Extract<Prepared, { ok: true }>
): ParseResult<TriangleMesh> {
  const { config, fileSystem, logger } = prepared;
  const env: PartEnvironment = {
    resolver: new PartResolver(config.libraryPath, fileSystem),
    fileSystem,
    metaIgnore: new Set(config.metaIgnore.map((word) => word.toLowerCase())),
    logger,
    diagnostics: new DiagnosticLog(logger),
    debug: config.debug,
  };

  const mesh = parseLines(
    text,
    { file, invert: config.invert, depth: 0, ancestors: new Set(ancestors) },
    env
  );

  const bounds = meshBounds(mesh);
  debug(
    env,
    0,
    bounds === undefined
      ? `no triangles`
      : `${mesh.length} triangles, bounds [${bounds.min.join(`, `)}] to [${bounds.max.join(`, `)}]`
  );

  return success(mesh, env.diagnostics.toArray());
}

/**
 * Flatten the part in `file` and everything it references.
 *
 * Only invalid options and an unreadable root file fail the result; missing,
 * cyclic or unreadable sub-parts are skipped and reported as diagnostics.
 */
export function parsePart(file: string, options: ParseOptions = {}): ParseResult<TriangleMesh> {
  const prepared = prepare(options);
  if (!prepared.ok) {
    return failure({ category: `invalidInput`, message: prepared.message, file });
  }

  if (!prepared.fileSystem.isFile(file)) {
    return failure({ category: `fileNotFound`, message: `${file}: no such file`, file });
  }

  let text: string;
  try {
    text = prepared.fileSystem.readText(file);
  } catch (error) {
    return failure({ category: `ioError`, message: `${file}: ${errorMessage(error)}`, file });
  }

  return flatten(text, file, [path.resolve(file)], prepared);
}

/**
 * Flatten a part given as text. Its references are resolved against the
 * library as usual; `sourceName` labels its diagnostics.
 */
export function parsePartText(text: string, options: ParseOptions = {}): ParseResult<TriangleMesh> {
  const prepared = prepare(options);
  if (!prepared.ok) {
    return failure({ category: `invalidInput`, message: prepared.message, file: options.sourceName ?? `<input>` });
  }
  return flatten(text, prepared.config.sourceName, [], prepared);
}
