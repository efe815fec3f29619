/**
 * Line classification and dispatch
 *
 * Every LDraw line starts with an integer line type; the type fixes the
 * layout of the rest of the line:
 *
 *   0 <comment or meta command>
 *   1 <colour> x y z a b c d e f g h i <file>
 *   2 <colour> x1 y1 z1 x2 y2 z2
 *   3 <colour> x1 y1 z1 x2 y2 z2 x3 y3 z3
 *   4 <colour> x1 y1 z1 x2 y2 z2 x3 y3 z3 x4 y4 z4
 *   5 <colour> x1 y1 z1 x2 y2 z2 x3 y3 z3 x4 y4 z4
 *
 * Edge lines (2) and optional lines (5) carry no surface and are only
 * recognized.
 */

import type { Mat4 } from '../num/mat4.js';
import { affine4 } from '../num/mat4.js';
import type { Vec3 } from '../num/vec3.js';
import type { Winding } from './winding.js';

// ============================================================================
// Commands
// ============================================================================

export type BfcCommand =
  | { type: `invertNext` }
  /** `CERTIFY` with an optional winding, CCW when absent */
  | { type: `certify`; winding?: Winding }
  | { type: `noCertify` }
  /** `CW`, `CCW`, `CLIP [CW|CCW]`, `NOCLIP` */
  | { type: `clip`; enabled: boolean; winding?: Winding };

export type LineCommand =
  | { kind: `comment` }
  | { kind: `meta`; command: BfcCommand }
  | {
      kind: `subfile`;
      color: string;
      matrix: Mat4;
      /** First filename token, the one that gets resolved */
      filename: string | undefined;
      /** All tokens after the matrix */
      filenameTokens: string[];
    }
  | { kind: `line` }
  | { kind: `triangle`; color: string; vertices: [Vec3, Vec3, Vec3] }
  | { kind: `quad`; color: string; vertices: [Vec3, Vec3, Vec3, Vec3] }
  | { kind: `optional` }
  | { kind: `unknown`; lineType: number }
  | { kind: `malformed`; lineType: number; reason: string };

export type LineCommandKind = LineCommand[`kind`];

const LINE_PATTERN = /^(\d+)\s+(.+)$/;

function tokenize(rest: string): string[] {
  return rest.split(/\s+/).filter((token) => token !== ``);
}

/**
 * Parse `count` numbers starting at `offset`, or undefined if any is missing
 * or not a finite number
 */
function readNumbers(tokens: string[], offset: number, count: number): number[] | undefined {
  const values: number[] = [];
  for (let i = offset; i < offset + count; i++) {
    const token = tokens[i];
    if (token === undefined) return undefined;
    const value = Number(token);
    if (!Number.isFinite(value)) return undefined;
    values.push(value);
  }
  return values;
}

function vertexAt(values: number[], index: number): Vec3 {
  return [values[index * 3], values[index * 3 + 1], values[index * 3 + 2]];
}

function parseWinding(token: string | undefined): Winding | undefined {
  return token === `CW` || token === `CCW` ? token : undefined;
}

/** First winding among the options of a command, e.g. `CERTIFY CLIP CW` */
function findWinding(tokens: string[]): Winding | undefined {
  for (const token of tokens) {
    const winding = parseWinding(token);
    if (winding !== undefined) return winding;
  }
  return undefined;
}

/**
 * `BFC` sub-commands. Returns a reason string when the command is malformed.
 */
function parseBfc(items: string[]): BfcCommand | string {
  const [first, ...options] = items;

  switch (first) {
    case undefined:
      return `BFC without a command`;
    case `INVERTNEXT`:
      return { type: `invertNext` };
    case `CERTIFY`:
      return { type: `certify`, winding: findWinding(options) };
    case `NOCERTIFY`:
      return { type: `noCertify` };
    case `CW`:
    case `CCW`:
      return { type: `clip`, enabled: true, winding: parseWinding(first) };
    case `CLIP`:
      return { type: `clip`, enabled: true, winding: findWinding(options) };
    case `NOCLIP`:
      return { type: `clip`, enabled: false };
    default:
      return `unknown BFC command: ${first}`;
  }
}

function classifyComment(rest: string, metaIgnore: ReadonlySet<string>): LineCommand {
  const [first, ...items] = tokenize(rest);

  // `0 // comment` is the preferred form, but `0 comment` is still common
  if (first === undefined || first === `//` || metaIgnore.has(first.toLowerCase())) {
    return { kind: `comment` };
  }

  if (first === `BFC`) {
    const command = parseBfc(items);
    return typeof command === `string`
      ? { kind: `malformed`, lineType: 0, reason: command }
      : { kind: `meta`, command };
  }

  // Unknown meta commands are left alone
  return { kind: `comment` };
}

function classifySubfile(tokens: string[]): LineCommand {
  // colour, x y z, a b c d e f g h i
  const values = readNumbers(tokens, 1, 12);
  if (values === undefined) {
    return { kind: `malformed`, lineType: 1, reason: `expected colour and 12 matrix values` };
  }

  const [x, y, z, a, b, c, d, e, f, g, h, i] = values;
  const filenameTokens = tokens.slice(13);

  return {
    kind: `subfile`,
    color: tokens[0],
    matrix: affine4([a, b, c, d, e, f, g, h, i], [x, y, z]),
    filename: filenameTokens[0],
    filenameTokens,
  };
}

function classifyTriangle(tokens: string[]): LineCommand {
  const values = readNumbers(tokens, 1, 9);
  if (values === undefined) {
    return { kind: `malformed`, lineType: 3, reason: `expected colour and 9 coordinates` };
  }
  return {
    kind: `triangle`,
    color: tokens[0],
    vertices: [vertexAt(values, 0), vertexAt(values, 1), vertexAt(values, 2)],
  };
}

function classifyQuad(tokens: string[]): LineCommand {
  const values = readNumbers(tokens, 1, 12);
  if (values === undefined) {
    return { kind: `malformed`, lineType: 4, reason: `expected colour and 12 coordinates` };
  }
  return {
    kind: `quad`,
    color: tokens[0],
    vertices: [vertexAt(values, 0), vertexAt(values, 1), vertexAt(values, 2), vertexAt(values, 3)],
  };
}

/**
 * Classify one line. Returns undefined for lines without a leading integer
 * and something after it (blank lines included); those are skipped silently.
 */
export function classifyLine(line: string, metaIgnore: ReadonlySet<string>): LineCommand | undefined {
  const match = LINE_PATTERN.exec(line.trim());
  if (match === null) {
    return undefined;
  }

  const lineType = Number(match[1]);
  const rest = match[2];

  switch (lineType) {
    case 0:
      return classifyComment(rest, metaIgnore);
    case 1:
      return classifySubfile(tokenize(rest));
    case 2:
      return { kind: `line` };
    case 3:
      return classifyTriangle(tokenize(rest));
    case 4:
      return classifyQuad(tokenize(rest));
    case 5:
      return { kind: `optional` };
    default:
      return { kind: `unknown`, lineType };
  }
}

// ============================================================================
// Dispatch
// ============================================================================

type CommandOf<K extends LineCommandKind> = Extract<LineCommand, { kind: K }>;

/**
 * One handler per command kind
 */
export type LineCommandHandlers<R = void> = {
  [K in LineCommandKind]: (command: CommandOf<K>) => R;
};

/**
 * Route a classified line to its handler
 */
export function dispatchLine<R>(command: LineCommand, handlers: LineCommandHandlers<R>): R {
  switch (command.kind) {
    case `comment`:
      return handlers.comment(command);
    case `meta`:
      return handlers.meta(command);
    case `subfile`:
      return handlers.subfile(command);
    case `line`:
      return handlers.line(command);
    case `triangle`:
      return handlers.triangle(command);
    case `quad`:
      return handlers.quad(command);
    case `optional`:
      return handlers.optional(command);
    case `unknown`:
      return handlers.unknown(command);
    case `malformed`:
      return handlers.malformed(command);
  }
}
