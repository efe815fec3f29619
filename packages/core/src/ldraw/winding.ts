/**
 * Winding order and inversion state
 *
 * Every file declares the winding of its own polygons with
 * `0 BFC CERTIFY CCW|CW` (CCW when absent). A CCW triangle on the XY plane
 * has its normal along +Z.
 *
 * `invert` is inherited from the referencing file and flips that declared
 * winding for the whole file and, through references, its descendants. It is
 * flipped on the way down by a pending `0 BFC INVERTNEXT` and by a reference
 * matrix with a negative determinant: a mirroring transform reverses the
 * winding of everything it is applied to, so the child is generated reversed
 * and comes out right once the matrix is applied.
 *
 * States are immutable; transitions return a new state.
 */

import type { Mat4 } from '../num/mat4.js';
import { determinant4 } from '../num/mat4.js';
import type { Vec3 } from '../num/vec3.js';
import type { Triangle } from '../mesh/types.js';

export type Winding = `CW` | `CCW`;

export interface WindingState {
  /** Inherited inversion for this file */
  readonly invert: boolean;
  /** Winding declared by this file */
  readonly ccwWinding: boolean;
  /** One-shot flip for the next sub-part reference */
  readonly pendingInvertNext: boolean;
}

/**
 * Fresh state for a file. The declared winding always starts as CCW, it is
 * never inherited.
 */
export function createWindingState(invert: boolean): WindingState {
  return { invert, ccwWinding: true, pendingInvertNext: false };
}

/**
 * Whether polygons of the current file are emitted in declaration order
 */
export function effectiveCcw(state: WindingState): boolean {
  return state.ccwWinding !== state.invert;
}

export function setDeclaredWinding(state: WindingState, winding: Winding): WindingState {
  return { ...state, ccwWinding: winding === `CCW` };
}

export function requestInvertNext(state: WindingState): WindingState {
  return { ...state, pendingInvertNext: true };
}

/**
 * Called after every sub-part reference line, whether or not it resolved
 */
export function clearInvertNext(state: WindingState): WindingState {
  return { ...state, pendingInvertNext: false };
}

/**
 * `invert` for the child of a reference with matrix `transform`.
 * INVERTNEXT is applied first, then the determinant rule; both together
 * cancel out.
 */
export function computeChildInvert(state: WindingState, transform: Mat4): boolean {
  let invert = state.pendingInvertNext ? !state.invert : state.invert;
  if (determinant4(transform) < 0) {
    invert = !invert;
  }
  return invert;
}

/**
 * Triangle in output order: as declared, or with the last two vertices
 * swapped
 */
export function orientTriangle(state: WindingState, p1: Vec3, p2: Vec3, p3: Vec3): Triangle {
  return effectiveCcw(state) ? [p1, p2, p3] : [p1, p3, p2];
}

/**
 * Split a quad along the v1-v3 diagonal. Each half is oriented on its own so
 * the diagonal is the same for either winding.
 */
export function splitQuad(
  state: WindingState,
  v1: Vec3,
  v2: Vec3,
  v3: Vec3,
  v4: Vec3
): [Triangle, Triangle] {
  return [orientTriangle(state, v1, v2, v3), orientTriangle(state, v3, v4, v1)];
}
