import { describe, it, expect } from 'vitest';
import { affine4, identity4 } from '../num/mat4.js';
import type { Vec3 } from '../num/vec3.js';
import {
  clearInvertNext,
  computeChildInvert,
  createWindingState,
  effectiveCcw,
  orientTriangle,
  requestInvertNext,
  setDeclaredWinding,
  splitQuad,
  type WindingState,
} from './winding.js';

const MIRROR_X = affine4([-1, 0, 0, 0, 1, 0, 0, 0, 1], [0, 0, 0]);
const ROTATE_Y = affine4([0, 0, 1, 0, 1, 0, -1, 0, 0], [0, 0, 0]);

const p1: Vec3 = [0, 0, 0];
const p2: Vec3 = [1, 0, 0];
const p3: Vec3 = [1, 1, 0];
const p4: Vec3 = [0, 1, 0];

function state(overrides: Partial<WindingState> = {}): WindingState {
  return { ...createWindingState(false), ...overrides };
}

describe('winding state', () => {
  it('starts counter-clockwise with nothing pending', () => {
    expect(createWindingState(true)).toEqual({
      invert: true,
      ccwWinding: true,
      pendingInvertNext: false,
    });
  });

  it('combines declared winding and inversion as an exclusive or', () => {
    expect(effectiveCcw(state({ ccwWinding: true, invert: false }))).toBe(true);
    expect(effectiveCcw(state({ ccwWinding: true, invert: true }))).toBe(false);
    expect(effectiveCcw(state({ ccwWinding: false, invert: false }))).toBe(false);
    expect(effectiveCcw(state({ ccwWinding: false, invert: true }))).toBe(true);
  });

  it('changes declared winding without touching inversion', () => {
    const cw = setDeclaredWinding(state({ invert: true }), 'CW');
    expect(cw).toEqual({ invert: true, ccwWinding: false, pendingInvertNext: false });
    expect(setDeclaredWinding(cw, 'CCW').ccwWinding).toBe(true);
  });

  it('sets and clears the one-shot INVERTNEXT flag', () => {
    const pending = requestInvertNext(state());
    expect(pending.pendingInvertNext).toBe(true);
    expect(clearInvertNext(pending).pendingInvertNext).toBe(false);
  });

  it('does not mutate the previous state', () => {
    const before = state();
    requestInvertNext(before);
    setDeclaredWinding(before, 'CW');
    expect(before).toEqual(createWindingState(false));
  });
});

describe('computeChildInvert', () => {
  it('passes inversion through for a plain reference', () => {
    expect(computeChildInvert(state({ invert: false }), identity4())).toBe(false);
    expect(computeChildInvert(state({ invert: true }), identity4())).toBe(true);
  });

  it('is not affected by rotations', () => {
    expect(computeChildInvert(state(), ROTATE_Y)).toBe(false);
  });

  it('flips once for a mirroring matrix', () => {
    expect(computeChildInvert(state({ invert: false }), MIRROR_X)).toBe(true);
    expect(computeChildInvert(state({ invert: true }), MIRROR_X)).toBe(false);
  });

  it('flips once for a pending INVERTNEXT', () => {
    expect(computeChildInvert(state({ pendingInvertNext: true }), identity4())).toBe(true);
    expect(computeChildInvert(state({ invert: true, pendingInvertNext: true }), identity4())).toBe(false);
  });

  it('cancels out INVERTNEXT and a mirror', () => {
    expect(computeChildInvert(state({ pendingInvertNext: true }), MIRROR_X)).toBe(false);
    expect(computeChildInvert(state({ invert: true, pendingInvertNext: true }), MIRROR_X)).toBe(true);
  });

  it('ignores the declared winding of the current file', () => {
    expect(computeChildInvert(state({ ccwWinding: false }), identity4())).toBe(false);
  });
});

describe('orientTriangle', () => {
  it('keeps declaration order when effectively CCW', () => {
    expect(orientTriangle(state(), p1, p2, p3)).toEqual([p1, p2, p3]);
  });

  it('swaps the last two vertices otherwise', () => {
    expect(orientTriangle(state({ ccwWinding: false }), p1, p2, p3)).toEqual([p1, p3, p2]);
    expect(orientTriangle(state({ invert: true }), p1, p2, p3)).toEqual([p1, p3, p2]);
  });
});

describe('splitQuad', () => {
  it('splits along the first diagonal when CCW', () => {
    expect(splitQuad(state(), p1, p2, p3, p4)).toEqual([
      [p1, p2, p3],
      [p3, p4, p1],
    ]);
  });

  it('reverses each half independently when not CCW', () => {
    expect(splitQuad(state({ invert: true }), p1, p2, p3, p4)).toEqual([
      [p1, p3, p2],
      [p3, p1, p4],
    ]);
  });
});
