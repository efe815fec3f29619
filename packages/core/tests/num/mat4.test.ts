import { describe, it, expect } from "vitest";
import {
  identity4,
  affine4,
  compose4,
  transformPoint3,
  determinant4,
  type Mat4,
} from "../../src/num/mat4.js";
import { vec3 } from "../../src/num/vec3.js";

function translation4(x: number, y: number, z: number): Mat4 {
  return affine4([1, 0, 0, 0, 1, 0, 0, 0, 1], [x, y, z]);
}

function scale4(s: number): Mat4 {
  return affine4([s, 0, 0, 0, s, 0, 0, 0, s], [0, 0, 0]);
}

describe(`mat4`, () => {
  describe(`affine4`, () => {
    it(`should store the linear block column-major with translation last`, () => {
      const m = affine4([1, 2, 3, 4, 5, 6, 7, 8, 9], [10, 11, 12]);
      expect(m).toEqual([1, 4, 7, 0, 2, 5, 8, 0, 3, 6, 9, 0, 10, 11, 12, 1]);
    });

    it(`should build the identity from an identity block`, () => {
      expect(translation4(0, 0, 0)).toEqual(identity4());
    });
  });

  describe(`transformPoint3`, () => {
    it(`should apply rows of the linear block plus translation`, () => {
      const m = affine4([1, 2, 3, 4, 5, 6, 7, 8, 9], [10, 11, 12]);
      expect(transformPoint3(m, vec3(1, 0, 0))).toEqual([11, 15, 19]);
      expect(transformPoint3(m, vec3(0, 1, 0))).toEqual([12, 16, 20]);
      expect(transformPoint3(m, vec3(0, 0, 1))).toEqual([13, 17, 21]);
    });

    it(`should transform point with identity`, () => {
      expect(transformPoint3(identity4(), vec3(1, 2, 3))).toEqual([1, 2, 3]);
    });

    it(`should transform point with translation`, () => {
      expect(transformPoint3(translation4(5, 6, 7), vec3(1, 2, 3))).toEqual([6, 8, 10]);
    });
  });

  describe(`compose4`, () => {
    it(`should apply inner first, then outer`, () => {
      const p = vec3(1, 1, 1);
      expect(transformPoint3(compose4(translation4(1, 0, 0), scale4(2)), p)).toEqual([3, 2, 2]);
      expect(transformPoint3(compose4(scale4(2), translation4(1, 0, 0)), p)).toEqual([4, 2, 2]);
    });

    it(`should match applying the transforms one after the other`, () => {
      const outer = affine4([0, -1, 0, 1, 0, 0, 0, 0, 1], [0, -24, 0]);
      const inner = affine4([1, 0, 0, 0, 1, 0, 0, 0, -1], [10, 0, 20]);
      const p = vec3(3, 4, 5);
      expect(transformPoint3(compose4(outer, inner), p)).toEqual(
        transformPoint3(outer, transformPoint3(inner, p))
      );
    });

    it(`should leave a matrix unchanged when composed with identity`, () => {
      const m = affine4([1, 2, 3, 4, 5, 6, 7, 8, 9], [10, 11, 12]);
      expect(compose4(m, identity4())).toEqual(m);
      expect(compose4(identity4(), m)).toEqual(m);
    });
  });

  describe(`determinant4`, () => {
    it(`should be 1 for identity and translations`, () => {
      expect(determinant4(identity4())).toBe(1);
      expect(determinant4(translation4(5, -6, 7))).toBe(1);
    });

    it(`should be negative for a mirror`, () => {
      const mirror = affine4([-1, 0, 0, 0, 1, 0, 0, 0, 1], [5, 6, 7]);
      expect(determinant4(mirror)).toBe(-1);
    });

    it(`should be positive for a rotation`, () => {
      // 90 degrees about Y
      const rotation = affine4([0, 0, 1, 0, 1, 0, -1, 0, 0], [0, 0, 0]);
      expect(determinant4(rotation)).toBe(1);
    });

    it(`should scale with the cube of a uniform scale`, () => {
      expect(determinant4(scale4(2))).toBe(8);
      expect(determinant4(scale4(-2))).toBe(-8);
    });

    it(`should be zero for a flattening matrix`, () => {
      const flatten = affine4([1, 0, 0, 0, 1, 0, 0, 0, 0], [0, 0, 0]);
      expect(Math.abs(determinant4(flatten))).toBe(0);
    });

    it(`should cancel out two mirrors`, () => {
      const mirrorX = affine4([-1, 0, 0, 0, 1, 0, 0, 0, 1], [0, 0, 0]);
      const mirrorZ = affine4([1, 0, 0, 0, 1, 0, 0, 0, -1], [0, 0, 0]);
      expect(determinant4(compose4(mirrorX, mirrorZ))).toBe(1);
    });

    it(`should handle a non-affine bottom row`, () => {
      const m = identity4();
      m[3] = 2; // row 3, column 0
      m[15] = 3;
      expect(determinant4(m)).toBe(3);
    });
  });
});
