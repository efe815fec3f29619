/**
 * 4x4 matrix operations
 *
 * Matrices are represented as 16-element arrays in column-major order:
 * [m00, m10, m20, m30, m01, m11, m21, m31, m02, m12, m22, m32, m03, m13, m23, m33]
 *
 * Part references only ever fill the affine part (a 3x3 linear block and a
 * translation column, bottom row [0, 0, 0, 1]), but every operation here
 * works on the full homogeneous matrix.
 */

import type { Vec3 } from './vec3.js';

export type Mat4 = [
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
];

/**
 * Row-major 3x3 linear block: [a, b, c, d, e, f, g, h, i] for
 *
 *   / a b c \
 *   | d e f |
 *   \ g h i /
 */
export type Mat3Rows = [
  number, number, number,
  number, number, number,
  number, number, number,
];

/**
 * Identity matrix
 */
export function identity4(): Mat4 {
  return [
    1, 0, 0, 0,
    0, 1, 0, 0,
    0, 0, 1, 0,
    0, 0, 0, 1,
  ];
}

/**
 * Build an affine matrix from a row-major linear block and a translation
 */
export function affine4(linear: Mat3Rows, translation: Vec3): Mat4 {
  const [a, b, c, d, e, f, g, h, i] = linear;
  return [
    a, d, g, 0,
    b, e, h, 0,
    c, f, i, 0,
    translation[0], translation[1], translation[2], 1,
  ];
}

/**
 * Multiply two matrices: outer * inner (apply inner first, then outer)
 */
export function compose4(outer: Mat4, inner: Mat4): Mat4 {
  const result = identity4();
  for (let i = 0; i < 4; i++) {
    for (let j = 0; j < 4; j++) {
      let sum = 0;
      for (let k = 0; k < 4; k++) {
        sum += outer[i + k * 4] * inner[k + j * 4];
      }
      result[i + j * 4] = sum;
    }
  }
  return result;
}

/**
 * Transform a 3D point by a 4x4 matrix (assumes w=1)
 */
export function transformPoint3(m: Mat4, v: Vec3): Vec3 {
  const x = m[0] * v[0] + m[4] * v[1] + m[8] * v[2] + m[12];
  const y = m[1] * v[0] + m[5] * v[1] + m[9] * v[2] + m[13];
  const z = m[2] * v[0] + m[6] * v[1] + m[10] * v[2] + m[14];
  return [x, y, z];
}

/**
 * Determinant of the full 4x4 matrix.
 *
 * Expanded over 2x2 minors of the first two and last two columns. The
 * determinant is invariant under transposition, so the storage order does
 * not affect the result. A negative value means the transform mirrors space.
 */
export function determinant4(m: Mat4): number {
  const [
    a00, a01, a02, a03,
    a10, a11, a12, a13,
    a20, a21, a22, a23,
    a30, a31, a32, a33,
  ] = m;

  const b00 = a00 * a11 - a01 * a10;
  const b01 = a00 * a12 - a02 * a10;
  const b02 = a00 * a13 - a03 * a10;
  const b03 = a01 * a12 - a02 * a11;
  const b04 = a01 * a13 - a03 * a11;
  const b05 = a02 * a13 - a03 * a12;
  const b06 = a20 * a31 - a21 * a30;
  const b07 = a20 * a32 - a22 * a30;
  const b08 = a20 * a33 - a23 * a30;
  const b09 = a21 * a32 - a22 * a31;
  const b10 = a21 * a33 - a23 * a31;
  const b11 = a22 * a33 - a23 * a32;

  return b00 * b11 - b01 * b10 + b02 * b09 + b03 * b08 - b04 * b07 + b05 * b06;
}
