/**
 * 3D vector operations
 *
 * Vectors are represented as tuples [number, number, number].
 * All operations are pure functions.
 */

export type Vec3 = [number, number, number];

/**
 * Create a 3D vector
 */
export function vec3(x: number, y: number, z: number): Vec3 {
  return [x, y, z];
}

/**
 * Subtract two vectors: a - b
 */
export function sub3(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

/**
 * Multiply vector by scalar: v * s
 */
export function mul3(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

/**
 * Cross product: a × b
 */
export function cross3(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

/**
 * Length of vector
 */
export function length3(v: Vec3): number {
  return Math.sqrt(v[0] * v[0] + v[1] * v[1] + v[2] * v[2]);
}

/**
 * Normalize vector to unit length
 * Returns zero vector if input is zero
 */
export function normalize3(v: Vec3): Vec3 {
  const len = length3(v);
  if (len === 0) {
    return [0, 0, 0];
  }
  return [v[0] / len, v[1] / len, v[2] / len];
}

/**
 * Unit normal of the triangle (p1, p2, p3), following the right-hand rule:
 * a counter-clockwise triangle on the XY plane points towards +Z.
 *
 * Collinear or coincident points give the zero vector.
 */
export function surfaceNormal(p1: Vec3, p2: Vec3, p3: Vec3): Vec3 {
  return normalize3(cross3(sub3(p2, p1), sub3(p3, p1)));
}

/**
 * Round each component to a fixed number of decimal places
 */
export function round3(v: Vec3, digits: number): Vec3 {
  return [roundTo(v[0], digits), roundTo(v[1], digits), roundTo(v[2], digits)];
}

/**
 * Round a scalar the way `toFixed` prints it
 */
export function roundTo(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}
