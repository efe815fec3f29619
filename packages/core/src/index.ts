/**
 * @brickmesh/core - LDraw part flattening
 *
 * Resolves a part and all of its sub-part references against an LDraw
 * library, flattens them into one triangle list with consistent winding,
 * and exports the result:
 *
 * - ldraw: resolver, line commands, BFC winding state, recursive parser
 * - mesh: triangle list type and transform helpers
 * - export: ASCII STL, flat vertex/normal buffers, facet records
 * - num: vector and matrix primitives, robust predicates
 */

export * from './ldraw/index.js';
export * from './mesh/index.js';
export * from './export/index.js';

export { vec3, type Vec3, sub3, mul3, cross3, length3, normalize3, surfaceNormal, round3, roundTo } from './num/vec3.js';
export { type Mat4, type Mat3Rows, identity4, affine4, compose4, transformPoint3, determinant4 } from './num/mat4.js';
export { isCollinear3 } from './num/predicates.js';
