/**
 * Geometric predicates
 *
 * Uses Shewchuk-style adaptive precision robust predicates via mourner/robust-predicates
 * so that the answers are exact for any floating-point input.
 */

import type { Vec3 } from './vec3.js';
import { orient2d } from 'robust-predicates';

/**
 * Exact test for three collinear (or coincident) points in 3D.
 *
 * Each component of (b - a) × (c - a) is the 2D orientation of the points
 * projected onto one coordinate plane, so the points are collinear exactly
 * when all three projections are.
 */
export function isCollinear3(a: Vec3, b: Vec3, c: Vec3): boolean {
  // YZ plane
  if (orient2d(a[1], a[2], b[1], b[2], c[1], c[2]) !== 0) return false;
  // ZX plane
  if (orient2d(a[2], a[0], b[2], b[0], c[2], c[0]) !== 0) return false;
  // XY plane
  return orient2d(a[0], a[1], b[0], b[1], c[0], c[1]) === 0;
}
