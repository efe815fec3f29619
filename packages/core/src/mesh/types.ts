/**
 * Mesh types
 *
 * A flattened part is an unindexed triangle soup: every triangle carries its
 * own three vertices in winding order. Normals are never stored here; the
 * exporters derive them from the final vertex positions.
 */

import type { Mat4 } from '../num/mat4.js';
import { transformPoint3 } from '../num/mat4.js';
import type { Vec3 } from '../num/vec3.js';

/**
 * Three vertices in winding order (counter-clockwise faces outwards)
 */
export type Triangle = [Vec3, Vec3, Vec3];

/**
 * Ordered, append-only list of triangles
 */
export type TriangleMesh = Triangle[];

/**
 * Transform every vertex of a triangle
 */
export function transformTriangle(m: Mat4, triangle: Triangle): Triangle {
  return [
    transformPoint3(m, triangle[0]),
    transformPoint3(m, triangle[1]),
    transformPoint3(m, triangle[2]),
  ];
}

/**
 * Append `source`, transformed by `m`, to `target`
 */
export function appendTransformed(target: TriangleMesh, source: TriangleMesh, m: Mat4): void {
  for (const triangle of source) {
    target.push(transformTriangle(m, triangle));
  }
}

/**
 * Axis-aligned bounds of a mesh, or undefined when it has no triangles
 */
export function meshBounds(mesh: TriangleMesh): { min: Vec3; max: Vec3 } | undefined {
  if (mesh.length === 0) {
    return undefined;
  }

  const min: Vec3 = [Infinity, Infinity, Infinity];
  const max: Vec3 = [-Infinity, -Infinity, -Infinity];

  for (const triangle of mesh) {
    for (const v of triangle) {
      for (let axis = 0; axis < 3; axis++) {
        if (v[axis] < min[axis]) min[axis] = v[axis];
        if (v[axis] > max[axis]) max[axis] = v[axis];
      }
    }
  }

  return { min, max };
}
