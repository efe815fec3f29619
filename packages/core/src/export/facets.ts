/**
 * Facet computation shared by every exporter
 *
 * Vertices are converted from LDraw units, scaled and rounded to 4 decimal
 * places first; the normal is then computed from those final vertices and
 * rounded the same way. Every output form iterates this one list, so they
 * all describe the same geometry.
 */

import type { TriangleMesh } from '../mesh/types.js';
import type { Vec3 } from '../num/vec3.js';
import { mul3, round3, surfaceNormal } from '../num/vec3.js';
import type { MeshExportConfig, MeshExportOptions } from '../ldraw/options.js';
import { meshExportOptionsSchema } from '../ldraw/options.js';

/** Decimal places of every exported value */
export const EXPORT_PRECISION = 4;

/**
 * A triangle ready for output
 */
export interface Facet {
  normal: Vec3;
  vertices: [Vec3, Vec3, Vec3];
}

/**
 * Serializable facet, values formatted like the STL text
 */
export interface FacetRecord {
  normal: [string, string, string];
  vertices: [[string, string, string], [string, string, string], [string, string, string]];
}

/**
 * Fixed-point text of a value, without a sign on zero.
 *
 * `toFixed` rounds an exact binary tie away from zero (0.03125 prints as
 * `0.0313`), where C's `printf` rounds it to even (`0.0312`).
 */
export function formatValue(value: number): string {
  const text = value.toFixed(EXPORT_PRECISION);
  return Number(text) === 0 ? (0).toFixed(EXPORT_PRECISION) : text;
}

export function formatVec3(v: Vec3): [string, string, string] {
  return [formatValue(v[0]), formatValue(v[1]), formatValue(v[2])];
}

/**
 * Validate export options and fill in defaults. Throws a ZodError on bad
 * input.
 */
export function resolveExportOptions(options: MeshExportOptions = {}): MeshExportConfig {
  return meshExportOptionsSchema.parse(options);
}

/**
 * Final vertices and recomputed normals, in mesh order
 */
export function computeFacets(mesh: TriangleMesh, options: MeshExportOptions = {}): Facet[] {
  const { scale, mmPerLdu } = resolveExportOptions(options);
  const toOutput = (v: Vec3): Vec3 => round3(mul3(mul3(v, mmPerLdu), scale), EXPORT_PRECISION);

  return mesh.map(([p1, p2, p3]) => {
    const vertices: [Vec3, Vec3, Vec3] = [toOutput(p1), toOutput(p2), toOutput(p3)];
    const normal = round3(surfaceNormal(...vertices), EXPORT_PRECISION);
    return { normal, vertices };
  });
}

/**
 * Facets as formatted records, for JSON and similar serializations
 */
export function exportMeshToFacets(mesh: TriangleMesh, options: MeshExportOptions = {}): FacetRecord[] {
  return computeFacets(mesh, options).map(({ normal, vertices }) => ({
    normal: formatVec3(normal),
    vertices: [formatVec3(vertices[0]), formatVec3(vertices[1]), formatVec3(vertices[2])],
  }));
}
