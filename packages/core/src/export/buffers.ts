/**
 * Flat vertex/normal buffers
 *
 * Meant for `drawArrays(TRIANGLES, 0, vertices.length / 3)`: no index buffer,
 * and each facet normal is repeated for its three vertices so both arrays
 * advance in lockstep.
 */

import type { TriangleMesh } from '../mesh/types.js';
import type { MeshExportOptions } from '../ldraw/options.js';
import { computeFacets } from './facets.js';

export interface FlatBuffers {
  /** xyz per vertex */
  normals: number[];
  /** xyz per vertex */
  vertices: number[];
}

export function exportMeshToBuffers(mesh: TriangleMesh, options: MeshExportOptions = {}): FlatBuffers {
  const normals: number[] = [];
  const vertices: number[] = [];

  for (const facet of computeFacets(mesh, options)) {
    for (const vertex of facet.vertices) {
      normals.push(...facet.normal);
      vertices.push(...vertex);
    }
  }

  return { normals, vertices };
}
