/**
 * STL Export
 *
 * Writes a flattened part as ASCII STL.
 */

import type { TriangleMesh } from '../mesh/types.js';
import type { Vec3 } from '../num/vec3.js';
import type { StlExportOptions } from '../ldraw/options.js';
import { stlExportOptionsSchema } from '../ldraw/options.js';
import type { Facet } from './facets.js';
import { computeFacets, formatVec3 } from './facets.js';

function fmt(v: Vec3): string {
  return formatVec3(v).join(` `);
}

/**
 * Write ASCII STL format
 */
function writeAsciiStl(facets: Facet[], name: string): string {
  let output = `solid ${name}\n`;

  for (const facet of facets) {
    output += `  facet normal ${fmt(facet.normal)}\n`;
    output += `    outer loop\n`;
    for (const vertex of facet.vertices) {
      output += `      vertex ${fmt(vertex)}\n`;
    }
    output += `    endloop\n`;
    output += `  endfacet\n`;
  }

  output += `endsolid ${name}\n`;

  return output;
}

/**
 * Export a mesh to ASCII STL
 *
 * @param options Unit conversion, scale and solid name; a ZodError is thrown
 *   when they are invalid
 */
export function exportMeshToStl(mesh: TriangleMesh, options: StlExportOptions = {}): string {
  const { name, ...meshOptions } = stlExportOptionsSchema.parse(options);
  return writeAsciiStl(computeFacets(mesh, meshOptions), name);
}
