/**
 * Parser and exporter configuration
 *
 * Zod schemas for the options accepted by the parser and the exporters.
 * Collaborators (file system, logger) are passed beside the validated part.
 */

import { z } from 'zod';
import type { ParserLogger } from './diagnostics.js';
import type { PartFileSystem } from './fileSystem.js';

/**
 * Conventional install location of the LDraw parts library
 */
export const DEFAULT_LIBRARY_PATH = `/usr/share/ldraw`;

/** Millimetres per LDraw unit */
export const DEFAULT_MM_PER_LDU = 0.4;

/**
 * First words of type 0 lines that are plain comments even though they are
 * not written in the `0 // ...` form. Compared case-insensitively.
 */
export const DEFAULT_META_IGNORE: readonly string[] = [
  `Hi-Res`,
  `Name:`,
  `Author:`,
  `!LDRAW_ORG`,
  `!LICENSE`,
  `!HISTORY`,
  `Technic`,
  `Box`,
  `Cylinder`,
  `Peg`,
  `Rectangle`,
  `Stud`,
];

// ============================================================================
// Parser
// ============================================================================

export const parseOptionsSchema = z.object({
  libraryPath: z.string().min(1).default(DEFAULT_LIBRARY_PATH),
  /** Start the root part with its winding inverted */
  invert: z.boolean().default(false),
  debug: z.boolean().default(false),
  metaIgnore: z.array(z.string().min(1)).default([...DEFAULT_META_IGNORE]),
  /** Name used in diagnostics when the root is given as text */
  sourceName: z.string().min(1).default(`<input>`),
});

export type ParseConfig = z.infer<typeof parseOptionsSchema>;

export type ParseOptions = z.input<typeof parseOptionsSchema> & {
  fileSystem?: PartFileSystem;
  logger?: ParserLogger;
};

// ============================================================================
// Export
// ============================================================================

export const meshExportOptionsSchema = z.object({
  /** Uniform scale applied on top of the unit conversion */
  scale: z.number().positive().default(1),
  mmPerLdu: z.number().positive().default(DEFAULT_MM_PER_LDU),
});

export const stlExportOptionsSchema = meshExportOptionsSchema.extend({
  /** Name written after `solid` / `endsolid` */
  name: z.string().regex(/^\S*$/, `name must not contain whitespace`).default(`model`),
});

export type MeshExportOptions = z.input<typeof meshExportOptionsSchema>;
export type MeshExportConfig = z.infer<typeof meshExportOptionsSchema>;
export type StlExportOptions = z.input<typeof stlExportOptionsSchema>;

/**
 * One line per issue: `scale: Too small: expected number to be >0`
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.map(String).join(`.`)}: ${issue.message}` : issue.message))
    .join(`; `);
}
