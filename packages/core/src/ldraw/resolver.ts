/**
 * Sub-part file resolution
 *
 * Layout of an LDraw library:
 *
 *   ldraw
 *   ├── models
 *   ├── p          primitives
 *   │   ├── 48     high resolution primitives
 *   │   └── 8
 *   └── parts      parts
 *       └── s      sub-parts
 *
 * References name files relative to one of the search roots, case-insensitively
 * and often with `\` separators (`s\3001s01.dat`).
 */

import * as path from 'node:path';
import type { PartFileSystem } from './fileSystem.js';
import { nodeFileSystem } from './fileSystem.js';

/**
 * Search roots below the library path, in probing order
 */
export const SEARCH_ROOTS: readonly (readonly string[])[] = [
  [`p`, `48`],
  [`p`],
  [`parts`],
  [`parts`, `s`],
];

export type ResolveResult =
  | { found: true; path: string }
  | { found: false; tried: string[] };

/**
 * Lower-cased path segments of a referenced name
 */
export function normalizePartName(name: string): string[] {
  return name
    .toLowerCase()
    .replace(/\\/g, `/`)
    .split(`/`)
    .filter((segment) => segment !== `` && segment !== `.`);
}

/**
 * Resolves part references against one library.
 *
 * Directory listings used for case-insensitive matching are cached for the
 * lifetime of the resolver, so one instance should cover one run.
 */
export class PartResolver {
  private readonly listings = new Map<string, Map<string, string>>();

  constructor(
    readonly libraryPath: string,
    private readonly fileSystem: PartFileSystem = nodeFileSystem
  ) {}

  resolve(name: string): ResolveResult {
    const segments = normalizePartName(name);
    const tried: string[] = [];

    if (segments.length === 0) {
      return { found: false, tried };
    }

    for (const root of SEARCH_ROOTS) {
      tried.push(path.join(this.libraryPath, ...root, ...segments));
      const match = this.match([...root, ...segments]);
      if (match !== undefined) {
        return { found: true, path: match };
      }
    }

    return { found: false, tried };
  }

  /**
   * Walk `segments` down from the library path, one case-insensitive step at
   * a time. The last segment must be a regular file.
   */
  private match(segments: string[]): string | undefined {
    const exact = path.join(this.libraryPath, ...segments);
    if (this.fileSystem.isFile(exact)) {
      return exact;
    }

    let current = this.libraryPath;
    for (const segment of segments) {
      const entry = this.listing(current).get(segment);
      if (entry === undefined) {
        return undefined;
      }
      current = path.join(current, entry);
    }

    return this.fileSystem.isFile(current) ? current : undefined;
  }

  private listing(dir: string): Map<string, string> {
    let entries = this.listings.get(dir);
    if (entries === undefined) {
      entries = new Map();
      for (const entry of this.fileSystem.readDir(dir)) {
        const key = entry.toLowerCase();
        // Keep the first of several names differing only in case
        if (!entries.has(key)) {
          entries.set(key, entry);
        }
      }
      this.listings.set(dir, entries);
    }
    return entries;
  }
}

/**
 * Resolve a single reference without keeping a resolver around
 */
export function resolvePart(
  name: string,
  libraryPath: string,
  fileSystem: PartFileSystem = nodeFileSystem
): ResolveResult {
  return new PartResolver(libraryPath, fileSystem).resolve(name);
}
