/**
 * File access used by the parser and the resolver
 */

import * as fs from 'node:fs';

export interface PartFileSystem {
  isFile(path: string): boolean;
  isDirectory(path: string): boolean;
  /** Entry names of a directory, empty when it cannot be listed */
  readDir(path: string): string[];
  /** Throws when the file cannot be read */
  readText(path: string): string;
}

// Probing only: a path that cannot be stat'ed (ENOTDIR, EACCES) counts as absent
function stat(path: string): fs.Stats | undefined {
  try {
    return fs.statSync(path, { throwIfNoEntry: false });
  } catch {
    return undefined;
  }
}

export const nodeFileSystem: PartFileSystem = {
  isFile: (path) => stat(path)?.isFile() ?? false,
  isDirectory: (path) => stat(path)?.isDirectory() ?? false,
  readDir: (path) => (stat(path)?.isDirectory() ? fs.readdirSync(path) : []),
  readText: (path) => fs.readFileSync(path, `utf8`),
};
