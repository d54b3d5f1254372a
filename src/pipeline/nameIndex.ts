import * as fs from "fs";
import * as path from "path";
import { normalize } from "../lib/normalize";
import type { NameIndex } from "../contracts";

export type { NameIndex };

function isDirectory(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Index every regular file below `dir`. Files of a directory are taken
 * before its subdirectories, both in enumeration order. Unreadable
 * subdirectories are skipped.
 */
function walk(dir: string, index: NameIndex): void {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch {
    return;
  }

  const subdirs: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      subdirs.push(fullPath);
    } else if (entry.isFile()) {
      const key = normalize(entry.name);
      const existing = index.entries.get(key);
      if (existing !== undefined) {
        index.collisions.push({ key, replaced: existing, path: fullPath });
      }
      index.entries.set(key, fullPath);
    }
  }

  for (const subdir of subdirs) {
    walk(subdir, index);
  }
}

/**
 * Build a normalized filename -> absolute path index over the given roots.
 *
 * Roots that are not existing directories are skipped. When two files
 * normalize to the same key the later one wins; walk order is whatever the
 * filesystem enumerates, so every overwrite is kept in `collisions`.
 */
export function buildIndex(rootFolders: readonly string[]): NameIndex {
  const index: NameIndex = { entries: new Map(), collisions: [] };

  for (const root of rootFolders) {
    const resolvedRoot = path.resolve(root);
    if (!isDirectory(resolvedRoot)) continue;
    walk(resolvedRoot, index);
  }

  return index;
}
