/**
 * Local filesystem side of the mirror: stat, list and order entries.
 */

import { constants as fsConstants } from 'node:fs';
import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { AccessError, describeError } from './errors.js';
import { classifyFile } from './file-kind.js';
import type { LocalEntry } from './types.js';

/**
 * Order names by UTF-16 code units. Independent of locale and of the order
 * the filesystem enumerates entries in.
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Stat a path (following symlinks) and describe it.
 * Returns null for entries that are neither files nor directories.
 * Throws AccessError when the path is missing or unreadable.
 */
export async function statEntry(localPath: string): Promise<LocalEntry | null> {
  let stats: Stats;
  try {
    stats = await fs.stat(localPath);
  } catch (err) {
    throw new AccessError(localPath, describeError(err), { cause: err });
  }

  const name = path.basename(path.resolve(localPath));

  if (stats.isDirectory()) {
    let realPath: string;
    try {
      realPath = await fs.realpath(localPath);
    } catch (err) {
      throw new AccessError(localPath, describeError(err), { cause: err });
    }
    return { type: 'directory', name, path: localPath, realPath };
  }
  if (stats.isFile()) {
    return {
      type: 'file',
      name,
      path: localPath,
      sizeBytes: stats.size,
      kind: classifyFile(name),
    };
  }
  return null;
}

/**
 * Throws AccessError unless the current process may read `localPath`.
 */
export async function assertReadable(localPath: string): Promise<void> {
  try {
    await fs.access(localPath, fsConstants.R_OK);
  } catch (err) {
    throw new AccessError(localPath, describeError(err), { cause: err });
  }
}

export interface DirectoryListing {
  /** Entries in a single combined alphabetical order (files and dirs interleaved) */
  entries: LocalEntry[];
  /** Names left out: hidden entries and special files */
  skipped: string[];
}

/**
 * List the immediate entries of a directory, sorted by name.
 * Throws AccessError when the directory cannot be read.
 */
export async function listDirectory(
  dirPath: string,
  options?: { includeHidden?: boolean }
): Promise<DirectoryListing> {
  const includeHidden = options?.includeHidden ?? false;

  let names: string[];
  try {
    names = await fs.readdir(dirPath);
  } catch (err) {
    throw new AccessError(dirPath, describeError(err), { cause: err });
  }

  const entries: LocalEntry[] = [];
  const skipped: string[] = [];

  for (const name of [...names].sort(compareNames)) {
    if (!includeHidden && name.startsWith('.')) {
      skipped.push(name);
      continue;
    }

    let entry: LocalEntry | null;
    try {
      entry = await statEntry(path.join(dirPath, name));
    } catch (err) {
      // Broken symlinks and entries removed since readdir
      if (err instanceof AccessError) {
        skipped.push(name);
        continue;
      }
      throw err;
    }

    if (entry === null) {
      skipped.push(name);
      continue;
    }
    entries.push(entry);
  }

  return { entries, skipped };
}
