import fs from 'node:fs';
import path from 'node:path';
import { PathNotFoundError, UnsupportedPathError } from '../cli/errors.js';
import { matchesAny } from './glob.js';
import type { FileRecord, GlobSet } from './types.js';

/**
 * Lazily enumerate the files to check under `root`.
 *
 * A root that is itself a regular file is yielded as-is, without applying
 * the glob sets. Any other kind of root (a FIFO, a device) is rejected. Directories are walked depth-first in lexical order; ignore patterns
 * prune matching directories as well as files.
 */
export function* scanFiles(root: string, globs: GlobSet): Generator<FileRecord> {
  const stats = statOrNull(root);
  if (!stats) {
    throw new PathNotFoundError(root);
  }

  if (stats.isFile()) {
    yield { absolutePath: path.resolve(root), relativePath: path.basename(root) };
    return;
  }
  if (!stats.isDirectory()) {
    throw new UnsupportedPathError(root);
  }

  const rootPath = path.resolve(root);
  yield* walkDirectory(rootPath, rootPath, {
    accept: [...globs.accept],
    ignore: [...globs.ignore],
  });
}

function* walkDirectory(rootPath: string, dir: string, globs: GlobSet): Generator<FileRecord> {
  const entries = fs
    .readdirSync(dir, { withFileTypes: true })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const absolutePath = path.join(dir, entry.name);
    const relativePath = toRelativePath(rootPath, absolutePath);

    if (isIgnored(globs.ignore, entry.name, relativePath)) {
      continue;
    }

    let isDirectory = entry.isDirectory();
    let isFile = entry.isFile();
    if (entry.isSymbolicLink()) {
      // Follow links to files only; linked directories could form cycles.
      // Dangling, looping and unreadable links are skipped.
      const target = statOrNull(absolutePath);
      isDirectory = false;
      isFile = target?.isFile() ?? false;
    }

    if (isDirectory) {
      yield* walkDirectory(rootPath, absolutePath, globs);
    } else if (isFile && matchesAny(globs.accept, entry.name)) {
      yield { absolutePath, relativePath };
    }
  }
}

function isIgnored(ignore: readonly string[], name: string, relativePath: string): boolean {
  for (const pattern of ignore) {
    // Masks with a slash address a path below the root, others a base name.
    const subject = pattern.includes('/') ? relativePath.split(path.sep).join('/') : name;
    if (matchesAny([pattern], subject)) {
      return true;
    }
  }
  return false;
}

function toRelativePath(rootPath: string, filePath: string): string {
  return filePath.slice(rootPath.length).replace(/^[\\/]+/, '');
}

const UNREACHABLE_CODES = new Set(['ENOENT', 'ENOTDIR', 'ELOOP', 'EACCES']);

function statOrNull(target: string): fs.Stats | null {
  try {
    return fs.statSync(target);
  } catch (error) {
    if (isNodeError(error) && error.code !== undefined && UNREACHABLE_CODES.has(error.code)) {
      return null;
    }
    throw error;
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
