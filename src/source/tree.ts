/**
 * Source Tree Hashing
 *
 * Walks an application source tree and hashes every regular file. The
 * result is the source stage's declared input: any file change yields a
 * different digest, and nothing outside the tree is read.
 *
 * Symbolic links to files are hashed through their target. Symbolic links
 * to directories are not followed.
 *
 * @module source/tree
 */

import * as crypto from 'node:crypto';
import type { Dirent, Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { LayerIOError, wrapIOError } from '../errors/index.js';

export interface SourceFile {
  /** POSIX path relative to the tree root */
  path: string;
  sha256: string;
  sizeBytes: number;
}

export interface SourceTree {
  /** Absolute root directory */
  root: string;
  /** Files sorted by path */
  files: SourceFile[];
  totalBytes: number;
}

async function hashFile(filePath: string): Promise<{ sha256: string; sizeBytes: number }> {
  const content = await fs.readFile(filePath);
  return {
    sha256: crypto.createHash('sha256').update(content).digest('hex'),
    sizeBytes: content.length,
  };
}

/**
 * Hash every file under `root`, skipping entries whose name is in `ignore`
 * at any depth.
 *
 * @throws LayerIOError if the root is missing or not a directory, or any
 *   file cannot be read
 *
 * @example
 * const tree = await hashSourceTree('/work/geo-app', ['.git', '__pycache__']);
 * tree.files[0]; // { path: 'manage.py', sha256: '…', sizeBytes: 627 }
 */
export async function hashSourceTree(root: string, ignore: readonly string[] = []): Promise<SourceTree> {
  const absoluteRoot = path.resolve(root);
  const ignored = new Set(ignore);

  let rootStat: Stats;
  try {
    rootStat = await fs.stat(absoluteRoot);
  } catch (error) {
    throw wrapIOError(error, absoluteRoot);
  }
  if (!rootStat.isDirectory()) {
    throw new LayerIOError(absoluteRoot, `Source root is not a directory: ${absoluteRoot}`);
  }

  const files: SourceFile[] = [];

  async function walk(dir: string, relDir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      throw wrapIOError(error, dir);
    }

    for (const entry of entries) {
      if (ignored.has(entry.name)) {
        continue;
      }
      const fullPath = path.join(dir, entry.name);
      const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;

      try {
        if (entry.isDirectory()) {
          await walk(fullPath, relPath);
        } else if (entry.isFile() || (entry.isSymbolicLink() && (await fs.stat(fullPath)).isFile())) {
          files.push({ path: relPath, ...(await hashFile(fullPath)) });
        }
      } catch (error) {
        throw wrapIOError(error, fullPath);
      }
    }
  }

  await walk(absoluteRoot, '');
  files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

  return {
    root: absoluteRoot,
    files,
    totalBytes: files.reduce((total, file) => total + file.sizeBytes, 0),
  };
}

/**
 * Join a working directory and a tree-relative path into an image path.
 *
 * @example
 * imagePath('/code', 'app/models.py'); // '/code/app/models.py'
 * imagePath('/', 'manage.py'); // '/manage.py'
 */
export function imagePath(workdir: string, relPath: string): string {
  return path.posix.join(workdir, relPath);
}
