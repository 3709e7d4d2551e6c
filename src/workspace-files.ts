import { readdir, stat } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve, sep } from 'node:path';
import { BACKUP_CONFIG_DIR, BACKUPS_DIR } from './store.js';

/**
 * Directory and file names never included in a backup: the backup
 * machinery's own state, plus build and VCS noise.
 */
export const EXCLUDE = new Set([
  BACKUPS_DIR,
  BACKUP_CONFIG_DIR,
  'updates',
  '.git',
  'node_modules',
]);

export interface LocalFile {
  /** `/`-separated path relative to the data directory */
  relativePath: string;
  absolutePath: string;
  size: number;
  modifiedAt: Date;
}

/**
 * Enumerate every regular file under the data directory, skipping any path
 * with an excluded segment. Sorted by relative path.
 */
export async function enumerateBackupFiles(root: string, extraExclude: Iterable<string> = []): Promise<LocalFile[]> {
  const exclude = new Set([...EXCLUDE, ...extraExclude]);
  const found: LocalFile[] = [];
  for (const absolutePath of await walkDir(root, exclude)) {
    const s = await stat(absolutePath);
    found.push({
      relativePath: relative(root, absolutePath).split(sep).join('/'),
      absolutePath,
      size: s.size,
      modifiedAt: s.mtime,
    });
  }
  return found.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
}

/**
 * Resolve a manifest path under the data directory, or null if it would
 * land outside it.
 */
export function resolveInside(root: string, relativePath: string): string | null {
  if (relativePath === '' || isAbsolute(relativePath) || relativePath.includes('\0')) return null;
  const base = resolve(root);
  const target = resolve(base, ...relativePath.split('/'));
  const rel = relative(base, target);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) return null;
  return target;
}

async function walkDir(dirPath: string, exclude: Set<string>): Promise<string[]> {
  const results: string[] = [];
  let entries;
  try {
    entries = await readdir(dirPath, { withFileTypes: true });
  } catch {
    return results;
  }
  for (const entry of entries) {
    if (exclude.has(entry.name)) continue;
    const full = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      const sub = await walkDir(full, exclude);
      results.push(...sub);
    } else if (entry.isFile()) {
      results.push(full);
    }
  }
  return results;
}
