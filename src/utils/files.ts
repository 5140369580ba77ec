import { readdir, stat } from 'fs/promises';
import { isAbsolute, join, relative, resolve, sep } from 'path';
import { minimatch } from 'minimatch';

const IGNORED_DIRS = new Set(['.git', 'node_modules']);

export function toPosix(path: string): string {
  return path.split(sep).join('/');
}

/**
 * Workspace-relative POSIX form of a path reported by a tool or a user.
 * Paths outside the workspace stay absolute.
 */
export function toWorkspacePath(file: string, workspaceRoot: string, baseDir: string = workspaceRoot): string {
  const absolute = resolve(baseDir, file);
  const rel = relative(workspaceRoot, absolute);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) return toPosix(absolute);
  return toPosix(rel);
}

export function matchesAny(path: string, globs: string[]): boolean {
  return globs.some(glob => minimatch(path, glob, { dot: true }));
}

/** Keeps paths matching any include glob (all when none are given) and no exclude glob. */
export function filterByGlobs(paths: string[], include: string[], exclude: string[] = []): string[] {
  return paths.filter(p => (include.length === 0 || matchesAny(p, include)) && !matchesAny(p, exclude));
}

export function hasExtension(path: string, extensions: Iterable<string>): boolean {
  for (const ext of extensions) {
    if (path.endsWith(ext)) return true;
  }
  return false;
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Lists every file under `dir` as a workspace-relative POSIX path, sorted.
 * `.git` and `node_modules` are never entered.
 */
export async function walkFiles(workspaceRoot: string, dir: string = workspaceRoot): Promise<string[]> {
  const files: string[] = [];

  async function visit(current: string): Promise<void> {
    const entries = await readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const full = join(current, entry.name);
      if (entry.isDirectory()) {
        if (!IGNORED_DIRS.has(entry.name)) await visit(full);
      } else if (entry.isFile()) {
        files.push(toPosix(relative(workspaceRoot, full)));
      }
    }
  }

  await visit(dir);
  return files.sort();
}

export function uniqueSorted(paths: Iterable<string>): string[] {
  return [...new Set(paths)].sort();
}
