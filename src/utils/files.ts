import { readdirSync, statSync, existsSync, lstatSync } from 'fs';
import { join, relative, sep } from 'path';

export const DEFAULT_IGNORE_DIRS = [
  '.git',
  '__pycache__',
  'venv',
  '.venv',
  'node_modules',
  'dist',
  'build',
  '.pytest_cache',
  '.mypy_cache',
  '.tox',
];

/**
 * Collect every .py file under rootDir, as POSIX paths relative to rootDir,
 * sorted so that repeated runs see files in the same order.
 */
export function scanPythonFiles(
  rootDir: string,
  ignoreDirs: readonly string[] = DEFAULT_IGNORE_DIRS
): string[] {
  const files = scanDirectory(rootDir, rootDir, new Set(ignoreDirs));
  return files.sort();
}

function scanDirectory(
  rootDir: string,
  baseDir: string,
  ignoreDirs: Set<string>
): string[] {
  const files: string[] = [];

  try {
    const entries = readdirSync(baseDir);

    for (const entry of entries) {
      const fullPath = join(baseDir, entry);

      // Skip hidden directories/files (starting with .)
      if (entry.startsWith('.')) {
        continue;
      }

      if (ignoreDirs.has(entry)) {
        continue;
      }

      // Skip symlinks
      try {
        const stats = lstatSync(fullPath);
        if (stats.isSymbolicLink()) {
          continue;
        }
      } catch (err) {
        continue;
      }

      const stats = statSync(fullPath);

      if (stats.isDirectory()) {
        files.push(...scanDirectory(rootDir, fullPath, ignoreDirs));
      } else if (stats.isFile() && entry.endsWith('.py')) {
        files.push(toPosixPath(relative(rootDir, fullPath)));
      }
    }
  } catch (err) {
    console.error(`[Scanner] Error scanning directory ${baseDir}:`, err instanceof Error ? err.message : err);
  }

  return files;
}

export function fileExists(filePath: string): boolean {
  try {
    return existsSync(filePath) && statSync(filePath).isFile();
  } catch {
    return false;
  }
}

export function toPosixPath(filePath: string): string {
  return sep === '/' ? filePath : filePath.split(sep).join('/');
}

/** Code-unit order, the same order `Array.prototype.sort` gives paths. */
export function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
