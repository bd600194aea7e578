import { dirname, isAbsolute, join, relative } from 'path';
import { fileExists, toPosixPath } from '../utils/files.js';

export interface ImportRequest {
  /** Dotted module name without leading dots; may be empty for relative imports */
  module: string;
  /** 0 for absolute imports, otherwise the number of leading dots */
  level: number;
  /** Importing file, relative to the project root */
  fromFile: string;
  projectRoot: string;
}

/**
 * Map one import to a file inside the project, or null when the module lives
 * outside it (standard library, third-party packages, or simply missing).
 *
 * Pure apart from the `exists` check, which defaults to the filesystem.
 */
export function resolvePythonImport(
  request: ImportRequest,
  exists: (absolutePath: string) => boolean = fileExists
): string | null {
  const { module, level, fromFile, projectRoot } = request;
  const segments = module ? module.split('.').filter(s => s.length > 0) : [];

  let baseDir: string;
  if (level > 0) {
    // from . import x → the importing file's directory; each extra dot goes up one more
    baseDir = dirname(join(projectRoot, fromFile));
    for (let i = 0; i < level - 1; i++) {
      baseDir = dirname(baseDir);
    }
  } else {
    if (segments.length === 0) return null;
    baseDir = projectRoot;
  }

  const candidates: string[] = [];
  if (segments.length > 0) {
    const modulePath = join(baseDir, ...segments);
    candidates.push(`${modulePath}.py`);
    candidates.push(join(modulePath, '__init__.py'));
  } else {
    candidates.push(join(baseDir, '__init__.py'));
  }

  for (const candidate of candidates) {
    const rel = relative(projectRoot, candidate);
    if (rel.startsWith('..') || isAbsolute(rel)) {
      continue; // Escaped the project root
    }
    if (exists(candidate)) {
      return toPosixPath(rel);
    }
  }

  return null;
}

export function isPackageInit(filePath: string): boolean {
  return filePath === '__init__.py' || filePath.endsWith('/__init__.py');
}

