/**
 * All parser operations are read-only: files are read and parsed, never
 * written. Each file is analyzed independently, so a failure in one of them
 * only removes that file from the results.
 */

import { readFile, stat } from 'fs/promises';
import { join } from 'path';
import { minimatch } from 'minimatch';
import { scanPythonFiles, DEFAULT_IGNORE_DIRS } from '../utils/files.js';
import { analyzePythonSource, skippedFile } from './python.js';
import type { FileAnalysis, SourceUnit } from './types.js';

const MAX_FILE_SIZE = 1_000_000; // 1MB, larger files are likely generated

// Files read at once; keeps large trees clear of EMFILE
export const READ_BATCH_SIZE = 64;

export interface ParseOptions {
  exclude?: string[];
  ignoreDirs?: string[];
  maxFileSize?: number;
  flagWildcardImports?: boolean;
  verbose?: boolean;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Enumerate the project's Python files, honoring ignore directories and
 * exclude globs. Paths are relative to the root and sorted.
 */
export function enumerateSourceUnits(projectRoot: string, options: ParseOptions = {}): SourceUnit[] {
  const files = scanPythonFiles(projectRoot, options.ignoreDirs ?? DEFAULT_IGNORE_DIRS);
  const units: SourceUnit[] = [];

  for (const file of files) {
    if (options.exclude) {
      const shouldExclude = options.exclude.some((pattern: string) =>
        minimatch(file, pattern, { matchBase: true })
      );
      if (shouldExclude) {
        if (options.verbose) {
          console.error(`[Parser] Excluded: ${file}`);
        }
        continue;
      }
    }

    units.push({ absolutePath: join(projectRoot, file), filePath: file });
  }

  return units;
}

/**
 * Read, decode and analyze one file. Never throws: anything that goes wrong
 * becomes a file-skipped diagnostic on an otherwise empty analysis.
 */
export async function analyzeSourceUnit(
  unit: SourceUnit,
  projectRoot: string,
  options: ParseOptions = {}
): Promise<FileAnalysis> {
  const maxFileSize = options.maxFileSize ?? MAX_FILE_SIZE;

  try {
    const stats = await stat(unit.absolutePath);
    if (stats.size > maxFileSize) {
      console.error(`[Parser] Skipping ${unit.filePath} — file too large (${(stats.size / 1024).toFixed(0)}KB)`);
      return skippedFile(unit.filePath, `File too large (${stats.size} bytes)`);
    }

    if (options.verbose) {
      console.error(`[Parser] Parsing: ${unit.filePath}`);
    }

    const buffer = await readFile(unit.absolutePath);
    let sourceCode: string;
    try {
      sourceCode = utf8.decode(buffer);
    } catch {
      console.error(`[Parser] Skipping ${unit.filePath} — not valid UTF-8`);
      return skippedFile(unit.filePath, 'File is not valid UTF-8');
    }

    const analysis = analyzePythonSource(unit.filePath, sourceCode, {
      projectRoot,
      flagWildcardImports: options.flagWildcardImports ?? true,
    });

    if (analysis.skipped) {
      console.error(`[Parser] Skipping ${unit.filePath} — ${analysis.diagnostics[0]?.message ?? 'parse error'}`);
    }

    return analysis;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[Parser] Error parsing file ${unit.filePath}:`, message);
    return skippedFile(unit.filePath, message);
  }
}

export async function parseProject(
  projectRoot: string,
  options: ParseOptions = {}
): Promise<FileAnalysis[]> {
  const units = enumerateSourceUnits(projectRoot, options);

  // Files are independent of each other; each batch is one join point
  const analyses: FileAnalysis[] = [];
  for (let i = 0; i < units.length; i += READ_BATCH_SIZE) {
    const batch = units.slice(i, i + READ_BATCH_SIZE);
    analyses.push(...await Promise.all(
      batch.map(unit => analyzeSourceUnit(unit, projectRoot, options))
    ));
  }

  const skipped = analyses.filter(a => a.skipped).length;

  if (options.verbose || skipped > 0) {
    console.error(`\n[Parser] Summary:`);
    console.error(`  Parsed: ${analyses.length - skipped} files`);
    if (skipped > 0) {
      console.error(`  Skipped: ${skipped} files`);
    }
  }

  return analyses;
}
