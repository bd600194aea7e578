import { readFileSync } from 'fs';

interface BuiltinTable {
  builtins: string[];
  implicit: string[];   // Names the interpreter provides inside modules and methods
}

let cached: ReadonlySet<string> | null = null;

/**
 * Names that are always defined in Python code: the contents of the builtins
 * module plus module attributes such as `__file__`. Loaded once per process.
 */
export function getPythonBuiltins(): ReadonlySet<string> {
  if (cached) return cached;

  const tablePath = new URL('../../data/python-builtins.json', import.meta.url);
  const table: unknown = JSON.parse(readFileSync(tablePath, 'utf-8'));

  if (!isBuiltinTable(table)) {
    throw new Error(`Malformed builtin name table: ${tablePath.pathname}`);
  }

  cached = new Set([...table.builtins, ...table.implicit]);
  return cached;
}

function isBuiltinTable(value: unknown): value is BuiltinTable {
  if (typeof value !== 'object' || value === null) return false;
  if (!('builtins' in value) || !('implicit' in value)) return false;
  return isStringArray(value.builtins) && isStringArray(value.implicit);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}
