import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { parse, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { z } from 'zod';
import { DEFAULT_IGNORE_DIRS } from './utils/files.js';

export const CONFIG_FILE_NAME = 'pyxref.config.json';

/**
 * Which names the unused-symbol report leaves out.
 * - 'dunder': `__init__`, `__all__` and friends
 * - 'prefix': anything starting with `privatePrefix`
 * - 'none':   report everything
 */
export type PrivateNamePolicy = 'dunder' | 'prefix' | 'none';

export type WildcardImportPolicy = 'flag' | 'ignore';

export interface AnalyzerConfig {
  /** Glob patterns (minimatch) matched against project-relative paths */
  exclude: string[];
  /** Directory names never descended into */
  ignoreDirs: string[];
  privateNames: PrivateNamePolicy;
  privatePrefix: string;
  wildcardImports: WildcardImportPolicy;
  /** Files larger than this many bytes are skipped */
  maxFileSize: number;
  verbose: boolean;
}

export const DEFAULT_CONFIG: AnalyzerConfig = {
  exclude: [],
  ignoreDirs: [...DEFAULT_IGNORE_DIRS],
  privateNames: 'dunder',
  privatePrefix: '_',
  wildcardImports: 'flag',
  maxFileSize: 1_000_000,
  verbose: false,
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Load pyxref.config.json from the project root (if present), merge it over
 * the defaults, then apply overrides (usually CLI flags).
 */
export function loadConfig(
  projectRoot: string,
  overrides: Partial<AnalyzerConfig> = {}
): AnalyzerConfig {
  const fromFile = readConfigFile(join(projectRoot, CONFIG_FILE_NAME));
  return { ...DEFAULT_CONFIG, ...fromFile, ...stripUndefined(overrides) };
}

function readConfigFile(configPath: string): Partial<AnalyzerConfig> {
  if (!existsSync(configPath)) {
    return {};
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read ${configPath}: ${err instanceof Error ? err.message : err}`);
  }

  // JSONC: comments and trailing commas are allowed
  const errors: ParseError[] = [];
  const parsed: unknown = parse(raw, errors, { allowTrailingComma: true });

  const [first] = errors;
  if (first) {
    throw new ConfigError(
      `${configPath} is not valid JSON: ${printParseErrorCode(first.error)} at offset ${first.offset}`
    );
  }

  return validateConfig(parsed, configPath);
}

const AnalyzerConfigSchema = z
  .object({
    exclude: z.array(z.string()).optional(),
    ignoreDirs: z.array(z.string()).optional(),
    privateNames: z.enum(['dunder', 'prefix', 'none']).optional(),
    privatePrefix: z.string().min(1).optional(),
    wildcardImports: z.enum(['flag', 'ignore']).optional(),
    maxFileSize: z.number().finite().positive().optional(),
    verbose: z.boolean().optional(),
  })
  .strict();

const FIELD_REQUIREMENTS: Record<keyof AnalyzerConfig, string> = {
  exclude: 'must be an array of strings',
  ignoreDirs: 'must be an array of strings',
  privateNames: 'must be one of "dunder", "prefix", "none"',
  privatePrefix: 'must be a non-empty string',
  wildcardImports: 'must be "flag" or "ignore"',
  maxFileSize: 'must be a positive number',
  verbose: 'must be a boolean',
};

export function validateConfig(value: unknown, source = 'configuration'): Partial<AnalyzerConfig> {
  const validated = AnalyzerConfigSchema.safeParse(value);

  if (!validated.success) {
    throw toConfigError(validated.error, source);
  }

  return validated.data;
}

function toConfigError(error: z.ZodError, source: string): ConfigError {
  const [issue] = error.issues;

  if (issue?.code === 'unrecognized_keys') {
    return new ConfigError(`${source}: unknown option "${issue.keys[0]}"`);
  }

  const key = issue?.path[0];
  if (typeof key === 'string' && isConfigKey(key)) {
    return new ConfigError(`${source}: "${key}" ${FIELD_REQUIREMENTS[key]}`);
  }

  return new ConfigError(`${source} must contain a JSON object`);
}

function isConfigKey(key: string): key is keyof AnalyzerConfig {
  return Object.prototype.hasOwnProperty.call(FIELD_REQUIREMENTS, key);
}

/**
 * The naming-convention predicate for the unused-symbol pass, decided once
 * from the configuration.
 */
export function createPrivateNamePredicate(
  config: Pick<AnalyzerConfig, 'privateNames' | 'privatePrefix'>
): (name: string) => boolean {
  switch (config.privateNames) {
    case 'dunder':
      return (name) => name.length > 4 && name.startsWith('__') && name.endsWith('__');
    case 'prefix': {
      const prefix = config.privatePrefix;
      return (name) => name.startsWith(prefix);
    }
    case 'none':
      return () => false;
  }
}

function stripUndefined(overrides: Partial<AnalyzerConfig>): Partial<AnalyzerConfig> {
  const result: Partial<AnalyzerConfig> = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}
