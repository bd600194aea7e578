import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  loadConfig,
  validateConfig,
  createPrivateNamePredicate,
  ConfigError,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAME,
} from '../src/config.js';

describe('loadConfig', () => {
  let projectRoot: string;

  beforeEach(() => {
    projectRoot = mkdtempSync(join(tmpdir(), 'pyxref-config-'));
  });

  afterEach(() => {
    rmSync(projectRoot, { recursive: true, force: true });
  });

  it('falls back to the defaults without a config file', () => {
    expect(loadConfig(projectRoot)).toEqual(DEFAULT_CONFIG);
  });

  it('reads a config file with comments and trailing commas', () => {
    writeFileSync(join(projectRoot, CONFIG_FILE_NAME), [
      '{',
      '  // generated code is not ours',
      '  "exclude": ["generated/**"],',
      '  /* report underscore names too */',
      '  "privateNames": "none",',
      '}',
    ].join('\n'));

    const config = loadConfig(projectRoot);

    expect(config.exclude).toEqual(['generated/**']);
    expect(config.privateNames).toBe('none');
    expect(config.wildcardImports).toBe('flag');
  });

  it('keeps commas and brackets inside string values', () => {
    writeFileSync(
      join(projectRoot, CONFIG_FILE_NAME),
      '{"exclude": ["weird,]name/**"], "privatePrefix": "x,}"}'
    );

    const config = loadConfig(projectRoot);

    expect(config.exclude).toEqual(['weird,]name/**']);
    expect(config.privatePrefix).toBe('x,}');
  });

  it('keeps comment markers inside string values', () => {
    writeFileSync(
      join(projectRoot, CONFIG_FILE_NAME),
      '{ "exclude": ["src/**/*.py", "a//b"], } // trailing note'
    );

    expect(loadConfig(projectRoot).exclude).toEqual(['src/**/*.py', 'a//b']);
  });

  it('reports invalid field values with the file path', () => {
    writeFileSync(join(projectRoot, CONFIG_FILE_NAME), '{ "privatePrefix": "" }');

    expect(() => loadConfig(projectRoot)).toThrow(
      `${join(projectRoot, CONFIG_FILE_NAME)}: "privatePrefix" must be a non-empty string`
    );
  });

  it('lets overrides win over the file and skips undefined overrides', () => {
    writeFileSync(join(projectRoot, CONFIG_FILE_NAME), '{ "privateNames": "prefix", "verbose": true }');

    const config = loadConfig(projectRoot, { privateNames: 'dunder', verbose: undefined });

    expect(config.privateNames).toBe('dunder');
    expect(config.verbose).toBe(true);
  });

  it('rejects a file that is not JSON', () => {
    writeFileSync(join(projectRoot, CONFIG_FILE_NAME), 'exclude = tests');
    expect(() => loadConfig(projectRoot)).toThrow(ConfigError);
  });
});

describe('validateConfig', () => {
  it('rejects unknown options', () => {
    expect(() => validateConfig({ colour: 'red' }, 'test')).toThrow('test: unknown option "colour"');
  });

  it('rejects fields of the wrong type', () => {
    expect(() => validateConfig({ maxFileSize: 'big' }, 'test')).toThrow(
      'test: "maxFileSize" must be a positive number'
    );
    expect(() => validateConfig({ exclude: 'tests/**' }, 'test')).toThrow(
      'test: "exclude" must be an array of strings'
    );
    expect(() => validateConfig({ privateNames: 'all' }, 'test')).toThrow(ConfigError);
    expect(() => validateConfig({ ignoreDirs: ['venv', 3] }, 'test')).toThrow(
      'test: "ignoreDirs" must be an array of strings'
    );
  });

  it('returns only the fields given', () => {
    expect(validateConfig({ wildcardImports: 'ignore', maxFileSize: 2048 }, 'test')).toEqual({
      wildcardImports: 'ignore',
      maxFileSize: 2048,
    });
  });

  it('rejects anything but an object', () => {
    expect(() => validateConfig([], 'test')).toThrow('test must contain a JSON object');
  });
});

describe('createPrivateNamePredicate', () => {
  it('matches dunder names only by default', () => {
    const isPrivate = createPrivateNamePredicate(DEFAULT_CONFIG);

    expect(isPrivate('__init__')).toBe(true);
    expect(isPrivate('__all__')).toBe(true);
    expect(isPrivate('_helper')).toBe(false);
    expect(isPrivate('____')).toBe(false);
  });

  it('matches the configured prefix', () => {
    const isPrivate = createPrivateNamePredicate({ privateNames: 'prefix', privatePrefix: '_' });

    expect(isPrivate('_helper')).toBe(true);
    expect(isPrivate('helper')).toBe(false);
  });

  it('matches nothing when disabled', () => {
    const isPrivate = createPrivateNamePredicate({ privateNames: 'none', privatePrefix: '_' });
    expect(isPrivate('__init__')).toBe(false);
  });
});
