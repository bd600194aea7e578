import { describe, it, expect } from 'vitest';
import { ScopeTable } from '../src/parser/scope.js';

describe('ScopeTable', () => {
  it('resolves a use recorded before the binding in the same scope', () => {
    const table = new ScopeTable();
    table.reference('helper', 1);
    table.bind('helper', 3, 'function');

    const { uses } = table.finish();
    expect(uses).toEqual([{ name: 'helper', line: 1, scopeId: 0, resolvedLocally: true }]);
  });

  it('walks up through enclosing function scopes', () => {
    const table = new ScopeTable();
    table.bind('outer', 1, 'function');
    table.enterScope('function');
    table.bind('total', 2, 'variable');
    table.enterScope('function');
    table.reference('total', 4);
    table.reference('missing', 5);
    table.exitScope();
    table.exitScope();

    const { uses } = table.finish();
    expect(uses.map(u => [u.name, u.resolvedLocally])).toEqual([
      ['total', true],
      ['missing', false],
    ]);
  });

  it('does not let methods see names bound in the class body', () => {
    const table = new ScopeTable();
    table.enterScope('class');
    table.bind('limit', 2, 'variable');
    table.reference('limit', 3);
    table.enterScope('function');
    table.reference('limit', 5);
    table.exitScope();
    table.exitScope();

    const { uses } = table.finish();
    expect(uses.map(u => u.resolvedLocally)).toEqual([true, false]);
  });

  it('binds global names in the module scope', () => {
    const table = new ScopeTable();
    table.enterScope('function');
    table.declareGlobal('counter');
    table.bind('counter', 3, 'variable');
    table.exitScope();
    table.reference('counter', 5);

    const { definitions, uses } = table.finish();
    expect(definitions).toEqual([
      { name: 'counter', line: 3, kind: 'variable', scopeId: 0, scopeKind: 'module' },
    ]);
    expect(uses[0].resolvedLocally).toBe(true);
  });

  it('records no new definition for nonlocal names', () => {
    const table = new ScopeTable();
    table.enterScope('function');
    table.bind('total', 2, 'variable');
    table.enterScope('function');
    table.declareNonlocal('total');
    table.bind('total', 5, 'variable');
    table.exitScope();
    table.exitScope();

    const { definitions } = table.finish();
    expect(definitions).toHaveLength(1);
    expect(definitions[0].line).toBe(2);
  });

  it('binds assignment expressions outside comprehensions', () => {
    const table = new ScopeTable();
    table.enterScope('function');
    table.enterScope('comprehension');
    table.bindOutsideComprehension('last', 3, 'variable');
    table.exitScope();
    table.exitScope();

    const { definitions } = table.finish();
    expect(definitions[0].scopeKind).toBe('function');
  });

  it('refuses to exit the module scope', () => {
    const table = new ScopeTable();
    expect(() => table.exitScope()).toThrow('Cannot exit the module scope');
  });
});
