import type { Definition, DefinitionKind, ScopeKind, Use } from './types.js';

export interface Scope {
  id: number;
  kind: ScopeKind;
  parent: number | null;
  names: Set<string>;
  globals: Set<string>;
  nonlocals: Set<string>;
}

interface PendingUse {
  name: string;
  line: number;
  scopeId: number;
}

/**
 * Per-file symbol table. Scopes live in an arena and point at their parent by
 * index; the stack holds the scopes that are currently open.
 *
 * Uses are only resolved in `finish()`, once every scope of the file is
 * complete, so binding order inside a scope does not matter.
 */
export class ScopeTable {
  private readonly scopes: Scope[] = [];
  private readonly open: number[] = [];
  private readonly definitions: Definition[] = [];
  private readonly pending: PendingUse[] = [];

  constructor() {
    this.open.push(this.createScope('module', null));
  }

  enterScope(kind: ScopeKind): number {
    const id = this.createScope(kind, this.current());
    this.open.push(id);
    return id;
  }

  exitScope(): void {
    if (this.open.length <= 1) {
      throw new Error('Cannot exit the module scope');
    }
    this.open.pop();
  }

  bind(name: string, line: number, kind: DefinitionKind): void {
    const scope = this.scopes[this.current()];

    if (scope.nonlocals.has(name)) {
      // The binding belongs to an enclosing function
      return;
    }

    const target = scope.globals.has(name) ? this.scopes[0] : scope;
    this.addDefinition(target, name, line, kind);
  }

  /** Assignment expressions inside comprehensions bind in the containing scope. */
  bindOutsideComprehension(name: string, line: number, kind: DefinitionKind): void {
    for (let i = this.open.length - 1; i >= 0; i--) {
      const scope = this.scopes[this.open[i]];
      if (scope.kind !== 'comprehension') {
        if (scope.nonlocals.has(name)) return;
        const target = scope.globals.has(name) ? this.scopes[0] : scope;
        this.addDefinition(target, name, line, kind);
        return;
      }
    }
  }

  declareGlobal(name: string): void {
    this.scopes[this.current()].globals.add(name);
  }

  declareNonlocal(name: string): void {
    this.scopes[this.current()].nonlocals.add(name);
  }

  reference(name: string, line: number): void {
    this.pending.push({ name, line, scopeId: this.current() });
  }

  /**
   * Resolve every recorded use against its scope chain and hand back the
   * file's definitions and uses. The table is spent afterwards.
   */
  finish(): { definitions: Definition[]; uses: Use[] } {
    const uses: Use[] = this.pending.map(use => ({
      name: use.name,
      line: use.line,
      scopeId: use.scopeId,
      resolvedLocally: this.resolves(use.name, use.scopeId),
    }));

    return { definitions: [...this.definitions], uses };
  }

  private resolves(name: string, scopeId: number): boolean {
    const own = this.scopes[scopeId];
    if (own.names.has(name)) return true;

    // Class bodies are not enclosing scopes for anything nested inside them
    let parentId = own.parent;
    while (parentId !== null) {
      const scope = this.scopes[parentId];
      if (scope.kind !== 'class' && scope.names.has(name)) {
        return true;
      }
      parentId = scope.parent;
    }

    return false;
  }

  private addDefinition(scope: Scope, name: string, line: number, kind: DefinitionKind): void {
    scope.names.add(name);
    this.definitions.push({
      name,
      line,
      kind,
      scopeId: scope.id,
      scopeKind: scope.kind,
    });
  }

  private createScope(kind: ScopeKind, parent: number | null): number {
    const id = this.scopes.length;
    this.scopes.push({
      id,
      kind,
      parent,
      names: new Set(),
      globals: new Set(),
      nonlocals: new Set(),
    });
    return id;
  }

  private current(): number {
    return this.open[this.open.length - 1];
  }
}
