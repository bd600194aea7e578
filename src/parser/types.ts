export type ScopeKind =
  | 'module'
  | 'function'
  | 'class'
  | 'lambda'
  | 'comprehension';

export type DefinitionKind =
  | 'function'
  | 'class'
  | 'variable'
  | 'import-alias'
  | 'parameter';

export interface SourceUnit {
  absolutePath: string;
  filePath: string;    // Relative to project root, POSIX separators; the file identity
}

export interface Definition {
  name: string;
  line: number;
  kind: DefinitionKind;
  scopeId: number;     // Index into the file's scope arena
  scopeKind: ScopeKind;
}

export interface Use {
  name: string;
  line: number;
  scopeId: number;
  resolvedLocally: boolean;
}

export interface ImportDeclaration {
  module: string;      // Dotted name without leading dots, '' for `from . import x`
  level: number;       // 0 = absolute, N = N leading dots
  names: string[];     // Imported names for `from` imports (original names, not aliases)
  wildcard: boolean;
  line: number;
}

export interface ImportEdge {
  source: string;
  target: string;
  line: number;
}

export type DiagnosticKind = 'file-skipped' | 'wildcard-import';

export interface Diagnostic {
  kind: DiagnosticKind;
  filePath: string;
  line?: number;
  message: string;
}

export interface FileAnalysis {
  filePath: string;
  definitions: Definition[];
  uses: Use[];
  attributeNames: string[];   // `obj.name` reads; count as usage, never as undefined
  imports: ImportDeclaration[];
  importEdges: ImportEdge[];
  diagnostics: Diagnostic[];
  skipped: boolean;
}

export interface PythonAnalyzerOptions {
  projectRoot: string;
  flagWildcardImports: boolean;
  /** Existence check handed to the import resolver */
  exists?: (absolutePath: string) => boolean;
}
