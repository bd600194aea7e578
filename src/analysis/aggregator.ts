import { parseProject } from '../parser/index.js';
import { getPythonBuiltins } from '../parser/builtins.js';
import { buildImportGraph, graphToAdjacency } from '../graph/index.js';
import { findCycles } from '../graph/cycles.js';
import { calculateCouplingMetrics, type CouplingMetric } from '../graph/metrics.js';
import { createPrivateNamePredicate, DEFAULT_CONFIG, type AnalyzerConfig } from '../config.js';
import { comparePaths } from '../utils/files.js';
import type { DefinitionKind, Diagnostic, FileAnalysis } from '../parser/types.js';

export interface UndefinedSymbol {
  name: string;
  filePath: string;
  line: number;
}

export interface UnusedSymbol {
  name: string;
  filePath: string;
  line: number;
  kind: DefinitionKind;
}

export interface AnalysisSummary {
  filesAnalyzed: number;
  filesSkipped: number;
  definitions: number;
  uses: number;
  importEdges: number;
}

export interface AnalysisReport {
  readonly undefinedSymbols: readonly UndefinedSymbol[];
  readonly unusedSymbols: readonly UnusedSymbol[];
  readonly cycles: readonly string[][];
  readonly couplingMetrics: readonly CouplingMetric[];
  readonly diagnostics: readonly Diagnostic[];
  /** file → files it imports, both levels sorted */
  readonly dependencies: Readonly<Record<string, string[]>>;
  /** name → files defining it, both levels sorted */
  readonly projectSymbols: Readonly<Record<string, string[]>>;
  readonly summary: AnalysisSummary;
}

export type DefinitionIndex = ReadonlyMap<string, readonly string[]>;

/**
 * Every name defined anywhere in the project, with the files that define it.
 * Built once, after all files have been analyzed, and only read afterwards.
 */
export function buildDefinitionIndex(analyses: readonly FileAnalysis[]): DefinitionIndex {
  const index = new Map<string, Set<string>>();

  for (const analysis of analyses) {
    for (const def of analysis.definitions) {
      let files = index.get(def.name);
      if (!files) {
        files = new Set();
        index.set(def.name, files);
      }
      files.add(analysis.filePath);
    }
  }

  const frozen = new Map<string, readonly string[]>();
  for (const name of Array.from(index.keys()).sort()) {
    const files = index.get(name);
    if (files) {
      frozen.set(name, Object.freeze(Array.from(files).sort()));
    }
  }
  return frozen;
}

/** Uses that resolve nowhere: not in their scope chain, the project, or the builtins. */
export function findUndefinedSymbols(
  analyses: readonly FileAnalysis[],
  index: DefinitionIndex,
  builtins: ReadonlySet<string> = getPythonBuiltins()
): UndefinedSymbol[] {
  const found = new Map<string, UndefinedSymbol>();

  for (const analysis of analyses) {
    for (const use of analysis.uses) {
      if (use.resolvedLocally || index.has(use.name) || builtins.has(use.name)) continue;

      const key = `${analysis.filePath}\u0000${use.line}\u0000${use.name}`;
      if (!found.has(key)) {
        found.set(key, { name: use.name, filePath: analysis.filePath, line: use.line });
      }
    }
  }

  return Array.from(found.values()).sort(compareLocated);
}

/**
 * Functions and classes (at any depth) and module-level variables whose name
 * is never read anywhere in the project, directly or as an attribute.
 */
export function findUnusedSymbols(
  analyses: readonly FileAnalysis[],
  isPrivateName: (name: string) => boolean
): UnusedSymbol[] {
  const referenced = new Set<string>();

  for (const analysis of analyses) {
    for (const use of analysis.uses) referenced.add(use.name);
    for (const name of analysis.attributeNames) referenced.add(name);
  }

  const unused: UnusedSymbol[] = [];
  const seen = new Set<string>();

  for (const analysis of analyses) {
    for (const def of analysis.definitions) {
      const candidate =
        def.kind === 'function' ||
        def.kind === 'class' ||
        (def.kind === 'variable' && def.scopeKind === 'module');

      if (!candidate || referenced.has(def.name) || isPrivateName(def.name)) continue;

      // A name rebound on the same line (a, a = ...) is one finding
      const key = `${analysis.filePath}\u0000${def.line}\u0000${def.name}`;
      if (seen.has(key)) continue;
      seen.add(key);

      unused.push({ name: def.name, filePath: analysis.filePath, line: def.line, kind: def.kind });
    }
  }

  return unused.sort(compareLocated);
}

/**
 * Join the per-file results into the project report: symbol findings, the
 * import graph with its cycles, and coupling metrics.
 */
export function aggregateProject(
  analyses: readonly FileAnalysis[],
  config: Pick<AnalyzerConfig, 'privateNames' | 'privatePrefix'> = DEFAULT_CONFIG
): AnalysisReport {
  const index = buildDefinitionIndex(analyses);
  const graph = buildImportGraph(analyses);

  const couplingMetrics = Array.from(calculateCouplingMetrics(graph).values())
    .sort((a, b) => comparePaths(a.filePath, b.filePath));

  const diagnostics = analyses
    .flatMap(a => a.diagnostics)
    .sort((a, b) => comparePaths(a.filePath, b.filePath) || (a.line ?? 0) - (b.line ?? 0));

  const projectSymbols: Record<string, string[]> = {};
  for (const [name, files] of index) {
    projectSymbols[name] = [...files];
  }

  const report: AnalysisReport = {
    undefinedSymbols: findUndefinedSymbols(analyses, index),
    unusedSymbols: findUnusedSymbols(analyses, createPrivateNamePredicate(config)),
    cycles: findCycles(graph),
    couplingMetrics,
    diagnostics,
    dependencies: graphToAdjacency(graph),
    projectSymbols,
    summary: {
      filesAnalyzed: analyses.filter(a => !a.skipped).length,
      filesSkipped: analyses.filter(a => a.skipped).length,
      definitions: analyses.reduce((sum, a) => sum + a.definitions.length, 0),
      uses: analyses.reduce((sum, a) => sum + a.uses.length, 0),
      importEdges: graph.size,
    },
  };

  return Object.freeze(report);
}

/** Enumerate, analyze every file, then aggregate. */
export async function analyzeProject(
  projectRoot: string,
  config: AnalyzerConfig = DEFAULT_CONFIG
): Promise<AnalysisReport> {
  const analyses = await parseProject(projectRoot, {
    exclude: config.exclude,
    ignoreDirs: config.ignoreDirs,
    maxFileSize: config.maxFileSize,
    flagWildcardImports: config.wildcardImports === 'flag',
    verbose: config.verbose,
  });

  return aggregateProject(analyses, config);
}

function compareLocated(
  a: { filePath: string; line: number; name: string },
  b: { filePath: string; line: number; name: string }
): number {
  return comparePaths(a.filePath, b.filePath) || a.line - b.line || comparePaths(a.name, b.name);
}
