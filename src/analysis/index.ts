export {
  analyzeProject,
  aggregateProject,
  buildDefinitionIndex,
  findUndefinedSymbols,
  findUnusedSymbols,
} from './aggregator.js';
export type {
  AnalysisReport,
  AnalysisSummary,
  DefinitionIndex,
  UndefinedSymbol,
  UnusedSymbol,
} from './aggregator.js';
export { loadConfig, validateConfig, ConfigError, DEFAULT_CONFIG } from '../config.js';
export type { AnalyzerConfig, PrivateNamePolicy, WildcardImportPolicy } from '../config.js';
export { parseProject, analyzeSourceUnit, enumerateSourceUnits } from '../parser/index.js';
export { analyzePythonSource } from '../parser/python.js';
export { resolvePythonImport } from '../parser/resolver.js';
export { buildImportGraph, addImportEdge, graphToAdjacency } from '../graph/index.js';
export type { ImportGraph } from '../graph/index.js';
export { findCycles } from '../graph/cycles.js';
export { calculateCouplingMetrics } from '../graph/metrics.js';
export type { CouplingMetric } from '../graph/metrics.js';
export type { FileAnalysis, Definition, Use, Diagnostic, ImportEdge } from '../parser/types.js';
