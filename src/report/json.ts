import { sortByInstability } from '../graph/metrics.js';
import type { AnalysisReport } from '../analysis/aggregator.js';
import type { DiagnosticKind } from '../parser/types.js';

export interface JsonReport {
  undefined_symbols: Array<{ symbol: string; file: string; line: number }>;
  unused_symbols: Array<{ symbol: string; file: string; line: number; kind: string }>;
  circular_imports: string[][];
  coupling_metrics: Array<{ module: string; ca: number; ce: number; instability: number }>;
  diagnostics: Array<{ kind: DiagnosticKind; file: string; line: number | null; message: string }>;
  dependencies: Record<string, string[]>;
  project_symbols: Record<string, string[]>;
  summary: {
    files_analyzed: number;
    files_skipped: number;
    definitions: number;
    uses: number;
    import_edges: number;
  };
}

/** Plain, JSON-ready view of a report with stable snake_case field names. */
export function toJsonReport(report: AnalysisReport): JsonReport {
  return {
    undefined_symbols: report.undefinedSymbols.map(s => ({
      symbol: s.name,
      file: s.filePath,
      line: s.line,
    })),
    unused_symbols: report.unusedSymbols.map(s => ({
      symbol: s.name,
      file: s.filePath,
      line: s.line,
      kind: s.kind,
    })),
    circular_imports: report.cycles.map(cycle => [...cycle]),
    coupling_metrics: sortByInstability(report.couplingMetrics).map(m => ({
      module: m.filePath,
      ca: m.ca,
      ce: m.ce,
      instability: m.instability,
    })),
    diagnostics: report.diagnostics.map(d => ({
      kind: d.kind,
      file: d.filePath,
      line: d.line ?? null,
      message: d.message,
    })),
    dependencies: { ...report.dependencies },
    project_symbols: { ...report.projectSymbols },
    summary: {
      files_analyzed: report.summary.filesAnalyzed,
      files_skipped: report.summary.filesSkipped,
      definitions: report.summary.definitions,
      uses: report.summary.uses,
      import_edges: report.summary.importEdges,
    },
  };
}

export function serializeReport(report: AnalysisReport, pretty = true): string {
  const json = toJsonReport(report);
  return pretty ? JSON.stringify(json, null, 2) : JSON.stringify(json);
}
