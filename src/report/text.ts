import { sortByInstability } from '../graph/metrics.js';
import type { AnalysisReport } from '../analysis/aggregator.js';

/**
 * Human-readable report: symbol findings, cycles, the coupling table (most
 * unstable first) and diagnostics.
 */
export function renderTextReport(report: AnalysisReport): string {
  let output = '';

  output += '=== Project Analysis Results ===\n';
  output += `Files: ${report.summary.filesAnalyzed} analyzed, ${report.summary.filesSkipped} skipped\n`;

  output += section('Undefined Symbols', report.undefinedSymbols.length);
  for (const item of report.undefinedSymbols) {
    output += `  ${item.filePath}:${item.line} -> ${item.name}\n`;
  }

  output += section('Unused Symbols', report.unusedSymbols.length);
  for (const item of report.unusedSymbols) {
    output += `  ${item.filePath}:${item.line} -> ${item.name} (${item.kind})\n`;
  }

  output += section('Circular Imports', report.cycles.length);
  report.cycles.forEach((cycle, i) => {
    output += `  Cycle ${i + 1}: ${cycle.join(' -> ')}\n`;
  });

  output += section('Coupling Metrics', report.couplingMetrics.length);
  output += couplingTable(report);

  if (report.diagnostics.length > 0) {
    output += section('Diagnostics', report.diagnostics.length);
    for (const diag of report.diagnostics) {
      const location = diag.line !== undefined ? `${diag.filePath}:${diag.line}` : diag.filePath;
      output += `  [${diag.kind}] ${location} ${diag.message}\n`;
    }
  }

  return output;
}

function section(title: string, count: number): string {
  return `\n${title} (${count}):\n`;
}

function couplingTable(report: AnalysisReport): string {
  if (report.couplingMetrics.length === 0) return '';

  const width = Math.max('Module'.length, ...report.couplingMetrics.map(m => m.filePath.length));
  let output = `  ${'Module'.padEnd(width)}  ${'Ca'.padEnd(5)} ${'Ce'.padEnd(5)} I\n`;
  output += `  ${'-'.repeat(width + 19)}\n`;

  for (const metric of sortByInstability(report.couplingMetrics)) {
    output += `  ${metric.filePath.padEnd(width)}  ${String(metric.ca).padEnd(5)} ${String(metric.ce).padEnd(5)} ${metric.instability.toFixed(2)}\n`;
  }

  return output;
}
