import { comparePaths } from '../utils/files.js';
import type { ImportGraph } from './index.js';

export interface CouplingMetric {
  filePath: string;
  ca: number;            // Afferent: distinct files importing this one
  ce: number;            // Efferent: distinct files this one imports
  instability: number;   // ce / (ca + ce), 0 for a file with no edges at all
}

/**
 * Afferent/efferent coupling and instability for every file in the graph.
 * Isolated files are included and count as maximally stable (0), so the
 * metric is defined for every file and never NaN.
 */
export function calculateCouplingMetrics(graph: ImportGraph): Map<string, CouplingMetric> {
  const metrics = new Map<string, CouplingMetric>();

  graph.forEachNode((filePath) => {
    const ce = graph.outDegree(filePath);
    const ca = graph.inDegree(filePath);
    const instability = ca + ce === 0 ? 0 : ce / (ca + ce);

    metrics.set(filePath, { filePath, ca, ce, instability });
  });

  return metrics;
}

/** Presentation order: most unstable first, ties by path. */
export function sortByInstability(metrics: Iterable<CouplingMetric>): CouplingMetric[] {
  return Array.from(metrics).sort((a, b) =>
    b.instability - a.instability || comparePaths(a.filePath, b.filePath)
  );
}
