import { DirectedGraph } from 'graphology';
import type { FileAnalysis } from '../parser/types.js';

export type FileNodeAttributes = {
  filePath: string;
  skipped: boolean;
};

export type ImportEdgeAttributes = {
  line: number;   // First import statement that produced the edge
};

export type ImportGraph = DirectedGraph<FileNodeAttributes, ImportEdgeAttributes>;

export function createImportGraph(): ImportGraph {
  return new DirectedGraph<FileNodeAttributes, ImportEdgeAttributes>({ allowSelfLoops: false });
}

export function buildImportGraph(analyses: readonly FileAnalysis[]): ImportGraph {
  const graph = createImportGraph();

  // First pass: every analyzed file is a node, isolated or not
  for (const analysis of analyses) {
    addFileNode(graph, analysis.filePath, analysis.skipped);
  }

  // Second pass: resolved import edges
  for (const analysis of analyses) {
    for (const edge of analysis.importEdges) {
      addImportEdge(graph, edge.source, edge.target, edge.line);
    }
  }

  return graph;
}

export function addFileNode(graph: ImportGraph, filePath: string, skipped = false): void {
  graph.mergeNode(filePath, { filePath, skipped });
}

/**
 * Record that `from` imports `to`. Recording the same pair again is a no-op,
 * and a file importing itself is not an edge.
 */
export function addImportEdge(graph: ImportGraph, from: string, to: string, line: number): void {
  if (from === to) return;

  if (!graph.hasNode(from)) addFileNode(graph, from);
  if (!graph.hasNode(to)) addFileNode(graph, to);

  if (!graph.hasEdge(from, to)) {
    graph.addEdge(from, to, { line });
  }
}

/** Outgoing neighbors in lexicographic order. */
export function sortedOutNeighbors(graph: ImportGraph, filePath: string): string[] {
  return graph.outNeighbors(filePath).sort();
}

/** `file → imported files`, both levels sorted, for reports and diagrams. */
export function graphToAdjacency(graph: ImportGraph): Record<string, string[]> {
  const adjacency: Record<string, string[]> = {};

  for (const node of graph.nodes().sort()) {
    adjacency[node] = sortedOutNeighbors(graph, node);
  }

  return adjacency;
}
