import { sortedOutNeighbors, type ImportGraph } from './index.js';

interface Frame {
  file: string;
  neighbors: string[];
  next: number;
}

/**
 * Find import cycles with a depth-first search over the file graph.
 *
 * Roots and neighbors are taken in lexicographic order, so the result is
 * stable across runs. Whenever an edge leads back to a file on the current
 * path, the path from that file onward is recorded, with the file repeated at
 * the end. Cycles over the same set of files are reported once, as first
 * found.
 *
 * This reports at least one cycle for every strongly connected group of two
 * or more files; it does not enumerate every elementary cycle.
 */
export function findCycles(graph: ImportGraph): string[][] {
  const cycles: string[][] = [];
  const seen = new Set<string>();
  const visited = new Set<string>();

  for (const root of graph.nodes().sort()) {
    if (visited.has(root)) continue;

    // Explicit stack instead of recursion: import chains can be deep
    const path: string[] = [];
    const onPath = new Map<string, number>();
    const stack: Frame[] = [];

    const enter = (file: string): void => {
      visited.add(file);
      onPath.set(file, path.length);
      path.push(file);
      stack.push({ file, neighbors: sortedOutNeighbors(graph, file), next: 0 });
    };

    enter(root);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];

      if (frame.next >= frame.neighbors.length) {
        stack.pop();
        path.pop();
        onPath.delete(frame.file);
        continue;
      }

      const neighbor = frame.neighbors[frame.next++];
      const index = onPath.get(neighbor);

      if (index !== undefined) {
        const cycle = [...path.slice(index), neighbor];
        const key = cycleKey(cycle);
        if (!seen.has(key)) {
          seen.add(key);
          cycles.push(cycle);
        }
      } else if (!visited.has(neighbor)) {
        enter(neighbor);
      }
    }
  }

  return cycles;
}

/** Pairs (from, to) of every edge that lies on a reported cycle. */
export function cycleEdges(cycles: readonly (readonly string[])[]): Set<string> {
  const edges = new Set<string>();

  for (const cycle of cycles) {
    for (let i = 0; i < cycle.length - 1; i++) {
      edges.add(edgeKey(cycle[i], cycle[i + 1]));
    }
  }

  return edges;
}

export function edgeKey(from: string, to: string): string {
  return `${from}\u0000${to}`;
}

function cycleKey(cycle: string[]): string {
  // Ignore the closing repeat, rotation and direction
  return Array.from(new Set(cycle)).sort().join('\u0000');
}
