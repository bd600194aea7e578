import { cycleEdges, edgeKey } from '../graph/cycles.js';

const CYCLE_LINK_STYLE = 'stroke:red,stroke-width:2px,stroke-dasharray: 5 5;';

/**
 * Mermaid flowchart of the file-level import graph. Edges lying on a cycle
 * come after the others and are painted red and dashed; `linkStyle` indices
 * count links in the order they are written.
 */
export function generateMermaid(
  dependencies: Readonly<Record<string, readonly string[]>>,
  cycles: readonly (readonly string[])[]
): string {
  const onCycle = cycleEdges(cycles);
  const lines = ['graph TD;'];
  const normalLinks: string[] = [];
  const cycleLinks: string[] = [];
  const linked = new Set<string>();

  for (const source of Object.keys(dependencies).sort()) {
    for (const target of [...dependencies[source]].sort()) {
      const link = `    ${nodeId(source)} --> ${nodeId(target)};`;
      if (onCycle.has(edgeKey(source, target))) {
        cycleLinks.push(link);
      } else {
        normalLinks.push(link);
      }
      linked.add(source);
      linked.add(target);
    }
  }

  // Files with no imports either way would otherwise not appear at all
  for (const file of Object.keys(dependencies).sort()) {
    if (!linked.has(file)) {
      lines.push(`    ${nodeId(file)};`);
    }
  }

  lines.push(...normalLinks, ...cycleLinks);

  const offset = normalLinks.length;
  for (let i = 0; i < cycleLinks.length; i++) {
    lines.push(`    linkStyle ${offset + i} ${CYCLE_LINK_STYLE}`);
  }

  return lines.join('\n');
}

function nodeId(filePath: string): string {
  return `"${filePath.replace(/"/g, '#quot;')}"`;
}
