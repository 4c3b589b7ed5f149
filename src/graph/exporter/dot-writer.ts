import type { GraphDescription } from './types';

export function quoteDotId(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function toDot(graph: GraphDescription): string {
  const lines = [`digraph ${quoteDotId(graph.name)} {`, '  rankdir=LR;', '  size="8,5";'];

  for (const node of graph.nodes) {
    lines.push(
      `  ${quoteDotId(node.id)} [style=${node.style.style}, color=${node.style.color}];`
    );
  }

  for (const edge of graph.edges) {
    const attributes = edge.label !== undefined ? ` [label=${quoteDotId(edge.label)}]` : '';
    lines.push(`  ${quoteDotId(edge.from)} -> ${quoteDotId(edge.to)}${attributes};`);
  }

  lines.push('}');
  return lines.join('\n') + '\n';
}
