import type { DiagramCluster, DiagramEdge, DiagramNode } from './diagram-graph.js';

const INDENT = '  ';

/**
 * Double-quoted D2 string. Backslashes, quotes and `$` (substitution marker)
 * are escaped and line breaks become `\n`, so any label is safe to embed.
 */
export function d2String(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\$/g, '\\$')
    .replace(/\r?\n/g, '\\n');
  return `"${escaped}"`;
}

/** Absolute key of a node, qualified by its cluster when it has one. */
export function nodePath(node: DiagramNode): string {
  return node.clusterId ? `${node.clusterId}.${node.id}` : node.id;
}

function indentLines(lines: string[], depth: number): string[] {
  const prefix = INDENT.repeat(depth);
  return lines.map((line) => `${prefix}${line}`);
}

function nodeLines(node: DiagramNode): string[] {
  const attributes: string[] = [];
  if (node.shape !== 'rectangle') attributes.push(`shape: ${node.shape}`);
  if (node.kind !== 'service') attributes.push('class: external');
  if (node.tooltip) attributes.push(`tooltip: ${d2String(node.tooltip)}`);

  const head = `${node.id}: ${d2String(node.label)}`;
  if (attributes.length === 0) return [head];
  return [`${head} {`, ...indentLines(attributes, 1), '}'];
}

export function formatNode(node: DiagramNode, depth = 0): string {
  return indentLines(nodeLines(node), depth).join('\n');
}

export function formatCluster(cluster: DiagramCluster, members: readonly DiagramNode[]): string {
  const body = ['class: cluster', ...members.flatMap(nodeLines)];
  return [`${cluster.id}: ${d2String(cluster.label)} {`, ...indentLines(body, 1), '}'].join('\n');
}

export function formatEdge(edge: DiagramEdge, from: DiagramNode, to: DiagramNode): string {
  const connection = `${nodePath(from)} -> ${nodePath(to)}`;
  const labelled = edge.label ? `${connection}: ${d2String(edge.label)}` : connection;
  return edge.style === 'async' ? `${labelled} {class: async}` : labelled;
}
