export const DIAGRAM_VIEWS = ['overview', 'service-relationships', 'system'] as const;

export type DiagramView = (typeof DIAGRAM_VIEWS)[number];

export type NodeKind = 'service' | 'external' | 'person';
export type NodeShape = 'rectangle' | 'queue' | 'cylinder' | 'person';
export type EdgeStyle = 'sync' | 'async';

export interface DiagramCluster {
  id: string;
  label: string;
}

export interface DiagramNode {
  id: string;
  label: string;
  kind: NodeKind;
  shape: NodeShape;
  tooltip?: string;
  clusterId?: string;
}

export interface DiagramEdge {
  from: string;
  to: string;
  label: string;
  style: EdgeStyle;
}

export interface DiagramGraph {
  view: DiagramView;
  clusters: DiagramCluster[];
  nodes: DiagramNode[];
  edges: DiagramEdge[];
}

export function slugify(name: string): string {
  const slug = name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'unnamed';
}

/**
 * Hands out D2 keys that are unique within one graph. Keys are plain
 * `[a-z0-9_-]` identifiers, so they never need quoting in a script.
 */
export class KeyAllocator {
  private readonly taken = new Set<string>();

  allocate(prefix: string, name: string): string {
    const base = `${prefix}_${slugify(name)}`;
    let key = base;
    for (let n = 2; this.taken.has(key); n++) {
      key = `${base}_${String(n)}`;
    }
    this.taken.add(key);
    return key;
  }
}

/**
 * Ordered, keyed collections backing one graph build. Nodes and clusters are
 * registered once under a lookup key and keep first-registration order.
 */
export class GraphAssembler {
  private readonly keys = new KeyAllocator();
  private readonly clusters = new Map<string, DiagramCluster>();
  private readonly nodes = new Map<string, DiagramNode>();
  private readonly edges: DiagramEdge[] = [];

  constructor(private readonly view: DiagramView) {}

  cluster(lookup: string, label: string, prefix = 'system'): DiagramCluster {
    const existing = this.clusters.get(lookup);
    if (existing) return existing;
    const cluster: DiagramCluster = { id: this.keys.allocate(prefix, label), label };
    this.clusters.set(lookup, cluster);
    return cluster;
  }

  node(
    lookup: string,
    create: (id: string) => DiagramNode,
    prefix: string,
    name: string
  ): DiagramNode {
    const existing = this.nodes.get(lookup);
    if (existing) return existing;
    const node = create(this.keys.allocate(prefix, name));
    this.nodes.set(lookup, node);
    return node;
  }

  findNode(lookup: string): DiagramNode | undefined {
    return this.nodes.get(lookup);
  }

  edge(edge: DiagramEdge): void {
    this.edges.push(edge);
  }

  build(): DiagramGraph {
    return {
      view: this.view,
      clusters: Array.from(this.clusters.values()),
      nodes: Array.from(this.nodes.values()),
      edges: [...this.edges],
    };
  }
}
