import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { ServicescapeError, ErrorCode } from '../errors.js';
import { loadTemplate } from '../utils/template-engine.js';
import type { CompiledTemplate } from '../utils/template-engine.js';
import { formatCluster, formatEdge, formatNode } from './d2-syntax.js';
import type { DiagramGraph, DiagramNode, DiagramView } from './diagram-graph.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_TEMPLATE_DIR = join(__dirname, 'templates');

const TEMPLATE_FILES: Record<DiagramView, string> = {
  overview: 'overview.d2.tmpl',
  'service-relationships': 'service-relationships.d2.tmpl',
  system: 'system.d2.tmpl',
};

/**
 * Serializes a built graph into a D2 script through the template of its view.
 * Templates are read and compiled once; emitting never touches the filesystem.
 */
export class ScriptEmitter {
  private readonly templates: Record<DiagramView, CompiledTemplate>;

  constructor(templateDir: string = DEFAULT_TEMPLATE_DIR) {
    this.templates = {
      overview: loadTemplate(templateDir, TEMPLATE_FILES.overview),
      'service-relationships': loadTemplate(
        templateDir,
        TEMPLATE_FILES['service-relationships']
      ),
      system: loadTemplate(templateDir, TEMPLATE_FILES.system),
    };
  }

  emit(graph: DiagramGraph): Buffer {
    return Buffer.from(this.emitText(graph), 'utf-8');
  }

  emitText(graph: DiagramGraph): string {
    const byId = new Map<string, DiagramNode>(graph.nodes.map((node) => [node.id, node]));

    const clusters = graph.clusters.map((cluster) =>
      formatCluster(
        cluster,
        graph.nodes.filter((node) => node.clusterId === cluster.id)
      )
    );
    const nodes = graph.nodes
      .filter((node) => node.clusterId === undefined)
      .map((node) => formatNode(node));
    const edges = graph.edges.map((edge) => {
      const from = byId.get(edge.from);
      const to = byId.get(edge.to);
      if (!from || !to) {
        throw new ServicescapeError(
          `Edge ${edge.from} -> ${edge.to} references a node missing from the ${graph.view} graph`,
          ErrorCode.TEMPLATE_EXPANSION_FAILED,
          'Could not build the diagram script',
          { view: graph.view, from: edge.from, to: edge.to }
        );
      }
      return formatEdge(edge, from, to);
    });

    return this.templates[graph.view].render({
      clusters: clusters.join('\n\n'),
      nodes: nodes.join('\n'),
      edges: edges.join('\n'),
    });
  }
}
