import type {
  AsyncEdge,
  Relationship,
  RelationshipAction,
  Schema,
  Service,
} from '../model/schema-types.js';
import { GraphAssembler } from './diagram-graph.js';
import type { DiagramCluster, DiagramGraph, DiagramNode, DiagramView } from './diagram-graph.js';
import { shapeForTechnologies, wrapDescription } from './shapes.js';

export const DEFAULT_GLOBAL_NAME = 'Internal Services';

interface Orientation {
  reversed: boolean;
  verb: string;
}

// "A receives from B" reads as "B sends to A"; "A replies to B" as "B requests A".
const ORIENTATION: Record<RelationshipAction, Orientation> = {
  uses: { reversed: false, verb: 'uses' },
  requests: { reversed: false, verb: 'requests' },
  sends: { reversed: false, verb: 'sends' },
  receives: { reversed: true, verb: 'sends' },
  replies: { reversed: true, verb: 'requests' },
};

export function relationshipLabel(rel: Relationship): string {
  const { verb } = ORIENTATION[rel.action];
  const technology = rel.technology?.trim();
  return technology ? `${verb} [${technology}]` : verb;
}

interface ExternalDetails {
  technologies: string[];
  descriptions: string[];
  person: boolean;
}

// Flagged participants sit outside the landscape even when a service shares their name.
function pointsOutside(rel: Relationship): boolean {
  return rel.external === true || rel.person === true;
}

/**
 * Resolves schema entities to nodes for a single view. Participants that name a
 * known service become service nodes unless the relationship flags them as
 * external or a person; everything else becomes an external node whose shape
 * and tooltip accumulate over every relationship that reaches it.
 */
class ViewBuilder {
  private readonly assembler: GraphAssembler;
  private readonly knownServices = new Map<string, Service>();
  private readonly externals = new Map<string, ExternalDetails>();

  constructor(
    view: DiagramView,
    services: readonly Service[],
    private readonly clusterFor: (
      service: Service,
      graph: GraphAssembler
    ) => DiagramCluster | undefined
  ) {
    this.assembler = new GraphAssembler(view);
    for (const service of services) {
      if (!this.knownServices.has(service.info.name)) {
        this.knownServices.set(service.info.name, service);
      }
    }
  }

  get graph(): GraphAssembler {
    return this.assembler;
  }

  serviceNode(service: Service): DiagramNode {
    const name = service.info.name;
    return this.assembler.node(
      `service:${name}`,
      (id) => ({
        id,
        label: name,
        kind: 'service',
        shape: 'rectangle',
        tooltip: wrapDescription(service.info.description),
        clusterId: this.clusterFor(service, this.assembler)?.id,
      }),
      'service',
      name
    );
  }

  participantNode(name: string, rel?: Relationship): DiagramNode {
    const known = rel && pointsOutside(rel) ? undefined : this.knownServices.get(name);
    if (known) return this.serviceNode(known);

    const details = this.externals.get(name) ?? {
      technologies: [],
      descriptions: [],
      person: false,
    };
    this.externals.set(name, details);
    if (rel) {
      const technology = rel.technology?.trim();
      if (technology && !details.technologies.includes(technology)) {
        details.technologies.push(technology);
      }
      const description = rel.description?.trim();
      if (description && !details.descriptions.includes(description)) {
        details.descriptions.push(description);
      }
      details.person ||= rel.person === true;
    }

    return this.assembler.node(
      `external:${name}`,
      (id) => ({ id, label: name, kind: 'external', shape: 'rectangle' }),
      'external',
      name
    );
  }

  relationship(service: Service, rel: Relationship): void {
    const source = this.serviceNode(service);
    const target = this.participantNode(rel.participant.trim(), rel);
    const { reversed } = ORIENTATION[rel.action];
    this.assembler.edge({
      from: reversed ? target.id : source.id,
      to: reversed ? source.id : target.id,
      label: relationshipLabel(rel),
      style: 'sync',
    });
  }

  asyncEdge(edge: AsyncEdge): void {
    const source = this.participantNode(edge.source.trim());
    const target = this.participantNode(edge.target.trim());
    this.assembler.edge({ from: source.id, to: target.id, label: edge.label, style: 'async' });
  }

  build(): DiagramGraph {
    for (const [name, details] of this.externals) {
      const node = this.assembler.findNode(`external:${name}`);
      if (!node) continue;
      if (details.person) {
        node.kind = 'person';
        node.shape = 'person';
      } else {
        node.shape = shapeForTechnologies(details.technologies);
      }
      if (details.descriptions.length > 0) {
        node.tooltip = details.descriptions.join('\n');
      }
    }
    return this.assembler.build();
  }
}

function hasSystem(service: Service): service is Service & { info: { system: string } } {
  return service.info.system !== undefined && service.info.system.trim() !== '';
}

/**
 * Every service grouped by owning system. Services without a system share one
 * cluster labeled with `systemLabel`.
 */
export function buildOverviewGraph(
  schema: Schema,
  asyncEdges: readonly AsyncEdge[],
  systemLabel: string
): DiagramGraph {
  const ungroupedLabel = systemLabel.trim() || DEFAULT_GLOBAL_NAME;
  const builder = new ViewBuilder('overview', schema.services, (service, graph) =>
    hasSystem(service)
      ? graph.cluster(`system:${service.info.system}`, service.info.system)
      : graph.cluster('internal', ungroupedLabel, 'internal')
  );

  for (const service of schema.services) {
    builder.serviceNode(service);
  }
  for (const service of schema.services) {
    for (const rel of service.relationships) {
      builder.relationship(service, rel);
    }
  }
  for (const edge of asyncEdges) {
    builder.asyncEdge(edge);
  }

  return builder.build();
}

/** One-hop neighborhood of `service`: its relationships and its async traffic. */
export function buildServiceRelationshipsGraph(
  service: Service,
  allServices: readonly Service[],
  asyncEdges: readonly AsyncEdge[]
): DiagramGraph {
  const builder = new ViewBuilder(
    'service-relationships',
    [service, ...allServices],
    () => undefined
  );
  const name = service.info.name;

  builder.serviceNode(service);
  for (const rel of service.relationships) {
    builder.relationship(service, rel);
  }
  for (const edge of asyncEdges) {
    if (edge.source.trim() === name || edge.target.trim() === name) {
      builder.asyncEdge(edge);
    }
  }

  return builder.build();
}

/**
 * Services of one system inside its cluster, plus boundary nodes for whatever
 * they talk to or are reached from.
 */
export function buildSystemGraph(
  schema: Schema,
  systemName: string,
  asyncEdges: readonly AsyncEdge[]
): DiagramGraph {
  const members = new Set(
    schema.services.filter((s) => s.info.system === systemName).map((s) => s.info.name)
  );
  const clusterKey = `system:${systemName}`;
  const builder = new ViewBuilder('system', schema.services, (service, graph) =>
    members.has(service.info.name) ? graph.cluster(clusterKey, systemName) : undefined
  );
  builder.graph.cluster(clusterKey, systemName);

  for (const service of schema.services) {
    if (members.has(service.info.name)) {
      builder.serviceNode(service);
    }
  }
  for (const service of schema.services) {
    const inside = members.has(service.info.name);
    for (const rel of service.relationships) {
      if (inside || (!pointsOutside(rel) && members.has(rel.participant.trim()))) {
        builder.relationship(service, rel);
      }
    }
  }
  for (const edge of asyncEdges) {
    if (members.has(edge.source.trim()) || members.has(edge.target.trim())) {
      builder.asyncEdge(edge);
    }
  }

  return builder.build();
}
