import type { AsyncSummary } from '../diagrams/async-summary.js';
import type { Relationship, Service } from '../model/schema-types.js';

/** Where a view's script and, when rendered, its image live relative to the README. */
export interface DiagramLink {
  script: string;
  image?: string;
}

export interface SystemEntry {
  name: string;
  diagram: DiagramLink;
  services: string[];
}

export interface ServiceEntry {
  service: Service;
  diagram: DiagramLink;
  asyncSummaries: AsyncSummary[];
}

function escapeCell(value: string | undefined): string {
  return (value ?? '').replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

export function formatDiagram(alt: string, link: DiagramLink): string {
  return link.image
    ? `![${alt}](${link.image})\n\n[D2 source](${link.script})`
    : `D2 source: [${link.script}](${link.script})`;
}

function participantCell(rel: Relationship): string {
  const marker = rel.external ? ' _(external)_' : rel.person ? ' _(person)_' : '';
  return `${escapeCell(rel.participant)}${marker}`;
}

// `gRPC (payments.v1.proto)`; the proto file alone when no technology is named.
function technologyCell(rel: Relationship): string {
  const technology = rel.technology?.trim();
  const proto = rel.proto?.trim();
  if (technology && proto) return escapeCell(`${technology} (${proto})`);
  return escapeCell(technology || proto);
}

export function formatRelationshipTable(relationships: readonly Relationship[]): string {
  if (relationships.length === 0) return '_No relationships declared._';
  const rows = relationships.map(
    (rel) =>
      `| ${rel.action} | ${participantCell(rel)} | ${technologyCell(rel)} | ${escapeCell(rel.tags?.join(', '))} | ${escapeCell(rel.description)} |`
  );
  return [
    '| Action | Participant | Technology | Tags | Description |',
    '| --- | --- | --- | --- | --- |',
    ...rows,
  ].join('\n');
}

export function formatAsyncSummaries(summaries: readonly AsyncSummary[]): string {
  if (summaries.length === 0) return '_No asynchronous messaging._';
  return summaries
    .map((s) => `- ${s.direction} **${s.counterpart}** (\`${s.label}\`)`)
    .join('\n');
}

export function formatSystemsSection(systems: readonly SystemEntry[]): string {
  if (systems.length === 0) return '_No systems declared._';
  return systems
    .map((system) =>
      [
        `### ${system.name}`,
        formatDiagram(`${system.name} system`, system.diagram),
        `Services: ${system.services.join(', ')}`,
      ].join('\n\n')
    )
    .join('\n\n');
}

export function formatServiceSection(entry: ServiceEntry): string {
  const { info, relationships } = entry.service;
  const parts = [`### ${info.name}`];
  const description = info.description?.trim();
  if (description) parts.push(description);

  const facts = [
    info.system ? `- **System:** ${info.system}` : undefined,
    info.owner ? `- **Owner:** ${info.owner}` : undefined,
    info.repository ? `- **Repository:** ${info.repository}` : undefined,
    info.tags && info.tags.length > 0 ? `- **Tags:** ${info.tags.join(', ')}` : undefined,
  ].filter((line): line is string => line !== undefined);
  if (facts.length > 0) parts.push(facts.join('\n'));

  parts.push(
    formatDiagram(`${info.name} relationships`, entry.diagram),
    '**Relationships**',
    formatRelationshipTable(relationships),
    '**Async messaging**',
    formatAsyncSummaries(entry.asyncSummaries)
  );
  return parts.join('\n\n');
}
