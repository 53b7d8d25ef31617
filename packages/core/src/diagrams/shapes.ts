import type { NodeShape } from './diagram-graph.js';

const QUEUE_TECHNOLOGIES = new Set(['kafka', 'rabbitmq', 'nats', 'sqs', 'pubsub']);

const STORAGE_TECHNOLOGIES = new Set([
  'postgres',
  'postgresql',
  'mysql',
  'mongodb',
  'redis',
  'cassandra',
  'elasticsearch',
  'dynamodb',
  'sqlite',
  'clickhouse',
  'aurora',
  'mssql',
  'sqlserver',
  'oracle',
  'snowflake',
]);

const MAX_WORDS_PER_LINE = 7;

function technologyKeys(technology: string): string[] {
  const lowered = technology.trim().toLowerCase();
  return [lowered, lowered.replace(/[\s_-]+/g, '')];
}

/** Picks a node shape from the technologies a participant is reached through. */
export function shapeForTechnologies(technologies: Iterable<string>): NodeShape {
  const keys = Array.from(technologies).flatMap(technologyKeys);
  if (keys.some((key) => QUEUE_TECHNOLOGIES.has(key))) return 'queue';
  if (keys.some((key) => STORAGE_TECHNOLOGIES.has(key))) return 'cylinder';
  return 'rectangle';
}

/** Breaks long descriptions into lines of at most seven words. */
export function wrapDescription(description: string | undefined): string | undefined {
  const words = description?.trim().split(/\s+/).filter(Boolean) ?? [];
  if (words.length === 0) return undefined;
  const lines: string[] = [];
  for (let i = 0; i < words.length; i += MAX_WORDS_PER_LINE) {
    lines.push(words.slice(i, i + MAX_WORDS_PER_LINE).join(' '));
  }
  return lines.join('\n');
}
