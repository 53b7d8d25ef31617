import { readFile, stat } from 'node:fs/promises';
import { ErrorCode, ServicescapeError } from '../errors.js';
import { SchemaDocumentSchema } from '../schemas/service-schema.schema.js';
import { validate } from '../utils/validation.js';
import { createChannelEdge } from './schema-types.js';
import type { AsyncEdge, ChannelEdge, Schema } from './schema-types.js';

export interface LoadedSchema {
  schema: Schema;
  asyncEdges: ChannelEdge[];
}

export function parseSchemaDocument(data: unknown, source = 'schema document'): LoadedSchema {
  const document = validate(SchemaDocumentSchema, data, source);
  return {
    schema: { services: document.services },
    asyncEdges: document.asyncEdges.map((edge) =>
      createChannelEdge(edge.source, edge.target, edge.channel, edge.kind)
    ),
  };
}

async function readSchemaText(path: string): Promise<string> {
  if (!path.trim()) {
    throw new ServicescapeError(
      'Schema file path is required',
      ErrorCode.INPUT_INVALID,
      'Pass the path of a JSON schema document'
    );
  }

  try {
    const stats = await stat(path);
    if (!stats.isFile()) {
      throw new ServicescapeError(
        `Schema path is not a file: ${path}`,
        ErrorCode.IO_FILE_NOT_FOUND,
        `Expected a JSON schema document but found a directory: ${path}`,
        { path }
      );
    }
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof ServicescapeError) throw error;
    throw new ServicescapeError(
      `Cannot read schema file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.IO_FILE_NOT_FOUND,
      `Schema file not found or not readable: ${path}`,
      { path },
      false,
      error
    );
  }
}

/** Reads and validates a JSON schema document. */
export async function loadSchemaFile(path: string): Promise<LoadedSchema> {
  const raw = await readSchemaText(path);

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ServicescapeError(
      `Schema file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.INPUT_INVALID,
      `Could not parse ${path} as JSON`,
      { path },
      false,
      error
    );
  }

  return parseSchemaDocument(data, path);
}

/** Distinct non-empty system names in first-appearance order. */
export function listSystems(schema: Schema): string[] {
  const systems: string[] = [];
  for (const service of schema.services) {
    const system = service.info.system;
    if (system?.trim() && !systems.includes(system)) systems.push(system);
  }
  return systems;
}

/**
 * Problems the diagrams draw around rather than reject: repeated service names
 * (the first declaration wins) and async endpoints that name no service.
 */
export function schemaWarnings(
  { services }: Schema,
  asyncEdges: readonly AsyncEdge[]
): string[] {
  const warnings: string[] = [];
  const names = new Set<string>();
  for (const { info } of services) {
    if (names.has(info.name)) {
      warnings.push(
        `Service "${info.name}" is declared more than once; diagrams use the first declaration`
      );
    }
    names.add(info.name);
  }
  for (const edge of asyncEdges) {
    for (const endpoint of new Set([edge.source.trim(), edge.target.trim()])) {
      if (!names.has(endpoint)) {
        warnings.push(
          `Async edge ${edge.source} -> ${edge.target} (${edge.label}): "${endpoint}" is not a declared service and is drawn as an external participant`
        );
      }
    }
  }
  return warnings;
}
