import { z } from 'zod';
import { RELATIONSHIP_ACTIONS } from '../model/schema-types.js';

const nonBlank = z.string().trim().min(1, 'must not be empty');

export const ServiceInfoSchema = z.object({
  name: nonBlank,
  description: z.string().optional(),
  system: z.string().optional(),
  owner: z.string().optional(),
  repository: z.string().optional(),
  tags: z.array(z.string()).optional(),
});

export const RelationshipSchema = z.object({
  action: z.enum(RELATIONSHIP_ACTIONS),
  participant: nonBlank,
  technology: z.string().optional(),
  description: z.string().optional(),
  proto: z.string().optional(),
  tags: z.array(z.string()).optional(),
  external: z.boolean().optional(),
  person: z.boolean().optional(),
});

export const ServiceSchema = z.object({
  info: ServiceInfoSchema,
  relationships: z.array(RelationshipSchema).default([]),
});

export const ChannelEdgeSchema = z.object({
  source: nonBlank,
  target: nonBlank,
  channel: nonBlank,
  kind: z.enum(['send', 'reply']).default('send'),
});

export const SchemaDocumentSchema = z.object({
  services: z.array(ServiceSchema),
  asyncEdges: z.array(ChannelEdgeSchema).default([]),
});

export type SchemaDocument = z.infer<typeof SchemaDocumentSchema>;
