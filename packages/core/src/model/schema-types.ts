export const RELATIONSHIP_ACTIONS = ['uses', 'requests', 'replies', 'sends', 'receives'] as const;

export type RelationshipAction = (typeof RELATIONSHIP_ACTIONS)[number];

export interface ServiceInfo {
  name: string;
  description?: string;
  system?: string;
  owner?: string;
  repository?: string;
  tags?: string[];
}

export interface Relationship {
  action: RelationshipAction;
  participant: string;
  technology?: string;
  description?: string;
  proto?: string;
  tags?: string[];
  /** Participant is a third-party system outside the documented landscape. */
  external?: boolean;
  /** Participant is a human actor. */
  person?: boolean;
}

export interface Service {
  info: ServiceInfo;
  relationships: Relationship[];
}

export interface Schema {
  services: Service[];
}

/**
 * Asynchronous message flow between two participants. Graph construction only
 * needs the two endpoint names and a display label.
 */
export interface AsyncEdge {
  readonly source: string;
  readonly target: string;
  readonly label: string;
}

export type ChannelEdgeKind = 'send' | 'reply';

export interface ChannelEdge extends AsyncEdge {
  readonly channel: string;
  readonly kind: ChannelEdgeKind;
}

export function createChannelEdge(
  source: string,
  target: string,
  channel: string,
  kind: ChannelEdgeKind = 'send'
): ChannelEdge {
  return {
    source,
    target,
    channel,
    kind,
    label: kind === 'reply' ? `${channel} (reply)` : channel,
  };
}

export type TargetType = 'd2';

export interface FormattedSchema {
  type: string;
  data: Buffer;
}

export interface TargetCapabilities {
  format: boolean;
  render: boolean;
}

export type FormatMode = 'overview' | 'service_relationships' | 'system';

export interface FormatOptions {
  mode?: FormatMode;
  service?: string;
  system?: string;
}

/**
 * Cancellation scope for calls that reach the external renderer.
 */
export interface RenderContext {
  signal: AbortSignal;
  /** Overrides the configured render timeout for this call. */
  timeoutMs?: number;
}

export interface SchemaFormatter {
  formatSchema(
    ctx: RenderContext | undefined,
    schema: Schema,
    options: FormatOptions
  ): Promise<FormattedSchema>;
}

export interface SchemaRenderer {
  renderSchema(ctx: RenderContext | undefined, formatted: FormattedSchema): Promise<Buffer>;
}

/**
 * A diagram target. `capabilities()` describes the protocol family the target
 * takes part in, not that every generic entry point is implemented.
 */
export interface Target extends SchemaFormatter, SchemaRenderer {
  capabilities(): TargetCapabilities;
}

export const D2_TARGET_TYPE: TargetType = 'd2';
