// Model
export { RELATIONSHIP_ACTIONS, D2_TARGET_TYPE, createChannelEdge } from './model/schema-types.js';
export type {
  RelationshipAction,
  ServiceInfo,
  Relationship,
  Service,
  Schema,
  AsyncEdge,
  ChannelEdge,
  ChannelEdgeKind,
  TargetType,
  FormattedSchema,
  TargetCapabilities,
  FormatMode,
  FormatOptions,
  RenderContext,
  SchemaFormatter,
  SchemaRenderer,
  Target,
} from './model/schema-types.js';
export {
  loadSchemaFile,
  parseSchemaDocument,
  listSystems,
  schemaWarnings,
} from './model/schema-loader.js';
export type { LoadedSchema } from './model/schema-loader.js';

// Diagrams
export {
  buildOverviewGraph,
  buildServiceRelationshipsGraph,
  buildSystemGraph,
  relationshipLabel,
  DEFAULT_GLOBAL_NAME,
} from './diagrams/graph-builder.js';
export { DIAGRAM_VIEWS, slugify } from './diagrams/diagram-graph.js';
export type {
  DiagramView,
  DiagramGraph,
  DiagramNode,
  DiagramEdge,
  DiagramCluster,
} from './diagrams/diagram-graph.js';
export { ScriptEmitter } from './diagrams/script-emitter.js';
export { summarizeAsyncEdges, deriveAsyncLabel } from './diagrams/async-summary.js';
export type { AsyncSummary, AsyncSummaryLabel } from './diagrams/async-summary.js';

// Rendering
export { RenderGateway } from './render/render-gateway.js';
export { D2CliCompiler, buildD2Args } from './render/d2-cli-compiler.js';
export type { DiagramCompiler, CompilerFactory } from './render/diagram-compiler.js';

// Target
export { D2Target, createD2Target } from './target/d2-target.js';
export type { D2TargetDependencies } from './target/d2-target.js';

// Schemas (re-export for consumers that need them)
export { SchemaDocumentSchema } from './schemas/service-schema.schema.js';
export type { SchemaDocument } from './schemas/service-schema.schema.js';
export { D2OptionsSchema, parseD2Options } from './schemas/d2-options.schema.js';
export type { D2Options, D2OptionsInput } from './schemas/d2-options.schema.js';
export { PackageJsonSchema } from './schemas/package.schema.js';

// Config
export { CONFIG, D2_FONTS, D2_LAYOUTS } from './utils/config.js';

// Errors
export { ServicescapeError, ConfigurationError, RenderError, ErrorCode } from './errors.js';

// Validation (core utilities only)
export { validate, formatIssues } from './utils/validation.js';

// Pipelines (headless orchestration functions)
export { runGenerate } from './pipelines/generate.js';
export type { GenerateOptions } from './pipelines/generate.js';
export type { ProgressReporter } from './pipelines/progress.js';
export { SilentProgress } from './pipelines/progress.js';
