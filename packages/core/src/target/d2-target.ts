import { ErrorCode, ServicescapeError } from '../errors.js';
import {
  buildOverviewGraph,
  buildServiceRelationshipsGraph,
  buildSystemGraph,
} from '../diagrams/graph-builder.js';
import { ScriptEmitter } from '../diagrams/script-emitter.js';
import { D2_TARGET_TYPE } from '../model/schema-types.js';
import type {
  AsyncEdge,
  FormatOptions,
  FormattedSchema,
  RenderContext,
  Schema,
  Service,
  Target,
  TargetCapabilities,
} from '../model/schema-types.js';
import { D2CliCompiler } from '../render/d2-cli-compiler.js';
import type { CompilerFactory } from '../render/diagram-compiler.js';
import { RenderGateway } from '../render/render-gateway.js';
import { parseD2Options } from '../schemas/d2-options.schema.js';
import type { D2Options, D2OptionsInput } from '../schemas/d2-options.schema.js';

export interface D2TargetDependencies {
  /** Builds the compiler from the validated options. Defaults to the d2 CLI. */
  compilerFactory?: CompilerFactory;
  /** Directory holding the view templates. */
  templateDir?: string;
  /** Default render timeout when the context carries none. */
  renderTimeoutMs?: number;
}

/**
 * D2 diagram target.
 *
 * `capabilities()` reports `format: true` because the target takes part in the
 * format/render protocol, yet the generic `formatSchema` always rejects: a D2
 * diagram needs a view and its parameters, so callers use the
 * `generate*DiagramScript` methods instead.
 */
export class D2Target implements Target {
  private readonly emitter: ScriptEmitter;
  private readonly gateway: RenderGateway;

  constructor(
    readonly options: D2Options,
    dependencies: D2TargetDependencies = {}
  ) {
    const factory = dependencies.compilerFactory ?? ((opts) => new D2CliCompiler(opts));
    this.emitter = new ScriptEmitter(dependencies.templateDir);
    this.gateway = new RenderGateway(factory(options), dependencies.renderTimeoutMs);
  }

  capabilities(): TargetCapabilities {
    return { format: true, render: true };
  }

  formatSchema(
    _ctx: RenderContext | undefined,
    _schema: Schema,
    _options: FormatOptions
  ): Promise<FormattedSchema> {
    return Promise.reject(
      new ServicescapeError(
        'FormatSchema not supported for D2 target',
        ErrorCode.FORMAT_SCHEMA_NOT_SUPPORTED,
        'The D2 target only produces view-specific diagrams; use one of the generate methods'
      )
    );
  }

  generateOverviewDiagramScript(
    schema: Schema,
    asyncEdges: readonly AsyncEdge[],
    systemLabel: string
  ): Buffer {
    return this.emitter.emit(buildOverviewGraph(schema, asyncEdges, systemLabel));
  }

  generateServiceRelationshipsDiagramScript(
    service: Service,
    allServices: readonly Service[],
    asyncEdges: readonly AsyncEdge[]
  ): Buffer {
    return this.emitter.emit(buildServiceRelationshipsGraph(service, allServices, asyncEdges));
  }

  generateSystemDiagramScript(
    schema: Schema,
    systemName: string,
    asyncEdges: readonly AsyncEdge[]
  ): Buffer {
    return this.emitter.emit(buildSystemGraph(schema, systemName, asyncEdges));
  }

  async generateOverviewDiagram(
    ctx: RenderContext | undefined,
    schema: Schema,
    asyncEdges: readonly AsyncEdge[],
    systemLabel: string
  ): Promise<Buffer> {
    const script = this.generateOverviewDiagramScript(schema, asyncEdges, systemLabel);
    return this.renderSchema(ctx, { type: D2_TARGET_TYPE, data: script });
  }

  async generateServiceRelationshipsDiagram(
    ctx: RenderContext | undefined,
    service: Service,
    allServices: readonly Service[],
    asyncEdges: readonly AsyncEdge[]
  ): Promise<Buffer> {
    const script = this.generateServiceRelationshipsDiagramScript(service, allServices, asyncEdges);
    return this.renderSchema(ctx, { type: D2_TARGET_TYPE, data: script });
  }

  async generateSystemDiagram(
    ctx: RenderContext | undefined,
    schema: Schema,
    systemName: string,
    asyncEdges: readonly AsyncEdge[]
  ): Promise<Buffer> {
    const script = this.generateSystemDiagramScript(schema, systemName, asyncEdges);
    return this.renderSchema(ctx, { type: D2_TARGET_TYPE, data: script });
  }

  renderSchema(ctx: RenderContext | undefined, formatted: FormattedSchema): Promise<Buffer> {
    return this.gateway.render(ctx, formatted);
  }
}

export function createD2Target(
  options: D2OptionsInput = {},
  dependencies: D2TargetDependencies = {}
): D2Target {
  return new D2Target(parseD2Options(options), dependencies);
}
