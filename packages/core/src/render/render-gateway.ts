import { ErrorCode, RenderError } from '../errors.js';
import { D2_TARGET_TYPE } from '../model/schema-types.js';
import type { FormattedSchema, RenderContext } from '../model/schema-types.js';
import { CONFIG } from '../utils/config.js';
import type { DiagramCompiler } from './diagram-compiler.js';

/**
 * Checks render preconditions and forwards the script to the compiler under
 * the caller's signal combined with a timeout.
 */
export class RenderGateway {
  constructor(
    private readonly compiler: DiagramCompiler,
    private readonly timeoutMs: number = CONFIG.d2.renderTimeout
  ) {}

  async render(ctx: RenderContext | undefined, formatted: FormattedSchema): Promise<Buffer> {
    if (!ctx) {
      throw RenderError.contextRequired();
    }
    if (formatted.type !== D2_TARGET_TYPE) {
      throw RenderError.unsupportedFormatType(formatted.type, D2_TARGET_TYPE);
    }

    const signal = AbortSignal.any([
      ctx.signal,
      AbortSignal.timeout(ctx.timeoutMs ?? this.timeoutMs),
    ]);
    if (signal.aborted) {
      throw RenderError.cancelled(signal.reason);
    }

    try {
      return await this.compiler.compile(formatted.data.toString('utf-8'), signal);
    } catch (error) {
      const compileFailure =
        error instanceof RenderError && error.code === ErrorCode.DIAGRAM_COMPILE_FAILED;
      if (signal.aborted && !compileFailure) {
        throw RenderError.cancelled(signal.reason);
      }
      throw RenderError.fromError(error);
    }
  }
}
