import type { D2Options } from '../schemas/d2-options.schema.js';

/**
 * The single I/O boundary of the engine: turns a diagram script into image
 * bytes. Implementations reject with a `RenderError`; a script the compiler
 * refuses yields `DIAGRAM_COMPILE_FAILED` carrying its diagnostic.
 */
export interface DiagramCompiler {
  compile(script: string, signal: AbortSignal): Promise<Buffer>;
}

export type CompilerFactory = (options: D2Options) => DiagramCompiler;
