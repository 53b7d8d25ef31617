export enum ErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  INPUT_INVALID = 'INPUT_INVALID',
  IO_FILE_NOT_FOUND = 'IO_FILE_NOT_FOUND',
  IO_WRITE_FAILED = 'IO_WRITE_FAILED',
  CONTEXT_REQUIRED = 'CONTEXT_REQUIRED',
  FORMAT_TYPE_UNSUPPORTED = 'FORMAT_TYPE_UNSUPPORTED',
  FORMAT_SCHEMA_NOT_SUPPORTED = 'FORMAT_SCHEMA_NOT_SUPPORTED',
  TEMPLATE_LOAD_FAILED = 'TEMPLATE_LOAD_FAILED',
  TEMPLATE_EXPANSION_FAILED = 'TEMPLATE_EXPANSION_FAILED',
  DIAGRAM_COMPILE_FAILED = 'DIAGRAM_COMPILE_FAILED',
  RENDERER_NOT_FOUND = 'RENDERER_NOT_FOUND',
  RENDER_FAILED = 'RENDER_FAILED',
  RENDER_CANCELLED = 'RENDER_CANCELLED',
  INTERNAL_UNKNOWN = 'INTERNAL_UNKNOWN',
}
type ErrorContext = Record<string, string | number | boolean | null | undefined>;
export class ServicescapeError extends Error {
  public readonly code: ErrorCode;
  public readonly userMessage: string;
  public readonly context: ErrorContext;
  public readonly recoverable: boolean;
  constructor(
    message: string,
    code: ErrorCode,
    userMessage?: string,
    context: ErrorContext = {},
    recoverable = false,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ServicescapeError';
    this.code = code;
    this.userMessage = userMessage ?? message;
    this.context = context;
    this.recoverable = recoverable;
    Error.captureStackTrace(this, ServicescapeError);
  }
  static fromError(
    error: unknown,
    code = ErrorCode.INTERNAL_UNKNOWN,
    userMessage?: string
  ): ServicescapeError {
    if (error instanceof ServicescapeError) return error;
    const message = error instanceof Error ? error.message : String(error);
    const context = error instanceof Error ? { originalError: error.name } : {};
    return new ServicescapeError(message, code, userMessage, context, false, error);
  }
}
export class ConfigurationError extends ServicescapeError {
  constructor(message: string, configKey?: string) {
    super(
      message,
      ErrorCode.CONFIG_INVALID,
      `Configuration issue: ${message}`,
      { configKey },
      false
    );
    this.name = 'ConfigurationError';
  }
}

/**
 * Failure on the way from a diagram script to a rendered image.
 *
 * Precondition failures and compiler diagnostics share this class on purpose;
 * callers tell them apart through `code`.
 */
export class RenderError extends ServicescapeError {
  public readonly suggestions?: string[];
  constructor(
    message: string,
    code: ErrorCode,
    userMessage?: string,
    context: ErrorContext = {},
    suggestions?: string[],
    cause?: unknown
  ) {
    super(message, code, userMessage, context, false, cause);
    this.name = 'RenderError';
    this.suggestions = suggestions;
  }
  static contextRequired(): RenderError {
    return new RenderError(
      'context is required',
      ErrorCode.CONTEXT_REQUIRED,
      'A render context with an abort signal must be supplied'
    );
  }
  static unsupportedFormatType(received: string, expected: string): RenderError {
    return new RenderError(
      `unsupported format type: ${received}, expected: ${expected}`,
      ErrorCode.FORMAT_TYPE_UNSUPPORTED,
      `Cannot render a "${received}" script with the ${expected} renderer`,
      { received, expected }
    );
  }
  static compileFailure(diagnostic: string, cause?: unknown): RenderError {
    return new RenderError(
      `failed to compile diagram: ${diagnostic}`,
      ErrorCode.DIAGRAM_COMPILE_FAILED,
      `The diagram compiler rejected the generated script:\n${diagnostic}`,
      {},
      undefined,
      cause
    );
  }
  static rendererNotFound(binPath: string, cause?: unknown): RenderError {
    return new RenderError(
      `renderer binary not found: ${binPath}`,
      ErrorCode.RENDERER_NOT_FOUND,
      `Could not start the D2 renderer (${binPath})`,
      { binPath },
      [
        'Install D2 from https://d2lang.com/tour/install',
        'Point SERVICESCAPE_D2_BIN at the d2 executable if it is not on PATH',
        'Use --no-render to write diagram scripts only',
      ],
      cause
    );
  }
  static cancelled(cause?: unknown): RenderError {
    return new RenderError(
      'render cancelled',
      ErrorCode.RENDER_CANCELLED,
      'Rendering was cancelled or timed out before the compiler finished',
      {},
      undefined,
      cause
    );
  }
  static fromError(error: unknown): RenderError {
    if (error instanceof RenderError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new RenderError(
      `failed to render diagram: ${message}`,
      ErrorCode.RENDER_FAILED,
      `Diagram rendering failed: ${message}`,
      error instanceof Error ? { originalError: error.name } : {},
      undefined,
      error
    );
  }
}
