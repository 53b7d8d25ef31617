import { ServicescapeError, RenderError, ErrorCode } from '@servicescape/core';
import { Logger } from './cli-helpers.js';

const HINTS: Partial<Record<ErrorCode, string[]>> = {
  [ErrorCode.CONFIG_INVALID]: [
    'Check the SERVICESCAPE_* variables in your environment or .env file',
    'Layouts: elk, dagre. Fonts: SourceSansPro, SourceCodePro, HandDrawn',
  ],
  [ErrorCode.INPUT_INVALID]: [
    'Every service needs info.name and every relationship an action and participant',
    'Relationship actions: uses, requests, replies, sends, receives',
  ],
  [ErrorCode.IO_FILE_NOT_FOUND]: [
    'Double-check the schema file path',
    'Confirm file permissions allow reading',
  ],
  [ErrorCode.IO_WRITE_FAILED]: ['Confirm the output directory is writable'],
  [ErrorCode.DIAGRAM_COMPILE_FAILED]: [
    'The compiler output above points at the offending line of the generated script',
    'Run `servicescape script <view> <schema-file>` to inspect the script',
  ],
  [ErrorCode.RENDER_CANCELLED]: [
    'Raise SERVICESCAPE_RENDER_TIMEOUT for large diagrams',
    'Try --layout dagre, which is faster than elk',
  ],
};

const SENSITIVE_KEYS = new Set(['token', 'apikey', 'api_key', 'secret', 'password', 'credential']);

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

function provideSuggestions(error: ServicescapeError): void {
  let suggestions = HINTS[error.code];
  if (error instanceof RenderError && error.suggestions && error.suggestions.length > 0) {
    suggestions = error.suggestions;
  }
  if (suggestions && suggestions.length > 0) {
    console.error('\n💡 Hints:');
    suggestions.forEach((suggestion) => {
      Logger.info(`• ${suggestion}`);
    });
  }
}

export const ErrorHandler = {
  formatError(error: unknown): void {
    if (error instanceof ServicescapeError) {
      Logger.fail(error.userMessage);
      const details = Object.entries(error.context).filter(
        ([, value]) => value !== undefined && value !== null
      );
      if (details.length > 0) {
        console.error('   Extra details:');
        for (const [key, value] of details) {
          console.error(`   ${key}: ${isSensitiveKey(key) ? '***REDACTED***' : String(value)}`);
        }
      }
      console.error(`   Code: ${error.code}`);
      provideSuggestions(error);
    } else if (error instanceof Error) {
      Logger.fail(error.message);
    } else {
      Logger.fail(`Something went wrong unexpectedly: ${String(error)}`);
    }
  },
  getExitCode(error: unknown): number {
    if (error instanceof ServicescapeError) {
      switch (error.code) {
        case ErrorCode.CONFIG_INVALID:
        case ErrorCode.INPUT_INVALID:
          return 2;
        case ErrorCode.IO_FILE_NOT_FOUND:
        case ErrorCode.IO_WRITE_FAILED:
          return 3;
        case ErrorCode.DIAGRAM_COMPILE_FAILED:
          return 4;
        case ErrorCode.RENDERER_NOT_FOUND:
        case ErrorCode.RENDER_FAILED:
        case ErrorCode.RENDER_CANCELLED:
          return 5;
        default:
          return 1;
      }
    }
    return 1;
  },
  handleCliError(error: unknown): never {
    ErrorHandler.formatError(error);
    const exitCode = ErrorHandler.getExitCode(error);
    process.exit(exitCode);
  },
} as const;
