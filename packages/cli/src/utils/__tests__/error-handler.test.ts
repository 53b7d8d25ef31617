import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { ErrorCode, RenderError, ServicescapeError } from '@servicescape/core';
import { ErrorHandler } from '../error-handler.js';

describe('ErrorHandler.getExitCode', () => {
  it.each([
    [ErrorCode.CONFIG_INVALID, 2],
    [ErrorCode.INPUT_INVALID, 2],
    [ErrorCode.IO_FILE_NOT_FOUND, 3],
    [ErrorCode.IO_WRITE_FAILED, 3],
    [ErrorCode.DIAGRAM_COMPILE_FAILED, 4],
    [ErrorCode.RENDERER_NOT_FOUND, 5],
    [ErrorCode.RENDER_CANCELLED, 5],
    [ErrorCode.FORMAT_SCHEMA_NOT_SUPPORTED, 1],
  ])('maps %s to %i', (code, exitCode) => {
    expect(ErrorHandler.getExitCode(new ServicescapeError('boom', code))).toBe(exitCode);
  });

  it('uses 1 for foreign errors', () => {
    expect(ErrorHandler.getExitCode(new Error('boom'))).toBe(1);
    expect(ErrorHandler.getExitCode('boom')).toBe(1);
  });
});

describe('ErrorHandler.formatError', () => {
  let errorSpy: MockInstance<typeof console.error>;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the user message, details and code', () => {
    ErrorHandler.formatError(
      new ServicescapeError('missing', ErrorCode.IO_FILE_NOT_FOUND, 'Cannot access file: x.json', {
        path: 'x.json',
        type: undefined,
      })
    );
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Cannot access file: x.json'));
    expect(errorSpy).toHaveBeenCalledWith('   path: x.json');
    expect(errorSpy).not.toHaveBeenCalledWith('   type: undefined');
    expect(errorSpy).toHaveBeenCalledWith(`   Code: ${ErrorCode.IO_FILE_NOT_FOUND}`);
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('• Double-check the schema file path'));
  });

  it('redacts sensitive context values', () => {
    ErrorHandler.formatError(
      new ServicescapeError('bad', ErrorCode.CONFIG_INVALID, 'Bad config', {
        apiKey: 'test-secret',
      })
    );
    expect(errorSpy).toHaveBeenCalledWith('   apiKey: ***REDACTED***');
  });

  it('prefers the suggestions carried by a render error', () => {
    ErrorHandler.formatError(RenderError.rendererNotFound('d2'));
    expect(logSpy).toHaveBeenCalledWith(
      expect.stringContaining('• Use --no-render to write diagram scripts only')
    );
  });

  it('prints plain errors by message', () => {
    ErrorHandler.formatError(new Error('plain failure'));
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('plain failure'));
  });
});
