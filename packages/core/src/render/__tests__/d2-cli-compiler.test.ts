import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';

const { mockSpawn } = vi.hoisted(() => ({
  mockSpawn: vi.fn(),
}));

vi.mock('child_process', () => ({
  spawn: mockSpawn,
}));

import { D2CliCompiler, applyFontPreamble, buildD2Args } from '../d2-cli-compiler.js';
import type { D2Options } from '../../schemas/d2-options.schema.js';
import { ErrorCode } from '../../errors.js';

class FakeChild extends EventEmitter {
  readonly stdout = new EventEmitter();
  readonly stderr = new EventEmitter();
  readonly stdin = Object.assign(new EventEmitter(), { end: vi.fn() });
}

const defaults: D2Options = {
  pad: 64,
  theme: 0,
  sketch: false,
  font: 'SourceSansPro',
  layout: 'elk',
};

describe('buildD2Args', () => {
  it('maps options to flags and pipes stdin to stdout', () => {
    expect(buildD2Args(defaults)).toEqual(['--layout=elk', '--theme=0', '--pad=64', '-', '-']);
  });

  it('adds --sketch for sketch mode', () => {
    expect(buildD2Args({ ...defaults, sketch: true, layout: 'dagre', theme: 200 })).toEqual([
      '--layout=dagre',
      '--theme=200',
      '--pad=64',
      '--sketch',
      '-',
      '-',
    ]);
  });

  it('uses sketch mode for the hand-drawn font', () => {
    expect(buildD2Args({ ...defaults, font: 'HandDrawn' })).toContain('--sketch');
  });
});

describe('applyFontPreamble', () => {
  it('switches shapes and connections to the monospace font', () => {
    expect(applyFontPreamble('a -> b\n', { ...defaults, font: 'SourceCodePro' })).toBe(
      '**.style.font: mono\n(** -> **)[*].style.font: mono\na -> b\n'
    );
  });

  it('leaves the script alone for other fonts', () => {
    expect(applyFontPreamble('a -> b\n', defaults)).toBe('a -> b\n');
  });
});

describe('D2CliCompiler', () => {
  let child: FakeChild;

  beforeEach(() => {
    child = new FakeChild();
    mockSpawn.mockReset();
    mockSpawn.mockReturnValue(child);
  });

  it('pipes the script into d2 and resolves with stdout', async () => {
    const signal = new AbortController().signal;
    const pending = new D2CliCompiler(defaults, '/usr/local/bin/d2').compile('a -> b', signal);

    child.stdout.emit('data', Buffer.from('<svg '));
    child.stdout.emit('data', Buffer.from('/>'));
    child.emit('close', 0);

    await expect(pending).resolves.toEqual(Buffer.from('<svg />'));
    expect(mockSpawn).toHaveBeenCalledWith(
      '/usr/local/bin/d2',
      ['--layout=elk', '--theme=0', '--pad=64', '-', '-'],
      { signal, stdio: ['pipe', 'pipe', 'pipe'] }
    );
    expect(child.stdin.end).toHaveBeenCalledWith('a -> b', 'utf-8');
  });

  it('reports a non-zero exit as a compile failure with stderr', async () => {
    const pending = new D2CliCompiler(defaults, 'd2').compile(
      '{{{{',
      new AbortController().signal
    );

    child.stderr.emit('data', Buffer.from('err: -:1:1: unexpected map termination\n'));
    child.emit('close', 1);

    await expect(pending).rejects.toMatchObject({
      code: ErrorCode.DIAGRAM_COMPILE_FAILED,
      message: 'failed to compile diagram: err: -:1:1: unexpected map termination',
    });
  });

  it('falls back to the exit code when stderr is empty', async () => {
    const pending = new D2CliCompiler(defaults, 'd2').compile('x', new AbortController().signal);

    child.emit('close', 2);

    await expect(pending).rejects.toMatchObject({
      message: 'failed to compile diagram: d2 exited with code 2',
    });
  });

  it('maps a missing binary to RENDERER_NOT_FOUND', async () => {
    const pending = new D2CliCompiler(defaults, 'd2').compile('x', new AbortController().signal);

    child.emit('error', Object.assign(new Error('spawn d2 ENOENT'), { code: 'ENOENT' }));

    await expect(pending).rejects.toMatchObject({
      code: ErrorCode.RENDERER_NOT_FOUND,
      message: 'renderer binary not found: d2',
    });
  });

  it('maps an aborted process to RENDER_CANCELLED', async () => {
    const controller = new AbortController();
    const pending = new D2CliCompiler(defaults, 'd2').compile('x', controller.signal);

    controller.abort();
    const abortError = new Error('The operation was aborted');
    abortError.name = 'AbortError';
    child.emit('error', abortError);
    child.emit('close', null);

    await expect(pending).rejects.toMatchObject({ code: ErrorCode.RENDER_CANCELLED });
  });

  it('does not spawn for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      new D2CliCompiler(defaults, 'd2').compile('x', controller.signal)
    ).rejects.toMatchObject({ code: ErrorCode.RENDER_CANCELLED });
    expect(mockSpawn).not.toHaveBeenCalled();
  });

  it('prepends the monospace preamble for SourceCodePro', async () => {
    const pending = new D2CliCompiler({ ...defaults, font: 'SourceCodePro' }, 'd2').compile(
      'a -> b',
      new AbortController().signal
    );
    child.emit('close', 0);
    await pending;

    expect(child.stdin.end).toHaveBeenCalledWith(
      '**.style.font: mono\n(** -> **)[*].style.font: mono\na -> b',
      'utf-8'
    );
  });
});
