import { spawn } from 'child_process';
import { RenderError } from '../errors.js';
import type { D2Options } from '../schemas/d2-options.schema.js';
import { CONFIG } from '../utils/config.js';
import type { DiagramCompiler } from './diagram-compiler.js';

// Applied to every shape and every connection, including nested ones.
const MONOSPACE_PREAMBLE = ['**.style.font: mono', '(** -> **)[*].style.font: mono', ''].join(
  '\n'
);

function errnoCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

export function buildD2Args(options: D2Options): string[] {
  const args = [
    `--layout=${options.layout}`,
    `--theme=${String(options.theme)}`,
    `--pad=${String(options.pad)}`,
  ];
  if (options.sketch || options.font === 'HandDrawn') {
    args.push('--sketch');
  }
  // read the script from stdin, write the SVG to stdout
  args.push('-', '-');
  return args;
}

export function applyFontPreamble(script: string, options: D2Options): string {
  return options.font === 'SourceCodePro' ? `${MONOSPACE_PREAMBLE}${script}` : script;
}

/**
 * Compiles scripts with the `d2` executable, piping the script through stdin
 * and collecting the SVG from stdout.
 */
export class D2CliCompiler implements DiagramCompiler {
  constructor(
    private readonly options: D2Options,
    private readonly binPath: string = CONFIG.d2.binPath
  ) {}

  compile(script: string, signal: AbortSignal): Promise<Buffer> {
    if (signal.aborted) {
      return Promise.reject(RenderError.cancelled(signal.reason));
    }

    return new Promise<Buffer>((resolve, reject) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;

      const fail = (error: RenderError): void => {
        if (settled) return;
        settled = true;
        reject(error);
      };

      const child = spawn(this.binPath, buildD2Args(this.options), {
        signal,
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error) => {
        if (signal.aborted || error.name === 'AbortError') {
          fail(RenderError.cancelled(error));
        } else if (errnoCode(error) === 'ENOENT') {
          fail(RenderError.rendererNotFound(this.binPath, error));
        } else {
          fail(RenderError.fromError(error));
        }
      });

      child.on('close', (code) => {
        if (signal.aborted) {
          fail(RenderError.cancelled(signal.reason));
          return;
        }
        if (code === 0) {
          if (settled) return;
          settled = true;
          resolve(Buffer.concat(stdout));
          return;
        }
        const diagnostic = Buffer.concat(stderr).toString('utf-8').trim();
        fail(
          RenderError.compileFailure(
            diagnostic || `${this.binPath} exited with code ${String(code)}`
          )
        );
      });

      // EPIPE when d2 exits before reading all input; the exit status reports the cause
      child.stdin.on('error', (error) => {
        stderr.push(Buffer.from(`${error.message}\n`, 'utf-8'));
      });
      child.stdin.end(applyFontPreamble(script, this.options), 'utf-8');
    });
  }
}
