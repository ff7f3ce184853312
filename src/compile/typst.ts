/**
 * SVG sources
 *
 * `TypstCompiler` runs `typst compile` as a child process and captures the
 * SVG it writes to stdout. `FileSvgSource` reads an SVG that already exists.
 * Neither retries; a failed spawn or a non-zero exit is final.
 */

import { spawn } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import { ExternalCompileFailedError } from '../common/errors';
import { DEFAULT_TYPST_BIN } from '../config';
import { logger } from '../dev/logger';

export interface CompileOptions {
  signal?: AbortSignal;
  /** Kill the compiler after this many milliseconds. */
  timeoutMs?: number | null;
}

export interface SvgCompiler {
  compile(inputPath: string, options?: CompileOptions): Promise<string>;
}

export interface TypstCompilerOptions {
  /** Executable to run. Defaults to `typst` on the PATH. */
  bin?: string;
  /** Extra arguments placed before the input path, e.g. `--root`. */
  extraArgs?: readonly string[];
}

export class TypstCompiler implements SvgCompiler {
  readonly bin: string;
  private readonly extraArgs: readonly string[];

  constructor(options: TypstCompilerOptions = {}) {
    this.bin = options.bin ?? DEFAULT_TYPST_BIN;
    this.extraArgs = options.extraArgs ?? [];
  }

  /** Arguments for a single-page SVG written to stdout. */
  args(inputPath: string): string[] {
    return ['compile', '--format', 'svg', ...this.extraArgs, inputPath, '-'];
  }

  compile(inputPath: string, options: CompileOptions = {}): Promise<string> {
    const { signal, timeoutMs } = options;
    const args = this.args(inputPath);

    return new Promise<string>((resolve, reject) => {
      if (signal?.aborted) {
        reject(
          new ExternalCompileFailedError(
            `Compilation of ${inputPath} was aborted`
          )
        );
        return;
      }

      logger.debug('spawning', this.bin, args.join(' '));
      const child = spawn(this.bin, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;
      let killedFor: 'timeout' | 'abort' | null = null;
      let timer: ReturnType<typeof setTimeout> | null = null;

      const diagnostics = () => Buffer.concat(stderr).toString('utf8').trim();

      const cleanup = () => {
        settled = true;
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      const onAbort = () => {
        if (settled) return;
        killedFor = 'abort';
        child.kill('SIGTERM');
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      if (timeoutMs) {
        timer = setTimeout(() => {
          if (settled) return;
          killedFor = 'timeout';
          child.kill('SIGTERM');
        }, timeoutMs);
      }

      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (err) => {
        if (settled) return;
        cleanup();
        const notFound = 'code' in err && err.code === 'ENOENT';
        reject(
          new ExternalCompileFailedError(
            notFound
              ? `Typst executable not found: ${this.bin}`
              : `Failed to start ${this.bin}: ${err.message}`,
            diagnostics()
          )
        );
      });

      child.on('close', (code) => {
        if (settled) return;
        cleanup();

        if (killedFor === 'timeout') {
          reject(
            new ExternalCompileFailedError(
              `Compilation of ${inputPath} timed out after ${timeoutMs}ms`,
              diagnostics(),
              code
            )
          );
          return;
        }
        if (killedFor === 'abort') {
          reject(
            new ExternalCompileFailedError(
              `Compilation of ${inputPath} was aborted`,
              diagnostics(),
              code
            )
          );
          return;
        }
        if (code !== 0) {
          reject(
            new ExternalCompileFailedError(
              `${this.bin} exited with ${code === null ? 'a signal' : `code ${code}`} while compiling ${inputPath}`,
              diagnostics(),
              code
            )
          );
          return;
        }
        resolve(Buffer.concat(stdout).toString('utf8'));
      });
    });
  }
}

/** Treats an existing SVG file as already compiled. */
export class FileSvgSource implements SvgCompiler {
  async compile(inputPath: string): Promise<string> {
    try {
      return await readFile(inputPath, 'utf8');
    } catch (err) {
      throw new ExternalCompileFailedError(
        `Cannot read SVG file ${inputPath}`,
        err instanceof Error ? err.message : String(err)
      );
    }
  }
}
