/**
 * Shapefile-to-SQL converter invocation (shp2pgsql by default).
 *
 * The first converted shapefile creates the table, every later one appends
 * to it. The caller owns that ordering; this module only builds the command
 * line, runs it, and streams stdout into a file.
 */
import { spawn } from 'node:child_process';
import { constants, createWriteStream } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import { delimiter, join, resolve, sep } from 'node:path';
import type { Writable } from 'node:stream';
import { finished, pipeline } from 'node:stream/promises';
import { ConverterInvocationError, describeError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export type ConversionMode = 'create' | 'append';

export interface TableTarget {
  schemaName: string;
  tableName: string;
}

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;
}

/**
 * Runs a command, piping its stdout into `options.stdout` and ending that
 * stream once the output is complete.
 */
export type ProcessRunner = (
  command: string,
  args: string[],
  options: { env: NodeJS.ProcessEnv; stdout: Writable }
) => Promise<ProcessResult>;

export interface ConverterOptions {
  command?: string;
  srid?: number;
  /** Source attribute encoding, passed as -W */
  encoding?: string;
  /** Build a spatial index when creating the table */
  spatialIndex?: boolean;
  env?: NodeJS.ProcessEnv;
  runner?: ProcessRunner;
}

export const DEFAULT_CONVERTER = 'shp2pgsql';
export const DEFAULT_SRID = 4326;

// ============================================================================
// Process Helpers
// ============================================================================

export const spawnProcess: ProcessRunner = async (command, args, { env, stdout }) => {
  const child = spawn(command, args, { env, stdio: ['ignore', 'pipe', 'pipe'] });
  const stderr: Buffer[] = [];
  child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

  const exited = new Promise<[number | null, NodeJS.Signals | null]>((resolveExit, reject) => {
    child.on('error', (err) => {
      child.stdout.destroy();
      reject(err);
    });
    child.on('close', (exitCode, signal) => resolveExit([exitCode, signal]));
  });

  // a failed pipe destroys `stdout` with the error, so the caller sees it there
  const [exit] = await Promise.allSettled([exited, pipeline(child.stdout, stdout)]);
  if (exit.status === 'rejected') throw exit.reason;

  const [exitCode, signal] = exit.value;
  return { exitCode, signal, stderr: Buffer.concat(stderr).toString('utf8') };
};

async function isExecutableFile(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolve a command the way a shell would: a command containing a path
 * separator is taken as a path, anything else is looked up on PATH.
 */
export async function locateExecutable(
  command: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<string | null> {
  if (command.includes('/') || command.includes(sep)) {
    const path = resolve(command);
    return (await isExecutableFile(path)) ? path : null;
  }

  const extensions =
    process.platform === 'win32' ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';')] : [''];

  for (const dir of (env.PATH ?? '').split(delimiter).filter(Boolean)) {
    for (const ext of extensions) {
      const candidate = join(dir, command + ext);
      if (await isExecutableFile(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}

function notFoundMessage(command: string): string {
  return `${command} was not found on PATH. Install PostGIS (which provides shp2pgsql) or pass --converter <path>.`;
}

function isMissingCommand(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

// ============================================================================
// Converter
// ============================================================================

export class ConverterInvoker {
  readonly command: string;
  private readonly srid: number;
  private readonly encoding: string | undefined;
  private readonly spatialIndex: boolean;
  private readonly env: NodeJS.ProcessEnv;
  private readonly runner: ProcessRunner;

  constructor(options: ConverterOptions = {}) {
    this.command = options.command ?? DEFAULT_CONVERTER;
    this.srid = options.srid ?? DEFAULT_SRID;
    this.encoding = options.encoding;
    this.spatialIndex = options.spatialIndex ?? true;
    this.env = options.env ?? process.env;
    this.runner = options.runner ?? spawnProcess;
  }

  buildArgs(shapefilePath: string, target: TableTarget, mode: ConversionMode): string[] {
    const args = ['-s', String(this.srid)];
    if (this.encoding) {
      args.push('-W', this.encoding);
    }
    if (mode === 'create') {
      args.push('-d');
      if (this.spatialIndex) args.push('-I');
    } else {
      args.push('-a');
    }
    args.push(shapefilePath, `${target.schemaName}.${target.tableName}`);
    return args;
  }

  /**
   * Check the converter can be found before anything is written.
   * Returns the resolved executable path.
   */
  async ensureAvailable(): Promise<string> {
    const found = await locateExecutable(this.command, this.env);
    if (!found) {
      throw new ConverterInvocationError(
        this.command,
        notFoundMessage(this.command)
      );
    }
    return found;
  }

  /**
   * Convert one shapefile, writing the SQL to `destination` (truncated
   * first). Returns the number of bytes written. On failure the file may
   * hold partial output and must not be used.
   */
  async convert(
    shapefilePath: string,
    target: TableTarget,
    mode: ConversionMode,
    destination: string
  ): Promise<number> {
    const args = this.buildArgs(shapefilePath, target, mode);
    const out = createWriteStream(destination);

    const [run, written] = await Promise.allSettled([
      this.invoke(args, out),
      finished(out),
    ]);
    if (run.status === 'rejected') throw run.reason;
    const result = run.value;

    if (result.exitCode !== 0) {
      const status = result.signal
        ? `was terminated by ${result.signal}`
        : `exited with code ${result.exitCode}`;
      const detail = result.stderr.trim();
      throw new ConverterInvocationError(
        this.command,
        `${this.command} ${status} while converting ${shapefilePath}${detail ? `: ${detail}` : ''}`,
        result.exitCode
      );
    }

    if (written.status === 'rejected') {
      throw new ConverterInvocationError(
        this.command,
        `Failed to write ${this.command} output to ${destination}: ${describeError(written.reason)}`,
        null,
        written.reason
      );
    }

    return out.bytesWritten;
  }

  private async invoke(args: string[], out: Writable): Promise<ProcessResult> {
    let result: ProcessResult;
    try {
      result = await this.runner(this.command, args, { env: this.env, stdout: out });
    } catch (err) {
      out.destroy();
      if (isMissingCommand(err)) {
        throw new ConverterInvocationError(
          this.command,
          notFoundMessage(this.command),
          null,
          err
        );
      }
      throw new ConverterInvocationError(
        this.command,
        `Failed to start ${this.command}: ${describeError(err)}`,
        null,
        err
      );
    }

    if (!out.writableEnded && !out.destroyed) out.end();
    return result;
  }
}
