/**
 * Error taxonomy for the extraction pipeline.
 *
 * Archive and extraction failures are recovered per entry; converter failures
 * and configuration errors end the run.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ArchiveReadError extends Error {
  readonly archivePath: string;

  constructor(archivePath: string, cause: unknown) {
    super(`Failed to open ${archivePath}: ${describeError(cause)}`, { cause });
    this.name = 'ArchiveReadError';
    this.archivePath = archivePath;
  }
}

export class ExtractionError extends Error {
  readonly archivePath: string;
  readonly entryName: string;

  constructor(archivePath: string, entryName: string, reason: string, cause?: unknown) {
    super(`Failed to extract ${entryName} from ${archivePath}: ${reason}`, { cause });
    this.name = 'ExtractionError';
    this.archivePath = archivePath;
    this.entryName = entryName;
  }
}

export class ConverterInvocationError extends Error {
  readonly command: string;
  /** Null when the process never started */
  readonly exitCode: number | null;

  constructor(command: string, message: string, exitCode: number | null = null, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConverterInvocationError';
    this.command = command;
    this.exitCode = exitCode;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
