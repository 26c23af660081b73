/**
 * Archive → scratch → converter → script pipeline.
 *
 * Runs strictly in sequence. Unreadable archives and failed extractions are
 * recorded and skipped; a converter failure stops the run.
 */
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { isShapefile, isSidecarOf, scanArchives, type ArchiveEntry } from './archive-scanner.js';
import type { ExtractorConfig } from './config.js';
import {
  ConverterInvoker,
  type ConversionMode,
  type ProcessRunner,
  type TableTarget,
} from './converter.js';
import { ArchiveReadError, ConfigError, ExtractionError } from './errors.js';
import { extractEntry, type ExtractedFile } from './extractor.js';
import { ScriptAssembler } from './script-assembler.js';

// ============================================================================
// Types
// ============================================================================

export interface MatchedEntry {
  archivePath: string;
  entryName: string;
  size: number;
  companion: boolean;
}

export interface SkippedEntry {
  archivePath: string;
  /** Null when the whole archive was skipped */
  entryName: string | null;
  error: ArchiveReadError | ExtractionError;
}

export interface RunSummary {
  archivesScanned: number;
  archivesFailed: number;
  entriesMatched: number;
  filesExtracted: number;
  shapefilesConverted: number;
  entriesSkipped: number;
  matches: MatchedEntry[];
  skipped: SkippedEntry[];
  outputPath: string;
  /** Null on a dry run */
  scratchDir: string | null;
  dryRun: boolean;
}

export type ProgressEvent =
  | { type: 'archive'; archivePath: string; entryCount: number; matchCount: number }
  | { type: 'extracted'; file: ExtractedFile }
  | { type: 'converted'; shapefile: string; mode: ConversionMode; bytes: number }
  | { type: 'skipped'; skipped: SkippedEntry };

export interface PipelineDeps {
  /** Environment for converter lookup and execution */
  env?: NodeJS.ProcessEnv;
  runner?: ProcessRunner;
  onProgress?: (event: ProgressEvent) => void;
}

interface Scratch {
  dir: string;
  temporary: boolean;
}

// ============================================================================
// Setup
// ============================================================================

async function assertDirectory(path: string): Promise<void> {
  const info = await stat(path).catch(() => null);
  if (!info || !info.isDirectory()) {
    throw new ConfigError(`Archive directory ${path} does not exist or is not a directory`);
  }
}

/**
 * An explicit scratch directory is created on first extraction, so a
 * location that cannot be written fails each entry rather than the run.
 */
async function prepareScratch(config: ExtractorConfig): Promise<Scratch> {
  if (config.scratchDir === undefined) {
    return { dir: await mkdtemp(join(tmpdir(), 'mapsheet-sql-')), temporary: true };
  }
  return { dir: config.scratchDir, temporary: false };
}

function createSummary(config: ExtractorConfig): RunSummary {
  return {
    archivesScanned: 0,
    archivesFailed: 0,
    entriesMatched: 0,
    filesExtracted: 0,
    shapefilesConverted: 0,
    entriesSkipped: 0,
    matches: [],
    skipped: [],
    outputPath: config.outputPath,
    scratchDir: null,
    dryRun: config.dryRun,
  };
}

// ============================================================================
// Pipeline
// ============================================================================

export async function runPipeline(
  config: ExtractorConfig,
  deps: PipelineDeps = {}
): Promise<RunSummary> {
  const { onProgress } = deps;
  const summary = createSummary(config);
  const target: TableTarget = { schemaName: config.schemaName, tableName: config.tableName };

  const skip = (skipped: SkippedEntry): void => {
    if (skipped.entryName === null) {
      summary.archivesFailed++;
    } else {
      summary.entriesSkipped++;
    }
    summary.skipped.push(skipped);
    onProgress?.({ type: 'skipped', skipped });
  };

  const onScanError = (error: ArchiveReadError): void => {
    skip({ archivePath: error.archivePath, entryName: null, error });
  };

  await assertDirectory(config.archiveRoot);

  if (config.dryRun) {
    for await (const archive of scanArchives(config.archiveRoot, config.searchToken, onScanError)) {
      summary.archivesScanned++;
      recordMatches(summary, archive.matches);
      onProgress?.({
        type: 'archive',
        archivePath: archive.archivePath,
        entryCount: archive.entryCount,
        matchCount: archive.matches.length,
      });
    }
    return summary;
  }

  const converter = new ConverterInvoker({
    command: config.converterCommand,
    srid: config.srid,
    encoding: config.encoding,
    spatialIndex: config.spatialIndex,
    env: deps.env,
    runner: deps.runner,
  });
  await converter.ensureAvailable();

  const scratch = await prepareScratch(config);
  summary.scratchDir = scratch.dir;
  // converter output lands here first and is only appended after a clean exit
  const staging = join(scratch.dir, 'converter-output.sql');
  let staged = false;

  try {
    const assembler = new ScriptAssembler(config.outputPath);
    await assembler.begin();

    let mode: ConversionMode = 'create';

    for await (const archive of scanArchives(config.archiveRoot, config.searchToken, onScanError)) {
      summary.archivesScanned++;
      recordMatches(summary, archive.matches);
      onProgress?.({
        type: 'archive',
        archivePath: archive.archivePath,
        entryCount: archive.entryCount,
        matchCount: archive.matches.length,
      });

      const extracted = new Map<string, ExtractedFile>();
      const failed: string[] = [];

      for (const entry of archive.matches) {
        try {
          const file = await extractEntry(entry, scratch.dir);
          extracted.set(entry.name, file);
          summary.filesExtracted++;
          onProgress?.({ type: 'extracted', file });
        } catch (err) {
          if (!(err instanceof ExtractionError)) throw err;
          failed.push(entry.name);
          skip({ archivePath: entry.archivePath, entryName: entry.name, error: err });
        }
      }

      for (const entry of archive.matches) {
        const file = extracted.get(entry.name);
        if (!file || !isShapefile(entry.name)) continue;

        const missing = failed.filter((name) => isSidecarOf(name, entry.name));
        if (missing.length > 0) {
          skip({
            archivePath: entry.archivePath,
            entryName: entry.name,
            error: new ExtractionError(
              entry.archivePath,
              entry.name,
              `incomplete file set, not extracted: ${missing.join(', ')}`
            ),
          });
          continue;
        }

        staged = true;
        await converter.convert(file.path, target, mode, staging);
        const bytes = await assembler.appendFile(staging);
        summary.shapefilesConverted++;
        onProgress?.({ type: 'converted', shapefile: file.path, mode, bytes });
        mode = 'append';
      }
    }
  } finally {
    if (scratch.temporary && !config.keepScratch) {
      await rm(scratch.dir, { recursive: true, force: true });
    } else if (staged) {
      await rm(staging, { force: true });
    }
  }

  return summary;
}

function recordMatches(summary: RunSummary, entries: ArchiveEntry[]): void {
  summary.entriesMatched += entries.length;
  for (const entry of entries) {
    summary.matches.push({
      archivePath: entry.archivePath,
      entryName: entry.name,
      size: entry.size,
      companion: entry.companion,
    });
  }
}
