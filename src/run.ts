/**
 * Command entry: parses arguments, runs the pipeline and prints the summary.
 * Returns the process exit code.
 */
import { basename, relative } from 'node:path';
import { parseCliArgs, resolveConfig, USAGE, type ExtractorConfig } from './core/config.js';
import type { ProcessRunner } from './core/converter.js';
import { ConfigError, ConverterInvocationError } from './core/errors.js';
import { runPipeline, type ProgressEvent, type RunSummary } from './core/pipeline.js';

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  runner?: ProcessRunner;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function logProgress(config: ExtractorConfig, event: ProgressEvent): void {
  switch (event.type) {
    case 'archive':
      if (event.matchCount > 0) {
        console.log(
          `  ${relative(config.archiveRoot, event.archivePath)}: ${event.matchCount} of ${event.entryCount} entries match`
        );
      }
      break;
    case 'converted':
      console.log(
        `    ${event.mode} ${basename(event.shapefile)} (${event.bytes.toLocaleString()} bytes of SQL)`
      );
      break;
    case 'skipped':
      console.warn(`  Skipped: ${event.skipped.error.message}`);
      break;
    case 'extracted':
      break;
  }
}

function printMatches(config: ExtractorConfig, summary: RunSummary): void {
  for (const match of summary.matches) {
    const suffix = match.companion ? ' (sidecar)' : '';
    console.log(`  ${relative(config.archiveRoot, match.archivePath)}: ${match.entryName}${suffix}`);
  }
}

function printSummary(config: ExtractorConfig, summary: RunSummary): void {
  console.log('\nSummary');
  console.log('-------');
  console.log(`Archives scanned:     ${summary.archivesScanned}`);
  console.log(`Archives unreadable:  ${summary.archivesFailed}`);
  console.log(`Entries matched:      ${summary.entriesMatched}`);
  if (!summary.dryRun) {
    console.log(`Files extracted:      ${summary.filesExtracted}`);
    console.log(`Shapefiles converted: ${summary.shapefilesConverted}`);
    console.log(`Entries skipped:      ${summary.entriesSkipped}`);
  }

  if (summary.entriesMatched === 0) {
    console.warn(
      `\nWarning: no entries matched "${config.searchToken}".` +
        (summary.dryRun ? '' : ` ${config.outputPath} is empty.`)
    );
  } else if (!summary.dryRun) {
    if (summary.shapefilesConverted === 0) {
      console.warn(`\nWarning: no shapefiles were converted. ${config.outputPath} is empty.`);
    } else {
      console.log(`\nOutput: ${config.outputPath}`);
    }
    if (summary.scratchDir && (config.scratchDir !== undefined || config.keepScratch)) {
      console.log(`Extracted files: ${summary.scratchDir}`);
    }
  }
}

export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
  const env = options.env ?? process.env;

  let config: ExtractorConfig;
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      console.log(USAGE);
      return EXIT_OK;
    }
    config = resolveConfig(args, env, options.cwd);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(`Error: ${err.message}\n`);
    console.error(USAGE);
    return EXIT_USAGE;
  }

  const title = 'Map Sheet Shapefile Extractor';
  console.log(title);
  console.log('='.repeat(title.length) + '\n');
  console.log(`Search:   ${config.searchToken}`);
  console.log(`Archives: ${config.archiveRoot}`);
  if (!config.dryRun) {
    console.log(`Output:   ${config.outputPath}`);
    console.log(`Table:    ${config.schemaName}.${config.tableName} (SRID ${config.srid})`);
  }
  console.log(config.dryRun ? '\nScanning archives (dry run)...' : '\nScanning and converting...');

  try {
    const summary = await runPipeline(config, {
      env,
      runner: options.runner,
      onProgress: (event) => logProgress(config, event),
    });
    if (summary.dryRun && summary.matches.length > 0) {
      console.log('\nMatching entries:');
      printMatches(config, summary);
    }
    printSummary(config, summary);
    return EXIT_OK;
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      return EXIT_USAGE;
    }
    if (err instanceof ConverterInvocationError) {
      console.error(`Error: ${err.message}`);
      return EXIT_FAILURE;
    }
    throw err;
  }
}
