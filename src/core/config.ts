/**
 * Command line parsing and run configuration.
 */
import { resolve } from 'node:path';
import { DEFAULT_CONVERTER, DEFAULT_SRID } from './converter.js';
import { ConfigError } from './errors.js';

export interface ExtractorConfig {
  /** Substring matched against entry paths inside each archive */
  searchToken: string;
  outputPath: string;
  archiveRoot: string;
  tableName: string;
  schemaName: string;
  /** Explicit scratch directory; a per-run temp directory is used when unset */
  scratchDir?: string;
  /** Keep the per-run temp directory after the run */
  keepScratch: boolean;
  srid: number;
  encoding?: string;
  spatialIndex: boolean;
  converterCommand: string;
  /** Scan and report matches only */
  dryRun: boolean;
}

export interface CliArgs {
  positionals: string[];
  scratchDir?: string;
  keepScratch: boolean;
  srid?: string;
  encoding?: string;
  spatialIndex: boolean;
  converter?: string;
  dryRun: boolean;
  help: boolean;
}

export const DEFAULT_SCHEMA = 'public';

export const USAGE = `Usage: mapsheet-sql <search> <output.sql> <archive-root> <table> [schema] [options]

  search        Substring matched against file names inside each archive
                (metric contours, for example, match 'FO_1030009')
  output.sql    SQL script to write; overwritten
  archive-root  Directory searched recursively for .zip archives
  table         Table to create and populate (an existing table is dropped)
  schema        Schema of the table (default: ${DEFAULT_SCHEMA})

Options:
  --scratch-dir <dir>  Extract into <dir> and leave the files there
  --keep-scratch       Keep the temporary extraction directory
  --srid <n>           SRID passed to the converter (default: ${DEFAULT_SRID})
  --encoding <name>    Attribute encoding of the shapefiles (converter -W)
  --no-index           Do not create a spatial index
  --converter <cmd>    Converter executable (default: $SHP2PGSQL or ${DEFAULT_CONVERTER})
  --dry-run            List matching entries without extracting or converting
  --help               Show this message
  --                   Treat every later argument as positional`;

function requireValue(args: string[], i: number, option: string): string {
  const value = args[i];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`Option ${option} requires a value`);
  }
  return value;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const result: CliArgs = {
    positionals: [],
    keepScratch: false,
    spatialIndex: true,
    dryRun: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--scratch-dir':
        result.scratchDir = requireValue(argv, ++i, arg);
        break;
      case '--keep-scratch':
        result.keepScratch = true;
        break;
      case '--srid':
        result.srid = requireValue(argv, ++i, arg);
        break;
      case '--encoding':
        result.encoding = requireValue(argv, ++i, arg);
        break;
      case '--no-index':
        result.spatialIndex = false;
        break;
      case '--converter':
        result.converter = requireValue(argv, ++i, arg);
        break;
      case '--dry-run':
        result.dryRun = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--':
        result.positionals.push(...argv.slice(i + 1));
        i = argv.length;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new ConfigError(`Unknown option: ${arg}`);
        }
        result.positionals.push(arg);
    }
  }

  return result;
}

function parseSrid(value: string | undefined): number {
  if (value === undefined) return DEFAULT_SRID;
  const srid = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!(srid > 0)) {
    throw new ConfigError(`Invalid SRID: ${value}`);
  }
  return srid;
}

function requireNonEmpty(value: string, label: string): string {
  if (value.trim() === '') {
    throw new ConfigError(`${label} must not be empty`);
  }
  return value;
}

/**
 * Build the run configuration. Relative paths resolve against `cwd`.
 */
export function resolveConfig(
  args: CliArgs,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ExtractorConfig {
  const count = args.positionals.length;
  if (count < 4 || count > 5) {
    throw new ConfigError(`Expected 4 or 5 arguments, got ${count}`);
  }

  const [searchToken, outputPath, archiveRoot, tableName, schemaName = DEFAULT_SCHEMA] =
    args.positionals;

  return {
    searchToken: requireNonEmpty(searchToken, 'Search string'),
    outputPath: resolve(cwd, requireNonEmpty(outputPath, 'Output path')),
    archiveRoot: resolve(cwd, requireNonEmpty(archiveRoot, 'Archive root')),
    tableName: requireNonEmpty(tableName, 'Table name'),
    schemaName: requireNonEmpty(schemaName, 'Schema name'),
    scratchDir: args.scratchDir === undefined ? undefined : resolve(cwd, args.scratchDir),
    keepScratch: args.keepScratch,
    srid: parseSrid(args.srid),
    encoding: args.encoding,
    spatialIndex: args.spatialIndex,
    converterCommand: args.converter ?? env.SHP2PGSQL ?? DEFAULT_CONVERTER,
    dryRun: args.dryRun,
  };
}
