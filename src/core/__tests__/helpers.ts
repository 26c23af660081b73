/**
 * Shared fixtures: zip archives built in-process and a fake converter.
 */
import JSZip from 'jszip';
import { chmod, mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, join } from 'node:path';
import type { ProcessResult, ProcessRunner } from '../converter.js';

export async function makeTempDir(prefix = 'mapsheet-sql-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function writeZip(
  path: string,
  files: Record<string, string | Buffer>
): Promise<void> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(files)) {
    zip.file(name, content);
  }
  const data = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, data);
}

/**
 * A shapefile set whose .shp bytes carry the sheet name, so extracted
 * files from different archives are distinguishable.
 */
export function shapefileSet(stem: string, sheet: string): Record<string, Buffer> {
  return {
    [`${stem}.shp`]: Buffer.concat([Buffer.from([0x00, 0x00, 0x27, 0x0a]), Buffer.from(sheet)]),
    [`${stem}.shx`]: Buffer.from([0x00, 0x00, 0x27, 0x0a, 0x00, 0x00]),
    [`${stem}.dbf`]: Buffer.from(`dbf:${sheet}`),
    [`${stem}.prj`]: Buffer.from('GEOGCS["GCS_North_American_1983"]'),
  };
}

/**
 * Shell script on a temp PATH. The default body does nothing, for tests
 * that only need the lookup to succeed.
 */
export async function installFakeExecutable(
  dir: string,
  name = 'shp2pgsql',
  body = 'exit 0'
): Promise<string> {
  const path = join(dir, name);
  await mkdir(dir, { recursive: true });
  await writeFile(path, `#!/bin/sh\n${body}\n`);
  await chmod(path, 0o755);
  return path;
}

/**
 * Label for an extracted shapefile: `<sheet>/<file>`, with the scratch
 * hash suffix removed so output does not depend on temp paths.
 */
export function shapefileLabel(shapefilePath: string): string {
  const sheet = basename(dirname(shapefilePath)).replace(/-[0-9a-f]{8}$/, '');
  return `${sheet}/${basename(shapefilePath)}`;
}

/**
 * Stand-in for shp2pgsql: emits a create block (-d) or an insert (-a)
 * naming the shapefile it was given.
 */
export const fakeShp2pgsql: ProcessRunner = async (_command, args, { stdout }) => {
  const table = args[args.length - 1];
  const label = shapefileLabel(args[args.length - 2]);
  const insert = `INSERT INTO ${table} VALUES ('${label}');\n`;
  stdout.end(
    args.includes('-a')
      ? insert
      : `DROP TABLE IF EXISTS ${table};\nCREATE TABLE ${table} (gid serial);\n${insert}`
  );
  return { exitCode: 0, signal: null, stderr: '' };
};

/** Runner that writes `stdout` and then reports `result`. */
export function scriptedRunner(
  stdout: string,
  result: Partial<ProcessResult> = {}
): ProcessRunner {
  return async (_command, _args, options) => {
    options.stdout.end(stdout);
    return { exitCode: 0, signal: null, stderr: '', ...result };
  };
}
