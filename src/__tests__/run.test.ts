/**
 * Command-level tests: exit codes and console output.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { USAGE } from '../core/config.js';
import {
  fakeShp2pgsql,
  installFakeExecutable,
  makeTempDir,
  shapefileSet,
  writeZip,
} from '../core/__tests__/helpers.js';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, run } from '../run.js';

describe('run', () => {
  let work: string;
  let env: NodeJS.ProcessEnv;
  let log: MockInstance<typeof console.log>;
  let warn: MockInstance<typeof console.warn>;
  let error: MockInstance<typeof console.error>;

  beforeEach(async () => {
    work = await makeTempDir();
    await writeZip(join(work, 'canvec', '021D04.zip'), shapefileSet('FO_1030009_0', '021D04'));
    await writeZip(join(work, 'canvec', '021D05.zip'), shapefileSet('FO_1030009_0', '021D05'));
    await installFakeExecutable(join(work, 'bin'));
    env = { PATH: join(work, 'bin') };

    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(work, { recursive: true, force: true });
  });

  it('prints usage for --help', async () => {
    expect(await run(['--help'], { env, cwd: work })).toBe(EXIT_OK);
    expect(log).toHaveBeenCalledWith(USAGE);
  });

  it('converts a tree and prints a summary', async () => {
    const code = await run(['FO_1030009', 'output.sql', 'canvec', 'contours', 'topo'], {
      env,
      cwd: work,
      runner: fakeShp2pgsql,
    });

    expect(code).toBe(EXIT_OK);
    expect(await readFile(join(work, 'output.sql'), 'utf8')).toBe(
      [
        'DROP TABLE IF EXISTS topo.contours;',
        'CREATE TABLE topo.contours (gid serial);',
        "INSERT INTO topo.contours VALUES ('021D04/FO_1030009_0.shp');",
        "INSERT INTO topo.contours VALUES ('021D05/FO_1030009_0.shp');",
        '',
      ].join('\n')
    );
    expect(log).toHaveBeenCalledWith('  021D04.zip: 4 of 4 entries match');
    expect(log).toHaveBeenCalledWith('Shapefiles converted: 2');
    expect(log).toHaveBeenCalledWith(`\nOutput: ${join(work, 'output.sql')}`);
    expect(warn).not.toHaveBeenCalled();
  });

  it('warns and succeeds with an empty script when nothing matches', async () => {
    const code = await run(['NOPE', 'output.sql', 'canvec', 'contours'], {
      env,
      cwd: work,
      runner: fakeShp2pgsql,
    });

    expect(code).toBe(EXIT_OK);
    expect(await readFile(join(work, 'output.sql'), 'utf8')).toBe('');
    expect(warn).toHaveBeenCalledWith(
      `\nWarning: no entries matched "NOPE". ${join(work, 'output.sql')} is empty.`
    );
  });

  it('skips entries and succeeds when the scratch directory cannot be created', async () => {
    await writeFile(join(work, 'blocker'), 'not a directory');

    const code = await run(
      ['FO_1030009', 'output.sql', 'canvec', 'contours', '--scratch-dir', 'blocker/s'],
      { env, cwd: work, runner: fakeShp2pgsql }
    );

    expect(code).toBe(EXIT_OK);
    expect(await readFile(join(work, 'output.sql'), 'utf8')).toBe('');
    expect(log).toHaveBeenCalledWith('Entries skipped:      8');
    expect(warn).toHaveBeenCalledWith(
      `\nWarning: no shapefiles were converted. ${join(work, 'output.sql')} is empty.`
    );
  });

  it('accepts a search string that starts with dashes after --', async () => {
    const code = await run(['--', '--FO_1030009', 'output.sql', 'canvec', 'contours'], {
      env,
      cwd: work,
      runner: fakeShp2pgsql,
    });

    expect(code).toBe(EXIT_OK);
    expect(warn).toHaveBeenCalledWith(
      `\nWarning: no entries matched "--FO_1030009". ${join(work, 'output.sql')} is empty.`
    );
  });

  it('lists matches on --dry-run', async () => {
    const code = await run(['FO_1030009_0.shp', 'output.sql', 'canvec', 'contours', '--dry-run'], {
      env: {},
      cwd: work,
    });

    expect(code).toBe(EXIT_OK);
    expect(log).toHaveBeenCalledWith('  021D04.zip: FO_1030009_0.shp');
    expect(log).toHaveBeenCalledWith('  021D05.zip: FO_1030009_0.dbf (sidecar)');
  });

  it('exits with a usage error for missing arguments', async () => {
    expect(await run(['FO_1030009', 'output.sql'], { env, cwd: work })).toBe(EXIT_USAGE);
    expect(error).toHaveBeenCalledWith('Error: Expected 4 or 5 arguments, got 2\n');
  });

  it('exits with a usage error when the archive root is missing', async () => {
    const code = await run(['FO_1030009', 'output.sql', 'missing', 'contours'], { env, cwd: work });

    expect(code).toBe(EXIT_USAGE);
    expect(error).toHaveBeenCalledWith(
      `Error: Archive directory ${join(work, 'missing')} does not exist or is not a directory`
    );
  });

  it('fails naming the converter when it is not installed', async () => {
    const code = await run(['FO_1030009', 'output.sql', 'canvec', 'contours'], {
      env: { PATH: join(work, 'canvec') },
      cwd: work,
      runner: fakeShp2pgsql,
    });

    expect(code).toBe(EXIT_FAILURE);
    expect(error).toHaveBeenCalledWith(
      'Error: shp2pgsql was not found on PATH. Install PostGIS (which provides shp2pgsql) or pass --converter <path>.'
    );
  });
});
