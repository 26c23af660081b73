/**
 * Writes matched archive entries into the scratch directory.
 *
 * Each archive gets its own subdirectory named after the archive stem plus a
 * short hash of its absolute path, so two map sheets that both contain
 * `FO_1030009_0.shp` never overwrite each other.
 */
import { createHash } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import { mkdir, stat } from 'node:fs/promises';
import { basename, join, posix, resolve, dirname } from 'node:path';
import { pipeline } from 'node:stream/promises';
import type { ArchiveEntry } from './archive-scanner.js';
import { ExtractionError, describeError } from './errors.js';

export interface ExtractedFile {
  archivePath: string;
  entryName: string;
  path: string;
  bytes: number;
}

export function archiveDirName(archivePath: string): string {
  const stem = basename(archivePath).replace(/\.zip$/i, '');
  const hash = createHash('sha1').update(resolve(archivePath)).digest('hex').slice(0, 8);
  return `${stem}-${hash}`;
}

/**
 * Local path for an entry. Rejects entry names that would land outside the
 * archive's own scratch subdirectory.
 */
export function scratchPathFor(scratchDir: string, entry: Pick<ArchiveEntry, 'archivePath' | 'name'>): string {
  const normalized = entry.name.replace(/\\/g, '/');
  if (posix.isAbsolute(normalized) || /^[A-Za-z]:/.test(normalized)) {
    throw new ExtractionError(entry.archivePath, entry.name, 'absolute entry path');
  }

  const segments = normalized.split('/').filter((s) => s !== '' && s !== '.');
  if (segments.includes('..')) {
    throw new ExtractionError(entry.archivePath, entry.name, 'entry path escapes the archive directory');
  }
  if (segments.length === 0) {
    throw new ExtractionError(entry.archivePath, entry.name, 'empty entry path');
  }

  return join(scratchDir, archiveDirName(entry.archivePath), ...segments);
}

export async function extractEntry(entry: ArchiveEntry, scratchDir: string): Promise<ExtractedFile> {
  const target = scratchPathFor(scratchDir, entry);

  let size: number;
  try {
    await mkdir(dirname(target), { recursive: true });
    await pipeline(entry.open(), createWriteStream(target));
    size = (await stat(target)).size;
  } catch (err) {
    throw new ExtractionError(entry.archivePath, entry.name, describeError(err), err);
  }

  if (size !== entry.size) {
    throw new ExtractionError(
      entry.archivePath,
      entry.name,
      `wrote ${size} bytes, expected ${entry.size}`
    );
  }

  return {
    archivePath: entry.archivePath,
    entryName: entry.name,
    path: target,
    bytes: size,
  };
}
