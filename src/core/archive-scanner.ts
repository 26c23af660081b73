/**
 * Recursive zip archive scanner.
 *
 * Walks an archive tree (one zip per map sheet), opens each archive and
 * selects the entries whose path contains the search token. Matched `.shp`
 * entries pull their sidecar files along so the converter always sees a
 * complete file set.
 */
import unzipper from 'unzipper';
import { readdir, stat } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join } from 'node:path';
import type { Readable } from 'node:stream';
import { ArchiveReadError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export interface ArchiveEntry {
  archivePath: string;
  /** Path of the entry inside the archive */
  name: string;
  /** Uncompressed size in bytes */
  size: number;
  /** True when matched as a sidecar of a matching .shp rather than by name */
  companion: boolean;
  open(): Readable;
}

export interface ScannedArchive {
  archivePath: string;
  /** File entries in the archive, directories excluded */
  entryCount: number;
  matches: ArchiveEntry[];
}

export interface EntrySelection {
  index: number;
  companion: boolean;
}

export type ScanErrorHandler = (error: ArchiveReadError) => void;

// ============================================================================
// Entry Selection
// ============================================================================

export const SIDECAR_SUFFIXES = [
  '.dbf',
  '.shx',
  '.prj',
  '.cpg',
  '.sbn',
  '.sbx',
  '.qix',
  '.shp.xml',
] as const;

export function isShapefile(name: string): boolean {
  return name.toLowerCase().endsWith('.shp');
}

/**
 * True if `name` is a sidecar file of the shapefile `shpName`
 * (same stem, sidecar suffix compared case-insensitively).
 */
export function isSidecarOf(name: string, shpName: string): boolean {
  if (!isShapefile(shpName)) return false;
  const stem = shpName.slice(0, -'.shp'.length);
  if (!name.startsWith(stem)) return false;
  const suffix = name.slice(stem.length).toLowerCase();
  return SIDECAR_SUFFIXES.some((s) => s === suffix);
}

/**
 * Select entries by case-sensitive substring match, plus sidecars of every
 * matched shapefile. Result keeps archive order.
 */
export function selectMatches(names: readonly string[], token: string): EntrySelection[] {
  const direct = names.map((name) => name.includes(token));
  const matchedShapefiles = names.filter((name, i) => direct[i] && isShapefile(name));

  const selections: EntrySelection[] = [];
  names.forEach((name, index) => {
    if (direct[index]) {
      selections.push({ index, companion: false });
    } else if (matchedShapefiles.some((shp) => isSidecarOf(name, shp))) {
      selections.push({ index, companion: true });
    }
  });
  return selections;
}

// ============================================================================
// Directory Walk
// ============================================================================

function byName(a: { name: string }, b: { name: string }): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function isZipName(name: string): boolean {
  return name.toLowerCase().endsWith('.zip');
}

/**
 * Yield every `.zip` file under `root`, depth first, in sorted name order.
 * Symlinked archives are followed; symlinked directories are not.
 * Unreadable subdirectories and dangling archive links are reported and
 * skipped.
 */
export async function* findArchives(
  root: string,
  onError: ScanErrorHandler
): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await readdir(root, { withFileTypes: true });
  } catch (err) {
    onError(new ArchiveReadError(root, err));
    return;
  }

  for (const entry of entries.sort(byName)) {
    const fullPath = join(root, entry.name);
    if (entry.isDirectory()) {
      yield* findArchives(fullPath, onError);
    } else if (entry.isFile() && isZipName(entry.name)) {
      yield fullPath;
    } else if (entry.isSymbolicLink() && isZipName(entry.name)) {
      const target = await stat(fullPath).catch((err: unknown) => {
        onError(new ArchiveReadError(fullPath, err));
        return null;
      });
      if (target?.isFile()) yield fullPath;
    }
  }
}

// ============================================================================
// Archive Scan
// ============================================================================

/**
 * Lazily open each archive under `root` and yield its matching entries.
 * Archives that fail to open are passed to `onError` and skipped.
 */
export async function* scanArchives(
  root: string,
  token: string,
  onError: ScanErrorHandler
): AsyncGenerator<ScannedArchive> {
  for await (const archivePath of findArchives(root, onError)) {
    const directory = await unzipper.Open.file(archivePath).catch((err: unknown) => {
      onError(new ArchiveReadError(archivePath, err));
      return null;
    });
    if (!directory) continue;

    const files = directory.files.filter((file) => file.type === 'File');
    const matches = selectMatches(
      files.map((file) => file.path),
      token
    ).map(({ index, companion }): ArchiveEntry => {
      const file = files[index];
      return {
        archivePath,
        name: file.path,
        size: file.uncompressedSize,
        companion,
        open: () => file.stream(),
      };
    });

    yield { archivePath, entryCount: files.length, matches };
  }
}
