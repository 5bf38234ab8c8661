import { promises as fs, type Dirent, type Stats } from 'node:fs';
import path from 'node:path';
import { CatalogReadError, describeError } from '@/lib/errors';
import { log } from '@/lib/logger';

export type MediaKind = 'image' | 'video' | 'audio';
export type RotationKind = Exclude<MediaKind, 'audio'>;

export type ScannedEntry = {
  filename: string;
  absolutePath: string;
  kind: RotationKind;
  sizeBytes: number;
  mtimeMs: number;
  sceneName: string;
  sourceName: string;
};

export type ResolvedEntry = ScannedEntry & { durationSeconds: number };

type CatalogOf<P extends string, E extends ScannedEntry> = {
  readonly phase: P;
  readonly directory: string;
  readonly entries: readonly E[];
  readonly fingerprint: string;
};

/** Straight off the disk; durations unknown. */
export type ScannedCatalog = CatalogOf<'scanned', ScannedEntry>;
/** Every entry carries a playback duration; the only shape the engine accepts. */
export type ResolvedCatalog = CatalogOf<'resolved', ResolvedEntry>;

export type ExtensionLookup = Readonly<Record<MediaKind, ReadonlySet<string>>>;

export const SCENE_SUFFIX = '_scene';
export const SOURCE_SUFFIX = '_source';

export function sceneNameFor(filename: string): string {
  return `${filename}${SCENE_SUFFIX}`;
}

export function sourceNameFor(filename: string): string {
  return `${filename}${SOURCE_SUFFIX}`;
}

export function classify(filename: string, extensions: ExtensionLookup): MediaKind | undefined {
  const ext = path.extname(filename).toLowerCase();
  if (!ext) return undefined;
  if (extensions.video.has(ext)) return 'video';
  if (extensions.image.has(ext)) return 'image';
  if (extensions.audio.has(ext)) return 'audio';
  return undefined;
}

export function compareFilenames(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la !== lb) return la < lb ? -1 : 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function fingerprint(entries: readonly Pick<ScannedEntry, 'filename' | 'sizeBytes' | 'mtimeMs'>[]): string {
  return entries
    .map((e) => `${e.filename}:${e.sizeBytes}:${e.mtimeMs}`)
    .sort()
    .join('|');
}

/**
 * Equal fingerprints only count as "unchanged" when there was something to
 * compare against. Filename + size + mtime is a proxy: a rewrite that keeps
 * both size and timestamp goes unnoticed.
 */
export function hasChanged(previous: { entries: readonly unknown[]; fingerprint: string } | undefined, next: { fingerprint: string }): boolean {
  if (!previous || previous.entries.length === 0) return true;
  return previous.fingerprint !== next.fingerprint;
}

export function emptyCatalog(directory: string): ResolvedCatalog {
  return { phase: 'resolved', directory, entries: [], fingerprint: '' };
}

export function sortEntries<E extends ScannedEntry>(entries: readonly E[]): E[] {
  return [...entries].sort((a, b) => compareFilenames(a.filename, b.filename));
}

export async function scanCatalog(directory: string, extensions: ExtensionLookup): Promise<ScannedCatalog> {
  let dirents: Dirent[];
  try {
    dirents = await fs.readdir(directory, { withFileTypes: true });
  } catch (err) {
    throw new CatalogReadError(directory, err);
  }

  const entries: ScannedEntry[] = [];
  for (const dirent of dirents) {
    if (!dirent.isFile()) continue;
    const filename = dirent.name;
    const kind = classify(filename, extensions);
    if (kind !== 'image' && kind !== 'video') continue;

    const absolutePath = path.join(directory, filename);
    let stat: Stats;
    try {
      stat = await fs.stat(absolutePath);
    } catch (err) {
      log(`Skipping unreadable file ${filename}: ${describeError(err)}`, 'warn');
      continue;
    }
    if (stat.size === 0) {
      log(`Skipping empty file: ${filename}`, 'warn');
      continue;
    }
    entries.push({
      filename,
      absolutePath,
      kind,
      sizeBytes: stat.size,
      mtimeMs: stat.mtimeMs,
      sceneName: sceneNameFor(filename),
      sourceName: sourceNameFor(filename),
    });
  }

  const sorted = sortEntries(entries);
  return { phase: 'scanned', directory, entries: sorted, fingerprint: fingerprint(sorted) };
}

/** Drops one file from a resolved catalog, keeping order and refreshing the fingerprint. */
export function withoutEntry(catalog: ResolvedCatalog, filename: string): ResolvedCatalog {
  const entries = catalog.entries.filter((e) => e.filename !== filename);
  return { ...catalog, entries, fingerprint: fingerprint(entries) };
}
