import { fingerprint, sceneNameFor, sourceNameFor, type ResolvedCatalog, type ResolvedEntry, type RotationKind } from '@/catalog/catalog';

export function makeEntry(
  filename: string,
  kind: RotationKind,
  durationSeconds: number,
  overrides: Partial<Pick<ResolvedEntry, 'sizeBytes' | 'mtimeMs'>> & { directory?: string } = {},
): ResolvedEntry {
  const directory = overrides.directory ?? '/media';
  return {
    filename,
    absolutePath: `${directory}/${filename}`,
    kind,
    sizeBytes: overrides.sizeBytes ?? 1000,
    mtimeMs: overrides.mtimeMs ?? 1_700_000_000_000,
    sceneName: sceneNameFor(filename),
    sourceName: sourceNameFor(filename),
    durationSeconds,
  };
}

export function makeCatalog(entries: ResolvedEntry[], directory = '/media'): ResolvedCatalog {
  return { phase: 'resolved', directory, entries, fingerprint: fingerprint(entries) };
}
