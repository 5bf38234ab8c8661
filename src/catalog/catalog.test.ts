import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_EXTENSIONS } from '@/lib/config';
import { CatalogReadError } from '@/lib/errors';
import {
  classify,
  compareFilenames,
  emptyCatalog,
  fingerprint,
  hasChanged,
  scanCatalog,
  withoutEntry,
  type ResolvedCatalog,
} from './catalog';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function write(name: string, bytes: number) {
  fs.writeFileSync(path.join(dir, name), Buffer.alloc(bytes, 1));
}

describe('classify', () => {
  it('maps extensions case-insensitively', () => {
    expect(classify('clip.MP4', DEFAULT_EXTENSIONS)).toBe('video');
    expect(classify('slide.jpeg', DEFAULT_EXTENSIONS)).toBe('image');
    expect(classify('intro.flac', DEFAULT_EXTENSIONS)).toBe('audio');
    expect(classify('readme.txt', DEFAULT_EXTENSIONS)).toBeUndefined();
    expect(classify('Makefile', DEFAULT_EXTENSIONS)).toBeUndefined();
  });
});

describe('compareFilenames', () => {
  it('orders case-insensitively with a deterministic tie-break', () => {
    expect(['b.png', 'A.mp4', 'c.mov'].sort(compareFilenames)).toEqual(['A.mp4', 'b.png', 'c.mov']);
    expect(['a.png', 'A.png'].sort(compareFilenames)).toEqual(['A.png', 'a.png']);
  });
});

describe('scanCatalog', () => {
  it('keeps non-empty images and videos sorted by name', async () => {
    write('b.png', 3);
    write('A.mp4', 5);
    write('c.MOV', 7);
    write('empty.jpg', 0);
    write('song.mp3', 4);
    write('notes.txt', 2);
    fs.mkdirSync(path.join(dir, 'nested.png'));

    const catalog = await scanCatalog(dir, DEFAULT_EXTENSIONS);

    expect(catalog.phase).toBe('scanned');
    expect(catalog.directory).toBe(dir);
    expect(catalog.entries.map((e) => [e.filename, e.kind, e.sizeBytes])).toEqual([
      ['A.mp4', 'video', 5],
      ['b.png', 'image', 3],
      ['c.MOV', 'video', 7],
    ]);
    const first = catalog.entries[0];
    expect(first?.sceneName).toBe('A.mp4_scene');
    expect(first?.sourceName).toBe('A.mp4_source');
    expect(first?.absolutePath).toBe(path.join(dir, 'A.mp4'));
    expect(Object.keys(first ?? {}).sort()).toEqual(['absolutePath', 'filename', 'kind', 'mtimeMs', 'sceneName', 'sizeBytes', 'sourceName']);
  });

  it('rejects with CatalogReadError when the folder cannot be listed', async () => {
    await expect(scanCatalog(path.join(dir, 'missing'), DEFAULT_EXTENSIONS)).rejects.toBeInstanceOf(CatalogReadError);
  });

  it('returns an empty catalog for a folder without media', async () => {
    write('notes.txt', 2);
    const catalog = await scanCatalog(dir, DEFAULT_EXTENSIONS);
    expect(catalog.entries).toEqual([]);
    expect(catalog.fingerprint).toBe('');
  });
});

describe('fingerprint', () => {
  const a = { filename: 'a.png', sizeBytes: 1, mtimeMs: 100 };
  const b = { filename: 'b.mp4', sizeBytes: 2, mtimeMs: 200 };

  it('ignores entry order', () => {
    expect(fingerprint([a, b])).toBe(fingerprint([b, a]));
    expect(fingerprint([a, b])).toBe('a.png:1:100|b.mp4:2:200');
  });

  it('changes with size or mtime', () => {
    expect(fingerprint([{ ...a, sizeBytes: 9 }])).not.toBe(fingerprint([a]));
    expect(fingerprint([{ ...a, mtimeMs: 101 }])).not.toBe(fingerprint([a]));
  });
});

describe('hasChanged', () => {
  const previous = { entries: [1], fingerprint: 'a.png:1:100' };

  it('reports a change when there is nothing to compare against', () => {
    expect(hasChanged(undefined, { fingerprint: '' })).toBe(true);
    expect(hasChanged({ entries: [], fingerprint: '' }, { fingerprint: '' })).toBe(true);
  });

  it('compares fingerprints otherwise', () => {
    expect(hasChanged(previous, { fingerprint: 'a.png:1:100' })).toBe(false);
    expect(hasChanged(previous, { fingerprint: 'a.png:1:101' })).toBe(true);
  });
});

describe('withoutEntry', () => {
  it('drops one file and refreshes the fingerprint', () => {
    const entry = (filename: string, sizeBytes: number) => ({
      filename,
      absolutePath: `/media/${filename}`,
      kind: 'image' as const,
      sizeBytes,
      mtimeMs: 10,
      sceneName: `${filename}_scene`,
      sourceName: `${filename}_source`,
      durationSeconds: 8,
    });
    const catalog: ResolvedCatalog = {
      ...emptyCatalog('/media'),
      entries: [entry('a.png', 1), entry('b.png', 2)],
      fingerprint: 'a.png:1:10|b.png:2:10',
    };

    const next = withoutEntry(catalog, 'a.png');

    expect(next.entries.map((e) => e.filename)).toEqual(['b.png']);
    expect(next.fingerprint).toBe('b.png:2:10');
    expect(catalog.entries).toHaveLength(2);
  });
});
