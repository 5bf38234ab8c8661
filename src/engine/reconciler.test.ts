import { describe, expect, it } from 'vitest';
import { fitTransform } from '@/connectors/controller';
import { FakeController } from '@/testing/fakeController';
import { makeCatalog, makeEntry } from '@/testing/fixtures';
import { emptyManagedState, isEngineScene, PLACEHOLDER_SCENE, Reconciler, sourceSettingsFor } from './reconciler';

const canvas = { width: 1920, height: 1080 };
const video = makeEntry('a.mp4', 'video', 10);
const image = makeEntry('b.png', 'image', 8);

async function bootstrapped() {
  const fake = new FakeController({ scenes: [PLACEHOLDER_SCENE] });
  const reconciler = new Reconciler(fake, canvas);
  const result = await reconciler.apply(emptyManagedState(), makeCatalog([video, image]));
  fake.clearCalls();
  return { fake, reconciler, state: result.state };
}

describe('isEngineScene', () => {
  it('matches the naming convention and legacy names but never the placeholder', () => {
    expect(isEngineScene('clip.mp4_scene')).toBe(true);
    expect(isEngineScene('Digital_Signage main')).toBe(true);
    expect(isEngineScene('Lobby Slideshow')).toBe(true);
    expect(isEngineScene(PLACEHOLDER_SCENE)).toBe(false);
    expect(isEngineScene('Camera')).toBe(false);
  });
});

describe('sourceSettingsFor', () => {
  it('builds image and media settings', () => {
    expect(sourceSettingsFor(image)).toEqual({ file: '/media/b.png', unload: false });
    expect(sourceSettingsFor(video)).toEqual({
      local_file: '/media/a.mp4',
      looping: false,
      restart_on_activate: true,
      clear_on_media_end: false,
    });
  });
});

describe('Reconciler.ensurePlaceholder', () => {
  it('creates the waiting scene once', async () => {
    const fake = new FakeController();
    const reconciler = new Reconciler(fake, canvas);
    await reconciler.ensurePlaceholder();
    await reconciler.ensurePlaceholder();
    expect(fake.calls).toEqual(['listScenes', `createScene ${PLACEHOLDER_SCENE}`, 'listScenes']);
  });
});

describe('Reconciler.apply', () => {
  it('sweeps leftovers, builds every entry and removes orphans on bootstrap', async () => {
    const fake = new FakeController({
      scenes: ['old.png_scene', 'My slideshow', 'Camera', PLACEHOLDER_SCENE],
      sources: { 'old.png_source': 'old.png_scene' },
    });
    const reconciler = new Reconciler(fake, canvas);

    const result = await reconciler.apply(emptyManagedState(), makeCatalog([video, image]));

    expect(fake.calls).toEqual([
      'listSources',
      'removeSource old.png_source',
      'listScenes',
      'removeScene old.png_scene',
      'removeScene My slideshow',
      'createScene a.mp4_scene',
      'createSource a.mp4_scene a.mp4_source media',
      'setSourceMuted a.mp4_source true',
      'getSourceItemId a.mp4_scene a.mp4_source',
      'setSourceTransform a.mp4_scene 2',
      'createScene b.png_scene',
      'createSource b.png_scene b.png_source image',
      'getSourceItemId b.png_scene b.png_source',
      'setSourceTransform b.png_scene 3',
      'listScenes',
      'removeScene Camera',
    ]);
    expect(result).toMatchObject({ mode: 'bootstrap', created: 2, removed: 3, failures: 0, orphansRemoved: 1, rotationActive: true });
    expect([...result.state.scenes]).toEqual(['a.mp4_scene', 'b.png_scene']);
    expect([...result.state.sources]).toEqual(['a.mp4_source', 'b.png_source']);
    expect([...fake.scenes]).toEqual([PLACEHOLDER_SCENE, 'a.mp4_scene', 'b.png_scene']);
    expect(fake.transforms.get('b.png_scene')).toEqual(fitTransform(canvas));
    expect(fake.muted.has('a.mp4_source')).toBe(true);
  });

  it('makes no create or remove calls when the catalog is unchanged', async () => {
    const { fake, reconciler, state } = await bootstrapped();

    const result = await reconciler.apply(state, makeCatalog([video, image]));

    expect(fake.calls).toEqual(['listScenes']);
    expect(result).toMatchObject({ mode: 'incremental', created: 0, removed: 0, failures: 0, orphansRemoved: 0 });
    expect(result.state).toEqual(state);
  });

  it('removes departed pairs and creates new ones incrementally', async () => {
    const { fake, reconciler, state } = await bootstrapped();
    const added = makeEntry('c.jpg', 'image', 8);

    const result = await reconciler.apply(state, makeCatalog([video, added]));

    expect(fake.calls).toEqual([
      'removeScene b.png_scene',
      'removeSource b.png_source',
      'createScene c.jpg_scene',
      'createSource c.jpg_scene c.jpg_source image',
      'getSourceItemId c.jpg_scene c.jpg_source',
      'setSourceTransform c.jpg_scene 3',
      'listScenes',
    ]);
    expect(result).toMatchObject({ mode: 'incremental', created: 1, removed: 2, failures: 0 });
    expect([...result.state.scenes]).toEqual(['a.mp4_scene', 'c.jpg_scene']);
  });

  it('rebuilds a pair whose file changed on disk', async () => {
    const { fake, reconciler, state } = await bootstrapped();
    const rewritten = makeEntry('a.mp4', 'video', 12, { mtimeMs: 1_800_000_000_000 });

    const result = await reconciler.apply(state, makeCatalog([rewritten, image]));

    expect(fake.callsTo('removeScene')).toEqual(['removeScene a.mp4_scene']);
    expect(fake.callsTo('removeSource')).toEqual(['removeSource a.mp4_source']);
    expect(fake.callsTo('createScene')).toEqual(['createScene a.mp4_scene']);
    expect(result).toMatchObject({ created: 1, removed: 2 });
  });

  it('tears everything down and shows the placeholder for an empty catalog', async () => {
    const { fake, reconciler, state } = await bootstrapped();

    const result = await reconciler.apply(state, makeCatalog([]));

    expect(fake.calls).toEqual([
      'removeScene a.mp4_scene',
      'removeScene b.png_scene',
      'removeSource a.mp4_source',
      'removeSource b.png_source',
      `setActiveScene ${PLACEHOLDER_SCENE}`,
      'listScenes',
    ]);
    expect(result.rotationActive).toBe(false);
    expect(result.state.scenes.size).toBe(0);
    expect(fake.activeScene).toBe(PLACEHOLDER_SCENE);
  });

  it('skips only the transform when the scene item id cannot be resolved', async () => {
    const fake = new FakeController({ scenes: [PLACEHOLDER_SCENE] });
    fake.failOn.add('getSourceItemId b.png_scene b.png_source');
    const reconciler = new Reconciler(fake, canvas);

    const result = await reconciler.apply(emptyManagedState(), makeCatalog([video, image]));

    expect(result.failures).toBe(1);
    expect(fake.callsTo('setSourceTransform')).toEqual(['setSourceTransform a.mp4_scene 1']);
    expect(result.state.scenes.has('b.png_scene')).toBe(true);
    expect(result.state.sources.has('b.png_source')).toBe(true);
  });

  it('keeps going when a scene cannot be created', async () => {
    const fake = new FakeController({ scenes: [PLACEHOLDER_SCENE] });
    fake.failOn.add('createScene a.mp4_scene');
    const reconciler = new Reconciler(fake, canvas);

    const result = await reconciler.apply(emptyManagedState(), makeCatalog([video, image]));

    expect(result).toMatchObject({ created: 1, failures: 1 });
    expect(fake.callsTo('createSource')).toEqual(['createSource b.png_scene b.png_source image']);
    expect([...result.state.scenes]).toEqual(['b.png_scene']);
  });

  it('finishes the bootstrap sweep and builds every entry when a leftover source will not go', async () => {
    const fake = new FakeController({
      scenes: ['old.png_scene', PLACEHOLDER_SCENE],
      sources: { 'old.png_source': 'old.png_scene' },
    });
    fake.failOn.add('removeSource old.png_source');
    const reconciler = new Reconciler(fake, canvas);

    const result = await reconciler.apply(emptyManagedState(), makeCatalog([video, image]));

    expect(fake.calls.slice(0, 4)).toEqual(['listSources', 'removeSource old.png_source', 'listScenes', 'removeScene old.png_scene']);
    expect(fake.callsTo('createScene')).toEqual(['createScene a.mp4_scene', 'createScene b.png_scene']);
    expect(fake.callsTo('setSourceTransform')).toEqual(['setSourceTransform a.mp4_scene 2', 'setSourceTransform b.png_scene 3']);
    expect(result).toMatchObject({ mode: 'bootstrap', created: 2, removed: 1, failures: 1, orphansRemoved: 0, rotationActive: true });
    expect([...result.state.scenes]).toEqual(['a.mp4_scene', 'b.png_scene']);
    expect([...result.state.sources]).toEqual(['a.mp4_source', 'b.png_source']);
    expect(fake.sources.has('old.png_source')).toBe(true);
  });

  it('counts an orphan that cannot be removed as a failure and keeps the rest', async () => {
    const fake = new FakeController({ scenes: [PLACEHOLDER_SCENE, 'Camera', 'Lobby'] });
    fake.failOn.add('removeScene Camera');
    const reconciler = new Reconciler(fake, canvas);

    const result = await reconciler.apply(emptyManagedState(), makeCatalog([video, image]));

    expect(fake.callsTo('removeScene')).toEqual(['removeScene Camera', 'removeScene Lobby']);
    expect(result).toMatchObject({ created: 2, removed: 0, failures: 1, orphansRemoved: 1, rotationActive: true });
    expect([...result.state.scenes]).toEqual(['a.mp4_scene', 'b.png_scene']);
    expect([...fake.scenes]).toEqual([PLACEHOLDER_SCENE, 'Camera', 'a.mp4_scene', 'b.png_scene']);
  });
});

describe('Reconciler.removeEntry', () => {
  it('removes the recorded pair of one file', async () => {
    const { fake, reconciler, state } = await bootstrapped();

    const res = await reconciler.removeEntry(state, 'b.png');

    expect(fake.calls).toEqual(['removeScene b.png_scene', 'removeSource b.png_source']);
    expect(res.removed).toBe(true);
    expect([...res.state.scenes]).toEqual(['a.mp4_scene']);
    expect(state.scenes.has('b.png_scene')).toBe(true);
  });

  it('does nothing for a file it never managed', async () => {
    const { fake, reconciler, state } = await bootstrapped();
    const res = await reconciler.removeEntry(state, 'unknown.png');
    expect(res.removed).toBe(false);
    expect(fake.calls).toEqual([]);
  });
});
