import { SCENE_SUFFIX, SOURCE_SUFFIX, sceneNameFor, sourceNameFor, type ResolvedCatalog, type ResolvedEntry } from '@/catalog/catalog';
import { fitTransform, type PresentationController, type SourceSettings } from '@/connectors/controller';
import { log } from '@/lib/logger';
import { attempt } from '@/lib/result';

export const PLACEHOLDER_SCENE = 'waiting_for_content_scene';

// Scenes left behind by earlier naming schemes; removed on bootstrap.
const LEGACY_SCENE_PATTERNS = [/slideshow/i, /digital_signage/i];

export type ManagedState = {
  readonly scenes: ReadonlySet<string>;
  readonly sources: ReadonlySet<string>;
  /** scene name -> signature of the file the pair was built from */
  readonly signatures: ReadonlyMap<string, string>;
};

export type ApplyMode = 'bootstrap' | 'incremental';

export type ApplyResult = {
  state: ManagedState;
  mode: ApplyMode;
  created: number;
  removed: number;
  failures: number;
  orphansRemoved: number;
  rotationActive: boolean;
};

export function emptyManagedState(): ManagedState {
  return { scenes: new Set(), sources: new Set(), signatures: new Map() };
}

export function isEmptyState(state: ManagedState): boolean {
  return state.scenes.size === 0 && state.sources.size === 0;
}

export function entrySignature(entry: Pick<ResolvedEntry, 'absolutePath' | 'sizeBytes' | 'mtimeMs'>): string {
  return `${entry.absolutePath}:${entry.sizeBytes}:${entry.mtimeMs}`;
}

export function isEngineScene(name: string): boolean {
  if (name === PLACEHOLDER_SCENE) return false;
  return name.endsWith(SCENE_SUFFIX) || LEGACY_SCENE_PATTERNS.some((rx) => rx.test(name));
}

export function isEngineSource(name: string): boolean {
  return name.endsWith(SOURCE_SUFFIX);
}

export function sourceSettingsFor(entry: ResolvedEntry): SourceSettings {
  if (entry.kind === 'image') return { file: entry.absolutePath, unload: false };
  return {
    local_file: entry.absolutePath,
    looping: false,
    restart_on_activate: true,
    clear_on_media_end: false,
  };
}

// Working copy of ManagedState; mutated right after each successful call.
class Ledger {
  readonly scenes: Set<string>;
  readonly sources: Set<string>;
  readonly signatures: Map<string, string>;
  created = 0;
  removed = 0;
  failures = 0;

  constructor(from: ManagedState) {
    this.scenes = new Set(from.scenes);
    this.sources = new Set(from.sources);
    this.signatures = new Map(from.signatures);
  }

  freeze(): ManagedState {
    return { scenes: new Set(this.scenes), sources: new Set(this.sources), signatures: new Map(this.signatures) };
  }
}

/**
 * Diffs a resolved catalog against the scenes/sources this engine created and
 * issues the create/remove calls that close the gap. Controller failures are
 * logged and counted; the batch always runs to the end.
 */
export class Reconciler {
  constructor(
    private readonly controller: PresentationController,
    private readonly canvas: { width: number; height: number },
  ) {}

  async ensurePlaceholder(): Promise<void> {
    const scenes = await attempt('List scenes', () => this.controller.listScenes(), 'error');
    if (scenes.ok && scenes.value.includes(PLACEHOLDER_SCENE)) return;
    const created = await attempt(`Create ${PLACEHOLDER_SCENE}`, () => this.controller.createScene(PLACEHOLDER_SCENE), 'error');
    if (created.ok) log('Created waiting scene');
  }

  async apply(oldState: ManagedState, catalog: ResolvedCatalog): Promise<ApplyResult> {
    const mode: ApplyMode = isEmptyState(oldState) ? 'bootstrap' : 'incremental';
    const ledger = new Ledger(oldState);
    let pending: readonly ResolvedEntry[];

    if (mode === 'bootstrap') {
      await this.sweepAll(ledger);
      pending = catalog.entries;
    } else {
      pending = await this.removeStale(ledger, catalog);
    }

    for (const entry of pending) {
      await this.createEntry(ledger, entry);
    }

    const rotationActive = catalog.entries.length > 0;
    if (!rotationActive) {
      log('No valid media files found', 'warn');
      const shown = await attempt(`Activate ${PLACEHOLDER_SCENE}`, () => this.controller.setActiveScene(PLACEHOLDER_SCENE), 'error');
      if (!shown.ok) ledger.failures++;
    }

    const orphansRemoved = await this.sweepOrphans(ledger);
    const state = ledger.freeze();
    log(`Reconciled ${catalog.entries.length} entries (${mode}): created=${ledger.created} removed=${ledger.removed} orphans=${orphansRemoved} failures=${ledger.failures}`);
    return { state, mode, created: ledger.created, removed: ledger.removed, failures: ledger.failures, orphansRemoved, rotationActive };
  }

  async removeEntry(state: ManagedState, filename: string): Promise<{ state: ManagedState; removed: boolean }> {
    const sceneName = sceneNameFor(filename);
    const sourceName = sourceNameFor(filename);
    const ledger = new Ledger(state);
    let removed = false;
    if (ledger.scenes.has(sceneName)) {
      removed = (await this.removeScene(ledger, sceneName)) || removed;
    }
    if (ledger.sources.has(sourceName)) {
      removed = (await this.removeSource(ledger, sourceName)) || removed;
    }
    if (removed) log(`Removed scene/source for deleted file ${filename}`);
    return { state: ledger.freeze(), removed };
  }

  // Recovery path: nothing is recorded, so anything carrying our naming goes.
  private async sweepAll(ledger: Ledger): Promise<void> {
    log('Cleaning up existing signage scenes and sources…');
    const sources = await attempt('List sources', () => this.controller.listSources(), 'error');
    if (sources.ok) {
      for (const name of sources.value.filter(isEngineSource)) {
        await this.removeSource(ledger, name);
      }
    } else {
      ledger.failures++;
    }
    const scenes = await attempt('List scenes', () => this.controller.listScenes(), 'error');
    if (scenes.ok) {
      for (const name of scenes.value.filter(isEngineScene)) {
        await this.removeScene(ledger, name);
      }
    } else {
      ledger.failures++;
    }
  }

  // Only recorded names are touched; pairs whose file is unchanged stay.
  private async removeStale(ledger: Ledger, catalog: ResolvedCatalog): Promise<ResolvedEntry[]> {
    const wanted = new Map(catalog.entries.map((e) => [e.sceneName, e]));
    const keep = new Set<string>();
    for (const [sceneName, entry] of wanted) {
      const sourceName = entry.sourceName;
      if (
        ledger.scenes.has(sceneName) &&
        ledger.sources.has(sourceName) &&
        ledger.signatures.get(sceneName) === entrySignature(entry)
      ) {
        keep.add(sceneName);
      }
    }

    for (const sceneName of [...ledger.scenes]) {
      if (!keep.has(sceneName)) await this.removeScene(ledger, sceneName);
    }
    const keptSources = new Set([...keep].map((s) => wanted.get(s)?.sourceName));
    for (const sourceName of [...ledger.sources]) {
      if (!keptSources.has(sourceName)) await this.removeSource(ledger, sourceName);
    }

    return catalog.entries.filter((e) => !keep.has(e.sceneName));
  }

  private async createEntry(ledger: Ledger, entry: ResolvedEntry): Promise<void> {
    const { sceneName, sourceName } = entry;
    const scene = await attempt(`Create scene ${sceneName}`, () => this.controller.createScene(sceneName), 'error');
    if (!scene.ok) { ledger.failures++; return; }
    ledger.scenes.add(sceneName);
    ledger.signatures.set(sceneName, entrySignature(entry));
    ledger.created++;

    const kind = entry.kind === 'image' ? 'image' : 'media';
    const source = await attempt(
      `Create source ${sourceName}`,
      () => this.controller.createSource(sceneName, sourceName, kind, sourceSettingsFor(entry)),
      'error',
    );
    if (!source.ok) { ledger.failures++; return; }
    ledger.sources.add(sourceName);

    if (entry.kind === 'video') {
      const muted = await attempt(`Mute ${sourceName}`, () => this.controller.setSourceMuted(sourceName, true));
      if (!muted.ok) ledger.failures++;
    }

    const itemId = await attempt(`Resolve scene item for ${sourceName}`, () => this.controller.getSourceItemId(sceneName, sourceName), 'error');
    if (!itemId.ok) {
      log(`Could not get scene item ID for ${sourceName}; transform skipped`, 'error');
      ledger.failures++;
      return;
    }
    const transformed = await attempt(
      `Transform ${sourceName}`,
      () => this.controller.setSourceTransform(sceneName, itemId.value, fitTransform(this.canvas)),
      'error',
    );
    if (!transformed.ok) ledger.failures++;
    log(`Created scene and source for: ${entry.filename}`, 'debug');
  }

  private async sweepOrphans(ledger: Ledger): Promise<number> {
    const scenes = await attempt('List scenes', () => this.controller.listScenes(), 'error');
    if (!scenes.ok) { ledger.failures++; return 0; }
    let removed = 0;
    for (const name of scenes.value) {
      if (name === PLACEHOLDER_SCENE || ledger.scenes.has(name)) continue;
      const res = await attempt(`Remove orphaned scene ${name}`, () => this.controller.removeScene(name));
      if (res.ok) {
        removed++;
        log(`Removed orphaned scene: ${name}`);
      } else {
        ledger.failures++;
      }
    }
    return removed;
  }

  private async removeScene(ledger: Ledger, name: string): Promise<boolean> {
    const res = await attempt(`Remove scene ${name}`, () => this.controller.removeScene(name));
    if (!res.ok) { ledger.failures++; return false; }
    ledger.scenes.delete(name);
    ledger.signatures.delete(name);
    ledger.removed++;
    return true;
  }

  private async removeSource(ledger: Ledger, name: string): Promise<boolean> {
    const res = await attempt(`Remove source ${name}`, () => this.controller.removeSource(name));
    if (!res.ok) { ledger.failures++; return false; }
    ledger.sources.delete(name);
    ledger.removed++;
    return true;
  }
}
