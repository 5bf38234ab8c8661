import path from 'node:path';
import {
  emptyCatalog,
  hasChanged,
  scanCatalog,
  withoutEntry,
  type ExtensionLookup,
  type ResolvedCatalog,
  type ScannedCatalog,
} from '@/catalog/catalog';
import type { DurationResolver } from '@/catalog/durations';
import type { PresentationController } from '@/connectors/controller';
import type { History } from '@/db/history';
import { emptyManagedState, PLACEHOLDER_SCENE, type ManagedState, type Reconciler } from '@/engine/reconciler';
import type { RotationClock } from '@/engine/rotationClock';
import type { ScheduleWindow } from '@/engine/scheduler';
import { describeError } from '@/lib/errors';
import { log } from '@/lib/logger';
import { attempt } from '@/lib/result';

/** What the sync side calls when a file vanished upstream. */
export interface RemovalListener {
  onFileRemoved(localPath: string): Promise<void>;
}

export type Published = Readonly<{ catalog: ResolvedCatalog; state: ManagedState }>;

export type PipelineDeps = {
  controller: PresentationController;
  reconciler: Reconciler;
  durations: DurationResolver;
  clock: RotationClock;
  extensions: ExtensionLookup;
  history?: History;
  now?: () => number;
};

/**
 * Owns the published (catalog, managed state) pair. Rescans and removals run
 * one at a time; the pair is only ever replaced whole.
 */
export class ContentPipeline implements RemovalListener {
  private published: Published;
  private directory: string;
  private tail: Promise<void> = Promise.resolve();
  private queuedRescan: Promise<void> | undefined;
  private forceNext = false;
  private readonly now: () => number;

  constructor(directory: string, private readonly deps: PipelineDeps) {
    this.directory = path.resolve(directory);
    this.published = Object.freeze({ catalog: emptyCatalog(this.directory), state: emptyManagedState() });
    this.now = deps.now ?? Date.now;
  }

  contentDirectory(): string {
    return this.directory;
  }

  current(): Published {
    return this.published;
  }

  /**
   * Queues a full rescan. Calls made while one is already queued share it;
   * calls made while one runs queue exactly one follow-up.
   */
  requestRescan(reason: string, opts: { force?: boolean } = {}): Promise<void> {
    if (opts.force) this.forceNext = true;
    if (this.queuedRescan) return this.queuedRescan;
    const run = this.exclusive(async () => {
      this.queuedRescan = undefined;
      const force = this.forceNext;
      this.forceNext = false;
      await this.rescan(reason, force);
    });
    this.queuedRescan = run;
    return run;
  }

  async switchWindow(window: ScheduleWindow): Promise<void> {
    log(`Switching to schedule "${window.name}": folder=${window.folder} transition=${window.transition} offset=${window.transitionOffsetSeconds}s`);
    await attempt(`Set transition ${window.transition}`, () => this.deps.controller.setTransitionStyle(window.transition), 'error');
    this.directory = path.resolve(window.folder);
    this.deps.clock.setTransitionOffset(window.transitionOffsetSeconds);
    try {
      this.deps.history?.recordScheduleChange(window, this.now());
    } catch (err) {
      log(`Could not record schedule change: ${describeError(err)}`, 'warn');
    }
    await this.requestRescan(`schedule ${window.name}`, { force: true });
  }

  async onFileRemoved(localPath: string): Promise<void> {
    if (path.resolve(path.dirname(localPath)) !== this.directory) {
      log(`Ignoring removal outside the active folder: ${localPath}`, 'debug');
      return;
    }
    await this.removeEntry(path.basename(localPath));
  }

  removeEntry(filename: string): Promise<void> {
    return this.exclusive(async () => {
      const { catalog, state } = this.published;
      const inCatalog = catalog.entries.some((e) => e.filename === filename);
      const res = await this.deps.reconciler.removeEntry(state, filename);
      if (!inCatalog && !res.removed) return;

      const nextCatalog = withoutEntry(catalog, filename);
      this.published = Object.freeze({ catalog: nextCatalog, state: res.state });
      await this.deps.clock.removeEntry(nextCatalog, filename, this.now());
      if (inCatalog && nextCatalog.entries.length === 0) {
        await attempt(`Activate ${PLACEHOLDER_SCENE}`, () => this.deps.controller.setActiveScene(PLACEHOLDER_SCENE), 'error');
      }
    });
  }

  tick(nowMs = this.now()): Promise<boolean> {
    return this.deps.clock.tick(nowMs);
  }

  /** Resolves once everything queued so far has run. */
  idle(): Promise<void> {
    return this.tail;
  }

  private async rescan(reason: string, force: boolean): Promise<void> {
    const directory = this.directory;
    log(`Scanning content directory ${directory} (${reason})…`);
    const previous = this.published.catalog;
    let scanned: ScannedCatalog;
    try {
      scanned = await scanCatalog(directory, this.deps.extensions);
    } catch (err) {
      log(`Content scan failed: ${describeError(err)}`, 'error');
      // The old folder's content must not keep playing after a schedule switch.
      if (previous.directory === directory) return;
      scanned = { phase: 'scanned', directory, entries: [], fingerprint: '' };
    }

    if (!force && previous.directory === directory && !hasChanged(previous, scanned)) {
      log('No content changes detected', 'debug');
      return;
    }

    const resolved = await this.deps.durations.resolveAll(scanned);
    const result = await this.deps.reconciler.apply(this.published.state, resolved);
    this.published = Object.freeze({ catalog: resolved, state: result.state });

    const { clock } = this.deps;
    clock.reset(resolved, this.now());
    if (result.rotationActive) await clock.activateCurrent();
    else clock.deactivate();

    log(`Content updated: ${resolved.entries.length} media files`);
    try {
      this.deps.history?.recordRun({
        folder: directory,
        fingerprint: resolved.fingerprint,
        entries: resolved.entries.length,
        mode: result.mode,
        created: result.created,
        removed: result.removed,
        failures: result.failures,
        orphansRemoved: result.orphansRemoved,
      }, this.now());
    } catch (err) {
      log(`Could not record reconcile run: ${describeError(err)}`, 'warn');
    }
  }

  private exclusive(task: () => Promise<void>): Promise<void> {
    const run = this.tail.then(task);
    this.tail = run.catch((err: unknown) => {
      log(`Content task failed: ${describeError(err)}`, 'error');
    });
    return this.tail;
  }
}
