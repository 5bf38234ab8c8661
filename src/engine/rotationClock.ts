import type { ResolvedCatalog, ResolvedEntry } from '@/catalog/catalog';
import type { PresentationController } from '@/connectors/controller';
import { log } from '@/lib/logger';
import { attempt } from '@/lib/result';

export type RotationSnapshot = {
  active: boolean;
  index: number;
  startedAtMs: number;
  current?: string;
};

/**
 * Seconds after activation at which the entry hands over. Videos start the
 * transition `offset` seconds early so a stinger can overlap the clip's end;
 * images always get their full slide time.
 */
export function switchTime(entry: Pick<ResolvedEntry, 'kind' | 'durationSeconds'>, transitionOffsetSeconds: number): number {
  if (entry.kind === 'video') return Math.max(0, entry.durationSeconds - transitionOffsetSeconds);
  return entry.durationSeconds;
}

/** Polled state machine over the published catalog. */
export class RotationClock {
  private catalog: ResolvedCatalog | undefined;
  private index = 0;
  private startedAtMs = 0;
  private active = false;
  private generation = 0;
  private ticking = false;

  constructor(private readonly controller: PresentationController, private transitionOffsetSeconds: number) {}

  setTransitionOffset(seconds: number) {
    this.transitionOffsetSeconds = seconds;
  }

  getTransitionOffset(): number {
    return this.transitionOffsetSeconds;
  }

  reset(catalog: ResolvedCatalog, nowMs: number) {
    this.generation++;
    this.catalog = catalog;
    this.index = 0;
    this.startedAtMs = nowMs;
    this.active = catalog.entries.length > 0;
  }

  deactivate() {
    this.generation++;
    this.active = false;
  }

  current(): ResolvedEntry | undefined {
    const entries = this.catalog?.entries ?? [];
    if (this.index >= entries.length) return entries[0];
    return entries[this.index];
  }

  async activateCurrent(): Promise<boolean> {
    const entry = this.current();
    if (!this.active || !entry) return false;
    const res = await attempt(`Switch to ${entry.filename}`, () => this.controller.setActiveScene(entry.sceneName), 'error');
    return res.ok;
  }

  async tick(nowMs: number): Promise<boolean> {
    const entries = this.catalog?.entries ?? [];
    if (!this.active || entries.length === 0 || this.ticking) return false;

    if (this.index >= entries.length) this.index = 0;
    const entry = entries[this.index];
    const elapsed = (nowMs - this.startedAtMs) / 1000;
    const threshold = switchTime(entry, this.transitionOffsetSeconds);
    if (elapsed < threshold) return false;

    const nextIndex = (this.index + 1) % entries.length;
    const next = entries[nextIndex];
    const generation = this.generation;
    log(`Switching from ${entry.filename} to ${next.filename} (elapsed=${elapsed.toFixed(1)}s, switch=${threshold.toFixed(1)}s)`);
    this.ticking = true;
    try {
      await attempt(`Switch to ${next.filename}`, () => this.controller.setActiveScene(next.sceneName), 'error');
    } finally {
      this.ticking = false;
    }
    // A reset while we were waiting owns the cursor now.
    if (generation !== this.generation) return false;
    this.index = nextIndex;
    this.startedAtMs = nowMs;
    return true;
  }

  /**
   * Swaps in a catalog that lost `filename`. Losing the current entry restarts
   * from the top; otherwise the cursor follows the current entry.
   */
  async removeEntry(catalog: ResolvedCatalog, filename: string, nowMs: number): Promise<void> {
    const wasCurrent = this.current()?.filename === filename;
    const currentName = this.current()?.filename;
    this.generation++;
    this.catalog = catalog;
    if (catalog.entries.length === 0) {
      this.index = 0;
      this.active = false;
      return;
    }
    if (wasCurrent) {
      this.index = 0;
      this.startedAtMs = nowMs;
      if (this.active) await this.activateCurrent();
      return;
    }
    const followed = catalog.entries.findIndex((e) => e.filename === currentName);
    this.index = followed >= 0 ? followed : 0;
  }

  snapshot(): RotationSnapshot {
    return { active: this.active, index: this.index, startedAtMs: this.startedAtMs, current: this.current()?.filename };
  }
}
