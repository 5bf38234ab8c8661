import { describeError } from '@/lib/errors';
import { log } from '@/lib/logger';
import type { ResolvedCatalog, ResolvedEntry, ScannedCatalog, ScannedEntry } from './catalog';

export interface DurationProbe {
  /** Rejects when the file cannot be probed within its time budget. */
  probe(absolutePath: string): Promise<number>;
}

export type DurationPolicy = {
  slideDurationSeconds: number;
  maxVideoDurationSeconds: number;
  fallbackVideoDurationSeconds: number;
};

export class DurationResolver {
  constructor(private readonly probe: DurationProbe, private readonly policy: DurationPolicy) {}

  async resolve(entry: ScannedEntry): Promise<number> {
    if (entry.kind === 'image') return this.policy.slideDurationSeconds;

    let seconds: number;
    try {
      seconds = await this.probe.probe(entry.absolutePath);
    } catch (err) {
      log(`Could not get duration for ${entry.filename} (${describeError(err)}), using fallback (${this.policy.fallbackVideoDurationSeconds}s)`, 'warn');
      return this.policy.fallbackVideoDurationSeconds;
    }
    if (!Number.isFinite(seconds) || seconds <= 0) {
      log(`Probe returned unusable duration ${seconds} for ${entry.filename}, using fallback (${this.policy.fallbackVideoDurationSeconds}s)`, 'warn');
      return this.policy.fallbackVideoDurationSeconds;
    }
    if (seconds > this.policy.maxVideoDurationSeconds) {
      log(`Video ${entry.filename} exceeds maximum duration (${seconds.toFixed(1)}s), capping at ${this.policy.maxVideoDurationSeconds}s`, 'warn');
      return this.policy.maxVideoDurationSeconds;
    }
    log(`Video ${entry.filename}: ${seconds.toFixed(2)}s`, 'debug');
    return seconds;
  }

  async resolveAll(catalog: ScannedCatalog): Promise<ResolvedCatalog> {
    const entries: ResolvedEntry[] = [];
    for (const entry of catalog.entries) {
      entries.push({ ...entry, durationSeconds: await this.resolve(entry) });
    }
    log(`Duration detection complete: ${entries.length} files processed`);
    return { phase: 'resolved', directory: catalog.directory, entries, fingerprint: catalog.fingerprint };
  }
}
