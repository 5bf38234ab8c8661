import { describeError } from '@/lib/errors';
import { log } from '@/lib/logger';
import { sleep } from '@/lib/result';

export type LoopOptions = {
  name: string;
  intervalMs: number;
  /** Delay after a failed iteration; defaults to `intervalMs`. */
  errorDelayMs?: number;
  signal: AbortSignal;
};

/**
 * Runs `body` until the signal aborts. Iterations never overlap and an
 * in-flight iteration is allowed to finish; only the sleep is cut short.
 */
export async function runLoop(opts: LoopOptions, body: () => Promise<void>): Promise<void> {
  const { name, intervalMs, signal } = opts;
  log(`${name} loop started`, 'debug');
  while (!signal.aborted) {
    let delay = intervalMs;
    try {
      await body();
    } catch (err) {
      log(`${name} loop error: ${describeError(err)}`, 'error');
      delay = opts.errorDelayMs ?? intervalMs;
    }
    await sleep(delay, signal);
  }
  log(`${name} loop stopped`, 'debug');
}
