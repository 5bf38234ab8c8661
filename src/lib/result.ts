import { describeError, TimeoutError } from './errors';
import { log, type LogLevel } from './logger';

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * Runs one external operation and folds its failure into a result object,
 * logging it at `level`. Batch code keeps going on `{ ok: false }`.
 */
export async function attempt<T>(label: string, fn: () => Promise<T>, level: LogLevel = 'warn'): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err) {
    const error = describeError(err);
    log(`${label} failed: ${error}`, level);
    return { ok: false, error };
  }
}

export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
    promise.then(
      (value) => { clearTimeout(timer); resolve(value); },
      (err: unknown) => { clearTimeout(timer); reject(err); },
    );
  });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) { resolve(); return; }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}
