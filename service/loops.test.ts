import { describe, expect, it, vi } from 'vitest';
import { runLoop } from './loops';

describe('runLoop', () => {
  it('repeats the body until aborted', async () => {
    const controller = new AbortController();
    let runs = 0;
    await runLoop({ name: 'Test', intervalMs: 1, signal: controller.signal }, async () => {
      runs++;
      if (runs === 3) controller.abort();
    });
    expect(runs).toBe(3);
  });

  it('logs a failing iteration and keeps going', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const controller = new AbortController();
    let runs = 0;
    await runLoop({ name: 'Sync', intervalMs: 1, errorDelayMs: 5, signal: controller.signal }, async () => {
      runs++;
      if (runs === 1) throw new Error('boom');
      controller.abort();
    });
    expect(runs).toBe(2);
    expect(String(error.mock.calls[0]?.[0])).toMatch(/\[ERROR\] Sync loop error: boom$/);
  });

  it('never runs the body once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const body = vi.fn(async () => {});
    await runLoop({ name: 'Idle', intervalMs: 1, signal: controller.signal }, body);
    expect(body).not.toHaveBeenCalled();
  });
});
