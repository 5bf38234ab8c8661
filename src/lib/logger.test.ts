import { afterEach, describe, expect, it, vi } from 'vitest';
import { addLogSink, isLogLevel, log, setLogLevel, type LogRecord } from './logger';

afterEach(() => {
  setLogLevel('info');
});

describe('log', () => {
  it('prints timestamped lines and routes errors to stderr', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});

    log('hello');
    log('broken', 'error');

    expect(out).toHaveBeenCalledTimes(1);
    expect(String(out.mock.calls[0]?.[0])).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] hello$/);
    expect(String(err.mock.calls[0]?.[0])).toMatch(/\[ERROR\] broken$/);
  });

  it('drops records below the threshold', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('warn');
    log('chatty', 'info');
    log('careful', 'warn');
    expect(out).toHaveBeenCalledTimes(1);
  });

  it('feeds sinks and survives a failing one', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const seen: LogRecord[] = [];
    const detachBroken = addLogSink(() => { throw new Error('disk full'); });
    const detach = addLogSink((record) => seen.push(record));

    log('kept', 'warn');
    detach();
    detachBroken();
    log('after detach', 'warn');

    expect(seen.map((r) => [r.level, r.message])).toEqual([['warn', 'kept']]);
  });
});

describe('isLogLevel', () => {
  it('accepts only known levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
