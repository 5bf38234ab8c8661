export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogRecord = { ts: number; level: LogLevel; message: string };
export type LogSink = (record: LogRecord) => void;

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = 'info';
const sinks = new Set<LogSink>();

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

// Returns a disposer so callers (tests, shutdown) can detach the sink again.
export function addLogSink(sink: LogSink): () => void {
  sinks.add(sink);
  return () => { sinks.delete(sink); };
}

export function log(msg: string, level: LogLevel = 'info') {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
  const ts = Date.now();
  const line = `[${new Date(ts).toISOString()}] [${level.toUpperCase()}] ${msg}`;
  if (level === 'error') console.error(line);
  else console.log(line);
  for (const sink of sinks) {
    try {
      sink({ ts, level, message: msg });
    } catch (err) {
      console.error(`[${new Date().toISOString()}] [ERROR] log sink failed: ${String(err)}`);
    }
  }
}
