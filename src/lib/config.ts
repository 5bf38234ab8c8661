import fs from 'node:fs';
import path from 'node:path';
import { ConfigError } from './errors';
import { isLogLevel, type LogLevel } from './logger';
import { parseTimeOfDay, type ScheduleWindow } from '@/engine/scheduler';
import type { MediaKind } from '@/catalog/catalog';

export type ExtensionSets = Readonly<Record<MediaKind, ReadonlySet<string>>>;

export type ControllerConfig = Readonly<{ host: string; port: number; password?: string; timeoutMs: number }>;

export type RemoteSyncConfig = Readonly<{
  url: string;
  username?: string;
  password?: string;
  rootPath: string;
  localDir: string;
  intervalMs: number;
}>;

export type ScheduleConfig = Readonly<{
  enabled: boolean;
  checkIntervalMs: number;
  timeZone?: string;
  windows: readonly ScheduleWindow[];
  defaultWindow: ScheduleWindow;
}>;

export type SignageConfig = Readonly<{
  contentDir: string;
  dataDir: string;
  controller: ControllerConfig;
  extensions: ExtensionSets;
  canvas: Readonly<{ width: number; height: number }>;
  slideDurationSeconds: number;
  maxVideoDurationSeconds: number;
  fallbackVideoDurationSeconds: number;
  probeTimeoutMs: number;
  ffprobePath: string;
  transitionOffsetSeconds: number;
  rotationIntervalMs: number;
  rescanDebounceMs: number;
  schedule: ScheduleConfig;
  remoteSync: RemoteSyncConfig | null;
  logLevel: LogLevel;
}>;

export type Env = Record<string, string | undefined>;

export const DEFAULT_EXTENSIONS: ExtensionSets = {
  video: new Set(['.mp4', '.mov', '.avi', '.mkv', '.wmv', '.webm', '.m4v']),
  image: new Set(['.jpg', '.jpeg', '.png', '.bmp', '.gif', '.tiff', '.webp']),
  audio: new Set(['.mp3', '.wav', '.ogg', '.flac', '.m4a']),
};

let envLoaded = false;

// Fills process.env from the first .env found; real environment variables win.
export function loadLocalEnvOnce(cwd = process.cwd()) {
  if (envLoaded) return;
  envLoaded = true;
  const roots = [path.resolve(cwd, '.env'), path.resolve(cwd, 'config', '.env')];
  for (const envPath of roots) {
    if (!fs.existsSync(envPath)) continue;
    const parsed = parseEnvFile(fs.readFileSync(envPath, 'utf8'));
    for (const [key, val] of Object.entries(parsed)) {
      if (process.env[key] === undefined) process.env[key] = val;
    }
    break;
  }
}

export function parseEnvFile(text: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eq = trimmed.indexOf('=');
    if (eq <= 0) continue;
    const key = trimmed.slice(0, eq).trim();
    let val = trimmed.slice(eq + 1).trim();
    if (/^".*"$/.test(val)) val = val.slice(1, -1);
    else val = val.replace(/\s+#.*$/, '');
    out[key] = val;
  }
  return out;
}

function readString(env: Env, key: string): string | undefined {
  const raw = (env[`SIGNAGE_${key}`] ?? '').trim();
  return raw.length ? raw : undefined;
}

function readNumber(env: Env, key: string, fallback: number, opts: { min?: number } = {}): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return fallback;
  if (opts.min !== undefined && parsed < opts.min) return fallback;
  return parsed;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = readString(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  return fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateWindow(input: unknown, label: string, errors: string[], opts: { unrestricted: boolean }) {
  if (!isRecord(input)) {
    errors.push(`${label} must be an object.`);
    return;
  }
  if (typeof input.name !== 'string' || !input.name.trim()) errors.push(`${label} needs a name.`);
  if (typeof input.folder !== 'string' || !input.folder.trim()) errors.push(`${label} needs a folder.`);
  if (typeof input.transition !== 'string' || !input.transition.trim()) errors.push(`${label} needs a transition.`);
  if (input.transitionOffsetSeconds !== undefined && (typeof input.transitionOffsetSeconds !== 'number' || input.transitionOffsetSeconds < 0)) {
    errors.push(`${label} transitionOffsetSeconds must be a non-negative number.`);
  }
  if (opts.unrestricted) {
    if (input.dayOfWeek !== undefined || input.start !== undefined || input.end !== undefined) {
      errors.push(`${label} must not restrict day or time.`);
    }
    return;
  }
  if (input.dayOfWeek !== undefined && (typeof input.dayOfWeek !== 'number' || !Number.isInteger(input.dayOfWeek) || input.dayOfWeek < 0 || input.dayOfWeek > 6)) {
    errors.push(`${label} dayOfWeek must be an integer 0-6 (0 = Monday).`);
  }
  for (const key of ['start', 'end'] as const) {
    const v = input[key];
    if (v !== undefined && (typeof v !== 'string' || parseTimeOfDay(v) === undefined)) {
      errors.push(`${label} ${key} must be HH:MM.`);
    }
  }
  if ((input.start === undefined) !== (input.end === undefined)) {
    errors.push(`${label} needs both start and end, or neither.`);
  }
}

/** Lists every problem in a parsed schedule file; an empty list means usable. */
export function validateScheduleFile(input: unknown): string[] {
  const errors: string[] = [];
  if (!isRecord(input)) return ['Schedule file must contain a JSON object.'];
  if (!Array.isArray(input.windows)) {
    errors.push('Schedule file needs a "windows" array.');
  } else {
    input.windows.forEach((w, i) => validateWindow(w, `windows[${i}]`, errors, { unrestricted: false }));
  }
  if (input.default !== undefined) validateWindow(input.default, 'default', errors, { unrestricted: true });
  return errors;
}

function toWindow(input: Record<string, unknown>, baseDir: string, fallbackOffset: number): ScheduleWindow {
  const folder = String(input.folder);
  const window: ScheduleWindow = {
    name: String(input.name),
    folder: path.resolve(baseDir, folder),
    transition: String(input.transition),
    transitionOffsetSeconds: typeof input.transitionOffsetSeconds === 'number' ? input.transitionOffsetSeconds : fallbackOffset,
  };
  if (typeof input.dayOfWeek === 'number') window.dayOfWeek = input.dayOfWeek;
  if (typeof input.start === 'string') window.start = input.start;
  if (typeof input.end === 'string') window.end = input.end;
  return window;
}

export function loadScheduleFile(file: string, fallback: ScheduleWindow): { windows: ScheduleWindow[]; defaultWindow: ScheduleWindow } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Cannot read schedule file ${file}`, [String(err)]);
  }
  const problems = validateScheduleFile(parsed);
  if (problems.length || !isRecord(parsed) || !Array.isArray(parsed.windows)) {
    throw new ConfigError(`Invalid schedule file ${file}`, problems);
  }
  const baseDir = path.dirname(file);
  const windows = parsed.windows.filter(isRecord).map((w) => toWindow(w, baseDir, fallback.transitionOffsetSeconds));
  const defaultWindow = isRecord(parsed.default) ? toWindow(parsed.default, baseDir, fallback.transitionOffsetSeconds) : fallback;
  return { windows, defaultWindow };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !(value instanceof Set)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

export function loadConfig(env: Env = process.env, cwd = process.cwd()): SignageConfig {
  const contentDir = path.resolve(cwd, readString(env, 'CONTENT_DIR') ?? 'content');
  const transitionOffsetSeconds = readNumber(env, 'TRANSITION_OFFSET', 2, { min: 0 });

  const fallbackWindow: ScheduleWindow = {
    name: 'Default',
    folder: contentDir,
    transition: readString(env, 'DEFAULT_TRANSITION') ?? 'Fade',
    transitionOffsetSeconds,
  };
  const scheduleEnabled = readBoolean(env, 'SCHEDULE_ENABLED', false);
  const scheduleFile = path.resolve(cwd, readString(env, 'SCHEDULE_FILE') ?? 'config/schedules.json');
  const { windows, defaultWindow } = scheduleEnabled
    ? loadScheduleFile(scheduleFile, fallbackWindow)
    : { windows: [], defaultWindow: fallbackWindow };

  const webdavUrl = readString(env, 'WEBDAV_URL');
  const remoteSync: RemoteSyncConfig | null = webdavUrl
    ? {
      url: webdavUrl,
      username: readString(env, 'WEBDAV_USERNAME'),
      password: readString(env, 'WEBDAV_PASSWORD'),
      rootPath: readString(env, 'WEBDAV_ROOT') ?? '/',
      localDir: path.resolve(cwd, readString(env, 'WEBDAV_LOCAL_DIR') ?? contentDir),
      intervalMs: readNumber(env, 'WEBDAV_SYNC_INTERVAL', 30, { min: 1 }) * 1000,
    }
    : null;

  const rawLevel = (readString(env, 'LOG_LEVEL') ?? 'info').toLowerCase();

  return deepFreeze<SignageConfig>({
    contentDir,
    dataDir: path.resolve(cwd, readString(env, 'DATA_DIR') ?? 'data'),
    controller: {
      host: readString(env, 'OBS_HOST') ?? '127.0.0.1',
      port: readNumber(env, 'OBS_PORT', 4455, { min: 1 }),
      password: readString(env, 'OBS_PASSWORD'),
      timeoutMs: readNumber(env, 'OBS_TIMEOUT_MS', 10_000, { min: 1 }),
    },
    extensions: DEFAULT_EXTENSIONS,
    canvas: {
      width: readNumber(env, 'VIDEO_WIDTH', 1920, { min: 1 }),
      height: readNumber(env, 'VIDEO_HEIGHT', 1080, { min: 1 }),
    },
    slideDurationSeconds: readNumber(env, 'SLIDE_SECONDS', 8, { min: 0 }),
    maxVideoDurationSeconds: readNumber(env, 'MAX_VIDEO_SECONDS', 900, { min: 1 }),
    fallbackVideoDurationSeconds: readNumber(env, 'FALLBACK_VIDEO_SECONDS', 10, { min: 0 }),
    probeTimeoutMs: readNumber(env, 'PROBE_TIMEOUT_MS', 5000, { min: 1 }),
    ffprobePath: readString(env, 'FFPROBE_PATH') ?? 'ffprobe',
    transitionOffsetSeconds,
    rotationIntervalMs: 500,
    rescanDebounceMs: readNumber(env, 'RESCAN_DEBOUNCE_MS', 2000, { min: 0 }),
    schedule: {
      enabled: scheduleEnabled,
      checkIntervalMs: readNumber(env, 'SCHEDULE_CHECK_INTERVAL', 60, { min: 1 }) * 1000,
      timeZone: readString(env, 'TIMEZONE'),
      windows,
      defaultWindow,
    },
    remoteSync,
    logLevel: isLogLevel(rawLevel) ? rawLevel : 'info',
  });
}
