import { describeError } from '@/lib/errors';
import { log } from '@/lib/logger';

export type ScheduleWindow = {
  name: string;
  folder: string;
  transition: string;
  transitionOffsetSeconds: number;
  /** 0 = Monday … 6 = Sunday */
  dayOfWeek?: number;
  /** 'HH:MM', inclusive */
  start?: string;
  /** 'HH:MM', exclusive */
  end?: string;
};

export type ClockParts = { weekday: number; secondsOfDay: number };

const WEEKDAYS: Record<string, number> = { Mon: 0, Tue: 1, Wed: 2, Thu: 3, Fri: 4, Sat: 5, Sun: 6 };

/** 'HH:MM' -> seconds since midnight, or undefined when malformed. */
export function parseTimeOfDay(value: string): number | undefined {
  const m = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!m) return undefined;
  const hour = Number(m[1]);
  const minute = Number(m[2]);
  if (hour > 23 || minute > 59) return undefined;
  return hour * 3600 + minute * 60;
}

export function windowMatches(window: ScheduleWindow, at: ClockParts): boolean {
  if (window.dayOfWeek !== undefined && window.dayOfWeek !== at.weekday) return false;
  if (window.start === undefined || window.end === undefined) return true;
  const start = parseTimeOfDay(window.start);
  const end = parseTimeOfDay(window.end);
  if (start === undefined || end === undefined) return false;
  if (start <= end) return at.secondsOfDay >= start && at.secondsOfDay < end;
  // crosses midnight, e.g. 23:00-02:00
  return at.secondsOfDay >= start || at.secondsOfDay < end;
}

export function sameWindow(a: ScheduleWindow, b: ScheduleWindow): boolean {
  return a.name === b.name
    && a.folder === b.folder
    && a.transition === b.transition
    && a.transitionOffsetSeconds === b.transitionOffsetSeconds
    && a.dayOfWeek === b.dayOfWeek
    && a.start === b.start
    && a.end === b.end;
}

function createPartsReader(timeZone?: string): (now: Date) => ClockParts {
  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      weekday: 'short',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
  } catch (err) {
    log(`Invalid timezone '${timeZone}': ${describeError(err)}; falling back to system timezone`, 'warn');
    formatter = new Intl.DateTimeFormat('en-US', { weekday: 'short', hour: '2-digit', minute: '2-digit', second: '2-digit', hourCycle: 'h23' });
  }
  return (now) => {
    const parts: Record<string, string> = {};
    for (const p of formatter.formatToParts(now)) parts[p.type] = p.value;
    const weekday = WEEKDAYS[parts.weekday ?? ''] ?? 0;
    const secondsOfDay = Number(parts.hour) * 3600 + Number(parts.minute) * 60 + Number(parts.second);
    return { weekday, secondsOfDay };
  };
}

/**
 * Picks the first matching window in priority order, falling back to the
 * unrestricted default, and reports changes edge-triggered.
 */
export class Scheduler {
  private readonly readParts: (now: Date) => ClockParts;
  private last: ScheduleWindow;

  constructor(
    private readonly windows: readonly ScheduleWindow[],
    private readonly defaultWindow: ScheduleWindow,
    opts: { timeZone?: string; now?: Date } = {},
  ) {
    this.readParts = createPartsReader(opts.timeZone);
    this.last = this.activeWindow(opts.now ?? new Date());
  }

  clockParts(now: Date): ClockParts {
    return this.readParts(now);
  }

  activeWindow(now: Date): ScheduleWindow {
    const parts = this.readParts(now);
    for (const window of this.windows) {
      if (windowMatches(window, parts)) return window;
    }
    return this.defaultWindow;
  }

  checkChange(now: Date): ScheduleWindow | undefined {
    const next = this.activeWindow(now);
    if (sameWindow(next, this.last)) return undefined;
    log(`Schedule changed: ${this.last.name} → ${next.name}`);
    this.last = next;
    return next;
  }

  current(): ScheduleWindow {
    return this.last;
  }

  list(): { windows: readonly ScheduleWindow[]; defaultWindow: ScheduleWindow } {
    return { windows: this.windows, defaultWindow: this.defaultWindow };
  }
}
