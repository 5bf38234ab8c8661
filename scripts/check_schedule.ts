// Prints the configured schedule windows and the one active now (or at the ISO time given as argv[2]),
// followed by the latest schedule changes and reconcile runs the service recorded.
// Usage: npm run schedule:check -- 2025-11-16T09:00:00Z
import fs from 'node:fs';
import path from 'node:path';
import { openDatabase } from '@/db/db';
import { createHistory } from '@/db/history';
import { Scheduler, type ScheduleWindow } from '@/engine/scheduler';
import { loadConfig, loadLocalEnvOnce } from '@/lib/config';
import { describeError } from '@/lib/errors';

const DAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

function describe(window: ScheduleWindow): string {
  const day = window.dayOfWeek === undefined ? 'every day' : DAY_NAMES[window.dayOfWeek] ?? `day ${window.dayOfWeek}`;
  const hours = window.start && window.end ? `${window.start}-${window.end}` : 'all day';
  return `${window.name}: ${day} ${hours} -> ${window.folder} (${window.transition}, offset ${window.transitionOffsetSeconds}s)`;
}

const RECENT_LIMIT = 5;

async function printHistory(dataDir: string) {
  const file = path.join(dataDir, 'signage.db');
  if (!fs.existsSync(file)) {
    console.log(`No history yet (${file} does not exist)`);
    return;
  }
  const handle = await openDatabase(file);
  try {
    const history = createHistory(handle.db);
    console.log('Recent schedule changes:');
    for (const c of history.recentScheduleChanges(RECENT_LIMIT)) {
      console.log(`  ${new Date(c.ts).toISOString()} ${c.windowName} -> ${c.folder} (${c.transition}, offset ${c.transitionOffset}s)`);
    }
    console.log('Recent reconcile runs:');
    for (const r of history.recentRuns(RECENT_LIMIT)) {
      console.log(`  ${new Date(r.ts).toISOString()} ${r.mode} ${r.folder}: ${r.entries} entries, created=${r.created} removed=${r.removed} failures=${r.failures}`);
    }
    console.log('Recent warnings and errors:');
    for (const l of history.recentLogs(RECENT_LIMIT)) {
      console.log(`  ${new Date(l.ts).toISOString()} [${l.level.toUpperCase()}] ${l.message}`);
    }
  } finally {
    handle.close();
  }
}

async function main() {
  loadLocalEnvOnce();
  const config = loadConfig();
  const at = process.argv[2] ? new Date(process.argv[2]) : new Date();
  if (Number.isNaN(at.getTime())) {
    console.error(`Not a valid timestamp: ${process.argv[2]}`);
    process.exitCode = 1;
    return;
  }

  const { enabled, timeZone } = config.schedule;
  const scheduler = new Scheduler(config.schedule.windows, config.schedule.defaultWindow, { timeZone, now: at });
  const { windows, defaultWindow } = scheduler.list();
  console.log(`Scheduling ${enabled ? 'enabled' : 'disabled'}; time zone ${timeZone ?? 'system'}`);
  windows.forEach((w, i) => console.log(`  ${i + 1}. ${describe(w)}`));
  console.log(`  default. ${describe(defaultWindow)}`);

  const parts = scheduler.clockParts(at);
  const hh = String(Math.floor(parts.secondsOfDay / 3600)).padStart(2, '0');
  const mm = String(Math.floor((parts.secondsOfDay % 3600) / 60)).padStart(2, '0');
  console.log(`At ${at.toISOString()} (${DAY_NAMES[parts.weekday]} ${hh}:${mm} local): ${scheduler.current().name}`);

  await printHistory(config.dataDir);
}

main().catch((err: unknown) => {
  console.error(describeError(err));
  process.exitCode = 1;
});
