import { desc } from 'drizzle-orm';
import type { ApplyResult } from '@/engine/reconciler';
import type { ScheduleWindow } from '@/engine/scheduler';
import type { LogRecord } from '@/lib/logger';
import type { SignageDb } from './db';
import { logs, reconcileRuns, scheduleChanges } from './schema';

export type RunRow = typeof reconcileRuns.$inferSelect;
export type ScheduleChangeRow = typeof scheduleChanges.$inferSelect;
export type LogRow = typeof logs.$inferSelect;

export type RunSummary = Pick<ApplyResult, 'mode' | 'created' | 'removed' | 'failures' | 'orphansRemoved'> & {
  folder: string;
  fingerprint: string;
  entries: number;
};

export interface History {
  recordRun(run: RunSummary, ts?: number): void;
  recentRuns(limit?: number): RunRow[];
  recordScheduleChange(window: ScheduleWindow, ts?: number): void;
  recentScheduleChanges(limit?: number): ScheduleChangeRow[];
  recordLog(record: LogRecord): void;
  recentLogs(limit?: number): LogRow[];
}

export function createHistory(db: SignageDb): History {
  return {
    recordRun(run, ts = Date.now()) {
      db.insert(reconcileRuns).values({ ts, ...run }).run();
    },
    recentRuns(limit = 20) {
      return db.select().from(reconcileRuns).orderBy(desc(reconcileRuns.id)).limit(limit).all();
    },
    recordScheduleChange(window, ts = Date.now()) {
      db.insert(scheduleChanges).values({
        ts,
        windowName: window.name,
        folder: window.folder,
        transition: window.transition,
        transitionOffset: window.transitionOffsetSeconds,
      }).run();
    },
    recentScheduleChanges(limit = 20) {
      return db.select().from(scheduleChanges).orderBy(desc(scheduleChanges.id)).limit(limit).all();
    },
    recordLog(record) {
      db.insert(logs).values({ ts: record.ts, level: record.level, message: record.message }).run();
    },
    recentLogs(limit = 100) {
      return db.select().from(logs).orderBy(desc(logs.id)).limit(limit).all();
    },
  };
}
