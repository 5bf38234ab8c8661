import { sqliteTable, integer, real, text } from 'drizzle-orm/sqlite-core';

export const logs = sqliteTable('logs', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  ts: integer('ts').notNull(),
  level: text('level').notNull(),
  message: text('message').notNull(),
});

export const reconcileRuns = sqliteTable('reconcile_runs', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  ts: integer('ts').notNull(),
  folder: text('folder').notNull(),
  fingerprint: text('fingerprint').notNull(),
  mode: text('mode').notNull(),
  entries: integer('entries').notNull(),
  created: integer('created').notNull(),
  removed: integer('removed').notNull(),
  failures: integer('failures').notNull(),
  orphansRemoved: integer('orphans_removed').notNull(),
});

export const scheduleChanges = sqliteTable('schedule_changes', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  ts: integer('ts').notNull(),
  windowName: text('window_name').notNull(),
  folder: text('folder').notNull(),
  transition: text('transition').notNull(),
  transitionOffset: real('transition_offset').notNull(),
});
