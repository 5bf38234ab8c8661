import path from 'node:path';
import { DurationResolver } from '@/catalog/durations';
import { FfprobeDurationProbe } from '@/connectors/ffprobe';
import { ObsController } from '@/connectors/obs';
import { createWebDavStore, RemoteSyncProvider } from '@/connectors/webdav';
import { openDatabase } from '@/db/db';
import { createHistory } from '@/db/history';
import { Reconciler } from '@/engine/reconciler';
import { RotationClock } from '@/engine/rotationClock';
import { Scheduler } from '@/engine/scheduler';
import { ChangeQueue } from '@/lib/changeQueue';
import { ConfigError, describeError, SignageError } from '@/lib/errors';
import { loadConfig, loadLocalEnvOnce, type SignageConfig } from '@/lib/config';
import { addLogSink, log, setLogLevel } from '@/lib/logger';
import { ContentPipeline } from '@/pipeline/contentPipeline';
import { FileMonitor } from './fileMonitor';
import { runLoop } from './loops';

const CHANGE_DISPATCH_MS = 250;
const HEALTH_CHECK_MS = 60_000;
const SYNC_ERROR_DELAY_MS = 60_000;

function readConfig(): SignageConfig | undefined {
  loadLocalEnvOnce();
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      log(err.message, 'error');
      return undefined;
    }
    throw err;
  }
}

async function main() {
  const config = readConfig();
  if (!config) {
    process.exitCode = 1;
    return;
  }
  setLogLevel(config.logLevel);
  log('Starting signage service');

  const database = await openDatabase(path.join(config.dataDir, 'signage.db'));
  const history = createHistory(database.db);
  const detachSink = addLogSink((record) => {
    if (record.level === 'warn' || record.level === 'error') history.recordLog(record);
  });

  const shutdown = new AbortController();
  const stop = (signal: string) => {
    if (shutdown.signal.aborted) return;
    log(`Received ${signal}, shutting down…`);
    shutdown.abort();
  };
  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));
  const { signal } = shutdown;

  const controller = new ObsController(config.controller);
  const closeAll = async () => {
    await controller.disconnect();
    detachSink();
    database.save();
    database.close();
  };

  if (!(await controller.connect(signal))) {
    await closeAll();
    process.exitCode = 1;
    return;
  }

  const reconciler = new Reconciler(controller, config.canvas);
  await reconciler.ensurePlaceholder();

  const scheduler = new Scheduler(config.schedule.windows, config.schedule.defaultWindow, { timeZone: config.schedule.timeZone });
  const initialWindow = config.schedule.enabled ? scheduler.current() : config.schedule.defaultWindow;

  const clock = new RotationClock(controller, initialWindow.transitionOffsetSeconds);
  const durations = new DurationResolver(
    new FfprobeDurationProbe({ binary: config.ffprobePath, timeoutMs: config.probeTimeoutMs }),
    config,
  );
  const pipeline = new ContentPipeline(initialWindow.folder, {
    controller,
    reconciler,
    durations,
    clock,
    extensions: config.extensions,
    history,
  });

  const remote = config.remoteSync;
  const sync = remote
    ? new RemoteSyncProvider(
      createWebDavStore(remote),
      { rootPath: remote.rootPath, localDir: remote.localDir, extensions: config.extensions },
      pipeline,
    )
    : undefined;
  if (sync && (await sync.testConnection())) {
    await sync.sync();
  }

  await pipeline.switchWindow(initialWindow);

  const queue = new ChangeQueue();
  const monitor = new FileMonitor(pipeline.contentDirectory(), config.extensions, queue);
  monitor.start();

  const loops: Promise<void>[] = [
    runLoop({ name: 'Rotation', intervalMs: config.rotationIntervalMs, signal }, async () => {
      await pipeline.tick();
    }),
    runLoop({ name: 'Change dispatch', intervalMs: CHANGE_DISPATCH_MS, signal }, async () => {
      if (!queue.isSettled(Date.now(), config.rescanDebounceMs)) return;
      const events = queue.drain();
      const dropped = queue.takeDropped();
      if (dropped > 0) log(`Change queue full; ${dropped} older event(s) dropped`, 'warn');
      await pipeline.requestRescan(`${events.length} file change(s)`);
    }),
    runLoop({ name: 'Health', intervalMs: HEALTH_CHECK_MS, signal }, async () => {
      database.save();
      if (controller.isConnected() && (await controller.healthCheck())) return;
      log(controller.isConnected() ? 'OBS health check failed' : 'OBS connection lost', 'warn');
      if (await controller.reconnect(signal)) await reconciler.ensurePlaceholder();
    }),
  ];

  if (config.schedule.enabled) {
    loops.push(runLoop({ name: 'Schedule', intervalMs: config.schedule.checkIntervalMs, signal }, async () => {
      const next = scheduler.checkChange(new Date());
      if (!next) return;
      await pipeline.switchWindow(next);
      monitor.retarget(pipeline.contentDirectory());
    }));
  }

  if (sync && remote) {
    loops.push(runLoop({ name: 'Remote sync', intervalMs: remote.intervalMs, errorDelayMs: SYNC_ERROR_DELAY_MS, signal }, async () => {
      const res = await sync.sync();
      if (!res.ok) throw new SignageError(res.error ?? 'remote sync failed');
      if (res.changed) await pipeline.requestRescan('remote sync');
    }));
  }

  log(`Service running with ${loops.length} loops`);
  await Promise.all(loops);

  monitor.stop();
  await pipeline.idle();
  await closeAll();
  log('Signage service stopped');
}

main().catch((err: unknown) => {
  log(`Fatal: ${describeError(err)}`, 'error');
  process.exitCode = 1;
});
