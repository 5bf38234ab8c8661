import fs from 'node:fs';
import path from 'node:path';
import { classify, type ExtensionLookup } from '@/catalog/catalog';
import { ChangeQueue, type ChangeEvent } from '@/lib/changeQueue';
import { describeError } from '@/lib/errors';
import { log } from '@/lib/logger';

// Watches one content folder (non-recursive) and queues media changes for the dispatch loop.
export class FileMonitor {
  private watcher: fs.FSWatcher | undefined;
  private directory: string;

  constructor(
    directory: string,
    private readonly extensions: ExtensionLookup,
    private readonly queue: ChangeQueue<ChangeEvent>,
    private readonly now: () => number = Date.now,
  ) {
    this.directory = path.resolve(directory);
  }

  get watching(): string | undefined {
    return this.watcher ? this.directory : undefined;
  }

  start(): boolean {
    this.stop();
    try {
      fs.mkdirSync(this.directory, { recursive: true });
      this.watcher = fs.watch(this.directory, (_event, filename) => {
        if (filename) this.handle(filename.toString());
      });
      this.watcher.on('error', (err) => {
        log(`File monitor error on ${this.directory}: ${describeError(err)}`, 'error');
      });
      log(`Watching ${this.directory} for changes`);
      return true;
    } catch (err) {
      log(`Could not watch ${this.directory}: ${describeError(err)}`, 'error');
      this.watcher = undefined;
      return false;
    }
  }

  retarget(directory: string): boolean {
    const next = path.resolve(directory);
    if (next === this.directory && this.watcher) return true;
    this.directory = next;
    return this.start();
  }

  stop() {
    this.watcher?.close();
    this.watcher = undefined;
  }

  /** Exposed for the watcher callback; ignores anything that is not media. */
  handle(filename: string) {
    if (!classify(filename, this.extensions)) return;
    const full = path.join(this.directory, filename);
    log(`Change detected: ${full}`, 'debug');
    this.queue.push({ path: full, at: this.now() });
  }
}
