import fs from 'node:fs';
import path from 'node:path';
import { createClient, type FileStat } from 'webdav';
import { classify, type ExtensionLookup } from '@/catalog/catalog';
import type { RemoteSyncConfig } from '@/lib/config';
import { describeError, SignageError } from '@/lib/errors';
import { log } from '@/lib/logger';
import type { RemovalListener } from '@/pipeline/contentPipeline';

/** A remote file, `path` relative to the sync root with `/` separators. */
export type RemoteFile = { path: string; size: number };

export interface RemoteFileStore {
  list(root: string): Promise<RemoteFile[]>;
  download(remotePath: string, localPath: string): Promise<void>;
}

export type SyncResult = {
  ok: boolean;
  changed: boolean;
  downloaded: number;
  deleted: number;
  error?: string;
};

export type SyncTarget = {
  rootPath: string;
  localDir: string;
  extensions: ExtensionLookup;
};

const DELETE_SUFFIX = '.delete';
const TMP_SUFFIX = '.tmp';

function joinRemote(root: string, rel: string): string {
  return path.posix.join('/', root, rel);
}

/** The part of the `webdav` client the store calls. */
export type DavClient = {
  getDirectoryContents(path: string, options: { deep: boolean }): Promise<Array<Pick<FileStat, 'filename' | 'type' | 'size'>>>;
  getFileContents(path: string): Promise<unknown>;
};

// Binary bodies arrive as a Buffer under Node and an ArrayBuffer elsewhere.
function toBuffer(body: unknown): Buffer {
  if (Buffer.isBuffer(body)) return body;
  if (body instanceof ArrayBuffer) return Buffer.from(body);
  if (typeof body === 'string') return Buffer.from(body);
  throw new SignageError(`Unexpected WebDAV response body (${typeof body})`);
}

export function createWebDavStore(
  cfg: Pick<RemoteSyncConfig, 'url' | 'username' | 'password'>,
  client: DavClient = createClient(cfg.url, cfg.username ? { username: cfg.username, password: cfg.password ?? '' } : {}),
): RemoteFileStore {
  return {
    async list(root) {
      const base = path.posix.join('/', root);
      const stats = await client.getDirectoryContents(base, { deep: true });
      return stats
        .filter((s) => s.type === 'file')
        .map((s) => ({ path: path.posix.relative(base, s.filename), size: s.size }));
    },
    async download(remotePath, localPath) {
      await fs.promises.writeFile(localPath, toBuffer(await client.getFileContents(remotePath)));
    },
  };
}

async function listLocal(dir: string, prefix = ''): Promise<string[]> {
  let dirents: fs.Dirent[];
  try {
    dirents = await fs.promises.readdir(dir, { withFileTypes: true });
  } catch (err) {
    log(`Could not list ${dir}: ${describeError(err)}`, 'warn');
    return [];
  }
  const out: string[] = [];
  for (const d of dirents) {
    const rel = prefix ? `${prefix}/${d.name}` : d.name;
    if (d.isDirectory()) out.push(...await listLocal(path.join(dir, d.name), rel));
    else if (d.isFile()) out.push(rel);
  }
  return out;
}

async function sizeOf(file: string): Promise<number | undefined> {
  try {
    return (await fs.promises.stat(file)).size;
  } catch {
    return undefined;
  }
}

/**
 * Mirrors a remote folder tree into the local content root. Files deleted
 * upstream are reported to the listener before they are removed locally so the
 * presentation side never points at a missing file.
 */
export class RemoteSyncProvider {
  constructor(
    private readonly store: RemoteFileStore,
    private readonly target: SyncTarget,
    private readonly listener?: RemovalListener,
  ) {}

  async testConnection(): Promise<boolean> {
    try {
      await this.store.list(this.target.rootPath);
      log('Remote connection test successful');
      return true;
    } catch (err) {
      log(`Remote connection test failed: ${describeError(err)}`, 'error');
      return false;
    }
  }

  async sync(): Promise<SyncResult> {
    const { localDir, rootPath } = this.target;
    await fs.promises.mkdir(localDir, { recursive: true });
    await this.cleanupDeletionMarkers();

    let remote: RemoteFile[];
    try {
      remote = (await this.store.list(rootPath)).filter((f) => this.isMedia(f.path));
    } catch (err) {
      const error = describeError(err);
      log(`Remote listing failed: ${error}`, 'error');
      return { ok: false, changed: false, downloaded: 0, deleted: 0, error };
    }

    let downloaded = 0;
    let deleted = 0;
    const remoteNames = new Set<string>();
    for (const file of remote) {
      remoteNames.add(file.path);
      const localPath = path.join(localDir, ...file.path.split('/'));
      if ((await sizeOf(localPath)) === file.size) continue;
      if (await this.download(file, localPath)) downloaded++;
    }

    const local = (await listLocal(localDir)).filter((rel) => this.isMedia(rel));
    for (const rel of local) {
      if (remoteNames.has(rel)) continue;
      if (await this.removeLocal(rel)) deleted++;
    }

    const changed = downloaded + deleted > 0;
    log(changed
      ? `Remote sync finished: ${downloaded} downloaded, ${deleted} removed`
      : 'Remote sync finished: no changes', changed ? 'info' : 'debug');
    return { ok: true, changed, downloaded, deleted };
  }

  private isMedia(rel: string): boolean {
    return classify(path.posix.basename(rel), this.target.extensions) !== undefined;
  }

  private async download(file: RemoteFile, localPath: string): Promise<boolean> {
    const tmp = localPath + TMP_SUFFIX;
    try {
      await fs.promises.mkdir(path.dirname(localPath), { recursive: true });
      await this.store.download(joinRemote(this.target.rootPath, file.path), tmp);
      const size = await sizeOf(tmp);
      if (!size) {
        log(`Download of ${file.path} produced an empty file`, 'error');
        await fs.promises.rm(tmp, { force: true });
        return false;
      }
      await fs.promises.rename(tmp, localPath);
      log(`Downloaded ${file.path}`);
      return true;
    } catch (err) {
      log(`Download of ${file.path} failed: ${describeError(err)}`, 'error');
      await fs.promises.rm(tmp, { force: true }).catch((rmErr: unknown) => {
        log(`Could not remove ${tmp}: ${describeError(rmErr)}`, 'warn');
      });
      return false;
    }
  }

  private async removeLocal(rel: string): Promise<boolean> {
    const localPath = path.join(this.target.localDir, ...rel.split('/'));
    log(`File removed from remote: ${rel}`);
    if (this.listener) {
      try {
        await this.listener.onFileRemoved(localPath);
      } catch (err) {
        log(`Removal listener failed for ${rel}: ${describeError(err)}`, 'error');
      }
    }
    try {
      await fs.promises.unlink(localPath);
      return true;
    } catch (err) {
      log(`Could not delete ${rel} (${describeError(err)}); marking for deletion`, 'warn');
    }
    try {
      const marker = localPath + DELETE_SUFFIX;
      if (!fs.existsSync(marker)) await fs.promises.rename(localPath, marker);
      return true;
    } catch (err) {
      log(`Failed to remove ${rel}: ${describeError(err)}`, 'error');
      return false;
    }
  }

  private async cleanupDeletionMarkers() {
    let names: string[];
    try {
      names = await fs.promises.readdir(this.target.localDir);
    } catch (err) {
      log(`Could not read ${this.target.localDir}: ${describeError(err)}`, 'warn');
      return;
    }
    for (const name of names.filter((n) => n.endsWith(DELETE_SUFFIX))) {
      try {
        await fs.promises.unlink(path.join(this.target.localDir, name));
        log(`Cleaned up deletion marker ${name}`);
      } catch (err) {
        log(`Failed to delete ${name}: ${describeError(err)}`, 'error');
      }
    }
  }
}
