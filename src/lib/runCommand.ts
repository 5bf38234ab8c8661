import { spawn, type SpawnOptionsWithoutStdio } from 'node:child_process';
import { TimeoutError } from './errors';
import { log } from './logger';

export type CommandResult = { code: number; out: string; err: string };

export function runCommand(cmd: string, args: string[], options: SpawnOptionsWithoutStdio & { timeoutMs?: number } = {}): Promise<CommandResult> {
  const { timeoutMs, ...spawnOptions } = options;
  log(`runCommand start cmd=${cmd} args=${args.join(' ')}`, 'debug');
  return new Promise((resolve, reject) => {
    const proc = spawn(cmd, args, spawnOptions);
    const out: string[] = [];
    const err: string[] = [];
    let timedOut = false;
    const timer = timeoutMs === undefined ? undefined : setTimeout(() => {
      timedOut = true;
      proc.kill('SIGKILL');
    }, timeoutMs);
    proc.stdout.on('data', (d: Buffer) => out.push(d.toString()));
    proc.stderr.on('data', (d: Buffer) => err.push(d.toString()));
    proc.on('error', (e) => {
      clearTimeout(timer);
      log(`runCommand error cmd=${cmd} message=${e.message}`, 'debug');
      reject(e);
    });
    proc.on('close', (code) => {
      clearTimeout(timer);
      if (timedOut && timeoutMs !== undefined) {
        reject(new TimeoutError(cmd, timeoutMs));
        return;
      }
      log(`runCommand close cmd=${cmd} code=${code}`, 'debug');
      resolve({ code: code ?? 1, out: out.join(''), err: err.join('') });
    });
  });
}
