import type { DurationProbe } from '@/catalog/durations';
import { ProbeError } from '@/lib/errors';
import { runCommand, type CommandResult } from '@/lib/runCommand';

export type CommandRunner = (cmd: string, args: string[], options: { timeoutMs: number }) => Promise<CommandResult>;

/** Reads `format.duration` from `ffprobe -of json` output. */
export function parseProbeOutput(stdout: string): number {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    throw new ProbeError('ffprobe output is not JSON');
  }
  const format = typeof json === 'object' && json !== null && 'format' in json ? json.format : undefined;
  const raw = typeof format === 'object' && format !== null && 'duration' in format ? format.duration : undefined;
  if (raw === undefined || raw === null || raw === '') throw new ProbeError('ffprobe returned no duration');
  const seconds = Number(raw);
  if (!Number.isFinite(seconds)) throw new ProbeError(`ffprobe returned unparseable duration "${String(raw)}"`);
  return seconds;
}

export class FfprobeDurationProbe implements DurationProbe {
  constructor(
    private readonly opts: { binary: string; timeoutMs: number },
    private readonly run: CommandRunner = runCommand,
  ) {}

  async probe(absolutePath: string): Promise<number> {
    const res = await this.run(
      this.opts.binary,
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'json', absolutePath],
      { timeoutMs: this.opts.timeoutMs },
    );
    if (res.code !== 0) throw new ProbeError(`ffprobe exited with ${res.code}: ${res.err.trim()}`);
    return parseProbeOutput(res.out);
  }
}
