export class SignageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends SignageError {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(problems.length ? `${message}: ${problems.join('; ')}` : message);
    this.problems = problems;
  }
}

/** The content directory could not be listed at all; the cycle is aborted. */
export class CatalogReadError extends SignageError {
  readonly directory: string;

  constructor(directory: string, cause: unknown) {
    super(`Cannot read content directory ${directory}: ${describeError(cause)}`, { cause });
    this.directory = directory;
  }
}

export class ControllerError extends SignageError {
  readonly request: string;

  constructor(request: string, cause: unknown) {
    super(`${request} failed: ${describeError(cause)}`, { cause });
    this.request = request;
  }
}

export class ProbeError extends SignageError {}

export class TimeoutError extends SignageError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
