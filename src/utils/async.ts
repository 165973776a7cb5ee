export class TimeoutError extends Error {
  readonly code = "ETIMEDOUT";
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  const ms = Number(timeoutMs);
  if (!Number.isFinite(ms) || ms <= 0) return promise;
  let timer: NodeJS.Timeout | undefined;
  const timeout = new TimeoutError(`${label} timed out after ${ms}ms`);
  return Promise.race([
    promise.finally(() => {
      if (timer) clearTimeout(timer);
    }),
    new Promise<T>((_, reject) => {
      timer = setTimeout(() => reject(timeout), ms);
    })
  ]);
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `op` up to `attempts` times, waiting `delayMs` between tries.
 * Rethrows the last error.
 */
export async function retry<T>(op: () => Promise<T>, opts: { attempts: number; delayMs: number; onRetry?: (err: unknown, attempt: number) => void }): Promise<T> {
  const attempts = Math.max(1, Math.floor(opts.attempts));
  let lastErr: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await op();
    } catch (err) {
      lastErr = err;
      if (attempt < attempts) {
        opts.onRetry?.(err, attempt);
        await sleep(opts.delayMs);
      }
    }
  }
  throw lastErr;
}

/** FIFO mutual exclusion over async sections. */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

export function errorMessage(e: unknown): string {
  if (!e) return "unknown error";
  if (e instanceof Error) return e.message || String(e);
  return String(e);
}
