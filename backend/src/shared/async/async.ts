/**
 * backend/src/shared/async/async.ts
 *
 * WHY:
 * - External calls (MySQL, object store) must never hang a request.
 * - One shared place for deadlines and the (rare) retry.
 *
 * RULES:
 * - CRUD calls get a deadline, never a retry.
 * - The background asset gets at most one retry.
 */

export interface RetryOptions {
  maxAttempts?: number;
  delayMs?: number;
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  { maxAttempts = 3, delayMs = 1000 }: RetryOptions = {},
): Promise<T> {
  let last: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      last = err;
      if (attempt === maxAttempts) break;
      await sleep(delayMs);
    }
  }
  throw last instanceof Error ? last : new Error(String(last));
}

/**
 * Races `fn()` against a timer. The timer is always cleared, so a finished
 * call leaves nothing pending on the event loop.
 *
 * `fn` receives a signal that aborts (with the TimeoutError) when the deadline
 * passes. Racing does not stop the underlying work: writes must check the
 * signal before committing.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  message = 'Operation timed out',
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(message, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
