/**
 * Deadlines for outbound requests. The timer covers the whole exchange,
 * body included, and an expired request rejects with RequestTimeoutError
 * so callers map it to their own error type.
 */

export const DEFAULT_TIMEOUT_MS = 15000;

export class RequestTimeoutError extends Error {
  constructor(
    public readonly target: string,
    public readonly timeoutMs: number
  ) {
    super(`Request to ${target} timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

/**
 * Runs `task` under a deadline. The signal handed to the task is aborted
 * when the deadline passes; the returned promise rejects at that moment
 * even if the task ignores the signal.
 */
export async function withTimeout<T>(
  target: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new RequestTimeoutError(target, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}

/** fetch plus `read` of the response, both inside one deadline. */
export function fetchWithTimeout<T>(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  read: (response: Response) => Promise<T>
): Promise<T> {
  return withTimeout(url, timeoutMs, async (signal) => read(await fetch(url, { ...init, signal })));
}
