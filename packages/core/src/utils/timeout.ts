import { TimeoutError } from '../errors';

export interface DeadlineInput<T> {
  /** Names the wait in the `TimeoutError` message, e.g. `Request on tasks.search.semantic.request`. */
  label: string;
  timeoutMs: number;
  run: () => Promise<T>;
}

/**
 * Bounds a wait on the bus: the in-memory bus uses it for the single reply
 * of a request, and the test recorder for expected message counts. When the
 * deadline passes first the call rejects with `TimeoutError`; whatever `run()`
 * started is left to finish on its own and its result is ignored.
 */
export async function withTimeout<T>({ label, timeoutMs, run }: DeadlineInput<T>): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([run(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
