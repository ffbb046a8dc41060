// packages/utils/src/async.ts

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} (${timeoutMs}ms)`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function withTimeout<T>(p: Promise<T>, ms: number, label = 'Operation timeout'): Promise<T> {
  let id: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    id = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });

  // Ensure the timer never keeps the process alive after p finishes.
  return Promise.race([p, timeoutPromise]).finally(() => {
    if (id !== undefined) clearTimeout(id);
  });
}
