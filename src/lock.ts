import { FetchTimeoutError } from "./errors.js";

/**
 * Serialises async sections on one promise chain. Callers queue in arrival
 * order; a failing section does not poison the chain.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private held = false;

  get locked(): boolean {
    return this.held;
  }

  run<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(async () => {
      this.held = true;
      try {
        return await fn();
      } finally {
        this.held = false;
      }
    });
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

/**
 * Races `work` against a timer. The work is not cancelled: when it settles
 * after the deadline, `onLate` receives its outcome and the value is dropped.
 */
export function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  label: string,
  onLate?: (outcome: { value: T } | { error: unknown }) => void,
): Promise<T> {
  let timedOut = false;
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      reject(new FetchTimeoutError(label, timeoutMs));
    }, timeoutMs);
  });
  void work.then(
    (value) => {
      if (timedOut) onLate?.({ value });
    },
    (error: unknown) => {
      if (timedOut) onLate?.({ error });
    },
  );
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
}
