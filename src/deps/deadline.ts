/** Throws once the deadline has passed; call it between units of work. */
export type Checkpoint = () => void;

/**
 * Runs `task` against a deadline. The returned promise rejects with `onTimeout()` when the
 * deadline passes first; the task sees the same error at its next checkpoint and stops, so
 * no partial result ever resolves.
 */
export function withDeadline<T>(
  timeoutMs: number,
  task: (checkpoint: Checkpoint) => Promise<T>,
  onTimeout: () => Error,
): Promise<T> {
  const deadline = Date.now() + timeoutMs;
  let expired = false;

  const checkpoint: Checkpoint = () => {
    if (expired || Date.now() >= deadline) {
      expired = true;
      throw onTimeout();
    }
  };

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      expired = true;
      reject(onTimeout());
    }, timeoutMs);

    void Promise.resolve()
      .then(() => task(checkpoint))
      .then(resolve, reject)
      .finally(() => clearTimeout(timer));
  });
}
