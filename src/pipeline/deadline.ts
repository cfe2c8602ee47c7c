export class DeadlineExceededError extends Error {
  public readonly code = "TIMEOUT" as const;

  constructor(message = "Deadline exceeded") {
    super(message);
    this.name = "DeadlineExceededError";
  }
}

export type Deadline = {
  signal: AbortSignal;
  /** Clears the timer; the signal stays as it is. */
  dispose: () => void;
};

export function createDeadline(ms: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new DeadlineExceededError(`Deadline of ${ms}ms exceeded`)), ms);
  const onParentAbort = () => controller.abort(parent?.reason ?? new DeadlineExceededError());

  if (parent) {
    if (parent.aborted) onParentAbort();
    else parent.addEventListener("abort", onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new DeadlineExceededError();
}

/**
 * Settles with `promise` unless `signal` aborts first. Aborting only detaches
 * this caller; the underlying work keeps running for whoever else holds it.
 */
export function raceWithSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      promise.then(
        () => undefined,
        () => undefined,
      );
      reject(new DeadlineExceededError());
      return;
    }
    const onAbort = () => reject(new DeadlineExceededError());
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new DeadlineExceededError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new DeadlineExceededError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
