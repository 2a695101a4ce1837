export type Clock = {
  now: () => number;
  /** Resolves after `ms`; rejects with the signal's reason as soon as it aborts. */
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error(String(reason ?? "aborted"));
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  const delayMs = Math.max(0, ms);
  if (!signal) {
    return new Promise<void>((resolve) => setTimeout(resolve, delayMs));
  }
  if (signal.aborted) {
    return Promise.reject(abortReason(signal));
  }
  const active = signal;
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timeoutId);
      reject(abortReason(active));
    };
    const timeoutId = setTimeout(() => {
      active.removeEventListener("abort", onAbort);
      resolve();
    }, delayMs);
    active.addEventListener("abort", onAbort, { once: true });
  });
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep
};

/**
 * Races `task` against `signal`. The task keeps running in the background when the
 * signal wins, but its outcome is ignored.
 */
export function raceAbort<T>(task: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return task;
  }
  if (signal.aborted) {
    task.catch(() => undefined);
    return Promise.reject(abortReason(signal));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(abortReason(signal));
    };
    signal.addEventListener("abort", onAbort, { once: true });
    task.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Calls `onExpire` once `ms` have passed on `clock`. The returned function cancels
 * the timer; after cancellation `onExpire` never runs.
 */
export function schedule(clock: Clock, ms: number, onExpire: () => void): () => void {
  const controller = new AbortController();
  void clock.sleep(Math.max(0, ms), controller.signal).then(
    () => {
      if (!controller.signal.aborted) onExpire();
    },
    // sleep only rejects through this controller
    () => undefined
  );
  return () => controller.abort();
}

export type DeadlineOptions = {
  clock: Clock;
  /** Absolute time on `clock`; undefined or infinite means no deadline. */
  deadline?: number;
  signal?: AbortSignal;
  onTimeout: () => Error;
};

/** Races `task` against both the signal and the deadline; the error comes from `onTimeout` at expiry. */
export function raceDeadline<T>(task: Promise<T>, options: DeadlineOptions): Promise<T> {
  const guarded = raceAbort(task, options.signal);
  const deadline = options.deadline;
  if (deadline === undefined || !Number.isFinite(deadline)) {
    return guarded;
  }
  return new Promise<T>((resolve, reject) => {
    const cancel = schedule(options.clock, deadline - options.clock.now(), () => reject(options.onTimeout()));
    guarded.then(
      (value) => {
        cancel();
        resolve(value);
      },
      (error: unknown) => {
        cancel();
        reject(error);
      }
    );
  });
}
