export type Clock = {
  /** Monotonic milliseconds; only differences are meaningful. */
  now: () => number;
  /** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export const abortableSleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const finish = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", finish);
      resolve();
    };
    const timer = setTimeout(finish, Math.max(0, ms));
    signal?.addEventListener("abort", finish, { once: true });
  });

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: abortableSleep
};
