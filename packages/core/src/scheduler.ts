export interface ScheduledTimeout {
  promise: Promise<void>;
  cancel(): void;
}

/**
 * Deferral points used by the dock. Swapped for a manual scheduler in tests.
 */
export interface Scheduler {
  /** Run on the next event loop turn, after pending editor side effects. */
  defer(fn: () => void): void;
  /** Resolve after `ms`; `cancel` releases the timer without resolving. */
  timeout(ms: number): ScheduledTimeout;
}

export const defaultScheduler: Scheduler = {
  defer: (fn) => {
    setImmediate(fn);
  },
  timeout: (ms) => {
    let timer: NodeJS.Timeout | undefined;
    const promise = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, ms);
    });
    return {
      promise,
      cancel: () => {
        if (timer) {
          clearTimeout(timer);
        }
      },
    };
  },
};
