// Interview Session Client - Timeout race
// The first of (operation, timer) to settle wins; the loser's later
// settlement is observed and dropped so it can never surface as an
// unhandled rejection.

import { TaskScheduler } from "./scheduler.js";

export interface TimeoutOptions {
  timeoutMs: number;
  /** Builds the rejection used when the timer wins. */
  onTimeout: () => Error;
  /** Owner of the timer, so a reset can cancel it. Defaults to a private scheduler. */
  scheduler?: TaskScheduler;
  name?: string;
}

export function withTimeout<T>(operation: Promise<T>, options: TimeoutOptions): Promise<T> {
  const scheduler = options.scheduler ?? new TaskScheduler();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const timer = scheduler.schedule(options.name ?? "timeout", options.timeoutMs, () => {
      if (settled) return;
      settled = true;
      reject(options.onTimeout());
    });

    operation.then(
      (value) => {
        if (settled) return;
        settled = true;
        timer.cancel();
        resolve(value);
      },
      (error: unknown) => {
        if (settled) return;
        settled = true;
        timer.cancel();
        reject(error);
      },
    );
  });
}
