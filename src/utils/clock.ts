/**
 * Time source for the solve governor.
 *
 * `waitUntil` resolves once `instant` is reached, or as soon as `signal`
 * aborts, whichever happens first. It never rejects.
 */
export interface Clock {
  now(): Date;
  waitUntil(instant: Date, signal: AbortSignal): Promise<void>;
}

/** Longest delay a single timer takes; later instants are reached in steps. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  waitUntil(instant: Date, signal: AbortSignal): Promise<void> {
    return new Promise<void>(resolve => {
      if (signal.aborted) {
        resolve();
        return;
      }

      let timeoutId: NodeJS.Timeout | undefined;
      const onAbort = (): void => {
        clearTimeout(timeoutId);
        resolve();
      };
      const schedule = (): void => {
        const remaining = instant.getTime() - Date.now();
        if (remaining <= 0) {
          signal.removeEventListener('abort', onAbort);
          resolve();
          return;
        }
        timeoutId = setTimeout(schedule, Math.min(remaining, MAX_TIMER_DELAY_MS));
      };

      signal.addEventListener('abort', onAbort, { once: true });
      schedule();
    });
  }
}

export const systemClock: Clock = new SystemClock();
