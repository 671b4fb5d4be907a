/**
 * Time source abstraction.
 *
 * The latching engine truncates sample timestamps to window boundaries and
 * the batching dispatcher arms deadline timers; both take their notion of
 * "now" and their timers from an injected TimeSource so that tests can drive
 * time explicitly.
 */

/**
 * Handle to a pending one-shot timer
 */
export interface Timer {
  /**
   * Cancel the timer.
   * Returns true if the timer was still pending, false if it had already
   * fired or been stopped.
   */
  stop(): boolean;
}

/**
 * Source of the current time and of one-shot timers
 */
export interface TimeSource {
  /** Milliseconds since the Unix epoch */
  now(): number;

  /** Invoke `callback` once, after `delayMs` milliseconds */
  newTimer(delayMs: number, callback: () => void): Timer;
}

/**
 * TimeSource backed by the system clock and setTimeout
 */
export class SystemTimeSource implements TimeSource {
  now(): number {
    return Date.now();
  }

  newTimer(delayMs: number, callback: () => void): Timer {
    let pending = true;
    const handle = setTimeout(() => {
      pending = false;
      callback();
    }, delayMs);

    // Don't keep the process alive for a pending deadline
    handle.unref();

    return {
      stop: (): boolean => {
        if (!pending) {
          return false;
        }
        pending = false;
        clearTimeout(handle);
        return true;
      },
    };
  }
}

/**
 * Shared system time source
 */
export const systemTimeSource: TimeSource = new SystemTimeSource();
