/**
 * The only suspension point of the trading loop. Swapped for a fake in tests
 * so cycles run without wall-clock sleeps.
 */
export interface Ticker {
  sleep(ms: number): Promise<void>;
}

/**
 * setTimeout-backed ticker. cancel() resolves a pending sleep immediately so
 * shutdown does not wait out the interval.
 */
export class TimerTicker implements Ticker {
  private timer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;

  sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      this.wake = resolve;
      this.timer = setTimeout(() => {
        this.timer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }

  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.wake) {
      this.wake();
      this.wake = null;
    }
  }
}
