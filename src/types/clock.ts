/**
 * Clock abstraction
 * All waiting in the orchestrator (backoff, attempt timeouts, cancel grace)
 * goes through a Clock so tests can drive time explicitly.
 */

export interface Clock {
  /**
   * Current time as a Date
   */
  now(): Date;

  /**
   * Current time as a Unix timestamp in milliseconds
   */
  timestamp(): number;

  /**
   * Current time as an ISO 8601 string
   */
  iso(): string;

  /**
   * Wait for `ms` milliseconds.
   * Resolves early (never rejects) when `signal` aborts, and releases any
   * timer it holds.
   */
  delay(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Clock backed by the system time and real timers
 */
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  timestamp(): number {
    return Date.now();
  }

  iso(): string {
    return new Date().toISOString();
  }

  delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

interface PendingDelay {
  time: number;
  resolve: () => void;
}

/**
 * Manually driven clock for tests.
 * Delays only resolve when `advance`, `advanceToNext` or `setTime` moves
 * time past their deadline.
 */
export class MockClock implements Clock {
  private currentTime: Date;
  private pending: PendingDelay[] = [];

  constructor(initialTime?: Date) {
    this.currentTime = initialTime ?? new Date('2025-01-01T00:00:00.000Z');
  }

  now(): Date {
    return new Date(this.currentTime);
  }

  timestamp(): number {
    return this.currentTime.getTime();
  }

  iso(): string {
    return this.currentTime.toISOString();
  }

  delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const entry: PendingDelay = { time: this.currentTime.getTime() + ms, resolve };
      this.pending.push(entry);
      signal?.addEventListener(
        'abort',
        () => {
          this.pending = this.pending.filter((p) => p !== entry);
          resolve();
        },
        { once: true }
      );
    });
  }

  /**
   * Move time forward and fire any delays that are now due
   */
  advance(ms: number): void {
    this.currentTime = new Date(this.currentTime.getTime() + ms);
    this.processDelays();
  }

  /**
   * Jump to the earliest pending deadline.
   * Returns the number of milliseconds advanced, or -1 when nothing is pending.
   */
  advanceToNext(): number {
    if (this.pending.length === 0) {
      return -1;
    }
    const next = Math.min(...this.pending.map((p) => p.time));
    const step = Math.max(0, next - this.currentTime.getTime());
    this.advance(step);
    return step;
  }

  setTime(time: Date): void {
    this.currentTime = new Date(time);
    this.processDelays();
  }

  /**
   * Number of delays that have not fired yet
   */
  pendingDelays(): number {
    return this.pending.length;
  }

  private processDelays(): void {
    const now = this.currentTime.getTime();
    const due = this.pending.filter((p) => p.time <= now);
    this.pending = this.pending.filter((p) => p.time > now);
    due.forEach((p) => p.resolve());
  }
}
