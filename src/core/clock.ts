// Time source and cadence scheduling, injectable so tests can run on virtual time

/**
 * Handle returned by a scheduled timer
 */
export interface TimerHandle {
  cancel(): void;
}

/**
 * Time source used by every component that waits or polls
 */
export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
  setTimeout(fn: () => void, ms: number): TimerHandle;
  setInterval(fn: () => void, ms: number): TimerHandle;
}

/**
 * Wall-clock implementation backed by the Node.js timers
 */
export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  setTimeout(fn: () => void, ms: number): TimerHandle {
    const timer = setTimeout(fn, ms);
    return { cancel: () => clearTimeout(timer) };
  }

  setInterval(fn: () => void, ms: number): TimerHandle {
    const timer = setInterval(fn, ms);
    return { cancel: () => clearInterval(timer) };
  }
}

interface ScheduledTimer {
  id: number;
  due: number;
  fn: () => void;
  interval?: number;
}

/**
 * Virtual clock. Time only moves when `advance` is called.
 */
export class ManualClock implements Clock {
  private current: number;
  private timers: ScheduledTimer[] = [];
  private nextId = 1;

  constructor(start: number = Date.UTC(2024, 0, 15, 9, 30, 0)) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  setTimeout(fn: () => void, ms: number): TimerHandle {
    return this.schedule({ id: this.nextId++, due: this.current + Math.max(0, ms), fn });
  }

  setInterval(fn: () => void, ms: number): TimerHandle {
    const interval = Math.max(1, ms);
    return this.schedule({ id: this.nextId++, due: this.current + interval, fn, interval });
  }

  /**
   * Number of timers still scheduled
   */
  pendingTimers(): number {
    return this.timers.length;
  }

  /**
   * Moves time forward, firing due timers in order. After each timer the
   * event loop is allowed to settle so async work started by it completes.
   */
  async advance(ms: number): Promise<void> {
    await settle();
    const target = this.current + ms;

    for (;;) {
      const next = this.earliestDue(target);
      if (!next) {
        break;
      }

      this.current = next.due;
      if (next.interval !== undefined) {
        next.due += next.interval;
      } else {
        this.timers = this.timers.filter(t => t.id !== next.id);
      }

      next.fn();
      await settle();
    }

    this.current = target;
    await settle();
  }

  private schedule(timer: ScheduledTimer): TimerHandle {
    this.timers.push(timer);
    return {
      cancel: () => {
        this.timers = this.timers.filter(t => t.id !== timer.id);
      }
    };
  }

  private earliestDue(limit: number): ScheduledTimer | undefined {
    let earliest: ScheduledTimer | undefined;
    for (const timer of this.timers) {
      if (timer.due > limit) continue;
      if (!earliest || timer.due < earliest.due || (timer.due === earliest.due && timer.id < earliest.id)) {
        earliest = timer;
      }
    }
    return earliest;
  }
}

/**
 * Lets pending promise continuations run
 */
export function settle(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

/**
 * Runs an async task on a fixed cadence. A run that is still in flight when
 * the next one is due causes that beat to be skipped.
 */
export class Ticker {
  private handle: TimerHandle | null = null;
  private inFlight: Promise<void> | null = null;
  private skipped = 0;

  constructor(
    private readonly clock: Clock,
    private readonly intervalMs: number,
    private readonly task: () => Promise<void>,
    private readonly onError: (error: unknown) => void
  ) {}

  /**
   * Start the cadence, optionally running the first beat immediately
   */
  start(runImmediately: boolean = true): void {
    if (this.handle) {
      return;
    }

    this.handle = this.clock.setInterval(() => this.beat(), this.intervalMs);

    if (runImmediately) {
      this.beat();
    }
  }

  /**
   * Stop scheduling new beats. A beat already running finishes on its own.
   */
  stop(): void {
    this.handle?.cancel();
    this.handle = null;
  }

  isRunning(): boolean {
    return this.handle !== null;
  }

  /**
   * Beats skipped because the previous run had not finished
   */
  getSkippedCount(): number {
    return this.skipped;
  }

  /**
   * Resolves when the in-flight beat (if any) has finished
   */
  async drain(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private beat(): void {
    if (this.inFlight) {
      this.skipped++;
      return;
    }

    this.inFlight = this.task()
      .catch(error => this.onError(error))
      .finally(() => {
        this.inFlight = null;
      });
  }
}
