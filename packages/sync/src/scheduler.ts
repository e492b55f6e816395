/**
 * Self-rearming timer for periodic sync cycles.
 *
 * The owner calls {@link PeriodicScheduler.schedule} after every cycle,
 * successful or not, so the next run is always `intervalMs` after the last
 * one finished. At most one timer is armed at a time.
 */
export class PeriodicScheduler {
  private timerId: ReturnType<typeof setTimeout> | null = null;
  private dueAt: number | null = null;
  private interval: number;
  private readonly task: () => void;

  constructor(task: () => void, intervalMs: number) {
    this.task = task;
    this.interval = intervalMs;
  }

  /**
   * Arm the timer, replacing any timer already armed
   */
  schedule(): void {
    this.cancel();
    this.dueAt = Date.now() + this.interval;
    this.timerId = setTimeout(() => {
      this.timerId = null;
      this.dueAt = null;
      this.task();
    }, this.interval);
  }

  /**
   * Change the interval. An armed timer is re-armed with the new interval;
   * an idle scheduler picks it up on the next `schedule()`.
   */
  setInterval(intervalMs: number): void {
    if (intervalMs === this.interval) return;
    this.interval = intervalMs;
    if (this.timerId !== null) {
      this.schedule();
    }
  }

  cancel(): void {
    if (this.timerId !== null) {
      clearTimeout(this.timerId);
      this.timerId = null;
      this.dueAt = null;
    }
  }

  get intervalMs(): number {
    return this.interval;
  }

  get isArmed(): boolean {
    return this.timerId !== null;
  }

  /**
   * Unix time the armed timer fires, null when idle
   */
  get nextRunAt(): number | null {
    return this.dueAt;
  }
}
