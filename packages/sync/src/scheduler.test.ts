import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PeriodicScheduler } from './scheduler.js';

describe('PeriodicScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should run the task once per schedule() after the interval', () => {
    const task = vi.fn();
    const scheduler = new PeriodicScheduler(task, 1_000);

    scheduler.schedule();
    expect(scheduler.isArmed).toBe(true);
    expect(scheduler.nextRunAt).toBe(1_000);

    vi.advanceTimersByTime(999);
    expect(task).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(task).toHaveBeenCalledTimes(1);
    expect(scheduler.isArmed).toBe(false);

    vi.advanceTimersByTime(5_000);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should rearm when the task schedules again', () => {
    const task = vi.fn();
    const scheduler = new PeriodicScheduler(() => {
      task();
      scheduler.schedule();
    }, 100);

    scheduler.schedule();
    vi.advanceTimersByTime(350);

    expect(task).toHaveBeenCalledTimes(3);
  });

  it('should keep a single timer when scheduled twice', () => {
    const task = vi.fn();
    const scheduler = new PeriodicScheduler(task, 100);

    scheduler.schedule();
    vi.advanceTimersByTime(50);
    scheduler.schedule();
    vi.advanceTimersByTime(100);

    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should re-arm an armed timer with a new interval', () => {
    const task = vi.fn();
    const scheduler = new PeriodicScheduler(task, 10_000);

    scheduler.schedule();
    vi.advanceTimersByTime(1_000);
    scheduler.setInterval(500);

    expect(scheduler.nextRunAt).toBe(1_500);
    vi.advanceTimersByTime(500);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should not arm an idle scheduler when the interval changes', () => {
    const scheduler = new PeriodicScheduler(vi.fn(), 100);
    scheduler.setInterval(200);

    expect(scheduler.isArmed).toBe(false);
    expect(scheduler.intervalMs).toBe(200);
  });

  it('should cancel an armed timer', () => {
    const task = vi.fn();
    const scheduler = new PeriodicScheduler(task, 100);

    scheduler.schedule();
    scheduler.cancel();
    vi.advanceTimersByTime(1_000);

    expect(task).not.toHaveBeenCalled();
    expect(scheduler.nextRunAt).toBeNull();
  });
});
