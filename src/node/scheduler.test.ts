import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { TimerScheduler } from './scheduler';

describe('TimerScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('ticks after the initial delay and then every interval', () => {
    const tick = vi.fn();
    const timer = new TimerScheduler().every(0, 100, tick);

    vi.advanceTimersByTime(1);
    expect(tick).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(250);
    expect(tick).toHaveBeenCalledTimes(3);
    expect(timer.isActive()).toBe(true);

    timer.cancel();
  });

  it('stops ticking once cancelled', () => {
    const tick = vi.fn();
    const timer = new TimerScheduler().every(0, 100, tick);
    vi.advanceTimersByTime(150);

    timer.cancel();
    vi.advanceTimersByTime(1000);

    expect(tick).toHaveBeenCalledTimes(2);
    expect(timer.isActive()).toBe(false);
  });

  it('never ticks when cancelled before the initial delay', () => {
    const tick = vi.fn();
    const timer = new TimerScheduler().every(50, 100, tick);

    timer.cancel();
    vi.advanceTimersByTime(1000);

    expect(tick).not.toHaveBeenCalled();
  });
});
