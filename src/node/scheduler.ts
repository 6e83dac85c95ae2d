import type { Scheduler, TimerHandle } from '../core/types';

/**
 * Scheduler on Node timers; ticks run on the event loop, one at a time
 */
export class TimerScheduler implements Scheduler {
  every(initialDelayMs: number, intervalMs: number, tick: () => void): TimerHandle {
    let active = true;
    let interval: NodeJS.Timeout | undefined;

    const timeout = setTimeout(() => {
      if (!active) return;
      interval = setInterval(tick, intervalMs);
      tick();
    }, initialDelayMs);

    return {
      isActive: () => active,
      cancel: () => {
        active = false;
        clearTimeout(timeout);
        if (interval) clearInterval(interval);
      },
    };
  }
}
