/**
 * Turns external render jobs into completion callbacks
 */

import type { Logger } from './logger';
import type { JobControl, JobId, Scheduler, TimerHandle } from './types';

export const DEFAULT_POLL_INTERVAL_MS = 100;

export class JobPoller {
  private readonly timers = new Set<TimerHandle>();

  constructor(
    private readonly jobs: JobControl,
    private readonly scheduler: Scheduler,
    private readonly logger: Logger,
    private readonly intervalMs: number = DEFAULT_POLL_INTERVAL_MS,
  ) {}

  /**
   * Poll `jobId` until it leaves the running state, then cancel the timer and
   * call `onComplete` once. Exit status is not inspected here.
   *
   * @returns false when no timer could be created; `onComplete` will then
   * never be called
   */
  watch(jobId: JobId, onComplete: () => void): boolean {
    let completed = false;
    let timer: TimerHandle | null = null;

    const finish = () => {
      completed = true;
      if (timer) {
        if (timer.isActive()) timer.cancel();
        this.timers.delete(timer);
      }
      try {
        onComplete();
      } catch (error) {
        this.logger.error(`diagram: completion handler for job ${jobId} failed:`, error);
      }
    };

    const tick = () => {
      if (completed) return;
      const [state] = this.jobs.wait([jobId]);
      if (state === 'running') return;
      finish();
    };

    timer = this.scheduler.every(0, this.intervalMs, tick);
    if (!timer) {
      this.logger.debug(`diagram: could not create poll timer for job ${jobId}`);
      return false;
    }

    if (completed) {
      // the scheduler ticked synchronously before handing the timer back
      if (timer.isActive()) timer.cancel();
    } else {
      this.timers.add(timer);
    }
    return true;
  }

  /**
   * Number of jobs still being watched. Timers the host stopped on its own
   * are dropped; their completions will never arrive.
   */
  get pending(): number {
    for (const timer of this.timers) {
      if (!timer.isActive()) this.timers.delete(timer);
    }
    return this.timers.size;
  }

  /**
   * Stop every poll without calling completion handlers
   */
  cancelAll(): void {
    for (const timer of this.timers) {
      if (timer.isActive()) timer.cancel();
    }
    this.timers.clear();
  }
}
