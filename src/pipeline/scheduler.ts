/**
 * Weekly Scheduler
 *
 * Runs a job once a week at a configured local day and time. The next run
 * time is fixed when the scheduler starts; the clock is checked every minute
 * and the job fires on the first check at or after that time, which then
 * moves to the following week. Starting after this week's time has passed
 * waits for next week.
 *
 * @module pipeline/scheduler
 */

import type { DayOfWeek, ScheduleConfig } from '../schemas/index.js';
import { silentLogger, type Logger } from './types.js';

export const DAY_INDEX: Record<DayOfWeek, number> = {
  sun: 0,
  mon: 1,
  tue: 2,
  wed: 3,
  thu: 4,
  fri: 5,
  sat: 6,
};

export const TICK_INTERVAL_MS = 60 * 1000;

/**
 * Scheduler options.
 */
export interface WeeklySchedulerOptions {
  schedule: Pick<ScheduleConfig, 'dayOfWeek' | 'hour' | 'minute'>;
  /** The scheduled work; errors are logged and the scheduler keeps going */
  job: () => Promise<void>;
  logger?: Logger;
  intervalMs?: number;
  now?: () => Date;
}

export class WeeklyScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private nextRun: Date;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: WeeklySchedulerOptions) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.nextRun = this.nextRunAt(this.now());
  }

  start(): void {
    if (this.timer !== null) return;
    this.nextRun = this.nextRunAt(this.now());
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.intervalMs ?? TICK_INTERVAL_MS);
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get isStarted(): boolean {
    return this.timer !== null;
  }

  /** Time of the next run */
  get scheduledAt(): Date {
    return new Date(this.nextRun);
  }

  /**
   * Whether the job should fire at `now`.
   */
  isDue(now: Date): boolean {
    return now >= this.nextRun;
  }

  /**
   * Check the clock and run the job if due. A tick that arrives while the
   * job is still running is ignored.
   *
   * @returns true if the job ran
   */
  async tick(now: Date = this.now()): Promise<boolean> {
    if (this.running || !this.isDue(now)) return false;

    this.running = true;
    this.nextRun = this.nextRunAt(now);
    try {
      this.logger.info('Starting scheduled triage run');
      await this.options.job();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Scheduled triage run failed: ${reason}`);
    } finally {
      this.running = false;
    }
    return true;
  }

  /**
   * Next scheduled time strictly after `from`.
   */
  nextRunAt(from: Date = this.now()): Date {
    const { dayOfWeek, hour, minute } = this.options.schedule;
    for (let offset = 0; offset <= 7; offset++) {
      const candidate = new Date(from);
      candidate.setDate(from.getDate() + offset);
      candidate.setHours(hour, minute, 0, 0);
      if (candidate.getDay() === DAY_INDEX[dayOfWeek] && candidate > from) {
        return candidate;
      }
    }
    // unreachable: one of eight consecutive days matches and is later
    throw new Error(`No run time found for ${dayOfWeek} ${hour}:${minute}`);
  }
}
