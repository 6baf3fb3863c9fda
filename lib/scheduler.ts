/**
 * Hourly sync scheduler.
 *
 * Two explicit states: idle, or running one cycle. A tick that arrives while
 * a cycle is running is skipped, so cycles never overlap. The cadence is
 * relative to process start; nothing about the schedule is persisted.
 */

import { daysBefore, todayIso } from '@/lib/dates';
import { errorMessage } from '@/lib/errors';

export type SchedulerState =
  | { status: 'idle' }
  | { status: 'running'; startedAt: Date; dates: string[] };

export type CycleRunner = (dates: string[]) => Promise<unknown>;

export interface SchedulerOptions {
  intervalMs: number;
  runCycle: CycleRunner;
  /** Also re-fetch yesterday, for data the vendor finalises late */
  refetchYesterday?: boolean;
  now?: () => Date;
}

export type TickOutcome = 'completed' | 'failed' | 'skipped';

/**
 * Dates a cycle starting at `now` covers, oldest first
 */
export function cycleDates(now: Date, refetchYesterday: boolean): string[] {
  const today = todayIso(now);
  return refetchYesterday ? [daysBefore(now, 1), today] : [today];
}

export class SyncScheduler {
  private state: SchedulerState = { status: 'idle' };
  private timer: NodeJS.Timeout | null = null;
  private readonly now: () => Date;

  completedCycles = 0;
  failedCycles = 0;
  skippedTicks = 0;

  constructor(private readonly options: SchedulerOptions) {
    if (!(options.intervalMs > 0)) {
      throw new Error(`Scheduler interval must be positive (got ${options.intervalMs})`);
    }
    this.now = options.now ?? (() => new Date());
  }

  getState(): SchedulerState {
    return this.state;
  }

  isArmed(): boolean {
    return this.timer !== null;
  }

  /**
   * Run one cycle unless one is already running. Never rejects; a failed
   * cycle is logged and the scheduler returns to idle for the next tick.
   */
  async tick(): Promise<TickOutcome> {
    if (this.state.status === 'running') {
      this.skippedTicks++;
      console.warn(
        `[SyncScheduler] Tick skipped: cycle started at ${this.state.startedAt.toISOString()} still running`
      );
      return 'skipped';
    }

    const startedAt = this.now();
    const dates = cycleDates(startedAt, this.options.refetchYesterday ?? true);
    this.state = { status: 'running', startedAt, dates };
    console.log(`[SyncScheduler] Cycle started for ${dates.join(', ')}`);

    try {
      await this.options.runCycle(dates);
      this.completedCycles++;
      console.log(`[SyncScheduler] Cycle finished in ${this.now().getTime() - startedAt.getTime()}ms`);
      return 'completed';
    } catch (error) {
      this.failedCycles++;
      console.error(`[SyncScheduler] Cycle failed, waiting for next tick: ${errorMessage(error)}`);
      return 'failed';
    } finally {
      this.state = { status: 'idle' };
    }
  }

  /**
   * Arm the interval timer; by default also run a cycle right away
   */
  start({ runImmediately = true }: { runImmediately?: boolean } = {}): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.intervalMs);

    console.log(`[SyncScheduler] Armed, every ${Math.round(this.options.intervalMs / 60000)} minute(s)`);
    if (runImmediately) {
      void this.tick();
    }
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      console.log('[SyncScheduler] Stopped');
    }
  }
}
