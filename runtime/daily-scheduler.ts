/**
 * DailyScheduler owns the calendar. The progress engine only knows "the next day";
 * this heartbeat decides when that day has arrived.
 */

import { errorMessage, isAgentError } from '../core/contracts/errors';
import type { AgentState } from '../goals/types';
import type { DailySchedulerOptions, ScheduledAgent } from './types';

export const DAY_MS = 24 * 60 * 60 * 1000;

/** Whole UTC calendar days between `createdAt` and `now`. */
export function calendarDayIndex(createdAt: number, now: number): number {
  return Math.max(0, Math.floor(now / DAY_MS) - Math.floor(createdAt / DAY_MS));
}

export class DailyScheduler {
  private readonly agent: ScheduledAgent;
  private readonly checkIntervalMs: number;
  private readonly getTime: () => number;
  private readonly timers: Pick<typeof globalThis, 'setInterval' | 'clearInterval'>;
  private readonly onError: (error: unknown) => void;
  private readonly options: DailySchedulerOptions;
  private heartbeatHandle: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<AgentState | null> | null = null;
  private beats = 0;

  constructor(options: DailySchedulerOptions) {
    const checkIntervalMs = options.checkIntervalMs ?? 60_000;
    if (!Number.isFinite(checkIntervalMs) || checkIntervalMs <= 0) {
      throw new Error(`checkIntervalMs must be a finite positive number. Got: ${options.checkIntervalMs}`);
    }
    this.options = options;
    this.agent = options.agent;
    this.checkIntervalMs = checkIntervalMs;
    this.getTime = options.getTime ?? (() => Date.now());
    this.timers = options.timers ?? {
      setInterval: globalThis.setInterval.bind(globalThis),
      clearInterval: globalThis.clearInterval.bind(globalThis)
    };
    this.onError = options.onError ?? ((error) => console.error(`[ERROR] Scheduled tick failed: ${errorMessage(error)}`));
  }

  get running(): boolean {
    return this.heartbeatHandle !== null;
  }

  start(): void {
    if (this.heartbeatHandle !== null) {
      return;
    }
    this.heartbeatHandle = this.timers.setInterval(() => {
      this.beat();
    }, this.checkIntervalMs);
  }

  stop(): void {
    if (this.heartbeatHandle !== null) {
      this.timers.clearInterval(this.heartbeatHandle);
      this.heartbeatHandle = null;
    }
  }

  /**
   * Ticks the agent when the calendar has reached its next day. Resolves with the new
   * state, or null when nothing was due or the tick failed. Calls made while a tick is
   * running share its result.
   */
  runDue(): Promise<AgentState | null> {
    if (!this.inFlight) {
      this.inFlight = this.runDueOnce().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private beat(): void {
    this.runDue().catch((error: unknown) => {
      console.error(`[ERROR] Scheduler heartbeat failed: ${errorMessage(error)}`);
    });
  }

  private async runDueOnce(): Promise<AgentState | null> {
    this.beats += 1;
    const requestId = `scheduler-${this.beats}`;
    try {
      const record = await this.agent.snapshot();
      if (!record || record.state.status !== 'active') {
        return null;
      }

      const { state } = record;
      const dayIndex = calendarDayIndex(state.goal.createdAt, this.getTime());
      if (state.currentDay > dayIndex) {
        return null;
      }
      return await this.agent.tick({ day: state.currentDay, requestId });
    } catch (error) {
      await this.options.auditLogger?.logError({
        requestId,
        error: errorMessage(error),
        code: isAgentError(error) ? error.code : undefined,
        context: { operation: 'scheduled_tick' }
      });
      this.onError(error);
      return null;
    }
  }
}
