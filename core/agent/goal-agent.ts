/**
 * GoalAgent is the composition root of the core. Every call runs one serialized
 * load -> transition -> save cycle on the store; nothing is cached between calls.
 * A result is returned only after the new record is durable.
 */

import { AdvanceError, PlanningError, StoreError, errorMessage, isAgentError } from '../contracts/errors';
import type { Planner } from '../../goals/planner';
import type { AdvanceOutcome, ProgressEngine } from '../../goals/progress-engine';
import { isTerminal, type AgentRecord, type AgentState, type AgentStatus, type Plan } from '../../goals/types';
import type { StateStore } from '../../memory/state-store';
import type { StructuredAuditLogger } from '../../security/audit-logger';

export interface GoalAgentOptions {
  store: StateStore;
  planner: Planner;
  engine: ProgressEngine;
  auditLogger?: StructuredAuditLogger;
  getTime?: () => number;
}

export interface TickOptions {
  /**
   * Day the caller intends to run. When the record is already past it, the tick is a
   * no-op; lets a scheduler retry a trigger without advancing twice.
   */
  day?: number;
  requestId?: string;
}

type TickOutcome = AdvanceOutcome | { kind: 'already_executed'; currentDay: number };

export interface Readiness {
  ready: boolean;
  status?: AgentStatus;
  reason?: string;
}

export class GoalAgent {
  private readonly store: StateStore;
  private readonly planner: Planner;
  private readonly engine: ProgressEngine;
  private readonly auditLogger?: StructuredAuditLogger;
  private readonly getTime: () => number;

  constructor(options: GoalAgentOptions) {
    this.store = options.store;
    this.planner = options.planner;
    this.engine = options.engine;
    this.auditLogger = options.auditLogger;
    this.getTime = options.getTime ?? (() => Date.now());
  }

  async runOnce(goalText: string, options: { requestId?: string } = {}): Promise<AgentState> {
    const text = goalText.trim();
    if (!text) {
      throw new PlanningError('invalid_goal', 'Goal text is required');
    }
    const created: { plan?: Plan } = {};
    const record = await this.reportFailures(options.requestId, 'runOnce', () =>
      this.store.update(async (current) => {
        created.plan = undefined;
        if (current && !isTerminal(current.state.status)) {
          if (current.state.goal.text === text) {
            return current;
          }
          throw new AdvanceError(
            'goal_conflict',
            `Goal "${current.state.goal.text}" is still ${current.state.status}; finish it before starting another`
          );
        }

        const goal = { text, createdAt: this.getTime() };
        const plan = await this.planner.plan(goal);
        created.plan = plan;
        return {
          state: {
            goal,
            plan,
            currentDay: 0,
            currentSubtaskIndex: 0,
            log: [],
            status: 'active'
          },
          consecutiveFailures: 0
        };
      })
    );

    if (created.plan) {
      await this.auditLogger?.logPlanCreated({
        requestId: options.requestId,
        goal: text,
        estimatedDays: created.plan.estimatedDays,
        subtaskCount: created.plan.subtasks.length
      });
    }
    return record.state;
  }

  async tick(options: TickOptions = {}): Promise<AgentState> {
    const { day, requestId } = options;
    if (day !== undefined && (!Number.isInteger(day) || day < 0)) {
      throw new AdvanceError('invalid_state', `Requested day must be a non-negative integer. Got: ${day}`);
    }

    // Without an explicit day, the day seen on entry is the one this call may run;
    // callers that queued behind it on the same day find it already executed.
    const seen = day === undefined ? await this.reportFailures(requestId, 'tick', () => this.store.load()) : null;
    const intendedDay = day ?? seen?.state.currentDay;

    const result: { outcome?: TickOutcome } = {};
    const record = await this.reportFailures(requestId, 'tick', () =>
      this.store.update(async (current) => {
        result.outcome = undefined;
        if (!current) {
          throw new StoreError('not_found', 'No agent state found; set a goal first');
        }

        const { state } = current;
        if (intendedDay !== undefined && state.currentDay > intendedDay) {
          result.outcome = { kind: 'already_executed', currentDay: state.currentDay };
          return current;
        }

        const advance = await this.engine.advanceDay(state, { consecutiveFailures: current.consecutiveFailures });
        result.outcome = advance;
        switch (advance.kind) {
          case 'noop':
            return current;
          case 'advanced':
            return { state: advance.state, consecutiveFailures: 0 };
          case 'failed':
            return {
              state: advance.state,
              consecutiveFailures: advance.consecutiveFailures,
              lastFailure: advance.stalled
                ? `Stalled after ${advance.consecutiveFailures} consecutive failures: ${advance.error.message}`
                : advance.error.message
            };
        }
      })
    );

    const { outcome } = result;
    switch (outcome?.kind) {
      case 'already_executed':
        await this.auditLogger?.logTickSkipped({
          requestId,
          reason: 'day_already_executed',
          currentDay: outcome.currentDay,
          requestedDay: intendedDay
        });
        break;
      case 'noop':
        await this.auditLogger?.logTickSkipped({ requestId, reason: outcome.reason, currentDay: record.state.currentDay });
        break;
      case 'advanced':
        await this.auditLogger?.logDayAdvanced({
          requestId,
          day: outcome.entry.day,
          subtaskId: outcome.entry.subtaskId,
          status: outcome.state.status,
          skippedSubtasks: outcome.skippedSubtasks || undefined
        });
        break;
      case 'failed':
        await this.auditLogger?.logError({
          requestId,
          error: outcome.error.message,
          code: outcome.error.code,
          context: {
            operation: 'tick',
            day: record.state.currentDay,
            consecutiveFailures: record.consecutiveFailures,
            status: record.state.status
          }
        });
        throw outcome.error;
      case undefined:
        break;
    }

    return record.state;
  }

  /** `planning` until a goal has been planned and persisted. */
  async status(): Promise<AgentStatus> {
    const record = await this.store.load();
    return record?.state.status ?? 'planning';
  }

  async snapshot(): Promise<AgentRecord | null> {
    return this.store.load();
  }

  async readiness(): Promise<Readiness> {
    try {
      await this.store.ping();
      const record = await this.store.load();
      if (!record) {
        return { ready: true, status: 'planning' };
      }
      if (record.state.status === 'stalled') {
        return { ready: false, status: 'stalled', reason: record.lastFailure ?? 'Agent is stalled' };
      }
      return { ready: true, status: record.state.status };
    } catch (error) {
      return { ready: false, reason: errorMessage(error) };
    }
  }

  private async reportFailures<T>(requestId: string | undefined, operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      await this.auditLogger?.logError({
        requestId,
        error: errorMessage(error),
        code: isAgentError(error) ? error.code : undefined,
        context: { operation }
      });
      throw error;
    }
  }
}
