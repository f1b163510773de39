/**
 * The daily state machine: planning -> active -> completed | stalled.
 *
 * advanceDay never mutates its input. A successful review produces a new state with
 * one more log entry; a failed review returns the input state untouched (or, once the
 * failure threshold is reached, a stalled copy of it).
 */

import { AdvanceError, GatewayError } from '../core/contracts/errors';
import type { CompletionGateway } from '../llm/model-gateway';
import type { AgentState, DailyEntry, Subtask, SubtaskStatus } from './types';

export type NoopReason = 'not_active' | 'day_already_logged';

export type AdvanceOutcome =
  | { kind: 'advanced'; state: AgentState; entry: DailyEntry; skippedSubtasks: number }
  | { kind: 'noop'; state: AgentState; reason: NoopReason }
  | { kind: 'failed'; state: AgentState; error: GatewayError; consecutiveFailures: number; stalled: boolean };

export interface AdvanceContext {
  /** Failures recorded since the last successful advance. */
  consecutiveFailures?: number;
}

export interface ProgressEngineOptions {
  gateway: CompletionGateway;
  stallThreshold?: number;
  logTailSize?: number;
  maxSummaryLength?: number;
  getTime?: () => number;
}

const GOAL_COMPLETE_MARKER = /^\s*GOAL COMPLETE\b[\s.:!-]*/i;

export class ProgressEngine {
  private readonly gateway: CompletionGateway;
  private readonly stallThreshold: number;
  private readonly logTailSize: number;
  private readonly maxSummaryLength: number;
  private readonly getTime: () => number;

  constructor(options: ProgressEngineOptions) {
    const stallThreshold = options.stallThreshold ?? 3;
    if (!Number.isInteger(stallThreshold) || stallThreshold < 1) {
      throw new Error(`stallThreshold must be a positive integer. Got: ${options.stallThreshold}`);
    }
    this.gateway = options.gateway;
    this.stallThreshold = stallThreshold;
    this.logTailSize = options.logTailSize ?? 3;
    this.maxSummaryLength = options.maxSummaryLength ?? 2000;
    this.getTime = options.getTime ?? (() => Date.now());
  }

  async advanceDay(state: AgentState, context: AdvanceContext = {}): Promise<AdvanceOutcome> {
    if (state.status !== 'active') {
      return { kind: 'noop', state, reason: 'not_active' };
    }

    // A restart after a successful save must not re-run the same day
    if (state.log.some((entry) => entry.day === state.currentDay)) {
      return { kind: 'noop', state, reason: 'day_already_logged' };
    }

    const index = state.currentSubtaskIndex;
    const subtask = state.plan.subtasks[index];
    if (!subtask || (subtask.status !== 'pending' && subtask.status !== 'in_progress')) {
      throw new AdvanceError(
        'invalid_state',
        `Current subtask index ${index} does not point at a pending subtask`
      );
    }

    const inProgress = withSubtaskStatus(state, index, 'in_progress');

    let reply: string;
    try {
      reply = await this.gateway.complete(buildReviewPrompt(inProgress, subtask, this.logTailSize));
    } catch (error) {
      if (!(error instanceof GatewayError)) {
        throw error;
      }
      const consecutiveFailures = (context.consecutiveFailures ?? 0) + 1;
      const stalled = consecutiveFailures >= this.stallThreshold;
      return {
        kind: 'failed',
        state: stalled ? { ...state, status: 'stalled' } : state,
        error,
        consecutiveFailures,
        stalled
      };
    }

    const { summary, goalComplete } = interpretReview(reply, this.maxSummaryLength);
    const entry: DailyEntry = {
      day: state.currentDay,
      subtaskId: subtask.id,
      summary,
      timestamp: this.getTime()
    };

    let subtasks = withSubtaskStatus(inProgress, index, 'done').plan.subtasks;
    let skippedSubtasks = 0;
    if (goalComplete) {
      subtasks = subtasks.map((candidate): Subtask => {
        if (candidate.status !== 'pending') return candidate;
        skippedSubtasks += 1;
        return { ...candidate, status: 'skipped' };
      });
    }

    const nextIndex = subtasks.findIndex((candidate) => candidate.status === 'pending');
    const completed = nextIndex < 0;

    return {
      kind: 'advanced',
      entry,
      skippedSubtasks,
      state: {
        ...state,
        plan: { ...state.plan, subtasks },
        currentDay: state.currentDay + 1,
        currentSubtaskIndex: completed ? subtasks.length : nextIndex,
        log: [...state.log, entry],
        status: completed ? 'completed' : 'active'
      }
    };
  }
}

function withSubtaskStatus(state: AgentState, index: number, status: SubtaskStatus): AgentState {
  return {
    ...state,
    plan: {
      ...state.plan,
      subtasks: state.plan.subtasks.map((subtask, i) => (i === index ? { ...subtask, status } : subtask))
    }
  };
}

export function interpretReview(reply: string, maxSummaryLength: number): { summary: string; goalComplete: boolean } {
  const goalComplete = GOAL_COMPLETE_MARKER.test(reply);
  const text = (goalComplete ? reply.replace(GOAL_COMPLETE_MARKER, '') : reply).trim();
  const summary = text || 'Goal reported complete.';
  return {
    goalComplete,
    summary: summary.length > maxSummaryLength ? `${summary.slice(0, maxSummaryLength - 3)}...` : summary
  };
}

export function buildReviewPrompt(state: AgentState, subtask: Subtask, logTailSize: number): string {
  const total = state.plan.subtasks.length;
  const done = state.plan.subtasks.filter((candidate) => candidate.status === 'done').map((candidate) => candidate.description);
  const tail = logTailSize > 0 ? state.log.slice(-logTailSize) : [];

  const lines = [
    'You are an autonomous assistant working through a multi-day plan, one subtask per day.',
    `Goal: "${state.goal.text}"`,
    `Today is day ${state.currentDay + 1} of an estimated ${state.plan.estimatedDays}.`,
    `Today's subtask (${subtask.id} of ${total}): ${subtask.description}`,
    `Already completed: ${done.length ? done.join('; ') : 'nothing yet'}.`
  ];

  if (tail.length) {
    lines.push('Recent progress:');
    for (const entry of tail) {
      lines.push(`- Day ${entry.day + 1} (subtask ${entry.subtaskId}): ${entry.summary}`);
    }
  }

  lines.push(
    "Carry out today's subtask and reply with a short summary (2-3 sentences) of what was done.",
    "If the overall goal is now fully accomplished, start your reply with 'GOAL COMPLETE'."
  );
  return lines.join('\n');
}
