/**
 * Pure helpers for the agent TUI. Exported for testing.
 */

import { z } from 'zod';
import type { AgentRecord, AgentState, AgentStatus, SubtaskStatus } from '../goals/types';
import { agentRecordSchema, agentStateSchema } from '../memory/record-codec';

const errorBodySchema = z.object({ error: z.string(), code: z.string().optional() });
const statusBodySchema = z.object({ status: z.enum(['planning', 'active', 'completed', 'stalled']) });

const STATUS_MARKERS: Record<SubtaskStatus, string> = {
  done: '[x]',
  skipped: '[-]',
  in_progress: '[>]',
  pending: '[ ]'
};

export function parseStateBody(text: string): AgentState {
  return agentStateSchema.parse(JSON.parse(text));
}

export function parseRecordBody(text: string): AgentRecord {
  return agentRecordSchema.parse(JSON.parse(text));
}

export function parseStatusBody(text: string): AgentStatus {
  return statusBodySchema.parse(JSON.parse(text)).status;
}

/** `HTTP <status> (<code>): <message>` when the body is a server error, raw text otherwise. */
export function describeHttpError(status: number, text: string): string {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return `HTTP ${status}: ${text}`;
  }
  const parsed = errorBodySchema.safeParse(body);
  if (!parsed.success) {
    return `HTTP ${status}: ${text}`;
  }
  const { error, code } = parsed.data;
  return code ? `HTTP ${status} (${code}): ${error}` : `HTTP ${status}: ${error}`;
}

export function formatState(state: AgentState): string {
  const subtasks = state.plan.subtasks;
  const done = subtasks.filter((subtask) => subtask.status === 'done').length;
  const lines: string[] = ['\n--- Goal ---'];
  lines.push(`Goal: ${state.goal.text}`);
  lines.push(`Status: ${state.status}`);
  lines.push(`Progress: ${done}/${subtasks.length} subtasks done, ${state.log.length} of ${state.plan.estimatedDays} days logged`);

  lines.push('Plan:');
  subtasks.forEach((subtask, index) => {
    const pointer = state.status === 'active' && index === state.currentSubtaskIndex ? ' <- next' : '';
    lines.push(`  ${STATUS_MARKERS[subtask.status]} ${subtask.id}. ${subtask.description}${pointer}`);
  });

  if (state.log.length) {
    lines.push('Log:');
    for (const entry of state.log) {
      lines.push(`  Day ${entry.day + 1} (subtask ${entry.subtaskId}): ${entry.summary}`);
    }
  }
  return lines.join('\n');
}

export function formatRecord(record: AgentRecord): string {
  const lines = [formatState(record.state)];
  if (record.consecutiveFailures > 0) {
    lines.push(`Consecutive failures: ${record.consecutiveFailures}`);
  }
  if (record.lastFailure) {
    lines.push(`Last failure: ${record.lastFailure}`);
  }
  return lines.join('\n');
}
