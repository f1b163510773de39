/**
 * Versioned JSON document for the persisted AgentRecord:
 *
 *   { schemaVersion, savedAt, state, progress: { consecutiveFailures, lastFailure? } }
 *
 * Decoding validates the state against the data-model invariants. Anything that fails is
 * reported as corrupt and never repaired; a newer schemaVersion is rejected explicitly.
 */

import { z } from 'zod';
import { StoreError } from '../core/contracts/errors';
import type { AgentRecord, AgentState } from '../goals/types';

export const CURRENT_SCHEMA_VERSION = 1;

const nonNegativeInt = z.number().int().min(0);

const subtaskSchema = z.object({
  id: z.number().int().min(1),
  description: z.string().min(1),
  status: z.enum(['pending', 'in_progress', 'done', 'skipped'])
});

const dailyEntrySchema = z.object({
  day: nonNegativeInt,
  subtaskId: z.number().int().min(1),
  summary: z.string(),
  timestamp: z.number()
});

export const agentStateSchema = z
  .object({
    goal: z.object({ text: z.string().min(1), createdAt: z.number() }),
    plan: z.object({
      estimatedDays: z.number().int().min(1),
      subtasks: z.array(subtaskSchema).min(1)
    }),
    currentDay: nonNegativeInt,
    currentSubtaskIndex: nonNegativeInt,
    log: z.array(dailyEntrySchema),
    status: z.enum(['planning', 'active', 'completed', 'stalled'])
  })
  .superRefine((state, ctx) => {
    const ids = state.plan.subtasks.map((subtask) => subtask.id);
    if (new Set(ids).size !== ids.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['plan', 'subtasks'], message: 'subtask ids must be unique' });
    }
    if (state.currentDay > state.log.length + 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['currentDay'], message: 'currentDay exceeds log length + 1' });
    }
    if (state.status === 'active') {
      const current = state.plan.subtasks[state.currentSubtaskIndex];
      if (!current || (current.status !== 'pending' && current.status !== 'in_progress')) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['currentSubtaskIndex'],
          message: 'active state must point at a pending or in-progress subtask'
        });
      }
    }
  });

/** The record as the HTTP surface returns it. */
export const agentRecordSchema = z.object({
  state: agentStateSchema,
  consecutiveFailures: nonNegativeInt,
  lastFailure: z.string().optional()
});

const documentSchema = z.object({
  schemaVersion: z.number().int().min(1),
  savedAt: z.number().optional(),
  state: agentStateSchema,
  progress: z
    .object({
      consecutiveFailures: nonNegativeInt.default(0),
      lastFailure: z.string().optional()
    })
    .default({ consecutiveFailures: 0 })
});

export function encodeRecord(record: AgentRecord, savedAt: number = Date.now()): string {
  const progress: { consecutiveFailures: number; lastFailure?: string } = {
    consecutiveFailures: record.consecutiveFailures
  };
  if (record.lastFailure !== undefined) {
    progress.lastFailure = record.lastFailure;
  }
  return JSON.stringify(
    { schemaVersion: CURRENT_SCHEMA_VERSION, savedAt, state: record.state, progress },
    null,
    2
  );
}

export function decodeRecord(raw: string): AgentRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StoreError('corrupt', 'Stored agent state is not valid JSON', error);
  }

  const version = readSchemaVersion(parsed);
  if (version > CURRENT_SCHEMA_VERSION) {
    throw new StoreError(
      'unsupported_version',
      `Stored agent state has schemaVersion ${version}; this engine reads up to ${CURRENT_SCHEMA_VERSION}`
    );
  }

  const result = documentSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new StoreError('corrupt', `Stored agent state failed validation: ${issues}`);
  }

  const state: AgentState = result.data.state;
  const record: AgentRecord = { state, consecutiveFailures: result.data.progress.consecutiveFailures };
  if (result.data.progress.lastFailure !== undefined) {
    record.lastFailure = result.data.progress.lastFailure;
  }
  return record;
}

function readSchemaVersion(parsed: unknown): number {
  if (typeof parsed !== 'object' || parsed === null || !('schemaVersion' in parsed)) {
    throw new StoreError('corrupt', 'Stored agent state has no schemaVersion');
  }
  const version = parsed.schemaVersion;
  if (typeof version !== 'number' || !Number.isInteger(version) || version < 1) {
    throw new StoreError('corrupt', `Stored agent state has an invalid schemaVersion: ${String(version)}`);
  }
  return version;
}
