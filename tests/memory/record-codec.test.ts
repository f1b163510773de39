import { StoreError } from '../../core/contracts/errors';
import { CURRENT_SCHEMA_VERSION, decodeRecord, encodeRecord } from '../../memory/record-codec';
import { captureError, makeState } from '../support/fixtures';

describe('record codec', () => {
  it('writes a versioned document with progress kept beside the state', () => {
    const state = makeState();
    const document = JSON.parse(encodeRecord({ state, consecutiveFailures: 2, lastFailure: 'timed out' }, 42));

    expect(document).toEqual({
      schemaVersion: CURRENT_SCHEMA_VERSION,
      savedAt: 42,
      state,
      progress: { consecutiveFailures: 2, lastFailure: 'timed out' }
    });
  });

  it('reads back what it wrote', () => {
    const record = { state: makeState(), consecutiveFailures: 0 };

    expect(decodeRecord(encodeRecord(record))).toEqual(record);
  });

  it('defaults missing progress to zero failures', () => {
    const raw = JSON.stringify({ schemaVersion: 1, state: makeState() });

    expect(decodeRecord(raw)).toEqual({ state: makeState(), consecutiveFailures: 0 });
  });

  it('reports unparsable JSON as corrupt', async () => {
    const error = await captureError(() => decodeRecord('{"schemaVersion": 1,'));

    expect(error).toBeInstanceOf(StoreError);
    expect(error).toMatchObject({ kind: 'corrupt', message: 'Stored agent state is not valid JSON' });
  });

  it('reports a missing schemaVersion as corrupt', async () => {
    const error = await captureError(() => decodeRecord(JSON.stringify({ state: makeState() })));

    expect(error).toMatchObject({ kind: 'corrupt', message: 'Stored agent state has no schemaVersion' });
  });

  it('refuses a newer schemaVersion', async () => {
    const error = await captureError(() => decodeRecord(JSON.stringify({ schemaVersion: 2, state: makeState() })));

    expect(error).toMatchObject({ kind: 'unsupported_version' });
  });

  it('rejects states that break the data-model invariants', async () => {
    const duplicateIds = makeState();
    duplicateIds.plan.subtasks = duplicateIds.plan.subtasks.map((subtask) => ({ ...subtask, id: 1 }));
    const dayAhead = makeState({ currentDay: 2 });
    const pointsAtDone = makeState();
    pointsAtDone.plan.subtasks = pointsAtDone.plan.subtasks.map((subtask) => ({ ...subtask, status: 'done' as const }));

    for (const state of [duplicateIds, dayAhead, pointsAtDone]) {
      const error = await captureError(() => decodeRecord(JSON.stringify({ schemaVersion: 1, state })));
      expect(error).toMatchObject({ kind: 'corrupt' });
      expect(error instanceof Error && error.message).toMatch(/^Stored agent state failed validation: /);
    }
  });

  it('accepts a completed state whose index is past the last subtask', () => {
    const state = makeState({ status: 'completed', currentSubtaskIndex: 3 });

    expect(decodeRecord(encodeRecord({ state, consecutiveFailures: 0 })).state.currentSubtaskIndex).toBe(3);
  });
});
