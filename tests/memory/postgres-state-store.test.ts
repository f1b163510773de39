import { newDb } from 'pg-mem';
import { KeyedMutex } from '../../memory/keyed-mutex';
import { PostgresStateStore } from '../../memory/repositories/postgres-state-store';
import type { AgentRecord } from '../../goals/types';
import { makeState } from '../support/fixtures';

function createPool() {
  const db = newDb();
  const pg = db.adapters.createPg();
  return new pg.Pool();
}

function increment(current: AgentRecord | null): AgentRecord {
  if (!current) throw new Error('record missing');
  return { ...current, consecutiveFailures: current.consecutiveFailures + 1 };
}

describe('PostgresStateStore', () => {
  it('persists and reloads the record', async () => {
    const pool = createPool();
    const store = new PostgresStateStore(pool);
    await store.ensureSchema();
    const record: AgentRecord = { state: makeState(), consecutiveFailures: 1, lastFailure: "Model said 'later'" };

    await expect(store.load()).resolves.toBeNull();
    await store.save(record);

    await expect(store.load()).resolves.toEqual(record);
    expect(store.description).toBe('postgres:default');
  });

  it('keeps records apart by key', async () => {
    const pool = createPool();
    const first = new PostgresStateStore(pool, { key: 'first' });
    const second = new PostgresStateStore(pool, { key: 'second' });
    await first.ensureSchema();

    await first.save({ state: makeState(), consecutiveFailures: 0 });

    await expect(second.load()).resolves.toBeNull();
  });

  it('applies sequential updates on top of each other', async () => {
    const pool = createPool();
    const store = new PostgresStateStore(pool);
    await store.ensureSchema();
    await store.save({ state: makeState(), consecutiveFailures: 0 });

    await Promise.all([1, 2, 3].map(() => store.update(async (current) => increment(current))));

    await expect(store.load()).resolves.toMatchObject({ consecutiveFailures: 3 });
  });

  it('re-runs an update that lost a race with another writer', async () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    const pool = createPool();
    const ours = new PostgresStateStore(pool, { mutex: new KeyedMutex() });
    const theirs = new PostgresStateStore(pool, { mutex: new KeyedMutex() });
    await ours.ensureSchema();
    await ours.save({ state: makeState(), consecutiveFailures: 0 });

    let interfered = false;
    const result = await ours.update(async (current) => {
      if (!interfered) {
        interfered = true;
        await theirs.update(async (latest) => increment(latest));
      }
      return increment(current);
    });

    expect(result.consecutiveFailures).toBe(2);
    await expect(ours.load()).resolves.toMatchObject({ consecutiveFailures: 2 });
    expect(warnSpy).toHaveBeenCalledWith('[WARNING] Agent state default changed concurrently; retrying update (1)');
    warnSpy.mockRestore();
  });

  it('gives up with a conflict after the retry budget', async () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    const pool = createPool();
    const ours = new PostgresStateStore(pool, { mutex: new KeyedMutex(), maxConflictRetries: 0 });
    const theirs = new PostgresStateStore(pool, { mutex: new KeyedMutex() });
    await ours.ensureSchema();
    await ours.save({ state: makeState(), consecutiveFailures: 0 });

    await expect(
      ours.update(async (current) => {
        await theirs.update(async (latest) => increment(latest));
        return increment(current);
      })
    ).rejects.toMatchObject({
      kind: 'conflict',
      message: 'Agent state default kept changing concurrently; gave up after 1 attempts'
    });
    warnSpy.mockRestore();
  });

  it('answers ping', async () => {
    const store = new PostgresStateStore(createPool());

    await expect(store.ping()).resolves.toBeUndefined();
  });
});
