import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { newDb } from 'pg-mem';
import { GoalAgent } from '../../core/agent/goal-agent';
import { GatewayError } from '../../core/contracts/errors';
import { LlmPlanner } from '../../goals/planner';
import { ProgressEngine } from '../../goals/progress-engine';
import type { AgentState } from '../../goals/types';
import type { CompletionGateway } from '../../llm/model-gateway';
import { KeyedMutex } from '../../memory/keyed-mutex';
import { FileStateStore } from '../../memory/repositories/file-state-store';
import { PostgresStateStore } from '../../memory/repositories/postgres-state-store';
import { InMemoryAuditLogger, StructuredAuditLogger } from '../../security/audit-logger';
import { ScriptedGateway, makeState } from '../support/fixtures';
import { WORKOUT_PLAN, createTestAgent } from '../support/agent';

const GOAL = 'Build a workout planner';

function reviewReply(prompt: string): string {
  const match = prompt.match(/Today's subtask \((\d+) of \d+\)/);
  return `Finished subtask ${match?.[1] ?? '?'}.`;
}

describe('daily goal flow', () => {
  it('plans a five day goal into an active state', async () => {
    const { agent, store } = createTestAgent({ replies: [WORKOUT_PLAN] });

    const state = await agent.runOnce(GOAL);

    expect(state).toMatchObject({ status: 'active', currentDay: 0, currentSubtaskIndex: 0 });
    expect(state.plan.estimatedDays).toBe(5);
    expect(state.plan.subtasks).toHaveLength(5);
    await expect(store.load()).resolves.toMatchObject({ state: { status: 'active', currentDay: 0 } });
  });

  it('completes after five successful ticks', async () => {
    const { agent } = createTestAgent({ replies: [WORKOUT_PLAN], fallback: reviewReply });
    await agent.runOnce(GOAL);

    let state: AgentState | undefined;
    for (let i = 0; i < 5; i += 1) {
      state = await agent.tick();
    }

    expect(state?.status).toBe('completed');
    expect(state?.log.map((entry) => entry.day)).toEqual([0, 1, 2, 3, 4]);
    expect(state?.log.map((entry) => entry.summary)).toEqual([
      'Finished subtask 1.',
      'Finished subtask 2.',
      'Finished subtask 3.',
      'Finished subtask 4.',
      'Finished subtask 5.'
    ]);
    expect(state?.plan.subtasks.every((subtask) => subtask.status === 'done')).toBe(true);
    await expect(agent.status()).resolves.toBe('completed');
  });

  it('treats a repeated tick for the same day as a no-op', async () => {
    const { agent, gateway } = createTestAgent({ replies: [WORKOUT_PLAN], fallback: reviewReply });
    await agent.runOnce(GOAL);

    const first = await agent.tick({ day: 0 });
    const second = await agent.tick({ day: 0 });

    expect(second).toEqual(first);
    expect(gateway.prompts).toHaveLength(2);
  });

  it('advances exactly one day under concurrent ticks for the same day', async () => {
    const { agent, gateway } = createTestAgent({ replies: [WORKOUT_PLAN], fallback: reviewReply });
    await agent.runOnce(GOAL);

    const results = await Promise.all(Array.from({ length: 6 }, () => agent.tick({ day: 0 })));

    for (const result of results) {
      expect(result.currentDay).toBe(1);
      expect(result.log).toHaveLength(1);
    }
    expect(gateway.prompts).toHaveLength(2);
  });

  it('serializes concurrent ticks across store instances on one file', async () => {
    const dir = await fs.mkdtemp(join(tmpdir(), 'goal-agent-flow-'));
    try {
      const path = join(dir, 'agent_memory.json');
      const first = createTestAgent({ replies: [WORKOUT_PLAN], fallback: reviewReply, store: new FileStateStore({ path }) });
      const second = createTestAgent({ fallback: reviewReply, store: new FileStateStore({ path }) });
      await first.agent.runOnce(GOAL);

      await Promise.all([first.agent.tick({ day: 0 }), second.agent.tick({ day: 0 }), first.agent.tick({ day: 0 })]);

      const record = await new FileStateStore({ path }).load();
      expect(record?.state.currentDay).toBe(1);
      expect(record?.state.log).toHaveLength(1);
      expect(first.gateway.prompts.length + second.gateway.prompts.length).toBe(2);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('reports the outcome of the attempt that was persisted after a lost write race', async () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    const pool = new (newDb().adapters.createPg().Pool)();
    const ours = new PostgresStateStore(pool, { mutex: new KeyedMutex() });
    const theirs = new PostgresStateStore(pool, { mutex: new KeyedMutex() });
    await ours.ensureSchema();

    let calls = 0;
    const gateway: CompletionGateway = {
      async complete() {
        calls += 1;
        if (calls === 1) {
          return WORKOUT_PLAN;
        }
        if (calls === 2) {
          // Another writer bumps the row while this review is in flight
          await theirs.update(async (latest) => {
            if (!latest) throw new Error('record missing');
            return { ...latest, lastFailure: 'touched elsewhere' };
          });
          throw new GatewayError('transient', 'busy');
        }
        return 'Listed 20 exercises.';
      }
    };
    const sink = new InMemoryAuditLogger();
    const agent = new GoalAgent({
      store: ours,
      planner: new LlmPlanner(gateway),
      engine: new ProgressEngine({ gateway }),
      auditLogger: new StructuredAuditLogger(sink)
    });
    await agent.runOnce(GOAL);

    const state = await agent.tick();

    expect(state.currentDay).toBe(1);
    await expect(ours.load()).resolves.toMatchObject({ state: { currentDay: 1 }, consecutiveFailures: 0 });
    expect(sink.ofType('error')).toHaveLength(0);
    expect(sink.ofType('day_advanced')).toHaveLength(1);
    expect(warnSpy).toHaveBeenCalledWith('[WARNING] Agent state default changed concurrently; retrying update (1)');
    warnSpy.mockRestore();
  });

  it('survives a restart by reloading from disk', async () => {
    const dir = await fs.mkdtemp(join(tmpdir(), 'goal-agent-restart-'));
    try {
      const path = join(dir, 'agent_memory.json');
      const before = createTestAgent({ replies: [WORKOUT_PLAN], fallback: reviewReply, store: new FileStateStore({ path }) });
      await before.agent.runOnce(GOAL);
      const afterDayOne = await before.agent.tick({ day: 0 });

      const after = createTestAgent({ fallback: reviewReply, store: new FileStateStore({ path }) });
      await expect(after.agent.tick({ day: 0 })).resolves.toEqual(afterDayOne);
      const dayTwo = await after.agent.tick({ day: 1 });

      expect(dayTwo.log.map((entry) => entry.subtaskId)).toEqual([1, 2]);
      expect(after.gateway.prompts).toHaveLength(1);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});

describe('progress engine properties', () => {
  it('gives the same result when run twice on the same input', async () => {
    const engine = new ProgressEngine({ gateway: new ScriptedGateway([], () => 'Same every time.'), getTime: () => 5 });
    const state = makeState();

    const once = await engine.advanceDay(state);
    const twice = await engine.advanceDay(state);

    expect(twice).toEqual(once);
  });

  it('never moves currentDay or the done count backwards', async () => {
    const gateway = new ScriptedGateway(['a', new Error('not a gateway error'), 'b', 'c', 'd']);
    const engine = new ProgressEngine({ gateway, getTime: () => 5 });
    let state = makeState();
    let lastDay = state.currentDay;
    let lastDone = 0;

    for (let i = 0; i < 5; i += 1) {
      try {
        state = (await engine.advanceDay(state)).state;
      } catch (error) {
        expect(error).toEqual(new Error('not a gateway error'));
      }
      const done = state.plan.subtasks.filter((subtask) => subtask.status === 'done').length;
      expect(state.currentDay).toBeGreaterThanOrEqual(lastDay);
      expect(done).toBeGreaterThanOrEqual(lastDone);
      lastDay = state.currentDay;
      lastDone = done;
    }

    expect(state.status).toBe('completed');
  });
});
