/**
 * Terminal UI for the goal agent server: set a goal, run a day, inspect the plan.
 */

/* eslint-disable no-await-in-loop */

import { input, select, confirm } from '@inquirer/prompts';
import {
  describeHttpError,
  formatRecord,
  formatState,
  parseRecordBody,
  parseStateBody,
  parseStatusBody
} from './agent-tui-helpers';

const PORT = Number(process.env.PORT) || 3000;
const BASE_URL = process.env.AGENT_URL ?? `http://127.0.0.1:${PORT}`;

/** Max ms for a goal or tick request; planning and reviews wait on the model. Default 2 min. */
const REQUEST_TIMEOUT_MS = (() => {
  const raw = Number(process.env.AGENT_REQUEST_TIMEOUT_MS ?? 120_000);
  return Number.isFinite(raw) && raw > 0 ? Math.floor(raw) : 120_000;
})();

type Action = 'goal' | 'tick' | 'state' | 'health' | 'exit';

async function request(path: string, init: { method?: string; body?: unknown } = {}): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);
  let res: Response;
  try {
    res = await fetch(`${BASE_URL}${path}`, {
      method: init.method ?? 'GET',
      headers: init.body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: init.body === undefined ? undefined : JSON.stringify(init.body),
      signal: controller.signal
    });
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') {
      throw new Error(`Request timed out after ${REQUEST_TIMEOUT_MS / 1000}s`);
    }
    throw err;
  } finally {
    clearTimeout(timeoutId);
  }
  const text = await res.text();
  if (!res.ok) {
    throw new Error(describeHttpError(res.status, text));
  }
  return text;
}

async function checkHealth(): Promise<boolean> {
  try {
    await request('/health');
    const ready = await fetch(`${BASE_URL}/ready`);
    console.log(`\n✓ Server healthy: ${await ready.text()}`);
    return true;
  } catch (err) {
    console.error('\n✗ Connection failed:', err instanceof Error ? err.message : String(err));
  }
  return false;
}

async function setGoal(): Promise<void> {
  const goal = await input({
    message: 'What goal should the agent work towards?',
    validate: (v: string) => (v.trim() ? true : 'Required')
  });
  console.log('\nPlanning...');
  const state = parseStateBody(await request('/agent/goal', { method: 'POST', body: { goal: goal.trim() } }));
  console.log(formatState(state));
}

async function runTick(): Promise<void> {
  const status = parseStatusBody(await request('/agent/status'));
  if (status !== 'active') {
    console.log(`\nNothing to run: agent is ${status}.`);
    return;
  }
  console.log('\nWorking on today\'s subtask...');
  const state = parseStateBody(await request('/agent/tick', { method: 'POST', body: {} }));
  const latest = state.log[state.log.length - 1];
  if (latest) {
    console.log(`\nDay ${latest.day + 1}: ${latest.summary}`);
  }
  if (state.status === 'completed') {
    console.log('\nGoal completed.');
  }
}

async function showState(): Promise<void> {
  try {
    console.log(formatRecord(parseRecordBody(await request('/agent/state'))));
  } catch (err) {
    if (err instanceof Error && err.message.startsWith('HTTP 404')) {
      console.log('\nNo goal yet. Choose "Set goal" first.');
      return;
    }
    throw err;
  }
}

export async function main(): Promise<void> {
  console.log(`\nGoal Agent TUI — ${BASE_URL}\n`);

  const healthy = await checkHealth();
  if (!healthy) {
    console.log('\nStart the server with: npm run build && npm start');
    console.log('Or set AGENT_URL for a different endpoint.\n');
    process.exit(1);
  }

  // eslint-disable-next-line no-constant-condition
  while (true) {
    const action = await select<Action>({
      message: 'Choose an operation',
      choices: [
        { name: 'Set goal', value: 'goal' },
        { name: 'Run today\'s subtask', value: 'tick' },
        { name: 'Show plan and progress', value: 'state' },
        { name: 'Health check', value: 'health' },
        { name: 'Exit', value: 'exit' }
      ]
    });

    if (action === 'exit') {
      console.log('\nGoodbye.\n');
      break;
    }

    try {
      switch (action) {
        case 'goal':
          await setGoal();
          break;
        case 'tick':
          await runTick();
          break;
        case 'state':
          await showState();
          break;
        case 'health':
          await checkHealth();
          continue;
      }
    } catch (err) {
      console.error('\n✗ Request failed:', err instanceof Error ? err.message : String(err));
      const retry = await confirm({ message: 'Show current state?', default: false });
      if (retry) {
        await showState().catch((stateErr: unknown) => {
          console.error('\n✗ Request failed:', stateErr instanceof Error ? stateErr.message : String(stateErr));
        });
      }
    }

    await input({ message: 'Press Enter to continue', default: '' });
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error('[ERROR] TUI failed:', err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
