import type { CompletionGateway } from '../../llm/model-gateway';
import type { AgentState, Subtask } from '../../goals/types';

export function makeSubtasks(descriptions: string[]): Subtask[] {
  return descriptions.map((description, index) => ({ id: index + 1, description, status: 'pending' }));
}

export function makeState(overrides: Partial<AgentState> = {}): AgentState {
  return {
    goal: { text: 'Learn to juggle', createdAt: 0 },
    plan: { estimatedDays: 3, subtasks: makeSubtasks(['Two balls', 'Three balls', 'Juggle for a minute']) },
    currentDay: 0,
    currentSubtaskIndex: 0,
    log: [],
    status: 'active',
    ...overrides
  };
}

/** Gateway that answers from a list; an Error entry is thrown instead of returned. */
export class ScriptedGateway implements CompletionGateway {
  readonly prompts: string[] = [];

  constructor(private readonly replies: Array<string | Error> = [], private readonly fallback?: (prompt: string) => string) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const next = this.replies.shift();
    if (next instanceof Error) {
      throw next;
    }
    if (next !== undefined) {
      return next;
    }
    if (this.fallback) {
      return this.fallback(prompt);
    }
    throw new Error('ScriptedGateway ran out of replies');
  }
}

export async function captureError(fn: () => unknown): Promise<unknown> {
  try {
    await fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
