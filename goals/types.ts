export type SubtaskStatus = 'pending' | 'in_progress' | 'done' | 'skipped';
export type AgentStatus = 'planning' | 'active' | 'completed' | 'stalled';

export interface Goal {
  text: string;
  createdAt: number;
}

export interface Subtask {
  id: number;
  description: string;
  status: SubtaskStatus;
}

export interface Plan {
  estimatedDays: number;
  subtasks: Subtask[];
}

export interface DailyEntry {
  day: number;
  subtaskId: number;
  summary: string;
  timestamp: number;
}

export interface AgentState {
  goal: Goal;
  plan: Plan;
  currentDay: number;
  currentSubtaskIndex: number;
  log: DailyEntry[];
  status: AgentStatus;
}

/** What the store persists: the agent state plus progress bookkeeping kept outside it. */
export interface AgentRecord {
  state: AgentState;
  consecutiveFailures: number;
  lastFailure?: string;
}

export const TERMINAL_STATUSES: readonly AgentStatus[] = ['completed', 'stalled'];

export function isTerminal(status: AgentStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}
