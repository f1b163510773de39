import type { AgentRecord, AgentState } from '../goals/types';
import type { StructuredAuditLogger } from '../security/audit-logger';

/** The part of the agent the scheduler drives. */
export interface ScheduledAgent {
  snapshot(): Promise<AgentRecord | null>;
  tick(options: { day?: number; requestId?: string }): Promise<AgentState>;
}

/** Options for constructing DailyScheduler. */
export interface DailySchedulerOptions {
  agent: ScheduledAgent;
  /** Heartbeat interval in ms. Default: 60000. */
  checkIntervalMs?: number;
  /** Optional clock for deterministic tests. Default: Date.now */
  getTime?: () => number;
  /** Optional timer functions for deterministic tests. */
  timers?: Pick<typeof globalThis, 'setInterval' | 'clearInterval'>;
  /** Receives every error raised by a scheduled tick. The heartbeat keeps running. */
  onError?: (error: unknown) => void;
  auditLogger?: StructuredAuditLogger;
}
