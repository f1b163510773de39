import type { AgentRecord } from '../goals/types';

/**
 * Receives the stored record (null on first run) and returns the record to persist.
 * Returning the same reference it was given means "no change": nothing is written.
 */
export type RecordMutator = (current: AgentRecord | null) => Promise<AgentRecord>;

/**
 * Durable home of the single agent record. Implementations serialize `update` per record
 * so that two concurrent callers never interleave a load-modify-save cycle, and make
 * `save` atomic: a reader sees either the previous or the new document, never a mix.
 */
export interface StateStore {
  readonly description: string;
  load(): Promise<AgentRecord | null>;
  save(record: AgentRecord): Promise<void>;
  update(mutator: RecordMutator): Promise<AgentRecord>;
  /** Resolves when the backing medium is reachable. */
  ping(): Promise<void>;
}
