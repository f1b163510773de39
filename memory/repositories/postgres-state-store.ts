import type { Pool } from 'pg';
import { StoreError, errorMessage } from '../../core/contracts/errors';
import type { AgentRecord } from '../../goals/types';
import { processStateLocks, type KeyedMutex } from '../keyed-mutex';
import { decodeRecord, encodeRecord } from '../record-codec';
import type { RecordMutator, StateStore } from '../state-store';

export interface PostgresStateStoreOptions {
  key?: string;
  maxConflictRetries?: number;
  mutex?: KeyedMutex;
  getTime?: () => number;
}

type StateRow = {
  document: string;
  revision: number | string;
};

/**
 * One row per agent record, guarded by optimistic concurrency on `revision`.
 * A write that loses the race re-runs the whole read-modify-write against the
 * winner's document.
 */
export class PostgresStateStore implements StateStore {
  private readonly key: string;
  private readonly maxConflictRetries: number;
  private readonly mutex: KeyedMutex;
  private readonly getTime: () => number;

  constructor(
    private readonly pool: Pool,
    options: PostgresStateStoreOptions = {}
  ) {
    this.key = options.key ?? 'default';
    this.maxConflictRetries = options.maxConflictRetries ?? 3;
    this.mutex = options.mutex ?? processStateLocks;
    this.getTime = options.getTime ?? (() => Date.now());
  }

  get description(): string {
    return `postgres:${this.key}`;
  }

  async ensureSchema(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS agent_state (
        state_key TEXT PRIMARY KEY,
        document TEXT NOT NULL,
        revision INTEGER NOT NULL,
        updated_at BIGINT NOT NULL
      );
    `);
  }

  async load(): Promise<AgentRecord | null> {
    const row = await this.readRow();
    return row ? decodeRecord(row.document) : null;
  }

  async save(record: AgentRecord): Promise<void> {
    await this.update(async () => record);
  }

  async update(mutator: RecordMutator): Promise<AgentRecord> {
    return this.mutex.runExclusive(this.lockKey, async () => {
      for (let attempt = 0; attempt <= this.maxConflictRetries; attempt += 1) {
        const row = await this.readRow();
        const current = row ? decodeRecord(row.document) : null;
        const next = await mutator(current);
        if (next === current) {
          return next;
        }

        const written = row
          ? await this.compareAndSwap(next, Number(row.revision))
          : await this.insertIfAbsent(next);
        if (written) {
          return next;
        }
        console.warn(`[WARNING] Agent state ${this.key} changed concurrently; retrying update (${attempt + 1})`);
      }

      throw new StoreError(
        'conflict',
        `Agent state ${this.key} kept changing concurrently; gave up after ${this.maxConflictRetries + 1} attempts`
      );
    });
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  private get lockKey(): string {
    return `postgres:${this.key}`;
  }

  private async readRow(): Promise<StateRow | null> {
    const result = await this.pool.query<StateRow>(
      'SELECT document, revision FROM agent_state WHERE state_key = $1',
      [this.key]
    );
    return result.rows[0] ?? null;
  }

  private async compareAndSwap(record: AgentRecord, revision: number): Promise<boolean> {
    const now = this.getTime();
    const rowCount = await this.execute(
      'UPDATE agent_state SET document = $1, revision = $2, updated_at = $3 WHERE state_key = $4 AND revision = $5',
      [encodeRecord(record, now), revision + 1, now, this.key, revision]
    );
    return rowCount === 1;
  }

  private async insertIfAbsent(record: AgentRecord): Promise<boolean> {
    const now = this.getTime();
    const rowCount = await this.execute(
      `
      INSERT INTO agent_state (state_key, document, revision, updated_at)
      VALUES ($1, $2, 1, $3)
      ON CONFLICT (state_key) DO NOTHING
      `,
      [this.key, encodeRecord(record, now), now]
    );
    return rowCount === 1;
  }

  private async execute(text: string, values: unknown[]): Promise<number> {
    try {
      const result = await this.pool.query(text, values);
      return result.rowCount ?? 0;
    } catch (error) {
      throw new StoreError('write_failed', `Failed to write agent state ${this.key}: ${errorMessage(error)}`, error);
    }
  }
}
