import type { AgentRecord } from '../../goals/types';
import { KeyedMutex } from '../keyed-mutex';
import { decodeRecord, encodeRecord } from '../record-codec';
import type { RecordMutator, StateStore } from '../state-store';

/**
 * Keeps the encoded document rather than the object, so callers never share references
 * with the store and every round trip goes through the same codec as the durable stores.
 */
export class InMemoryStateStore implements StateStore {
  readonly description = 'memory';
  private document: string | null = null;
  private readonly mutex = new KeyedMutex();

  async load(): Promise<AgentRecord | null> {
    return this.document === null ? null : decodeRecord(this.document);
  }

  async save(record: AgentRecord): Promise<void> {
    await this.mutex.runExclusive('record', async () => {
      this.document = encodeRecord(record);
    });
  }

  async update(mutator: RecordMutator): Promise<AgentRecord> {
    return this.mutex.runExclusive('record', async () => {
      const current = await this.load();
      const next = await mutator(current);
      if (next !== current) {
        this.document = encodeRecord(next);
      }
      return next;
    });
  }

  async ping(): Promise<void> {
    return;
  }

  /** Replaces the raw document; lets tests plant corrupt or future-version records. */
  setRawDocument(document: string | null): void {
    this.document = document;
  }
}
