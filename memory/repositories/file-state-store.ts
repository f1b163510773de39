/**
 * JSON-file home of the agent record (default data/agent_memory.json).
 *
 * Writes go to a temp file in the same directory, are fsynced, then renamed over the
 * target, so a crash leaves either the old or the new document. Read-modify-write cycles
 * hold the in-process keyed mutex and an O_EXCL lock file (<path>.lock) that other
 * processes honor; a lock file older than staleLockMs is taken over.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { dirname, basename, join, resolve } from 'path';
import { homedir } from 'os';
import { randomUUID } from 'crypto';
import { StoreError, errorMessage } from '../../core/contracts/errors';
import type { AgentRecord } from '../../goals/types';
import { processStateLocks, type KeyedMutex } from '../keyed-mutex';
import { decodeRecord, encodeRecord } from '../record-codec';
import type { RecordMutator, StateStore } from '../state-store';

export const DEFAULT_LOCK_TIMEOUT_MS = 60_000;
export const DEFAULT_STALE_LOCK_MS = 10 * 60_000;

const lockFileSchema = z.object({ token: z.string() });

export interface FileStateStoreOptions {
  path: string;
  lockTimeoutMs?: number;
  staleLockMs?: number;
  lockRetryMs?: number;
  mutex?: KeyedMutex;
  getTime?: () => number;
}

export function resolveStatePath(raw: string): string {
  return resolve(process.cwd(), raw.replace(/^~/, homedir()));
}

export class FileStateStore implements StateStore {
  readonly path: string;
  readonly lockPath: string;
  readonly lockTimeoutMs: number;
  readonly staleLockMs: number;
  private readonly lockRetryMs: number;
  private readonly mutex: KeyedMutex;
  private readonly getTime: () => number;

  constructor(options: FileStateStoreOptions) {
    this.path = resolveStatePath(options.path);
    this.lockPath = `${this.path}.lock`;
    this.lockTimeoutMs = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    this.staleLockMs = options.staleLockMs ?? DEFAULT_STALE_LOCK_MS;
    this.lockRetryMs = options.lockRetryMs ?? 50;
    this.mutex = options.mutex ?? processStateLocks;
    this.getTime = options.getTime ?? (() => Date.now());
  }

  get description(): string {
    return `file:${this.path}`;
  }

  async load(): Promise<AgentRecord | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.path, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
    return decodeRecord(raw);
  }

  async save(record: AgentRecord): Promise<void> {
    await this.exclusive(() => this.write(record));
  }

  async update(mutator: RecordMutator): Promise<AgentRecord> {
    return this.exclusive(async () => {
      const current = await this.load();
      const next = await mutator(current);
      if (next !== current) {
        await this.write(next);
      }
      return next;
    });
  }

  async ping(): Promise<void> {
    const directory = dirname(this.path);
    await fs.mkdir(directory, { recursive: true });
    await fs.access(directory, fs.constants.R_OK | fs.constants.W_OK);
  }

  private async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(this.path, async () => {
      const token = await this.acquireFileLock();
      try {
        return await fn();
      } finally {
        await this.releaseFileLock(token);
      }
    });
  }

  private async write(record: AgentRecord): Promise<void> {
    const directory = dirname(this.path);
    const tempPath = join(directory, `.${basename(this.path)}.tmp-${process.pid}-${randomUUID()}`);
    try {
      await fs.mkdir(directory, { recursive: true });
      const handle = await fs.open(tempPath, 'w');
      try {
        await handle.writeFile(encodeRecord(record, this.getTime()), 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tempPath, this.path);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new StoreError('write_failed', `Failed to write agent state to ${this.path}: ${errorMessage(error)}`, error);
    }
  }

  /** Creates the lock file holding a fresh token and returns the token. */
  private async acquireFileLock(): Promise<string> {
    const deadline = this.getTime() + this.lockTimeoutMs;
    const token = randomUUID();
    await fs.mkdir(dirname(this.lockPath), { recursive: true });

    for (;;) {
      if (await createExclusive(this.lockPath, JSON.stringify({ pid: process.pid, token, acquiredAt: this.getTime() }))) {
        return token;
      }
      if (await this.removeStaleLock()) {
        continue;
      }
      if (this.getTime() >= deadline) {
        throw new StoreError('write_failed', `Timed out after ${this.lockTimeoutMs}ms waiting for lock ${this.lockPath}`);
      }
      await new Promise((resolveDelay) => setTimeout(resolveDelay, this.lockRetryMs));
    }
  }

  /**
   * Takeovers run one at a time under `<path>.lock.takeover`, and the lock is
   * re-checked inside it, so a lock recreated by another waiter is never removed.
   */
  private async removeStaleLock(): Promise<boolean> {
    const age = await this.fileAge(this.lockPath);
    if (age === null) {
      return true;
    }
    if (age < this.staleLockMs) {
      return false;
    }

    const guardPath = `${this.lockPath}.takeover`;
    if (!(await createExclusive(guardPath, String(process.pid)))) {
      const guardAge = await this.fileAge(guardPath);
      if (guardAge !== null && guardAge >= this.staleLockMs) {
        console.warn(`[WARNING] Removing abandoned lock takeover ${guardPath}`);
        await fs.rm(guardPath, { force: true });
      }
      return false;
    }

    try {
      const current = await this.fileAge(this.lockPath);
      if (current === null) {
        return true;
      }
      if (current < this.staleLockMs) {
        return false;
      }
      console.warn(`[WARNING] Removing stale agent state lock ${this.lockPath}`);
      await fs.rm(this.lockPath, { force: true });
      return true;
    } finally {
      await fs.rm(guardPath, { force: true });
    }
  }

  /** Milliseconds since the file was last written; null when it does not exist. */
  private async fileAge(path: string): Promise<number | null> {
    try {
      const stats = await fs.stat(path);
      return this.getTime() - stats.mtimeMs;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  private async releaseFileLock(token: string): Promise<void> {
    const holder = await readLockToken(this.lockPath);
    if (holder !== token) {
      console.warn(`[WARNING] Lock ${this.lockPath} was taken over while held; leaving it to its new owner`);
      return;
    }
    await fs.rm(this.lockPath, { force: true });
  }
}

/** Creates `path` only if it does not exist; false when another holder has it. */
async function createExclusive(path: string, content: string): Promise<boolean> {
  try {
    const handle = await fs.open(path, 'wx');
    try {
      await handle.writeFile(content, 'utf-8');
    } finally {
      await handle.close();
    }
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      return false;
    }
    throw new StoreError('write_failed', `Failed to create lock file ${path}: ${errorMessage(error)}`, error);
  }
}

async function readLockToken(path: string): Promise<string | null> {
  let raw: string;
  try {
    raw = await fs.readFile(path, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
  const parsed = lockFileSchema.safeParse(parseJson(raw));
  return parsed.success ? parsed.data.token : null;
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return null;
    }
    throw error;
  }
}

// fs errors can come from another realm (e.g. under a test VM), so no instanceof check
function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}
