import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createStore, type Store } from 'tinybase';
import { createFilePersister, type FilePersister } from 'tinybase/persisters/persister-file';
import { StorageFaultError, StoreError, errorMessage } from './errors';
import { acquireLock } from './file-lock';
import { normalizeIdentity } from './identity';
import type { StoredIdentity } from './types';

const TABLE = 'identities';
const NEXT_ID = 'nextId';
export const MEMORY_STORE = ':memory:';

/** Store boundary used by the session runner and hydration. */
export interface IdentityRepository {
  list(): Promise<StoredIdentity[]>;
  /** Resolves to the new row id, or `undefined` when the trimmed pair already exists. */
  insert(name: string, email: string): Promise<number | undefined>;
  delete(id: number): Promise<void>;
  /** Delete-then-insert as one write. */
  replace(id: number, name: string, email: string): Promise<number | undefined>;
  close(): void;
}

export type IdentityStoreOptions = {
  /** JSON file path, or `:memory:`. */
  filename: string;
  timeoutMs: number;
};

type FileBacking = {
  persister: FilePersister;
  lockPath: string;
  /** Errors the persister reports instead of throwing. */
  failures: unknown[];
};

const byName = (a: StoredIdentity, b: StoredIdentity): number => {
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  if (left !== right) return left < right ? -1 : 1;
  return a.id - b.id;
};

const fileExists = async (filename: string): Promise<boolean> => {
  try {
    await fs.access(filename);
    return true;
  } catch {
    return false;
  }
};

/**
 * Identity rows in a TinyBase store, persisted to a JSON file. Every
 * operation reloads the file under a lock file, so several processes can
 * share one store; a held lock turns into StoreTimeoutError after `timeoutMs`.
 */
export class IdentityStore implements IdentityRepository {
  private readonly store: Store;
  private readonly backing: FileBacking | undefined;
  private readonly timeoutMs: number;
  private closed = false;

  private constructor(store: Store, backing: FileBacking | undefined, timeoutMs: number) {
    this.store = store;
    this.backing = backing;
    this.timeoutMs = timeoutMs;
  }

  static async open({ filename, timeoutMs }: IdentityStoreOptions): Promise<IdentityStore> {
    const store = createStore();
    if (filename === MEMORY_STORE) {
      return new IdentityStore(store, undefined, timeoutMs);
    }

    const failures: unknown[] = [];
    const backing: FileBacking = {
      persister: createFilePersister(store, filename, (error) => failures.push(error)),
      lockPath: `${filename}.lock`,
      failures
    };

    try {
      await fs.mkdir(path.dirname(filename), { recursive: true });
      const release = await acquireLock(backing.lockPath, timeoutMs);
      try {
        if (await fileExists(filename)) {
          await backing.persister.load();
        } else {
          await backing.persister.save();
        }
      } finally {
        await release();
      }
    } catch (error) {
      throw new StorageFaultError(`cannot open identity store at ${filename}: ${errorMessage(error)}`, {
        cause: error
      });
    }

    if (failures.length > 0) {
      backing.persister.destroy();
      throw new StorageFaultError(`cannot open identity store at ${filename}: ${errorMessage(failures[0])}`, {
        cause: failures[0]
      });
    }

    return new IdentityStore(store, backing, timeoutMs);
  }

  list(): Promise<StoredIdentity[]> {
    return this.run(false, () => this.rows().sort(byName));
  }

  insert(name: string, email: string): Promise<number | undefined> {
    return this.run(true, () => this.insertRow(name, email));
  }

  async delete(id: number): Promise<void> {
    await this.run(true, () => {
      this.store.delRow(TABLE, String(id));
    });
  }

  replace(id: number, name: string, email: string): Promise<number | undefined> {
    return this.run(true, () => {
      this.store.delRow(TABLE, String(id));
      return this.insertRow(name, email);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.backing?.persister.destroy();
  }

  private rows(): StoredIdentity[] {
    return Object.entries(this.store.getTable(TABLE)).flatMap(([rowId, row]) => {
      const id = Number(rowId);
      const { name, email } = row;
      return Number.isInteger(id) && typeof name === 'string' && typeof email === 'string' ? [{ id, name, email }] : [];
    });
  }

  /** Ids only grow: the counter survives deletes and never falls behind the rows. */
  private nextId(): number {
    const stored = this.store.getValue(NEXT_ID);
    const highest = this.rows().reduce((max, row) => Math.max(max, row.id), 0);
    return Math.max(typeof stored === 'number' ? stored : 1, highest + 1);
  }

  private insertRow(name: string, email: string): number | undefined {
    const identity = normalizeIdentity({ name, email });
    if (this.rows().some((row) => row.name === identity.name && row.email === identity.email)) {
      return undefined;
    }

    const id = this.nextId();
    this.store.setRow(TABLE, String(id), { name: identity.name, email: identity.email });
    this.store.setValue(NEXT_ID, id + 1);
    return id;
  }

  private async run<T>(writes: boolean, operation: () => T): Promise<T> {
    if (this.closed) {
      throw new StoreError('identity store: closed');
    }

    const { backing } = this;
    if (!backing) {
      return this.store.transaction(operation);
    }

    try {
      const release = await acquireLock(backing.lockPath, this.timeoutMs);
      try {
        await this.persist(backing, () => backing.persister.load());
        const result = this.store.transaction(operation);
        if (writes) {
          await this.persist(backing, () => backing.persister.save());
        }
        return result;
      } finally {
        await release();
      }
    } catch (error) {
      if (error instanceof StoreError) throw error;
      throw new StoreError(`identity store: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async persist(backing: FileBacking, step: () => Promise<unknown>): Promise<void> {
    const before = backing.failures.length;
    await step();
    if (backing.failures.length > before) {
      const failure = backing.failures[before];
      throw new StoreError(`identity store: ${errorMessage(failure)}`, { cause: failure });
    }
  }
}
