import { MsgbaseError } from "../msgbase/msgbase_error";

export type ReleaseLock = () => void;

/**
 * Named tables of string keys to opaque serialized values. Keys come back in
 * ascending order. `acquire` hands out an exclusive per-table lock; holders
 * must call the returned release exactly once, usually from a `finally`.
 */
export interface KeyValueStore {
  get(table: string, key: string): Promise<string | null>;
  set(table: string, key: string, value: string): Promise<void>;
  keys(table: string): Promise<string[]>;
  entries(table: string): Promise<Array<[string, string]>>;
  acquire(table: string): Promise<ReleaseLock>;
  close(): void;
}

export async function withTableLock<T>(
  store: KeyValueStore,
  table: string,
  fn: () => Promise<T>
): Promise<T> {
  const release = await store.acquire(table);
  try {
    return await fn();
  } finally {
    release();
  }
}

/** FIFO async mutex per table name. */
export class TableLocks {
  private tails = new Map<string, Promise<void>>();

  async acquire(table: string): Promise<ReleaseLock> {
    const previous = this.tails.get(table) ?? Promise.resolve();
    let unlock: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(table, tail);

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      unlock();
      if (this.tails.get(table) === tail) {
        this.tails.delete(table);
      }
    };
  }
}

export class MemoryKeyValueStore implements KeyValueStore {
  private tables = new Map<string, Map<string, string>>();
  private locks = new TableLocks();
  private closed = false;

  async get(table: string, key: string): Promise<string | null> {
    this.ensureOpen(table);
    return this.tables.get(table)?.get(key) ?? null;
  }

  async set(table: string, key: string, value: string): Promise<void> {
    this.ensureOpen(table);
    const rows = this.tables.get(table) ?? new Map<string, string>();
    rows.set(key, value);
    this.tables.set(table, rows);
  }

  async keys(table: string): Promise<string[]> {
    this.ensureOpen(table);
    return Array.from(this.tables.get(table)?.keys() ?? []).sort();
  }

  async entries(table: string): Promise<Array<[string, string]>> {
    this.ensureOpen(table);
    const rows = this.tables.get(table);
    if (!rows) return [];
    return Array.from(rows.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  async acquire(table: string): Promise<ReleaseLock> {
    this.ensureOpen(table);
    return this.locks.acquire(table);
  }

  close(): void {
    this.closed = true;
  }

  private ensureOpen(table: string) {
    if (this.closed) {
      throw new MsgbaseError({
        code: "store_unavailable",
        message: "Key-value store is closed",
        table,
      });
    }
  }
}
