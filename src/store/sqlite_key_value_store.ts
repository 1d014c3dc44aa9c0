import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

import { createDefaultLogger, type MsgbaseLogger } from "../logging/logger";
import { MsgbaseError } from "../msgbase/msgbase_error";
import { TableLocks, type KeyValueStore, type ReleaseLock } from "./key_value_store";

type KvRow = { key: string; value: string };

export function validateDataPath(dbPath: string, log: MsgbaseLogger): void {
  if (dbPath === ":memory:") {
    log.warn({ dbPath }, "store.guard: in-memory database detected (acceptable for tests)");
    return;
  }

  if (dbPath.startsWith("/tmp/")) {
    log.warn({ dbPath }, "store.guard: database on ephemeral storage (data will be lost on restart)");
  }

  log.info({ dbPath }, "store.guard: validation passed");
}

/**
 * Key-value tables in one SQLite file. Every logical table shares the `kv`
 * table, keyed by (tbl, key). Locks are in-process: one store instance per
 * database file.
 */
export class SqliteKeyValueStore implements KeyValueStore {
  private db: Database.Database;
  private log: MsgbaseLogger;
  private locks = new TableLocks();

  private getStmt: Database.Statement<[string, string], { value: string }>;
  private setStmt: Database.Statement<[string, string, string]>;
  private keysStmt: Database.Statement<[string], { key: string }>;
  private entriesStmt: Database.Statement<[string], KvRow>;

  constructor(
    dbPath: string = "./data/msgbase.db",
    log: MsgbaseLogger = createDefaultLogger()
  ) {
    this.log = log;
    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    try {
      this.db = new Database(dbPath);
    } catch (err) {
      throw new MsgbaseError({
        code: "store_unavailable",
        message: `Unable to open database: ${dbPath}`,
        cause: String(err),
      });
    }
    validateDataPath(dbPath, this.log);
    this.db.pragma("journal_mode = WAL");
    this.initSchema();

    this.getStmt = this.db.prepare<[string, string], { value: string }>(
      "SELECT value FROM kv WHERE tbl = ? AND key = ?"
    );
    this.setStmt = this.db.prepare<[string, string, string]>(`
      INSERT INTO kv (tbl, key, value) VALUES (?, ?, ?)
      ON CONFLICT(tbl, key) DO UPDATE SET value = excluded.value
    `);
    this.keysStmt = this.db.prepare<[string], { key: string }>(
      "SELECT key FROM kv WHERE tbl = ? ORDER BY key"
    );
    this.entriesStmt = this.db.prepare<[string], KvRow>(
      "SELECT key, value FROM kv WHERE tbl = ? ORDER BY key"
    );
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS kv (
        tbl TEXT NOT NULL,
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        PRIMARY KEY (tbl, key)
      );
    `);
  }

  async get(table: string, key: string): Promise<string | null> {
    return this.run(table, () => this.getStmt.get(table, key)?.value ?? null);
  }

  async set(table: string, key: string, value: string): Promise<void> {
    this.run(table, () => {
      this.setStmt.run(table, key, value);
    });
  }

  async keys(table: string): Promise<string[]> {
    return this.run(table, () => this.keysStmt.all(table).map((row) => row.key));
  }

  async entries(table: string): Promise<Array<[string, string]>> {
    return this.run(table, () =>
      this.entriesStmt.all(table).map((row): [string, string] => [row.key, row.value])
    );
  }

  async acquire(table: string): Promise<ReleaseLock> {
    this.ensureOpen(table);
    return this.locks.acquire(table);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private ensureOpen(table: string) {
    if (!this.db.open) {
      throw new MsgbaseError({
        code: "store_unavailable",
        message: "Key-value store is closed",
        table,
      });
    }
  }

  private run<T>(table: string, op: () => T): T {
    this.ensureOpen(table);
    try {
      return op();
    } catch (err) {
      this.log.error({ evt: "store.sqlite_failed", table, error: String(err) }, "store.sqlite_failed");
      throw new MsgbaseError({
        code: "store_unavailable",
        message: "SQLite key-value operation failed",
        table,
        cause: String(err),
      });
    }
  }
}
