import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  MemoryKeyValueStore,
  withTableLock,
  type KeyValueStore,
} from "../src/store/key_value_store";
import { SqliteKeyValueStore } from "../src/store/sqlite_key_value_store";

const tick = (ms = 10) => new Promise((resolve) => setTimeout(resolve, ms));

// Test suite that runs against both Memory and SQLite stores
function testKeyValueStore(storeName: string, createStore: () => KeyValueStore) {
  describe(`KeyValueStore (${storeName})`, () => {
    let store: KeyValueStore;

    beforeEach(() => {
      store = createStore();
    });

    afterEach(() => {
      store.close();
    });

    it("returns null for a missing key", async () => {
      expect(await store.get("msgbase", "0")).toBeNull();
      expect(await store.keys("msgbase")).toEqual([]);
      expect(await store.entries("msgbase")).toEqual([]);
    });

    it("overwrites values in place", async () => {
      await store.set("tags", "public", "[0]");
      await store.set("tags", "public", "[0,1]");

      expect(await store.get("tags", "public")).toBe("[0,1]");
      expect(await store.keys("tags")).toEqual(["public"]);
    });

    it("keeps tables separate", async () => {
      await store.set("fidonet_queue", "3", '"fidonet"');
      await store.set("local_transit", "3", "3");

      expect(await store.get("fidonet_queue", "3")).toBe('"fidonet"');
      expect(await store.get("local_transit", "3")).toBe("3");
      expect(await store.get("tags", "3")).toBeNull();
    });

    it("returns keys and entries in ascending key order", async () => {
      await store.set("tags", "offtopic", "[1]");
      await store.set("tags", "code", "[2]");
      await store.set("tags", "public", "[0]");

      expect(await store.keys("tags")).toEqual(["code", "offtopic", "public"]);
      expect(await store.entries("tags")).toEqual([
        ["code", "[2]"],
        ["offtopic", "[1]"],
        ["public", "[0]"],
      ]);
    });

    it("holds a second acquirer until the first releases", async () => {
      const releaseFirst = await store.acquire("msgbase");

      let secondAcquired = false;
      const second = store.acquire("msgbase").then((release) => {
        secondAcquired = true;
        return release;
      });

      await tick();
      expect(secondAcquired).toBe(false);

      releaseFirst();
      const releaseSecond = await second;
      expect(secondAcquired).toBe(true);
      releaseSecond();
    });

    it("does not block other tables", async () => {
      const releaseMsgs = await store.acquire("msgbase");
      const releaseTags = await store.acquire("tags");

      releaseTags();
      releaseMsgs();
    });

    it("releases the lock when the transaction throws", async () => {
      await expect(
        withTableLock(store, "msgbase", async () => {
          throw new Error("boom");
        })
      ).rejects.toThrow("boom");

      const release = await store.acquire("msgbase");
      release();
    });

    it("grants the lock in request order", async () => {
      const order: number[] = [];
      const first = await store.acquire("tags");

      const waiters = [1, 2, 3].map((n) =>
        withTableLock(store, "tags", async () => {
          order.push(n);
        })
      );

      first();
      await Promise.all(waiters);
      expect(order).toEqual([1, 2, 3]);
    });

    it("fails with store_unavailable once closed", async () => {
      store.close();

      await expect(store.get("msgbase", "0")).rejects.toMatchObject({
        code: "store_unavailable",
      });
      await expect(store.set("msgbase", "0", "{}")).rejects.toMatchObject({
        code: "store_unavailable",
      });
      await expect(store.acquire("msgbase")).rejects.toMatchObject({
        code: "store_unavailable",
      });
    });
  });
}

testKeyValueStore("Memory", () => new MemoryKeyValueStore());
testKeyValueStore("SQLite", () => new SqliteKeyValueStore(":memory:"));

describe("SqliteKeyValueStore persistence", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "msgbase-kv-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("keeps values across reopen", async () => {
    const dbPath = join(dir, "nested", "msgbase.db");

    const first = new SqliteKeyValueStore(dbPath);
    await first.set("msgbase", "0", '{"subject":"hi"}');
    first.close();

    const second = new SqliteKeyValueStore(dbPath);
    try {
      expect(await second.get("msgbase", "0")).toBe('{"subject":"hi"}');
    } finally {
      second.close();
    }
  });
});
