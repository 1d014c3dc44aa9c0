import { describe, it, expect, afterEach } from "vitest";

import { SectionConfig, type ConfigSections } from "../src/config/config_source";
import { MessageBase } from "../src/msgbase/message_base";
import {
  ORIGIN_SEPARATOR,
  formatOriginLine,
  readNetworkSettings,
} from "../src/msgbase/network_dispatcher";
import { MemoryKeyValueStore, type KeyValueStore } from "../src/store/key_value_store";
import { SqliteKeyValueStore } from "../src/store/sqlite_key_value_store";

const NETWORKS: ConfigSections = {
  system: { bbsname: "Test BBS" },
  msg: { network_tags: "fidonet, local", server_tags: "local" },
  msgnet_fidonet: { queue_db_name: "fidonet_queue" },
  msgnet_local: { trans_db_name: "local_transit" },
};

function testNetworkDispatcher(storeName: string, createStore: () => KeyValueStore) {
  describe(`NetworkDispatcher (${storeName})`, () => {
    const opened: KeyValueStore[] = [];

    const makeBase = (sections: ConfigSections) => {
      const store = createStore();
      opened.push(store);
      const base = new MessageBase({ store, config: new SectionConfig(sections) });
      return { store, base };
    };

    afterEach(() => {
      opened.splice(0).forEach((store) => store.close());
    });

    it("does nothing without network tags", async () => {
      const { store, base } = makeBase({ system: { bbsname: "Test BBS" } });

      const report = await base.saveWithReport(base.createMsg({ body: "hello", tags: ["fidonet"] }));

      expect(report.dispatch).toEqual({ action: "none", reason: "disabled" });
      expect((await base.getMessage(0)).body).toBe("hello");
      expect(await store.keys("fidonet_queue")).toEqual([]);
    });

    it("queues a message for a network this node does not host", async () => {
      const { store, base } = makeBase({
        msg: { network_tags: "fidonet" },
        msgnet_fidonet: { queue_db_name: "fidonet_queue" },
      });

      const report = await base.saveWithReport(base.createMsg({ body: "hello", tags: ["fidonet"] }));

      expect(report.dispatch).toEqual({ action: "queued", network: "fidonet", table: "fidonet_queue" });
      expect(await store.get("fidonet_queue", "0")).toBe('"fidonet"');
      expect((await base.getMessage(0)).body).toBe("hello");
    });

    it("appends the origin line and records transit for a hosted network", async () => {
      const { store, base } = makeBase(NETWORKS);

      const report = await base.saveWithReport(base.createMsg({ body: "hello", tags: ["local"] }));

      expect(report.dispatch).toEqual({ action: "transit", network: "local", table: "local_transit" });
      expect((await base.getMessage(0)).body).toBe("hello\r\n---\r\nSent from Test BBS");
      expect(await store.get("local_transit", "0")).toBe("0");
      expect(await base.listMessages()).toEqual(new Set([0]));
    });

    it("prefers a configured origin line over the board name", async () => {
      const { base } = makeBase({
        ...NETWORKS,
        msg: { ...NETWORKS.msg, origin_line: "Greetings from the basement" },
      });

      await base.createMsg({ body: "hello", tags: ["local"] }).save();

      expect((await base.getMessage(0)).body).toBe("hello\r\n---\r\nGreetings from the basement");
    });

    it("routes by the first matching tag only", async () => {
      const { store, base } = makeBase(NETWORKS);

      await base.createMsg({ body: "a", tags: ["offtopic", "fidonet", "local"] }).save();
      await base.createMsg({ body: "b", tags: ["local", "fidonet"] }).save();

      expect(await store.entries("fidonet_queue")).toEqual([["0", '"fidonet"']]);
      expect(await store.entries("local_transit")).toEqual([["1", "1"]]);
      expect((await base.getMessage(0)).body).toBe("a");
    });

    it("skips tags that name no network", async () => {
      const { base } = makeBase(NETWORKS);

      const report = await base.saveWithReport(base.createMsg({ tags: ["public", "offtopic"] }));

      expect(report.dispatch).toEqual({ action: "none", reason: "no_match" });
    });

    it("does not dispatch when suppressed or on re-save", async () => {
      const { store, base } = makeBase(NETWORKS);

      const msg = base.createMsg({ body: "imported", tags: ["fidonet"] });
      const first = await base.saveWithReport(msg, { noDispatch: true });
      const second = await base.saveWithReport(msg);

      expect(first.dispatch).toBeNull();
      expect(second.dispatch).toBeNull();
      expect(await store.keys("fidonet_queue")).toEqual([]);
    });

    it("fails when a matched network has no table configured", async () => {
      const { base } = makeBase({ msg: { network_tags: "fidonet" } });

      await expect(base.createMsg({ tags: ["fidonet"] }).save()).rejects.toMatchObject({
        code: "configuration_missing",
        details: { section: "msgnet_fidonet", key: "queue_db_name" },
      });
      expect(await base.listMessages()).toEqual(new Set([0]));
    });

    it("fails without a board name when no origin line is set", async () => {
      const { base } = makeBase({ ...NETWORKS, system: {} });

      await expect(base.createMsg({ body: "hello", tags: ["local"] }).save()).rejects.toMatchObject({
        code: "configuration_missing",
        details: { section: "system", key: "bbsname" },
      });
      expect((await base.getMessage(0)).body).toBe("hello");
    });

    it("re-saves a transit reply without touching its thread", async () => {
      const { store, base } = makeBase(NETWORKS);
      const parentId = await base.createMsg({ subject: "question" }).save();

      const report = await base.saveWithReport(
        base.createMsg({ body: "answer", tags: ["local"], parent: parentId })
      );

      expect(report.thread).toEqual({ updatedParents: [parentId], strippedSelfParent: false });
      expect(report.dispatch).toEqual({ action: "transit", network: "local", table: "local_transit" });
      expect((await base.getMessage(1)).body).toBe("answer\r\n---\r\nSent from Test BBS");
      expect((await base.getMessage(1)).parent).toBe(parentId);
      expect((await base.getMessage(parentId)).children).toEqual(new Set([1]));
      expect(await store.get("local_transit", "1")).toBe("1");
    });
  });
}

testNetworkDispatcher("Memory", () => new MemoryKeyValueStore());
testNetworkDispatcher("SQLite", () => new SqliteKeyValueStore(":memory:"));

describe("network settings", () => {
  it("trims list items and drops empty ones", () => {
    const settings = readNetworkSettings(
      new SectionConfig({ msg: { network_tags: " fidonet , ,agoranet ", server_tags: "local," } })
    );

    expect(settings).toEqual({ networks: ["fidonet", "agoranet"], serverTags: ["local"] });
  });

  it("treats an empty network list as disabled", () => {
    expect(readNetworkSettings(new SectionConfig({ msg: { network_tags: " , " } }))).toBeNull();
    expect(readNetworkSettings(new SectionConfig())).toBeNull();
  });

  it("formats the origin line with its separator", () => {
    expect(formatOriginLine(new SectionConfig({ system: { bbsname: "Test BBS" } }))).toBe(
      `${ORIGIN_SEPARATOR}Sent from Test BBS`
    );
  });
});
