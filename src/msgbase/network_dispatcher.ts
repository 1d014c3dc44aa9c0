import { parseTagList, requireOption, type ConfigSource } from "../config/config_source";
import type { MsgbaseLogger } from "../logging/logger";
import { withTableLock, type KeyValueStore } from "../store/key_value_store";
import type { Msg } from "./msg";

export type DispatchResult =
  | { action: "none"; reason: "disabled" | "no_match" }
  | { action: "transit"; network: string; table: string }
  | { action: "queued"; network: string; table: string };

export type NetworkSettings = {
  // Networks this node forwards to.
  networks: string[];
  // Networks this node hosts.
  serverTags: string[];
};

export const ORIGIN_SEPARATOR = "\r\n---\r\n";

export function readNetworkSettings(config: ConfigSource): NetworkSettings | null {
  const networks = parseTagList(config.get("msg", "network_tags"));
  if (networks.length === 0) return null;
  return {
    networks,
    serverTags: parseTagList(config.get("msg", "server_tags")),
  };
}

export function formatOriginLine(config: ConfigSource): string {
  const line =
    config.get("msg", "origin_line") ?? `Sent from ${requireOption(config, "system", "bbsname")}`;
  return `${ORIGIN_SEPARATOR}${line}`;
}

export class NetworkDispatcher {
  private store: KeyValueStore;
  private config: ConfigSource;
  private log: MsgbaseLogger;

  constructor(args: { store: KeyValueStore; config: ConfigSource; log: MsgbaseLogger }) {
    this.store = args.store;
    this.config = args.config;
    this.log = args.log;
  }

  /**
   * Routes a newly saved message by the first of its tags (insertion order)
   * that names a network. A hosted network gets the origin line appended and
   * the id recorded in its transit table; any other network gets the id
   * queued with the tag. At most one network is chosen per message.
   */
  async dispatch(msg: Msg, resave: (msg: Msg) => Promise<unknown>): Promise<DispatchResult> {
    const msgId = msg.id;
    if (msgId === undefined) {
      throw new Error("NetworkDispatcher requires a saved message");
    }

    const settings = readNetworkSettings(this.config);
    if (!settings) return { action: "none", reason: "disabled" };

    for (const tag of msg.tags) {
      if (settings.serverTags.includes(tag)) {
        const table = requireOption(this.config, `msgnet_${tag}`, "trans_db_name");
        msg.body = `${msg.body}${formatOriginLine(this.config)}`;
        await resave(msg);
        await withTableLock(this.store, table, () =>
          this.store.set(table, String(msgId), JSON.stringify(msgId))
        );
        this.log.info(
          { evt: "msgbase.net.transit", network: tag, msgId, table },
          "msgbase.net.transit"
        );
        return { action: "transit", network: tag, table };
      }

      if (settings.networks.includes(tag)) {
        const table = requireOption(this.config, `msgnet_${tag}`, "queue_db_name");
        await withTableLock(this.store, table, () =>
          this.store.set(table, String(msgId), JSON.stringify(tag))
        );
        this.log.info(
          { evt: "msgbase.net.queued", network: tag, msgId, table },
          "msgbase.net.queued"
        );
        return { action: "queued", network: tag, table };
      }
    }

    return { action: "none", reason: "no_match" };
  }
}
