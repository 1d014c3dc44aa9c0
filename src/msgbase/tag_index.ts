import { TagMembersSchema } from "../contracts/msg";
import type { MsgbaseLogger } from "../logging/logger";
import { withTableLock, type KeyValueStore } from "../store/key_value_store";
import { MsgbaseError } from "./msgbase_error";

export const TAG_TABLE = "tags";

type Taggable = { id?: number; tags: ReadonlySet<string> };

const encodeMembers = (members: Set<number>) =>
  JSON.stringify(Array.from(members).sort((a, b) => a - b));

function decodeMembers(tag: string, raw: string): Set<number> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    throw new MsgbaseError({
      code: "invalid_record",
      message: `Tag '${tag}' is not valid JSON`,
      table: TAG_TABLE,
      key: tag,
      cause: String(err),
    });
  }
  const parsed = TagMembersSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new MsgbaseError({
      code: "invalid_record",
      message: `Tag '${tag}' failed validation`,
      table: TAG_TABLE,
      key: tag,
      cause: parsed.error.message,
    });
  }
  return new Set(parsed.data);
}

/**
 * tag -> member ids. Entries are never removed, so `listTags` reports every
 * tag that was ever used, including ones whose members have all been
 * untagged.
 */
export class TagIndex {
  private store: KeyValueStore;
  private log: MsgbaseLogger;

  constructor(args: { store: KeyValueStore; log: MsgbaseLogger }) {
    this.store = args.store;
    this.log = args.log;
  }

  async members(tag: string): Promise<Set<number> | null> {
    const raw = await this.store.get(TAG_TABLE, tag);
    return raw === null ? null : decodeMembers(tag, raw);
  }

  async listTags(): Promise<string[]> {
    return this.store.keys(TAG_TABLE);
  }

  /**
   * Two-way diff of `msg.tags` against every known tag, then creates entries
   * for tags the index has not seen yet.
   */
  async reconcile(msg: Taggable): Promise<void> {
    const msgId = msg.id;
    if (msgId === undefined) {
      throw new Error("TagIndex.reconcile requires a saved message");
    }

    await withTableLock(this.store, TAG_TABLE, async () => {
      const known = new Set<string>();

      for (const [tag, raw] of await this.store.entries(TAG_TABLE)) {
        known.add(tag);
        const members = decodeMembers(tag, raw);

        if (msg.tags.has(tag) && !members.has(msgId)) {
          members.add(msgId);
          await this.store.set(TAG_TABLE, tag, encodeMembers(members));
          this.log.info({ evt: "msgbase.tag.tagged", msgId, tag }, "msgbase.tag.tagged");
        } else if (!msg.tags.has(tag) && members.has(msgId)) {
          members.delete(msgId);
          await this.store.set(TAG_TABLE, tag, encodeMembers(members));
          this.log.info({ evt: "msgbase.tag.untagged", msgId, tag }, "msgbase.tag.untagged");
        }
      }

      for (const tag of msg.tags) {
        if (known.has(tag)) continue;
        await this.store.set(TAG_TABLE, tag, encodeMembers(new Set([msgId])));
        this.log.info({ evt: "msgbase.tag.created", msgId, tag }, "msgbase.tag.created");
      }
    });
  }
}
