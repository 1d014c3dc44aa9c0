import { MsgRecordSchema } from "../contracts/msg";
import { withTableLock, type KeyValueStore } from "../store/key_value_store";
import { Msg, type MsgSaver } from "./msg";
import { MsgbaseError } from "./msgbase_error";
import type { TagIndex } from "./tag_index";

export const MSG_TABLE = "msgbase";

export type WriteResult = { id: number; isNew: boolean };

const parseId = (key: string): number | null => {
  const id = Number(key);
  return Number.isInteger(id) && id >= 0 ? id : null;
};

export class MessageStore {
  private store: KeyValueStore;
  private tags: TagIndex;
  private saver: MsgSaver;
  private clock: () => Date;

  constructor(args: {
    store: KeyValueStore;
    tags: TagIndex;
    saver: MsgSaver;
    clock?: () => Date;
  }) {
    this.store = args.store;
    this.tags = args.tags;
    this.saver = args.saver;
    this.clock = args.clock ?? (() => new Date());
  }

  async get(id: number): Promise<Msg> {
    const msg = await this.read(id);
    if (!msg) {
      throw new MsgbaseError({
        code: "not_found",
        message: `Message ${id} not found`,
        msgId: id,
      });
    }
    return msg;
  }

  private async read(id: number): Promise<Msg | null> {
    const raw = await this.store.get(MSG_TABLE, String(id));
    if (raw === null) return null;

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      throw new MsgbaseError({
        code: "invalid_record",
        message: `Message ${id} is not valid JSON`,
        msgId: id,
        table: MSG_TABLE,
        cause: String(err),
      });
    }

    const parsed = MsgRecordSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new MsgbaseError({
        code: "invalid_record",
        message: `Message ${id} failed validation`,
        msgId: id,
        table: MSG_TABLE,
        cause: parsed.error.message,
      });
    }
    return Msg.fromRecord(this.saver, parsed.data);
  }

  /** All ids, or the union of the given tags' members. */
  async list(tags?: Iterable<string>): Promise<Set<number>> {
    const wanted = tags === undefined ? [] : Array.from(tags);
    if (wanted.length > 0) {
      const ids = new Set<number>();
      for (const tag of wanted) {
        const members = await this.tags.members(tag);
        members?.forEach((id) => ids.add(id));
      }
      return ids;
    }

    const ids = new Set<number>();
    for (const key of await this.store.keys(MSG_TABLE)) {
      const id = parseId(key);
      if (id !== null) ids.add(id);
    }
    return ids;
  }

  /**
   * Persists the full record. A message without an id is minted
   * `max(existing) + 1` while the message table is locked, so concurrent
   * writers never share an id. An existing message keeps every child already
   * stored, so a copy loaded before a reply arrived does not drop it.
   */
  async write(msg: Msg, ctime?: Date): Promise<WriteResult> {
    return withTableLock(this.store, MSG_TABLE, async () => {
      const existingId = msg.id;
      const isNew = existingId === undefined;
      const previous = { creationTime: msg.creationTime, saveTime: msg.saveTime };

      if (existingId === undefined) {
        const keys = await this.store.keys(MSG_TABLE);
        const maxId = keys.reduce((max, key) => Math.max(max, parseId(key) ?? -1), -1);
        msg.id = maxId + 1;
        if (ctime !== undefined) {
          msg.creationTime = ctime;
          msg.saveTime = ctime;
        } else {
          msg.saveTime = this.clock();
        }
      } else {
        const stored = await this.read(existingId);
        stored?.children.forEach((child) => msg.children.add(child));
      }

      const record = msg.toRecord();
      try {
        await this.store.set(MSG_TABLE, String(record.id), JSON.stringify(record));
      } catch (err) {
        if (isNew) {
          msg.id = undefined;
          msg.creationTime = previous.creationTime;
          msg.saveTime = previous.saveTime;
        }
        throw err;
      }
      return { id: record.id, isNew };
    });
  }

  /**
   * Adds a reply to the stored parent in one locked read-modify-write and
   * returns the updated parent.
   */
  async addChild(parentId: number, childId: number): Promise<Msg> {
    return withTableLock(this.store, MSG_TABLE, async () => {
      const parent = await this.read(parentId);
      if (!parent) {
        throw new MsgbaseError({
          code: "not_found",
          message: `Message ${parentId} not found`,
          msgId: parentId,
        });
      }
      parent.children.add(childId);
      const record = parent.toRecord();
      await this.store.set(MSG_TABLE, String(parentId), JSON.stringify(record));
      return parent;
    });
  }
}
