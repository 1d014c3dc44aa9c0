import type { MsgbaseLogger } from "../logging/logger";
import type { MessageStore } from "./message_store";
import type { Msg } from "./msg";
import { MsgbaseError } from "./msgbase_error";
import type { TagIndex } from "./tag_index";

export type LinkResult = {
  // Ancestors re-saved, nearest first.
  updatedParents: number[];
  strippedSelfParent: boolean;
};

const requireId = (msg: Msg): number => {
  if (msg.id === undefined) {
    throw new Error("ThreadIndex requires a saved message");
  }
  return msg.id;
};

/** Rejects a message whose parent is also one of its replies. */
export function assertThreadable(msg: Msg): void {
  if (msg.parent !== null && msg.children.has(msg.parent)) {
    throw new MsgbaseError({
      code: "thread_cycle",
      message: `Message ${msg.id ?? "(new)"} lists its parent ${msg.parent} as a reply`,
      msgId: msg.id,
      parentId: msg.parent,
    });
  }
}

export class ThreadIndex {
  private messages: MessageStore;
  private tags: TagIndex;
  private log: MsgbaseLogger;

  constructor(args: { messages: MessageStore; tags: TagIndex; log: MsgbaseLogger }) {
    this.messages = args.messages;
    this.tags = args.tags;
    this.log = args.log;
  }

  /**
   * Adds each message to its parent's children, walking up the chain. Every
   * ancestor is re-saved (record and tags) the way a plain save would.
   */
  async link(msg: Msg): Promise<LinkResult> {
    const result: LinkResult = { updatedParents: [], strippedSelfParent: false };
    const visited = new Set<number>([requireId(msg)]);
    let current = msg;

    while (current.parent !== null) {
      const currentId = requireId(current);

      if (current.parent === currentId) {
        this.log.error(
          { evt: "msgbase.thread.self_parent", code: "self_parent", msgId: currentId },
          "msgbase.thread.self_parent"
        );
        current.parent = null;
        await this.messages.write(current);
        result.strippedSelfParent = true;
        break;
      }

      const parentId = current.parent;
      if (visited.has(parentId)) {
        this.log.error(
          { evt: "msgbase.thread.cycle", msgId: currentId, parentId },
          "msgbase.thread.cycle"
        );
        throw new MsgbaseError({
          code: "thread_cycle",
          message: `Reply chain of message ${requireId(msg)} loops back to ${parentId}`,
          msgId: currentId,
          parentId,
        });
      }
      visited.add(parentId);

      const parent = await this.messages.addChild(parentId, currentId);
      await this.tags.reconcile(parent);
      result.updatedParents.push(parentId);

      current = parent;
    }

    return result;
  }
}
