import type { ConfigSource } from "../config/config_source";
import { createDefaultLogger, type MsgbaseLogger } from "../logging/logger";
import type { KeyValueStore } from "../store/key_value_store";
import { MessageStore } from "./message_store";
import { Msg, type MsgInit, type MsgSaver, type SaveOptions } from "./msg";
import { NetworkDispatcher, type DispatchResult } from "./network_dispatcher";
import { TagIndex } from "./tag_index";
import { ThreadIndex, assertThreadable, type LinkResult } from "./thread_index";

/** Handle of the active session, or null outside a session. */
export type AuthorResolver = () => string | null;

export type SaveReport = {
  id: number;
  isNew: boolean;
  thread: LinkResult | null;
  dispatch: DispatchResult | null;
};

export type MessageBaseOptions = {
  store: KeyValueStore;
  config: ConfigSource;
  log?: MsgbaseLogger;
  resolveAuthor?: AuthorResolver;
  clock?: () => Date;
};

export class MessageBase implements MsgSaver {
  readonly messages: MessageStore;
  readonly tags: TagIndex;
  readonly threads: ThreadIndex;
  readonly dispatcher: NetworkDispatcher;

  private log: MsgbaseLogger;
  private resolveAuthor: AuthorResolver;
  private clock: () => Date;

  constructor(opts: MessageBaseOptions) {
    this.log = opts.log ?? createDefaultLogger();
    this.resolveAuthor = opts.resolveAuthor ?? (() => null);
    this.clock = opts.clock ?? (() => new Date());

    this.tags = new TagIndex({ store: opts.store, log: this.log });
    this.messages = new MessageStore({
      store: opts.store,
      tags: this.tags,
      saver: this,
      clock: this.clock,
    });
    this.threads = new ThreadIndex({ messages: this.messages, tags: this.tags, log: this.log });
    this.dispatcher = new NetworkDispatcher({
      store: opts.store,
      config: opts.config,
      log: this.log,
    });
  }

  createMsg(init: MsgInit = {}): Msg {
    const author = init.author !== undefined ? init.author : this.resolveAuthor();
    return new Msg(this, { ...init, author }, this.clock());
  }

  getMessage(id: number): Promise<Msg> {
    return this.messages.get(id);
  }

  listMessages(tags?: Iterable<string>): Promise<Set<number>> {
    return this.messages.list(tags);
  }

  listTags(): Promise<string[]> {
    return this.tags.listTags();
  }

  async save(msg: Msg, opts: SaveOptions = {}): Promise<number> {
    const report = await this.saveWithReport(msg, opts);
    return report.id;
  }

  /**
   * Persist, reconcile tags, link the thread, then dispatch a new message.
   * Each step runs after the previous one has finished; nothing is rolled
   * back when a later step fails.
   */
  async saveWithReport(msg: Msg, opts: SaveOptions = {}): Promise<SaveReport> {
    assertThreadable(msg);

    const { id, isNew } = await this.messages.write(msg, opts.ctime);
    await this.tags.reconcile(msg);

    const thread = msg.parent !== null ? await this.threads.link(msg) : null;

    const dispatch =
      isNew && !opts.noDispatch
        ? await this.dispatcher.dispatch(msg, async (resaved) => {
            // Thread links are already in place; only the record and tags change.
            await this.messages.write(resaved);
            await this.tags.reconcile(resaved);
          })
        : null;

    this.log.info(
      {
        evt: "msgbase.saved",
        msgId: id,
        isNew,
        isPublic: msg.isPublic,
        isReply: msg.parent !== null,
        recipient: msg.recipient,
        dispatch: dispatch?.action ?? null,
      },
      "msgbase.saved"
    );

    return { id, isNew, thread, dispatch };
  }
}
