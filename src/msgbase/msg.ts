import type { MsgRecord } from "../contracts/msg";

export type MsgInit = {
  recipient?: string | null;
  subject?: string;
  body?: string;
  tags?: Iterable<string>;
  parent?: number | null;
  // Overrides the session author.
  author?: string | null;
};

export type SaveOptions = {
  // Skip network dispatch (messages imported from a network).
  noDispatch?: boolean;
  // Explicit create time; also used as the save time of a new message.
  ctime?: Date;
};

export interface MsgSaver {
  save(msg: Msg, opts?: SaveOptions): Promise<number>;
}

/**
 * A message record: envelope, body, tags and thread links.
 *
 * `parent` must be set explicitly by the caller; `children` is filled in on
 * the parent whenever a reply is saved.
 */
export class Msg {
  id?: number;
  creationTime: Date;
  saveTime?: Date;
  author: string | null;
  recipient: string | null;
  subject: string;
  body: string;
  tags: Set<string>;
  parent: number | null;
  children: Set<number>;

  private readonly saver: MsgSaver;

  constructor(saver: MsgSaver, init: MsgInit & { author: string | null }, now: Date = new Date()) {
    this.saver = saver;
    this.creationTime = now;
    this.author = init.author;
    this.recipient = init.recipient ?? null;
    this.subject = init.subject ?? "";
    this.body = init.body ?? "";
    this.tags = new Set(init.tags ?? []);
    this.parent = init.parent ?? null;
    this.children = new Set();
  }

  save(opts: SaveOptions = {}): Promise<number> {
    return this.saver.save(this, opts);
  }

  get isPublic(): boolean {
    return this.tags.has("public");
  }

  toRecord(): MsgRecord {
    if (this.id === undefined || this.saveTime === undefined) {
      throw new Error("Msg has not been assigned an id");
    }
    return {
      id: this.id,
      creationTime: this.creationTime.toISOString(),
      saveTime: this.saveTime.toISOString(),
      author: this.author,
      recipient: this.recipient,
      subject: this.subject,
      body: this.body,
      tags: Array.from(this.tags),
      parent: this.parent,
      children: Array.from(this.children).sort((a, b) => a - b),
    };
  }

  static fromRecord(saver: MsgSaver, record: MsgRecord): Msg {
    const msg = new Msg(
      saver,
      {
        author: record.author,
        recipient: record.recipient,
        subject: record.subject,
        body: record.body,
        tags: record.tags,
        parent: record.parent,
      },
      new Date(record.creationTime)
    );
    msg.id = record.id;
    msg.saveTime = new Date(record.saveTime);
    msg.children = new Set(record.children);
    return msg;
  }
}
