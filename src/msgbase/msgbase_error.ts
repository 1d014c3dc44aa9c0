export type MsgbaseErrorCode =
  | "not_found"
  | "self_parent"
  | "thread_cycle"
  | "configuration_missing"
  | "store_unavailable"
  | "invalid_record";

export interface MsgbaseErrorDetails {
  code: MsgbaseErrorCode;
  message: string;
  // Bounded details (ids and names only, never bodies)
  msgId?: number;
  parentId?: number;
  table?: string;
  section?: string;
  key?: string;
  cause?: string;
}

export class MsgbaseError extends Error {
  public readonly code: MsgbaseErrorCode;
  public readonly details: MsgbaseErrorDetails;

  constructor(details: MsgbaseErrorDetails) {
    super(details.message);
    this.name = "MsgbaseError";
    this.code = details.code;
    this.details = details;
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      details: {
        ...this.details,
        cause: this.details.cause?.substring(0, 200),
      },
    };
  }
}

export const isMsgbaseError = (err: unknown, code?: MsgbaseErrorCode): err is MsgbaseError =>
  err instanceof MsgbaseError && (code === undefined || err.code === code);
