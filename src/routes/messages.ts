import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";

import type { MessageBase } from "../msgbase/message_base";
import { MsgbaseError, isMsgbaseError, type MsgbaseErrorCode } from "../msgbase/msgbase_error";

const MessageIdParams = z.object({
  id: z
    .string()
    .regex(/^\d+$/, "id must be a decimal integer")
    .transform(Number)
    .pipe(z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER)),
});

const ListMessagesQuery = z.object({
  tags: z.string().optional(),
});

const TagList = z.array(z.string().trim().min(1)).max(64);

const CreateMessageSchema = z.object({
  recipient: z.string().min(1).nullable().optional(),
  subject: z.string(),
  body: z.string(),
  tags: TagList.optional(),
  parent: z.number().int().nonnegative().nullable().optional(),
  created_at: z.string().datetime().optional(),
  no_dispatch: z.boolean().optional(),
}).strict();

const RetagSchema = z.object({
  tags: TagList,
}).strict();

const STATUS_BY_CODE: Record<MsgbaseErrorCode, number> = {
  not_found: 404,
  self_parent: 500,
  thread_cycle: 409,
  configuration_missing: 500,
  store_unavailable: 503,
  invalid_record: 500,
};

export const getAuthor = (req: { headers: Record<string, string | string[] | undefined> }) => {
  const header = req.headers["x-bbs-user"];
  if (Array.isArray(header)) {
    return header[0]?.trim() || null;
  }
  if (typeof header === "string" && header.trim().length > 0) {
    return header.trim();
  }
  return null;
};

export const sendMsgbaseError = (req: FastifyRequest, reply: FastifyReply, err: unknown) => {
  if (!(err instanceof MsgbaseError)) throw err;
  const status = STATUS_BY_CODE[err.code];
  if (status >= 500) {
    req.log.error({ evt: "msgbase.request_failed", code: err.code }, err.message);
  }
  return reply.code(status).send(err.toJSON());
};

const invalidRequest = (reply: FastifyReply, error: z.ZodError) =>
  reply.code(400).send({ error: "invalid_request", issues: error.issues });

export async function messageRoutes(app: FastifyInstance, opts: { base: MessageBase }) {
  const { base } = opts;

  app.options("/messages", async (_req, reply) => reply.code(204).send());
  app.options("/messages/:id", async (_req, reply) => reply.code(204).send());
  app.options("/messages/:id/tags", async (_req, reply) => reply.code(204).send());

  app.get("/messages", async (req, reply) => {
    const query = ListMessagesQuery.safeParse(req.query);
    if (!query.success) return invalidRequest(reply, query.error);

    const tags = query.data.tags
      ?.split(",")
      .map((tag) => tag.trim())
      .filter((tag) => tag.length > 0);

    try {
      const ids = await base.listMessages(tags);
      return reply.send({ ids: Array.from(ids).sort((a, b) => a - b) });
    } catch (err) {
      return sendMsgbaseError(req, reply, err);
    }
  });

  app.get("/messages/:id", async (req, reply) => {
    const params = MessageIdParams.safeParse(req.params);
    if (!params.success) return invalidRequest(reply, params.error);

    try {
      const msg = await base.getMessage(params.data.id);
      return reply.send(msg.toRecord());
    } catch (err) {
      return sendMsgbaseError(req, reply, err);
    }
  });

  app.post("/messages", async (req, reply) => {
    const author = getAuthor(req);
    if (!author) {
      return reply.code(401).send({ error: "unauthorized" });
    }

    const parsed = CreateMessageSchema.safeParse(req.body);
    if (!parsed.success) return invalidRequest(reply, parsed.error);
    const input = parsed.data;

    try {
      if (input.parent !== undefined && input.parent !== null) {
        await base.getMessage(input.parent);
      }
    } catch (err) {
      if (isMsgbaseError(err, "not_found")) {
        return reply.code(404).send({ error: "parent_not_found", parent: input.parent });
      }
      return sendMsgbaseError(req, reply, err);
    }

    const msg = base.createMsg({
      author,
      recipient: input.recipient ?? null,
      subject: input.subject,
      body: input.body,
      tags: input.tags ?? [],
      parent: input.parent ?? null,
    });

    try {
      const report = await base.saveWithReport(msg, {
        noDispatch: input.no_dispatch,
        ctime: input.created_at ? new Date(input.created_at) : undefined,
      });
      req.log.info(
        { evt: "msgbase.message_posted", msgId: report.id, dispatch: report.dispatch?.action ?? null },
        "msgbase.message_posted"
      );
      return reply.code(201).send({ id: report.id, message: msg.toRecord() });
    } catch (err) {
      return sendMsgbaseError(req, reply, err);
    }
  });

  app.put("/messages/:id/tags", async (req, reply) => {
    const params = MessageIdParams.safeParse(req.params);
    if (!params.success) return invalidRequest(reply, params.error);
    const parsed = RetagSchema.safeParse(req.body);
    if (!parsed.success) return invalidRequest(reply, parsed.error);

    try {
      const msg = await base.getMessage(params.data.id);
      msg.tags = new Set(parsed.data.tags);
      const id = await msg.save();
      return reply.send({ id, tags: Array.from(msg.tags) });
    } catch (err) {
      return sendMsgbaseError(req, reply, err);
    }
  });
}
