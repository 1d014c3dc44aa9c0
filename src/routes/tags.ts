import type { FastifyInstance } from "fastify";

import type { MessageBase } from "../msgbase/message_base";
import { sendMsgbaseError } from "./messages";

export async function tagRoutes(app: FastifyInstance, opts: { base: MessageBase }) {
  const { base } = opts;

  app.options("/tags", async (_req, reply) => reply.code(204).send());

  app.get("/tags", async (req, reply) => {
    try {
      const tags = await base.listTags();
      return reply.send({ tags: [...tags].sort() });
    } catch (err) {
      return sendMsgbaseError(req, reply, err);
    }
  });
}
