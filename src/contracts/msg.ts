import { z } from "zod";

export const MsgId = z.number().int().nonnegative();

export const MsgRecordSchema = z.object({
  id: MsgId,
  creationTime: z.string().datetime(),
  saveTime: z.string().datetime(),
  author: z.string().nullable(),
  recipient: z.string().nullable(),
  subject: z.string(),
  body: z.string(),
  tags: z.array(z.string()),
  parent: MsgId.nullable(),
  children: z.array(MsgId),
});

export type MsgRecord = z.infer<typeof MsgRecordSchema>;

// tags table: tag -> member ids
export const TagMembersSchema = z.array(MsgId);

