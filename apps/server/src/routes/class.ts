import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { z } from "zod";

import {
  emailField,
  idField,
  idParamSchema,
  rejectInvalid,
  requiredText,
} from "@/lib/validation";
import type { MembershipService } from "@/services/membership";
import { DEFAULT_CHANNEL, type MessagingService } from "@/services/messaging";

const channelField = z.string().trim().min(1).default(DEFAULT_CHANNEL);

const channelQuerySchema = z.object({
  channel: channelField,
});

const attachmentSchema = z.object({
  filename: z.string(),
  url: z.string(),
  content_type: z.string(),
});

const postMessageSchema = z.object({
  channel: channelField,
  senderEmail: emailField,
  senderName: requiredText,
  content: z.string().default(""),
  attachments: z.array(attachmentSchema).default([]),
});

const messageParamSchema = z.object({
  id: idField,
  messageId: idField,
});

const deleteMessageQuerySchema = z.object({
  teacherEmail: emailField,
});

export function createClassRouter(
  membership: MembershipService,
  messaging: MessagingService
) {
  const classRouter = new Hono();

  classRouter.get(
    "/:id/members",
    zValidator("param", idParamSchema, rejectInvalid),
    async (c) => {
      const members = await membership.listMembers(c.req.valid("param").id);
      return c.json({ success: true, data: members });
    }
  );

  classRouter.get(
    "/:id/messages",
    zValidator("param", idParamSchema, rejectInvalid),
    zValidator("query", channelQuerySchema, rejectInvalid),
    async (c) => {
      const { id } = c.req.valid("param");
      const { channel } = c.req.valid("query");
      const messages = await messaging.listMessages(id, channel);
      return c.json({ success: true, data: messages });
    }
  );

  classRouter.post(
    "/:id/messages",
    zValidator("param", idParamSchema, rejectInvalid),
    zValidator("json", postMessageSchema, rejectInvalid),
    async (c) => {
      const { id } = c.req.valid("param");
      const message = await messaging.postMessage({
        classId: id,
        ...c.req.valid("json"),
      });
      return c.json({ success: true, data: message }, 201);
    }
  );

  classRouter.delete(
    "/:id/messages/:messageId",
    zValidator("param", messageParamSchema, rejectInvalid),
    zValidator("query", deleteMessageQuerySchema, rejectInvalid),
    async (c) => {
      const { id, messageId } = c.req.valid("param");
      const { teacherEmail } = c.req.valid("query");
      await messaging.deleteMessage(id, messageId, teacherEmail);
      return c.json({ success: true, data: { message: "Message deleted" } });
    }
  );

  return classRouter;
}
