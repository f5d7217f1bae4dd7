import {
  and,
  asc,
  eq,
  messages,
  type Database,
  type Message,
} from "@classroom-chat/db";
import { z } from "zod";

import { forbidden, notFound } from "@/lib/errors";
import type { AttachmentDescriptor } from "./attachments";
import { findClass, findOwnedClass, findUserByEmail } from "./lookup";
import { normalizeEmail } from "./normalize";

export const DEFAULT_CHANNEL = "general";

export type PostMessageInput = {
  classId: number;
  channel?: string;
  senderEmail: string;
  senderName: string;
  content: string;
  attachments?: AttachmentDescriptor[];
};

export type ChatMessage = {
  id: number;
  classId: number;
  channel: string;
  senderEmail: string;
  senderName: string;
  content: string;
  timestamp: Date;
  attachments: AttachmentDescriptor[];
};

const storedAttachmentSchema = z.object({
  filename: z.string().catch(""),
  url: z.string().catch(""),
  content_type: z.string().catch(""),
});

export function serializeAttachments(list: AttachmentDescriptor[]): string {
  return JSON.stringify(
    list.map((a) => ({
      filename: a.filename,
      url: a.url,
      content_type: a.content_type,
    }))
  );
}

/** Unreadable text decodes to no attachments; entries that are not objects are skipped. */
export function parseAttachments(text: string): AttachmentDescriptor[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return [];
  }

  const entries = z.array(z.unknown()).safeParse(data);
  if (!entries.success) {
    return [];
  }

  return entries.data.flatMap((entry) => {
    const parsed = storedAttachmentSchema.safeParse(entry);
    if (!parsed.success) {
      return [];
    }
    return [
      {
        filename: parsed.data.filename,
        url: parsed.data.url,
        content_type: parsed.data.content_type,
      },
    ];
  });
}

export function toChatMessage(row: Message): ChatMessage {
  return {
    id: row.id,
    classId: row.classId,
    channel: row.channel,
    senderEmail: row.senderEmail,
    senderName: row.senderName,
    content: row.content,
    timestamp: row.timestamp,
    attachments: parseAttachments(row.attachmentsJson),
  };
}

export class MessagingService {
  constructor(
    private readonly db: Database,
    private readonly now: () => Date = () => new Date()
  ) {}

  // Posting is open to anyone who knows the class id; membership is not checked.
  async postMessage(input: PostMessageInput): Promise<ChatMessage> {
    return this.db.transaction(async (tx) => {
      if (!(await findClass(tx, input.classId))) {
        throw notFound("Class not found");
      }

      const [row] = await tx
        .insert(messages)
        .values({
          classId: input.classId,
          channel: input.channel ?? DEFAULT_CHANNEL,
          senderEmail: normalizeEmail(input.senderEmail),
          senderName: input.senderName,
          content: input.content,
          attachmentsJson: serializeAttachments(input.attachments ?? []),
          timestamp: this.now(),
        })
        .returning();
      if (!row) {
        throw new Error("Failed to create message");
      }
      return toChatMessage(row);
    });
  }

  async listMessages(
    classId: number,
    channel: string = DEFAULT_CHANNEL
  ): Promise<ChatMessage[]> {
    if (!(await findClass(this.db, classId))) {
      throw notFound("Class not found");
    }

    const rows = await this.db.query.messages.findMany({
      where: and(eq(messages.classId, classId), eq(messages.channel, channel)),
      orderBy: [asc(messages.timestamp), asc(messages.id)],
    });
    return rows.map(toChatMessage);
  }

  async deleteMessage(
    classId: number,
    messageId: number,
    teacherEmail: string
  ): Promise<void> {
    const email = normalizeEmail(teacherEmail);

    await this.db.transaction(async (tx) => {
      const teacher = await findUserByEmail(tx, email, "teacher");
      if (!teacher) {
        throw forbidden("Teacher not found");
      }
      if (!(await findOwnedClass(tx, classId, teacher.id))) {
        throw forbidden("You are not the owner of this class");
      }

      const [deleted] = await tx
        .delete(messages)
        .where(and(eq(messages.id, messageId), eq(messages.classId, classId)))
        .returning({ id: messages.id });
      if (!deleted) {
        throw notFound("Message not found");
      }
    });
  }
}
