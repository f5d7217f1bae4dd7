import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { z } from "zod";

import { idField, rejectInvalid } from "@/lib/validation";
import {
  readUpload,
  type AttachmentDescriptor,
  type AttachmentStore,
} from "@/services/attachments";

const uploadFormSchema = z.object({
  classId: idField,
  files: z.union([z.instanceof(File), z.array(z.instanceof(File)).min(1)]),
});

export function createUploadRouter(store: AttachmentStore) {
  const uploadRouter = new Hono();

  uploadRouter.post(
    "/",
    zValidator("form", uploadFormSchema, rejectInvalid),
    async (c) => {
      const { files } = c.req.valid("form");
      const list = Array.isArray(files) ? files : [files];

      const saved: AttachmentDescriptor[] = [];
      for (const file of list) {
        saved.push(await store.saveBlob(await readUpload(file)));
      }
      return c.json({ success: true, data: { files: saved } }, 201);
    }
  );

  return uploadRouter;
}
