import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { z } from "zod";

import { emailField, rejectInvalid } from "@/lib/validation";
import { readUpload } from "@/services/attachments";
import type { IdentityService } from "@/services/identity";

const profileQuerySchema = z.object({
  email: emailField,
});

const avatarFormSchema = z.object({
  email: emailField,
  file: z.instanceof(File),
});

export function createProfileRouter(identity: IdentityService) {
  const profileRouter = new Hono();

  profileRouter.get(
    "/",
    zValidator("query", profileQuerySchema, rejectInvalid),
    async (c) => {
      const profile = await identity.getProfile(c.req.valid("query").email);
      return c.json({ success: true, data: profile });
    }
  );

  profileRouter.post(
    "/avatar",
    zValidator("form", avatarFormSchema, rejectInvalid),
    async (c) => {
      const { email, file } = c.req.valid("form");
      const blob = await readUpload(file);
      const profile = await identity.updateAvatar(email, blob);
      return c.json({ success: true, data: profile });
    }
  );

  return profileRouter;
}
