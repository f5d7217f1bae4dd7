import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { z } from "zod";

import { emailField, rejectInvalid, requiredText } from "@/lib/validation";
import type { MembershipService } from "@/services/membership";

const joinClassSchema = z.object({
  studentEmail: emailField,
  code: requiredText,
});

const studentQuerySchema = z.object({
  studentEmail: emailField,
});

export function createStudentRouter(membership: MembershipService) {
  const studentRouter = new Hono();

  studentRouter.post(
    "/join",
    zValidator("json", joinClassSchema, rejectInvalid),
    async (c) => {
      const { studentEmail, code } = c.req.valid("json");
      const result = await membership.joinClass(studentEmail, code);
      return c.json({ success: true, data: result });
    }
  );

  studentRouter.get(
    "/classes",
    zValidator("query", studentQuerySchema, rejectInvalid),
    async (c) => {
      const { studentEmail } = c.req.valid("query");
      const classes = await membership.listClassesForStudent(studentEmail);
      return c.json({ success: true, data: classes });
    }
  );

  return studentRouter;
}
