import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { z } from "zod";

import { emailField, rejectInvalid, requiredText } from "@/lib/validation";
import type { IdentityService } from "@/services/identity";

const registerStudentSchema = z.object({
  fullName: requiredText,
  studentId: requiredText,
  email: emailField,
  password: z.string().min(1),
});

const registerAdminSchema = z.object({
  fullName: requiredText,
  email: emailField,
  password: z.string().min(1),
});

const studentLoginSchema = z.object({
  studentId: requiredText,
  password: z.string(),
});

const teacherLoginSchema = z.object({
  staffId: requiredText,
  password: z.string(),
});

const adminLoginSchema = z.object({
  email: emailField,
  password: z.string(),
});

export function createAuthRouter(identity: IdentityService) {
  const authRouter = new Hono();

  authRouter.post(
    "/register/student",
    zValidator("json", registerStudentSchema, rejectInvalid),
    async (c) => {
      const student = await identity.registerStudent(c.req.valid("json"));
      return c.json({ success: true, data: student }, 201);
    }
  );

  authRouter.post(
    "/register/admin",
    zValidator("json", registerAdminSchema, rejectInvalid),
    async (c) => {
      const session = await identity.registerAdmin(c.req.valid("json"));
      return c.json({ success: true, data: session }, 201);
    }
  );

  authRouter.post(
    "/login/student",
    zValidator("json", studentLoginSchema, rejectInvalid),
    async (c) => {
      const { studentId, password } = c.req.valid("json");
      const session = await identity.loginStudent(studentId, password);
      return c.json({ success: true, data: session }, 200);
    }
  );

  authRouter.post(
    "/login/teacher",
    zValidator("json", teacherLoginSchema, rejectInvalid),
    async (c) => {
      const { staffId, password } = c.req.valid("json");
      const session = await identity.loginTeacher(staffId, password);
      return c.json({ success: true, data: session }, 200);
    }
  );

  authRouter.post(
    "/login/admin",
    zValidator("json", adminLoginSchema, rejectInvalid),
    async (c) => {
      const { email, password } = c.req.valid("json");
      const session = await identity.loginAdmin(email, password);
      return c.json({ success: true, data: session }, 200);
    }
  );

  return authRouter;
}
