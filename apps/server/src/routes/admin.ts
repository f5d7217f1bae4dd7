import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { z } from "zod";

import {
  emailField,
  idParamSchema,
  rejectInvalid,
  requiredText,
} from "@/lib/validation";
import type { IdentityService } from "@/services/identity";

const createTeacherSchema = z.object({
  fullName: requiredText,
  email: emailField,
  staffId: requiredText,
  tempPassword: z.string().min(1),
});

export function createAdminRouter(identity: IdentityService) {
  const adminRouter = new Hono();

  adminRouter.post(
    "/teachers",
    zValidator("json", createTeacherSchema, rejectInvalid),
    async (c) => {
      const teacher = await identity.createTeacher(c.req.valid("json"));
      return c.json({ success: true, data: teacher }, 201);
    }
  );

  adminRouter.get("/teachers", async (c) => {
    const teachers = await identity.listTeachers();
    return c.json({ success: true, data: teachers });
  });

  adminRouter.delete(
    "/teachers/:id",
    zValidator("param", idParamSchema, rejectInvalid),
    async (c) => {
      await identity.deleteTeacher(c.req.valid("param").id);
      return c.json({ success: true, data: { message: "Teacher deleted" } });
    }
  );

  adminRouter.get("/students", async (c) => {
    const students = await identity.listStudents();
    return c.json({ success: true, data: students });
  });

  adminRouter.delete(
    "/students/:id",
    zValidator("param", idParamSchema, rejectInvalid),
    async (c) => {
      await identity.deleteStudent(c.req.valid("param").id);
      return c.json({ success: true, data: { message: "Student deleted" } });
    }
  );

  return adminRouter;
}
