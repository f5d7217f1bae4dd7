import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { z } from "zod";

import {
  emailField,
  idField,
  rejectInvalid,
  requiredText,
} from "@/lib/validation";
import type { MembershipService } from "@/services/membership";

const createClassSchema = z.object({
  name: requiredText,
  semester: z.string().nullish(),
  description: z.string().nullish(),
  code: requiredText,
  ownerEmail: emailField,
});

const ownerQuerySchema = z.object({
  ownerEmail: emailField,
});

const approveSchema = z.object({
  classId: idField,
  studentEmail: emailField,
});

const removeMemberSchema = z.object({
  classId: idField,
  studentEmail: emailField,
  ownerEmail: emailField,
});

const removeClassSchema = z.object({
  classId: idField,
  ownerEmail: emailField,
});

export function createTeacherRouter(membership: MembershipService) {
  const teacherRouter = new Hono();

  teacherRouter.post(
    "/classes",
    zValidator("json", createClassSchema, rejectInvalid),
    async (c) => {
      const newClass = await membership.createClass(c.req.valid("json"));
      return c.json({ success: true, data: newClass }, 201);
    }
  );

  teacherRouter.get(
    "/classes",
    zValidator("query", ownerQuerySchema, rejectInvalid),
    async (c) => {
      const { ownerEmail } = c.req.valid("query");
      const classes = await membership.listClassesForTeacher(ownerEmail);
      return c.json({ success: true, data: classes });
    }
  );

  teacherRouter.post(
    "/approve",
    zValidator("json", approveSchema, rejectInvalid),
    async (c) => {
      const { classId, studentEmail } = c.req.valid("json");
      const member = await membership.approveMembership(classId, studentEmail);
      return c.json({
        success: true,
        data: { message: "Student approved", status: member.status },
      });
    }
  );

  teacherRouter.post(
    "/remove-member",
    zValidator("json", removeMemberSchema, rejectInvalid),
    async (c) => {
      const { classId, studentEmail, ownerEmail } = c.req.valid("json");
      const member = await membership.removeMember(
        classId,
        studentEmail,
        ownerEmail
      );
      return c.json({
        success: true,
        data: { message: "Student removed", status: member.status },
      });
    }
  );

  teacherRouter.post(
    "/remove-class",
    zValidator("json", removeClassSchema, rejectInvalid),
    async (c) => {
      const { classId, ownerEmail } = c.req.valid("json");
      await membership.removeClass(classId, ownerEmail);
      return c.json({ success: true, data: { message: "Class deleted" } });
    }
  );

  return teacherRouter;
}
