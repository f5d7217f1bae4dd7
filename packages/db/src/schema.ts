import {
  index,
  integer,
  pgSchema,
  serial,
  text,
  timestamp,
  unique,
  varchar,
} from "drizzle-orm/pg-core";
import { z } from "zod";

export const multichat = pgSchema("multichat");

export const userRole = multichat.enum("user_role", [
  "admin",
  "teacher",
  "student",
]);

export const UserRoleSchema = z.enum(userRole.enumValues);
export type UserRole = z.infer<typeof UserRoleSchema>;

export const users = multichat.table("users", {
  id: serial("id").primaryKey(),
  fullName: varchar("full_name", { length: 200 }).notNull(),
  email: varchar("email", { length: 200 }).notNull().unique(),
  password: varchar("password", { length: 200 }).notNull(),
  role: userRole("role").notNull(),
  studentId: varchar("student_id", { length: 50 }).unique(),
  staffId: varchar("staff_id", { length: 50 }).unique(),
  avatarUrl: varchar("avatar_url", { length: 300 }),
});

export const classes = multichat.table("classes", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: 200 }).notNull(),
  semester: varchar("semester", { length: 100 }),
  description: text("description"),
  code: varchar("code", { length: 50 }).notNull().unique(),
  ownerId: integer("owner_id")
    .notNull()
    .references(() => users.id),
});

export const memberRole = multichat.enum("member_role", ["student", "teacher"]);

export const memberStatus = multichat.enum("member_status", [
  "pending",
  "active",
  "removed",
]);

export const MemberStatusSchema = z.enum(memberStatus.enumValues);
export type TMemberStatus = z.infer<typeof MemberStatusSchema>;

export const classMembers = multichat.table(
  "class_members",
  {
    id: serial("id").primaryKey(),
    classId: integer("class_id")
      .notNull()
      .references(() => classes.id),
    userId: integer("user_id")
      .notNull()
      .references(() => users.id),
    role: memberRole("role").notNull().default("student"),
    status: memberStatus("status").notNull().default("pending"),
  },
  (t) => [
    unique("uq_class_user").on(t.classId, t.userId),
    index("class_members_class_id_idx").on(t.classId),
    index("class_members_user_id_idx").on(t.userId),
  ]
);

export const messages = multichat.table(
  "messages",
  {
    id: serial("id").primaryKey(),
    classId: integer("class_id")
      .notNull()
      .references(() => classes.id),
    channel: varchar("channel", { length: 50 }).notNull().default("general"),
    senderEmail: varchar("sender_email", { length: 200 }).notNull(),
    senderName: varchar("sender_name", { length: 200 }).notNull(),
    content: text("content").notNull().default(""),
    // ordered [{ filename, url, content_type }]
    attachmentsJson: text("attachments_json").notNull().default("[]"),
    timestamp: timestamp("timestamp", { withTimezone: true, mode: "date" })
      .notNull()
      .defaultNow(),
  },
  (t) => [
    index("messages_class_id_idx").on(t.classId),
    index("messages_timestamp_idx").on(t.timestamp),
  ]
);

export type User = typeof users.$inferSelect;
export type Class = typeof classes.$inferSelect;
export type ClassMember = typeof classMembers.$inferSelect;
export type Message = typeof messages.$inferSelect;
