import { relations } from "drizzle-orm";
import { classes, classMembers, messages, users } from "./schema";

export const usersRelations = relations(users, ({ many }) => ({
  ownedClasses: many(classes),
  memberships: many(classMembers),
}));

export const classesRelations = relations(classes, ({ one, many }) => ({
  owner: one(users, {
    fields: [classes.ownerId],
    references: [users.id],
  }),
  members: many(classMembers),
  messages: many(messages),
}));

export const classMembersRelations = relations(classMembers, ({ one }) => ({
  class: one(classes, {
    fields: [classMembers.classId],
    references: [classes.id],
  }),
  user: one(users, {
    fields: [classMembers.userId],
    references: [users.id],
  }),
}));

export const messagesRelations = relations(messages, ({ one }) => ({
  class: one(classes, {
    fields: [messages.classId],
    references: [classes.id],
  }),
}));
