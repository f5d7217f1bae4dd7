import {
  and,
  classes,
  classMembers,
  eq,
  users,
  type Executor,
  type UserRole,
} from "@classroom-chat/db";

export function findUserByEmail(db: Executor, email: string, role?: UserRole) {
  return db.query.users.findFirst({
    where: role
      ? and(eq(users.email, email), eq(users.role, role))
      : eq(users.email, email),
  });
}

export function findOwnedClass(db: Executor, classId: number, ownerId: number) {
  return db.query.classes.findFirst({
    where: and(eq(classes.id, classId), eq(classes.ownerId, ownerId)),
  });
}

export function findClass(db: Executor, classId: number) {
  return db.query.classes.findFirst({
    where: eq(classes.id, classId),
  });
}

export function findClassByCode(db: Executor, code: string) {
  return db.query.classes.findFirst({
    where: eq(classes.code, code),
  });
}

export function findMembership(db: Executor, classId: number, userId: number) {
  return db.query.classMembers.findFirst({
    where: and(
      eq(classMembers.classId, classId),
      eq(classMembers.userId, userId)
    ),
  });
}

export function findUserByStudentId(db: Executor, studentId: string) {
  return db.query.users.findFirst({
    where: eq(users.studentId, studentId),
  });
}
