import { users, type Database } from "@classroom-chat/db";

export async function insertStudent(
  db: Database,
  email: string,
  studentId: string
) {
  const [user] = await db
    .insert(users)
    .values({
      fullName: `Student ${studentId}`,
      email,
      password: "test-secret",
      role: "student",
      studentId,
    })
    .returning();
  if (!user) {
    throw new Error("student insert returned nothing");
  }
  return user;
}

export async function insertTeacher(
  db: Database,
  email: string,
  staffId: string
) {
  const [user] = await db
    .insert(users)
    .values({
      fullName: `Teacher ${staffId}`,
      email,
      password: "test-secret",
      role: "teacher",
      staffId,
    })
    .returning();
  if (!user) {
    throw new Error("teacher insert returned nothing");
  }
  return user;
}
