import {
  and,
  asc,
  classes,
  classMembers,
  eq,
  isUniqueViolation,
  users,
  type Database,
  type SQL,
  type Transaction,
  type User,
  type UserRole,
} from "@classroom-chat/db";

import { conflict, notFound, unauthorized } from "@/lib/errors";
import { type AttachmentStore, type IncomingBlob } from "./attachments";
import { findUserByEmail, findUserByStudentId } from "./lookup";
import { deleteClassCascade } from "./membership";
import { normalizeEmail } from "./normalize";

// Placeholder session marker; nothing verifies it.
export const SESSION_TOKEN = "demo-token";

export type RegisterStudentInput = {
  fullName: string;
  studentId: string;
  email: string;
  password: string;
};

export type RegisterAdminInput = {
  fullName: string;
  email: string;
  password: string;
};

export type CreateTeacherInput = {
  fullName: string;
  email: string;
  staffId: string;
  tempPassword: string;
};

export type LoginResult = {
  token: string;
  role: UserRole;
  fullName: string;
  email: string;
  studentId?: string;
  staffId?: string;
};

export type Profile = Pick<
  User,
  "fullName" | "email" | "role" | "studentId" | "staffId" | "avatarUrl"
>;

const rosterColumns = {
  id: true,
  fullName: true,
  email: true,
  studentId: true,
  staffId: true,
  password: true,
} as const;

const INVALID_LOGIN = "Invalid user ID or password";

function toProfile(user: User): Profile {
  return {
    fullName: user.fullName,
    email: user.email,
    role: user.role,
    studentId: user.studentId,
    staffId: user.staffId,
    avatarUrl: user.avatarUrl,
  };
}

function toLoginResult(user: User): LoginResult {
  const result: LoginResult = {
    token: SESSION_TOKEN,
    role: user.role,
    fullName: user.fullName,
    email: user.email,
  };
  if (user.role === "student") {
    result.studentId = user.studentId ?? "";
  }
  if (user.role === "teacher") {
    result.staffId = user.staffId ?? "";
  }
  return result;
}

/**
 * Registration, login and the admin roster. Credentials are stored and
 * compared as given.
 */
export class IdentityService {
  constructor(
    private readonly db: Database,
    private readonly store: AttachmentStore
  ) {}

  async registerStudent(input: RegisterStudentInput) {
    const studentId = input.studentId.trim().toLowerCase();
    const email = normalizeEmail(input.email);

    const user = await this.insertUnique(async (tx) => {
      if (await findUserByStudentId(tx, studentId)) {
        throw conflict("Student ID already registered");
      }
      if (await findUserByEmail(tx, email)) {
        throw conflict("Email already registered");
      }

      return tx
        .insert(users)
        .values({
          fullName: input.fullName.trim(),
          email,
          password: input.password,
          role: "student",
          studentId,
        })
        .returning();
    });

    return {
      fullName: user.fullName,
      studentId: user.studentId ?? "",
      email: user.email,
      role: user.role,
    };
  }

  async registerAdmin(input: RegisterAdminInput): Promise<LoginResult> {
    const email = normalizeEmail(input.email);

    const user = await this.insertUnique(async (tx) => {
      const existingAdmin = await tx.query.users.findFirst({
        where: eq(users.role, "admin"),
        columns: { id: true },
      });
      if (existingAdmin) {
        throw conflict("Admin already exists");
      }
      if (await findUserByEmail(tx, email)) {
        throw conflict("Email already registered");
      }

      return tx
        .insert(users)
        .values({
          fullName: input.fullName.trim(),
          email,
          password: input.password,
          role: "admin",
        })
        .returning();
    });

    return toLoginResult(user);
  }

  async createTeacher(input: CreateTeacherInput) {
    const email = normalizeEmail(input.email);
    const staffId = input.staffId.trim();

    const user = await this.insertUnique(async (tx) => {
      if (await findUserByEmail(tx, email)) {
        throw conflict("Email already registered");
      }
      const byStaffId = await tx.query.users.findFirst({
        where: eq(users.staffId, staffId),
        columns: { id: true },
      });
      if (byStaffId) {
        throw conflict("Staff ID already registered");
      }

      return tx
        .insert(users)
        .values({
          fullName: input.fullName.trim(),
          email,
          password: input.tempPassword,
          role: "teacher",
          staffId,
        })
        .returning();
    });

    return {
      id: user.id,
      fullName: user.fullName,
      email: user.email,
      staffId: user.staffId ?? "",
      password: user.password,
    };
  }

  loginStudent(studentId: string, password: string) {
    return this.login(
      eq(users.studentId, studentId.trim().toLowerCase()),
      "student",
      password
    );
  }

  loginTeacher(staffId: string, password: string) {
    return this.login(eq(users.staffId, staffId.trim()), "teacher", password);
  }

  loginAdmin(email: string, password: string) {
    return this.login(eq(users.email, normalizeEmail(email)), "admin", password);
  }

  listTeachers() {
    return this.db.query.users.findMany({
      where: eq(users.role, "teacher"),
      columns: rosterColumns,
      orderBy: [asc(users.fullName)],
    });
  }

  listStudents() {
    return this.db.query.users.findMany({
      where: eq(users.role, "student"),
      columns: rosterColumns,
      orderBy: [asc(users.fullName)],
    });
  }

  /** Removes a teacher together with every class they own. */
  async deleteTeacher(teacherId: number): Promise<void> {
    await this.db.transaction(async (tx) => {
      const teacher = await tx.query.users.findFirst({
        where: and(eq(users.id, teacherId), eq(users.role, "teacher")),
      });
      if (!teacher) {
        throw notFound("Teacher not found");
      }

      const owned = await tx.query.classes.findMany({
        where: eq(classes.ownerId, teacher.id),
        columns: { id: true },
      });
      for (const cls of owned) {
        await deleteClassCascade(tx, cls.id);
      }

      await tx.delete(classMembers).where(eq(classMembers.userId, teacher.id));
      await tx.delete(users).where(eq(users.id, teacher.id));
    });
  }

  async deleteStudent(studentId: number): Promise<void> {
    await this.db.transaction(async (tx) => {
      const student = await tx.query.users.findFirst({
        where: and(eq(users.id, studentId), eq(users.role, "student")),
      });
      if (!student) {
        throw notFound("Student not found");
      }

      await tx.delete(classMembers).where(eq(classMembers.userId, student.id));
      await tx.delete(users).where(eq(users.id, student.id));
    });
  }

  async getProfile(email: string): Promise<Profile> {
    const user = await findUserByEmail(this.db, normalizeEmail(email));
    if (!user) {
      throw notFound("User not found");
    }
    return toProfile(user);
  }

  async updateAvatar(email: string, blob: IncomingBlob): Promise<Profile> {
    const user = await findUserByEmail(this.db, normalizeEmail(email));
    if (!user) {
      throw notFound("User not found");
    }

    const saved = await this.store.saveAvatar(blob);
    const [updated] = await this.db
      .update(users)
      .set({ avatarUrl: saved.url })
      .where(eq(users.id, user.id))
      .returning();
    if (!updated) {
      throw notFound("User not found");
    }
    return toProfile(updated);
  }

  private async login(
    where: SQL,
    role: UserRole,
    password: string
  ): Promise<LoginResult> {
    const user = await this.db.query.users.findFirst({
      where: and(where, eq(users.role, role)),
    });

    if (!user || user.password !== password) {
      throw unauthorized(INVALID_LOGIN);
    }
    return toLoginResult(user);
  }

  /** Runs a checked insert; a unique constraint that still trips is a Conflict. */
  private async insertUnique(
    insert: (tx: Transaction) => Promise<User[]>
  ): Promise<User> {
    try {
      return await this.db.transaction(async (tx) => {
        const [user] = await insert(tx);
        if (!user) {
          throw new Error("Failed to create user");
        }
        return user;
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw conflict("Account already registered");
      }
      throw error;
    }
  }
}
