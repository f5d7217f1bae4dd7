import {
  and,
  asc,
  classes,
  classMembers,
  eq,
  getTableColumns,
  isUniqueViolation,
  messages,
  type Class,
  type ClassMember,
  type Database,
  type Executor,
  type TMemberStatus,
} from "@classroom-chat/db";

import { conflict, notFound } from "@/lib/errors";
import {
  findClassByCode,
  findMembership,
  findOwnedClass,
  findUserByEmail,
} from "./lookup";
import { normalizeEmail, normalizeJoinCode, optionalText } from "./normalize";

export type CreateClassInput = {
  name: string;
  semester?: string | null;
  description?: string | null;
  code: string;
  ownerEmail: string;
};

export type JoinResult = {
  status: TMemberStatus;
  message: string;
};

export type MemberView = {
  email: string;
  fullName: string;
  role: ClassMember["role"];
  status: TMemberStatus;
};

const ALREADY_PENDING: JoinResult = {
  status: "pending",
  message: "Request already pending",
};

/**
 * Deletes a class with everything it owns: memberships, then messages, then
 * the class row. Callers run it inside their own transaction.
 */
export async function deleteClassCascade(db: Executor, classId: number) {
  await db.delete(classMembers).where(eq(classMembers.classId, classId));
  await db.delete(messages).where(eq(messages.classId, classId));
  await db.delete(classes).where(eq(classes.id, classId));
}

export class MembershipService {
  constructor(private readonly db: Database) {}

  async createClass(input: CreateClassInput): Promise<Class> {
    const ownerEmail = normalizeEmail(input.ownerEmail);
    const code = normalizeJoinCode(input.code);

    try {
      return await this.db.transaction(async (tx) => {
        const owner = await findUserByEmail(tx, ownerEmail, "teacher");
        if (!owner) {
          throw notFound("Teacher not found");
        }

        if (await findClassByCode(tx, code)) {
          throw conflict("Join code already used");
        }

        const [created] = await tx
          .insert(classes)
          .values({
            name: input.name.trim(),
            semester: optionalText(input.semester),
            description: optionalText(input.description),
            code,
            ownerId: owner.id,
          })
          .returning();
        if (!created) {
          throw new Error("Failed to create class");
        }

        await tx.insert(classMembers).values({
          classId: created.id,
          userId: owner.id,
          role: "teacher",
          status: "active",
        });

        return created;
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw conflict("Join code already used");
      }
      throw error;
    }
  }

  /**
   * Requests membership for a student. Repeating the request never creates a
   * second row: active and pending members are left alone, removed members go
   * back to pending.
   */
  async joinClass(studentEmail: string, code: string): Promise<JoinResult> {
    const email = normalizeEmail(studentEmail);
    const joinCode = normalizeJoinCode(code);

    try {
      return await this.db.transaction(async (tx): Promise<JoinResult> => {
        const student = await findUserByEmail(tx, email, "student");
        if (!student) {
          throw notFound("Student not found");
        }

        const cls = await findClassByCode(tx, joinCode);
        if (!cls) {
          throw notFound("Join code not found");
        }

        const existing = await findMembership(tx, cls.id, student.id);

        if (!existing) {
          await tx.insert(classMembers).values({
            classId: cls.id,
            userId: student.id,
            role: "student",
            status: "pending",
          });
          return { status: "pending", message: "Join request sent" };
        }

        if (existing.status === "active") {
          return { status: "active", message: "Already a member" };
        }
        if (existing.status === "pending") {
          return ALREADY_PENDING;
        }

        await tx
          .update(classMembers)
          .set({ status: "pending" })
          .where(eq(classMembers.id, existing.id));
        return { status: "pending", message: "Request re-sent" };
      });
    } catch (error) {
      // a concurrent request inserted the row first
      if (isUniqueViolation(error)) {
        return ALREADY_PENDING;
      }
      throw error;
    }
  }

  // Any caller may approve for any class; ownership is not checked here.
  async approveMembership(
    classId: number,
    studentEmail: string
  ): Promise<ClassMember> {
    const email = normalizeEmail(studentEmail);

    return this.db.transaction(async (tx) => {
      const student = await findUserByEmail(tx, email, "student");
      if (!student) {
        throw notFound("Student not found");
      }

      const [approved] = await tx
        .update(classMembers)
        .set({ status: "active" })
        .where(
          and(
            eq(classMembers.classId, classId),
            eq(classMembers.userId, student.id)
          )
        )
        .returning();
      if (!approved) {
        throw notFound("Membership not found");
      }
      return approved;
    });
  }

  async removeMember(
    classId: number,
    studentEmail: string,
    ownerEmail: string
  ): Promise<ClassMember> {
    const email = normalizeEmail(studentEmail);
    const owner = normalizeEmail(ownerEmail);

    return this.db.transaction(async (tx) => {
      const teacher = await findUserByEmail(tx, owner, "teacher");
      if (!teacher) {
        throw notFound("Teacher not found");
      }
      if (!(await findOwnedClass(tx, classId, teacher.id))) {
        throw notFound("Class not found");
      }

      const student = await findUserByEmail(tx, email, "student");
      if (!student) {
        throw notFound("Student not found");
      }

      const [removed] = await tx
        .update(classMembers)
        .set({ status: "removed" })
        .where(
          and(
            eq(classMembers.classId, classId),
            eq(classMembers.userId, student.id)
          )
        )
        .returning();
      if (!removed) {
        throw notFound("Membership not found");
      }
      return removed;
    });
  }

  async removeClass(classId: number, ownerEmail: string): Promise<void> {
    const email = normalizeEmail(ownerEmail);

    await this.db.transaction(async (tx) => {
      const teacher = await findUserByEmail(tx, email, "teacher");
      if (!teacher) {
        throw notFound("Teacher not found");
      }

      const cls = await findOwnedClass(tx, classId, teacher.id);
      if (!cls) {
        throw notFound("Class not found");
      }

      await deleteClassCascade(tx, cls.id);
    });
  }

  async listClassesForTeacher(ownerEmail: string): Promise<Class[]> {
    const teacher = await findUserByEmail(
      this.db,
      normalizeEmail(ownerEmail),
      "teacher"
    );
    if (!teacher) {
      throw notFound("Teacher not found");
    }

    return this.db.query.classes.findMany({
      where: eq(classes.ownerId, teacher.id),
      orderBy: [asc(classes.id)],
    });
  }

  async listClassesForStudent(studentEmail: string): Promise<Class[]> {
    const student = await findUserByEmail(
      this.db,
      normalizeEmail(studentEmail),
      "student"
    );
    if (!student) {
      throw notFound("Student not found");
    }

    return this.db
      .select(getTableColumns(classes))
      .from(classes)
      .innerJoin(classMembers, eq(classMembers.classId, classes.id))
      .where(
        and(
          eq(classMembers.userId, student.id),
          eq(classMembers.status, "active")
        )
      )
      .orderBy(asc(classes.id));
  }

  async listMembers(classId: number): Promise<MemberView[]> {
    const rows = await this.db.query.classMembers.findMany({
      where: eq(classMembers.classId, classId),
      orderBy: [asc(classMembers.id)],
      with: {
        user: {
          columns: { email: true, fullName: true },
        },
      },
    });

    return rows.map((m) => ({
      email: m.user.email,
      fullName: m.user.fullName,
      role: m.role,
      status: m.status,
    }));
  }
}
