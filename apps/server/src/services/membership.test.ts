import { classMembers, eq, type Database } from "@classroom-chat/db";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";

import { ServiceError } from "@/lib/errors";
import { createTestDatabase, type TestDatabase } from "../test/database";
import { insertStudent, insertTeacher } from "../test/fixtures";
import { MembershipService } from "./membership";
import { MessagingService } from "./messaging";

let testDb: TestDatabase;
let db: Database;
let membership: MembershipService;

beforeAll(async () => {
  testDb = await createTestDatabase();
  db = testDb.db;
  membership = new MembershipService(db);
});

afterAll(async () => {
  await testDb.close();
});

beforeEach(async () => {
  await testDb.reset();
  await insertTeacher(db, "teacher@school.test", "T-100");
  await insertStudent(db, "a@x.com", "s1");
});

function createAlgebra() {
  return membership.createClass({
    name: "  Algebra  ",
    semester: "Fall",
    description: "   ",
    code: "ABC1",
    ownerEmail: "Teacher@School.test",
  });
}

describe("createClass", () => {
  it("creates the class with its owner as an active teacher member", async () => {
    const cls = await createAlgebra();

    expect(cls).toEqual({
      id: 1,
      name: "Algebra",
      semester: "Fall",
      description: null,
      code: "ABC1",
      ownerId: 1,
    });
    expect(await membership.listMembers(cls.id)).toEqual([
      {
        email: "teacher@school.test",
        fullName: "Teacher T-100",
        role: "teacher",
        status: "active",
      },
    ]);
  });

  it("stores the join code uppercased", async () => {
    const cls = await membership.createClass({
      name: "Biology",
      code: " bio-7 ",
      ownerEmail: "teacher@school.test",
    });

    expect(cls.code).toBe("BIO-7");
  });

  it("rejects an owner who is not a teacher", async () => {
    await expect(
      membership.createClass({
        name: "Biology",
        code: "BIO",
        ownerEmail: "a@x.com",
      })
    ).rejects.toMatchObject({ kind: "NotFound", message: "Teacher not found" });
  });

  it("rejects a join code already in use, whatever its case", async () => {
    await createAlgebra();

    await expect(
      membership.createClass({
        name: "Other",
        code: "abc1",
        ownerEmail: "teacher@school.test",
      })
    ).rejects.toMatchObject({
      kind: "Conflict",
      message: "Join code already used",
    });
  });
});

describe("joinClass", () => {
  it("creates a pending membership and stays pending when repeated", async () => {
    const cls = await createAlgebra();

    const first = await membership.joinClass("a@x.com", "abc1");
    const second = await membership.joinClass("A@X.COM", "ABC1");

    expect(first).toEqual({ status: "pending", message: "Join request sent" });
    expect(second).toEqual({
      status: "pending",
      message: "Request already pending",
    });

    const rows = await db.query.classMembers.findMany({
      where: eq(classMembers.classId, cls.id),
    });
    expect(rows).toHaveLength(2);
  });

  it("settles two requests sent together on a single row", async () => {
    const cls = await createAlgebra();

    const results = await Promise.all([
      membership.joinClass("a@x.com", "ABC1"),
      membership.joinClass("a@x.com", "ABC1"),
    ]);

    expect(results.map((r) => r.status)).toEqual(["pending", "pending"]);
    const members = await membership.listMembers(cls.id);
    expect(members.filter((m) => m.role === "student")).toHaveLength(1);
  });

  it("reports an active member without changing anything", async () => {
    const cls = await createAlgebra();
    await membership.joinClass("a@x.com", "ABC1");
    await membership.approveMembership(cls.id, "a@x.com");

    expect(await membership.joinClass("a@x.com", "ABC1")).toEqual({
      status: "active",
      message: "Already a member",
    });
  });

  it("puts a removed member back to pending", async () => {
    const cls = await createAlgebra();
    await membership.joinClass("a@x.com", "ABC1");
    await membership.approveMembership(cls.id, "a@x.com");
    await membership.removeMember(cls.id, "a@x.com", "teacher@school.test");

    expect(await membership.joinClass("a@x.com", "ABC1")).toEqual({
      status: "pending",
      message: "Request re-sent",
    });
    expect(await membership.listClassesForStudent("a@x.com")).toEqual([]);
  });

  it("rejects unknown students and unknown codes", async () => {
    await createAlgebra();

    await expect(
      membership.joinClass("nobody@x.com", "ABC1")
    ).rejects.toMatchObject({ kind: "NotFound", message: "Student not found" });
    await expect(membership.joinClass("a@x.com", "ZZZ")).rejects.toMatchObject(
      { kind: "NotFound", message: "Join code not found" }
    );
  });
});

describe("approveMembership", () => {
  it("makes the class visible to the student only after approval", async () => {
    const cls = await createAlgebra();
    await membership.joinClass("a@x.com", "abc1");

    expect(await membership.listClassesForStudent("a@x.com")).toEqual([]);

    const approved = await membership.approveMembership(cls.id, "a@x.com");
    expect(approved.status).toBe("active");

    const visible = await membership.listClassesForStudent("a@x.com");
    expect(visible.map((c) => c.code)).toEqual(["ABC1"]);
  });

  it("fails when there is no membership to approve", async () => {
    const cls = await createAlgebra();

    await expect(
      membership.approveMembership(cls.id, "a@x.com")
    ).rejects.toMatchObject({
      kind: "NotFound",
      message: "Membership not found",
    });
  });

  it("does not check who is approving", async () => {
    // known gap: there is no caller to check against
    const cls = await createAlgebra();
    await insertTeacher(db, "other@school.test", "T-200");
    await membership.joinClass("a@x.com", "ABC1");

    await expect(
      membership.approveMembership(cls.id, "a@x.com")
    ).resolves.toMatchObject({ status: "active" });
  });
});

describe("removeMember", () => {
  it("requires the owning teacher", async () => {
    const cls = await createAlgebra();
    await insertTeacher(db, "other@school.test", "T-200");
    await membership.joinClass("a@x.com", "ABC1");

    await expect(
      membership.removeMember(cls.id, "a@x.com", "other@school.test")
    ).rejects.toMatchObject({ kind: "NotFound", message: "Class not found" });
  });
});

describe("removeClass", () => {
  it("deletes the class with its members and messages", async () => {
    const cls = await createAlgebra();
    await membership.joinClass("a@x.com", "ABC1");
    const messaging = new MessagingService(db);
    await messaging.postMessage({
      classId: cls.id,
      senderEmail: "a@x.com",
      senderName: "Student s1",
      content: "hello",
    });

    await membership.removeClass(cls.id, "teacher@school.test");

    expect(await membership.listMembers(cls.id)).toEqual([]);
    await expect(messaging.listMessages(cls.id)).rejects.toMatchObject({
      kind: "NotFound",
    });
    expect(await db.query.messages.findMany()).toEqual([]);
    expect(await membership.listClassesForTeacher("teacher@school.test")).toEqual(
      []
    );
  });

  it("refuses a teacher who does not own the class", async () => {
    const cls = await createAlgebra();
    await insertTeacher(db, "other@school.test", "T-200");
    const messaging = new MessagingService(db);
    await messaging.postMessage({
      classId: cls.id,
      senderEmail: "teacher@school.test",
      senderName: "Teacher T-100",
      content: "welcome",
    });

    const attempt = membership.removeClass(cls.id, "other@school.test");

    await expect(attempt).rejects.toBeInstanceOf(ServiceError);
    await expect(attempt).rejects.toMatchObject({
      kind: "NotFound",
      message: "Class not found",
    });
    expect(await messaging.listMessages(cls.id)).toHaveLength(1);
    expect(await membership.listMembers(cls.id)).toHaveLength(1);
  });
});

describe("listings", () => {
  it("lists only the classes a teacher owns", async () => {
    await createAlgebra();
    await insertTeacher(db, "other@school.test", "T-200");
    await membership.createClass({
      name: "Chemistry",
      code: "CHEM",
      ownerEmail: "other@school.test",
    });

    const owned = await membership.listClassesForTeacher("teacher@school.test");
    expect(owned.map((c) => c.name)).toEqual(["Algebra"]);
  });

  it("rejects listings for unknown users", async () => {
    await expect(
      membership.listClassesForTeacher("a@x.com")
    ).rejects.toMatchObject({ kind: "NotFound" });
    await expect(
      membership.listClassesForStudent("teacher@school.test")
    ).rejects.toMatchObject({ kind: "NotFound" });
  });

  it("lists members of every status", async () => {
    const cls = await createAlgebra();
    await insertStudent(db, "b@x.com", "s2");
    await membership.joinClass("a@x.com", "ABC1");
    await membership.joinClass("b@x.com", "ABC1");
    await membership.approveMembership(cls.id, "b@x.com");

    const members = await membership.listMembers(cls.id);
    expect(members.map((m) => [m.email, m.role, m.status])).toEqual([
      ["teacher@school.test", "teacher", "active"],
      ["a@x.com", "student", "pending"],
      ["b@x.com", "student", "active"],
    ]);
  });
});
