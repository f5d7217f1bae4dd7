import { PGlite } from "@electric-sql/pglite";
import {
  bootstrap,
  fullSchema,
  sql,
  type Database,
} from "@classroom-chat/db";
import { drizzle } from "drizzle-orm/pglite";

export type TestDatabase = {
  db: Database;
  reset: () => Promise<void>;
  close: () => Promise<void>;
};

/** In-process Postgres with the multichat schema applied. */
export async function createTestDatabase(): Promise<TestDatabase> {
  const client = new PGlite();
  const db = drizzle({ client, schema: fullSchema });
  await bootstrap(db);

  return {
    db,
    reset: async () => {
      await db.execute(
        sql.raw(
          'TRUNCATE "multichat"."messages", "multichat"."class_members", "multichat"."classes", "multichat"."users" RESTART IDENTITY CASCADE'
        )
      );
    },
    close: () => client.close(),
  };
}
