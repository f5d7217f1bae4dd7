import { readFile } from "node:fs/promises";
import { sql } from "drizzle-orm";
import { z } from "zod";

import type { Database } from "./index";

const STATEMENT_BREAKPOINT = "--> statement-breakpoint";
const initScript = new URL("../sql/init.sql", import.meta.url);

const existingTableResult = z.object({
  rows: z.array(z.object({ existing: z.boolean() })),
});

async function readInitStatements(): Promise<string[]> {
  const script = await readFile(initScript, "utf8");
  return script
    .split(STATEMENT_BREAKPOINT)
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

/**
 * Creates the multichat schema, enums, tables and indexes in one transaction.
 * Resolves to false without touching anything when the tables already exist.
 */
export async function bootstrap(db: Database): Promise<boolean> {
  const statements = await readInitStatements();

  return db.transaction(async (tx) => {
    const result = existingTableResult.parse(
      await tx.execute(
        sql`select exists (
          select 1 from information_schema.tables
          where table_schema = 'multichat' and table_name = 'users'
        ) as existing`
      )
    );
    if (result.rows[0]?.existing) {
      return false;
    }

    for (const statement of statements) {
      await tx.execute(sql.raw(statement));
    }
    return true;
  });
}
