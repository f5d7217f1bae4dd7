import { drizzle } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";

import * as relations from "./relations";
import * as schema from "./schema";

export const fullSchema = { ...schema, ...relations };

export type Database = PgDatabase<PgQueryResultHKT, typeof fullSchema>;
export type Transaction = Parameters<Parameters<Database["transaction"]>[0]>[0];
/** Anything queries can run on: the root handle or an open transaction. */
export type Executor = Database | Transaction;

export function createDatabase(url: string) {
  return drizzle(url, { schema: fullSchema });
}

export * from "./schema";
export { isUniqueViolation } from "./errors";
export { bootstrap } from "./bootstrap";
export { eq, and, asc, getTableColumns, sql, type SQL } from "drizzle-orm";
