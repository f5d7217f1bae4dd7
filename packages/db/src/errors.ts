const UNIQUE_VIOLATION = "23505";

/**
 * True when a Postgres unique constraint rejected the statement. Drizzle wraps
 * driver errors, so the SQLSTATE may sit anywhere on the `cause` chain.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if ("code" in error && error.code === UNIQUE_VIOLATION) {
    return true;
  }
  return isUniqueViolation(error.cause);
}
