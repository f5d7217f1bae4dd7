export const normalizeEmail = (email: string) => email.trim().toLowerCase();

export const normalizeJoinCode = (code: string) => code.trim().toUpperCase();

/** Trims free text; blank input is stored as null. */
export const optionalText = (value?: string | null) => {
  const trimmed = (value ?? "").trim();
  return trimmed === "" ? null : trimmed;
};
