import type { Context } from "hono";
import { z } from "zod";

export const rejectInvalid = (result: { success: boolean }, c: Context) => {
  if (!result.success) {
    return c.json({ success: false, error: "Invalid request schema" }, 400);
  }
};

export const emailField = z.string().trim().pipe(z.email());
export const requiredText = z.string().trim().min(1);
export const idField = z.coerce.number().int().positive();

export const idParamSchema = z.object({ id: idField });
