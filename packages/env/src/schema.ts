import { z } from "zod";

export const serverEnvSchema = z.object({
  DATABASE_URL: z.url(),
  CORS_ORIGIN: z.string().min(1).default("*"),
  PORT: z.coerce.number().int().positive().default(3000),
  UPLOAD_DIR: z.string().min(1).default("uploads"),
});

export type ServerEnv = z.infer<typeof serverEnvSchema>;
