import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";

const statusByKind = {
  BadRequest: 400,
  Unauthorized: 401,
  Forbidden: 403,
  NotFound: 404,
  Conflict: 409,
} as const;

export type ErrorKind = keyof typeof statusByKind;

export class ServiceError extends Error {
  readonly status: (typeof statusByKind)[ErrorKind];

  constructor(readonly kind: ErrorKind, message: string) {
    super(message);
    this.name = "ServiceError";
    this.status = statusByKind[kind];
  }
}

export const badRequest = (message: string) =>
  new ServiceError("BadRequest", message);
export const unauthorized = (message: string) =>
  new ServiceError("Unauthorized", message);
export const forbidden = (message: string) =>
  new ServiceError("Forbidden", message);
export const notFound = (message: string) =>
  new ServiceError("NotFound", message);
export const conflict = (message: string) =>
  new ServiceError("Conflict", message);

export const handleError: ErrorHandler = (err, c) => {
  if (err instanceof ServiceError) {
    return c.json({ success: false, error: err.message }, err.status);
  }
  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  console.error(err);
  return c.json({ success: false, error: "Internal server error" }, 500);
};
