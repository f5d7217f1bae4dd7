import type { Database } from "@classroom-chat/db";
import { serveStatic } from "@hono/node-server/serve-static";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";

import { handleError } from "./lib/errors";
import { createAdminRouter } from "./routes/admin";
import { createAuthRouter } from "./routes/auth";
import { createClassRouter } from "./routes/class";
import { createProfileRouter } from "./routes/profile";
import { createStudentRouter } from "./routes/student";
import { createTeacherRouter } from "./routes/teacher";
import { createUploadRouter } from "./routes/upload";
import { AttachmentStore } from "./services/attachments";
import { IdentityService } from "./services/identity";
import { MembershipService } from "./services/membership";
import { MessagingService } from "./services/messaging";

export type AppOptions = {
  db: Database;
  uploadDir: string;
  corsOrigin?: string;
  /** Clock for message timestamps. */
  now?: () => Date;
};

export function createServices({ db, uploadDir, now }: AppOptions) {
  const attachments = new AttachmentStore(uploadDir);
  return {
    attachments,
    identity: new IdentityService(db, attachments),
    membership: new MembershipService(db),
    messaging: new MessagingService(db, now),
  };
}

export function createApp(options: AppOptions) {
  const { attachments, identity, membership, messaging } =
    createServices(options);

  const app = new Hono();

  app.use(logger());
  app.use(
    "/*",
    cors({
      origin: options.corsOrigin ?? "*",
      allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
    })
  );

  app.get("/", (c) => {
    return c.text("OK");
  });

  app.get("/health", (c) => {
    return c.json({
      success: true,
      data: { status: "ok", message: "Class chat backend is running" },
    });
  });

  app.get(
    "/uploads/*",
    serveStatic({
      root: options.uploadDir,
      rewriteRequestPath: (path) => path.replace(/^\/uploads/, ""),
    })
  );

  app.route("/auth", createAuthRouter(identity));
  app.route("/admin", createAdminRouter(identity));
  app.route("/profile", createProfileRouter(identity));
  app.route("/teacher", createTeacherRouter(membership));
  app.route("/student", createStudentRouter(membership));
  app.route("/classes", createClassRouter(membership, messaging));
  app.route("/upload", createUploadRouter(attachments));

  app.notFound((c) => c.json({ success: false, error: "Not found" }, 404));
  app.onError(handleError);

  return app;
}
