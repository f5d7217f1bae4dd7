import { bootstrap, createDatabase } from "@classroom-chat/db";
import { env } from "@classroom-chat/env/server";
import { serve } from "@hono/node-server";

import { createApp } from "./app";

const db = createDatabase(env.DATABASE_URL);

if (await bootstrap(db)) {
  console.log("Created the multichat schema");
}

const app = createApp({
  db,
  uploadDir: env.UPLOAD_DIR,
  corsOrigin: env.CORS_ORIGIN,
});

const server = serve(
  {
    fetch: app.fetch,
    port: env.PORT,
  },
  (info) => {
    console.log(`Server is running on http://localhost:${info.port}`);
  }
);

process.on("SIGTERM", () => {
  server.close(() => {
    db.$client.end().catch((error: unknown) => {
      console.error(error);
    });
  });
});
