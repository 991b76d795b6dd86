import { serve } from "@hono/node-server";
import { openDb } from "../db/connection.js";
import { initSchema } from "../db/schema.js";
import { createKysely } from "../db/kysely.js";
import { createTracker } from "../main.js";
import { loadConfig } from "../config/config.js";
import { createApp } from "./routes.js";
import { bold } from "../format/colors.js";

const config = loadConfig();
const port = parseInt(process.env.TANDEM_PORT ?? String(config.port), 10);
const db = openDb();
initSchema(db);

const tracker = createTracker(createKysely(db));
const app = createApp(tracker, { sessionDays: config.session_days, log: console.log });

const server = serve({ fetch: app.fetch, port }, (info) => {
  console.log(`${bold("tandem")} server listening on http://localhost:${info.port}`);
});

function shutdown() {
  console.log("Shutting down...");
  server.close(() => {
    db.close();
    process.exit(0);
  });
}

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);
