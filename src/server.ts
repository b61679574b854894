import "dotenv/config";

import type { AppEnv } from "./env.ts";

import { randomUUID } from "node:crypto";
import { mkdirSync } from "node:fs";
import { createServer } from "node:http";
import { createServerAdapter } from "@whatwg-node/server";
import { createRouter } from "./index.ts";
import { getConfig } from "./config.ts";
import { openDatabase } from "./db/client.ts";
import { deleteExpiredSessions } from "./db/dal.ts";
import { createLogger } from "./common/logger.ts";

const config = getConfig(process.env);
const logger = createLogger(config.logLevel, { service: "lot-auction" });
mkdirSync(config.uploadsDir, { recursive: true });

const env: AppEnv = {
  config,
  db: openDatabase(config.databasePath, { logger }),
  logger,
  clock: () => new Date(),
};

const purged = deleteExpiredSessions(env.db, env.clock());
if (purged > 0) logger.info("sessions:purged", { count: purged });

const router = createRouter();
// Each request logs with its own id
const adapter = createServerAdapter((request: Request) =>
  router.fetch(request, { ...env, logger: logger.child({ requestId: randomUUID() }) })
);

createServer(adapter).listen(config.port, () => {
  logger.info("server:listening", { port: config.port, database: config.databasePath });
});
