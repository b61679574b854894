import type Database from "better-sqlite3";
import type { Logger } from "@/common/logger.ts";

import { readFileSync } from "node:fs";

const BOOTSTRAP_SQL = new URL("./bootstrap.sql", import.meta.url);

/**
 * Create missing tables and seed categories. Safe to run on every start:
 * every statement in bootstrap.sql is IF NOT EXISTS / OR IGNORE.
 */
export function bootstrapSchema(sqlite: Database.Database, logger?: Logger): void {
  const ddl = readFileSync(BOOTSTRAP_SQL, "utf8");
  sqlite.exec(ddl);
  const row: unknown = sqlite.prepare("SELECT count(*) AS n FROM categories").get();
  const categoryCount =
    typeof row === "object" && row !== null && "n" in row ? Number(row.n) : 0;
  logger?.debug("db:bootstrap", { categories: categoryCount });
}
