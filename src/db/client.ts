import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type { Logger } from "@/common/logger.ts";

import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import { bootstrapSchema } from "./migrate.ts";
import * as schema from "./schema.ts";

export type AuctionDb = BetterSQLite3Database<typeof schema>;

/**
 * Open (or create) the SQLite database at `path` and make sure the schema
 * exists. Pass ":memory:" for a throwaway database.
 */
export function openDatabase(path: string, options?: { logger?: Logger }): AuctionDb {
  const sqlite = new Database(path);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");
  bootstrapSchema(sqlite, options?.logger);
  return drizzle(sqlite, { schema });
}
