import { sql } from "drizzle-orm";
import { sqliteTable, text, integer, real, index, uniqueIndex, check } from "drizzle-orm/sqlite-core";

// Timestamps are epoch milliseconds (mode "timestamp_ms" maps them to Date).
// lots.finish_at is a calendar day "YYYY-MM-DD"; the lot closes at its start.
// Keep in sync with bootstrap.sql.

export const users = sqliteTable(
  "users",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    email: text("email").notNull().unique(),
    name: text("name").notNull(),
    contacts: text("contacts").notNull(),
    passwordHash: text("password_hash").notNull(),
    createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  },
  // One account per address, whatever its case
  (t) => [uniqueIndex("idx_users_email_lower").on(sql`lower(${t.email})`)]
);

export const categories = sqliteTable("categories", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  code: text("code").notNull().unique(),
  title: text("title").notNull(),
});

export const lots = sqliteTable(
  "lots",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    title: text("title").notNull(),
    description: text("description").notNull(),
    image: text("image").notNull(),
    startPrice: real("start_price").notNull(),
    bidStep: integer("bid_step").notNull(),
    finishAt: text("finish_at").notNull(),
    createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
    authorId: integer("author_id")
      .notNull()
      .references(() => users.id),
    categoryId: integer("category_id")
      .notNull()
      .references(() => categories.id),
    winnerId: integer("winner_id").references(() => users.id),
  },
  (t) => [
    index("idx_lots_finish_at").on(t.finishAt),
    index("idx_lots_category").on(t.categoryId),
    check("chk_lots_price", sql`"start_price" > 0 AND "bid_step" > 0`),
  ]
);

export const bets = sqliteTable(
  "bets",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    amount: integer("amount").notNull(),
    createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
    userId: integer("user_id")
      .notNull()
      .references(() => users.id),
    lotId: integer("lot_id")
      .notNull()
      .references(() => lots.id),
  },
  (t) => [index("idx_bets_lot").on(t.lotId)]
);

export const sessions = sqliteTable("sessions", {
  id: text("id").primaryKey(),
  userId: integer("user_id")
    .notNull()
    .references(() => users.id),
  expiresAt: integer("expires_at", { mode: "timestamp_ms" }).notNull(),
});

export type UserRow = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type CategoryRow = typeof categories.$inferSelect;
export type LotRow = typeof lots.$inferSelect;
export type NewLot = typeof lots.$inferInsert;
export type BetRow = typeof bets.$inferSelect;
export type SessionRow = typeof sessions.$inferSelect;
