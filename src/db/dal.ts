/**
 * Data Access Layer (DAL) for the auction database.
 *
 * better-sqlite3 is synchronous, so these helpers return values directly;
 * this keeps lookups usable from inside form validators.
 */

import type { AuctionDb } from "./client.ts";

import { and, desc, eq, gt, isNull, lt, lte, sql } from "drizzle-orm";
import { bets, categories, lots, sessions, users } from "./schema.ts";
import type { CategoryRow, NewLot, NewUser, UserRow } from "./schema.ts";

export interface LotCard {
  id: number;
  title: string;
  image: string;
  startPrice: number;
  currentPrice: number;
  betCount: number;
  finishAt: string;
  categoryTitle: string;
}

export interface LotDetail extends LotCard {
  description: string;
  bidStep: number;
  authorId: number;
  categoryId: number;
  winnerId: number | null;
}

export interface BetEntry {
  id: number;
  amount: number;
  createdAt: Date;
  userId: number;
  userName: string;
}

// Highest bet, or the start price when nobody has bid yet.
const currentPrice = sql<number>`coalesce(max(${bets.amount}), ${lots.startPrice})`;
const betCount = sql<number>`count(${bets.id})`;

export function listCategories(db: AuctionDb): CategoryRow[] {
  return db.select().from(categories).orderBy(categories.id).all();
}

export function findCategoryByCode(db: AuctionDb, code: string): CategoryRow | undefined {
  return db.select().from(categories).where(eq(categories.code, code)).get();
}

/**
 * Newest lots still open on `today` (a "YYYY-MM-DD" day), optionally within one category.
 * A lot closes at the start of its finish day, so lots finishing today are excluded.
 */
export function listOpenLots(
  db: AuctionDb,
  today: string,
  limit: number,
  categoryId?: number
): LotCard[] {
  return db
    .select({
      id: lots.id,
      title: lots.title,
      image: lots.image,
      startPrice: lots.startPrice,
      currentPrice,
      betCount,
      finishAt: lots.finishAt,
      categoryTitle: categories.title,
    })
    .from(lots)
    .innerJoin(categories, eq(lots.categoryId, categories.id))
    .leftJoin(bets, eq(bets.lotId, lots.id))
    .where(
      and(
        gt(lots.finishAt, today),
        categoryId === undefined ? undefined : eq(lots.categoryId, categoryId)
      )
    )
    .groupBy(lots.id)
    .orderBy(desc(lots.createdAt), desc(lots.id))
    .limit(limit)
    .all();
}

export function getLot(db: AuctionDb, id: number): LotDetail | undefined {
  return db
    .select({
      id: lots.id,
      title: lots.title,
      image: lots.image,
      description: lots.description,
      startPrice: lots.startPrice,
      bidStep: lots.bidStep,
      currentPrice,
      betCount,
      finishAt: lots.finishAt,
      authorId: lots.authorId,
      categoryId: lots.categoryId,
      winnerId: lots.winnerId,
      categoryTitle: categories.title,
    })
    .from(lots)
    .innerJoin(categories, eq(lots.categoryId, categories.id))
    .leftJoin(bets, eq(bets.lotId, lots.id))
    .where(eq(lots.id, id))
    .groupBy(lots.id)
    .get();
}

export function listBets(db: AuctionDb, lotId: number): BetEntry[] {
  return db
    .select({
      id: bets.id,
      amount: bets.amount,
      createdAt: bets.createdAt,
      userId: bets.userId,
      userName: users.name,
    })
    .from(bets)
    .innerJoin(users, eq(bets.userId, users.id))
    .where(eq(bets.lotId, lotId))
    .orderBy(desc(bets.createdAt), desc(bets.id))
    .all();
}

export function insertLot(db: AuctionDb, lot: NewLot): number {
  const row = db.insert(lots).values(lot).returning({ id: lots.id }).get();
  return row.id;
}

/**
 * Record the top bidder as winner of every lot that closed on or before
 * `today` and has no winner yet. Lots without bets stay unsold.
 * @returns number of lots that got a winner
 */
export function assignWinners(db: AuctionDb, today: string): number {
  const closed = db
    .select({ id: lots.id })
    .from(lots)
    .where(and(isNull(lots.winnerId), lte(lots.finishAt, today)))
    .all();
  let assigned = 0;
  for (const { id } of closed) {
    const top = db
      .select({ userId: bets.userId })
      .from(bets)
      .where(eq(bets.lotId, id))
      .orderBy(desc(bets.amount), desc(bets.id))
      .limit(1)
      .get();
    if (!top) continue;
    db.update(lots).set({ winnerId: top.userId }).where(eq(lots.id, id)).run();
    assigned++;
  }
  return assigned;
}

export function insertBet(
  db: AuctionDb,
  bet: { lotId: number; userId: number; amount: number; createdAt: Date }
): number {
  const row = db.insert(bets).values(bet).returning({ id: bets.id }).get();
  return row.id;
}

/** Emails are compared case-insensitively. */
export function findUserByEmail(db: AuctionDb, email: string): UserRow | undefined {
  return db
    .select()
    .from(users)
    .where(sql`lower(${users.email}) = ${email.trim().toLowerCase()}`)
    .get();
}

export function emailExists(db: AuctionDb, email: string): boolean {
  const row = db
    .select({ id: users.id })
    .from(users)
    .where(sql`lower(${users.email}) = ${email.trim().toLowerCase()}`)
    .limit(1)
    .get();
  return row !== undefined;
}

/**
 * Emails are stored trimmed and lowercased.
 * @returns the new id, or undefined when the address is already registered
 */
export function insertUser(db: AuctionDb, user: NewUser): number | undefined {
  const [row] = db
    .insert(users)
    .values({ ...user, email: user.email.trim().toLowerCase() })
    .onConflictDoNothing()
    .returning({ id: users.id })
    .all();
  return row?.id;
}

export function insertSession(db: AuctionDb, id: string, userId: number, expiresAt: Date): void {
  db.insert(sessions).values({ id, userId, expiresAt }).run();
}

/** The user owning a session that has not expired at `now`. */
export function findSessionUser(db: AuctionDb, id: string, now: Date): UserRow | undefined {
  const row = db
    .select({ user: users })
    .from(sessions)
    .innerJoin(users, eq(sessions.userId, users.id))
    .where(and(eq(sessions.id, id), gt(sessions.expiresAt, now)))
    .get();
  return row?.user;
}

export function deleteSession(db: AuctionDb, id: string): void {
  db.delete(sessions).where(eq(sessions.id, id)).run();
}

/** Drop sessions that expired before `now`; returns how many were removed. */
export function deleteExpiredSessions(db: AuctionDb, now: Date): number {
  const res = db.delete(sessions).where(lt(sessions.expiresAt, now)).run();
  return res.changes;
}
