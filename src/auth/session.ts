/**
 * Cookie sessions. The cookie holds a random id; the sessions table maps it
 * to a user until it expires. Handlers receive the current user explicitly
 * through getCurrentUser().
 */
import type { AppEnv } from "@/env.ts";
import type { UserRow } from "@/db/schema.ts";

import { randomUUID } from "node:crypto";
import { getCookie, serializeCookie } from "@/common/index.ts";
import { deleteSession, findSessionUser, insertSession } from "@/db/dal.ts";

export const SESSION_COOKIE = "sid";

/** The part of a user record that pages and handlers may see. */
export interface SessionUser {
  id: number;
  name: string;
  email: string;
}

function toSessionUser(user: UserRow): SessionUser {
  return { id: user.id, name: user.name, email: user.email };
}

export function getCurrentUser(request: Request, env: AppEnv): SessionUser | null {
  const id = getCookie(request, SESSION_COOKIE);
  if (!id) return null;
  const user = findSessionUser(env.db, id, env.clock());
  return user ? toSessionUser(user) : null;
}

/**
 * Store a new session for `userId`.
 * @returns Set-Cookie header value carrying the session id
 */
export function startSession(env: AppEnv, userId: number): string {
  const id = randomUUID();
  const expiresAt = new Date(env.clock().getTime() + env.config.sessionTtlMs);
  insertSession(env.db, id, userId, expiresAt);
  env.logger.debug("session:start", { userId });
  return serializeCookie(SESSION_COOKIE, id, {
    maxAgeSeconds: env.config.sessionTtlMs / 1000,
  });
}

/**
 * Forget the request's session, if any.
 * @returns Set-Cookie header value that clears the cookie
 */
export function endSession(request: Request, env: AppEnv): string {
  const id = getCookie(request, SESSION_COOKIE);
  if (id) deleteSession(env.db, id);
  return serializeCookie(SESSION_COOKIE, "", { maxAgeSeconds: 0 });
}
