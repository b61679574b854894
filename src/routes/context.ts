import type { IRequest, RouterType } from "itty-router";
import type { AppEnv } from "@/env.ts";
import type { SessionUser } from "@/auth/session.ts";
import type { PageData } from "@/web/render.ts";

import { listCategories } from "@/db/dal.ts";

export type AuctionRouter = RouterType<IRequest, [AppEnv]>;

/** Layout data shared by every page: title, current user and the category nav. */
export function pageData(env: AppEnv, user: SessionUser | null, title: string): PageData {
  return { title, user, categories: listCategories(env.db) };
}

/** Positive integer route parameter, or null. */
export function parseId(raw: string | undefined): number | null {
  if (!raw || !/^[1-9]\d{0,9}$/.test(raw)) return null;
  return Number(raw);
}
