import type { AppEnv } from "@/env.ts";
import type { SessionUser } from "@/auth/session.ts";
import type { CategoryRow } from "@/db/schema.ts";

import { html } from "@/common/index.ts";
import { renderView, type RenderEnv, type TemplateContext } from "./templates.ts";

export interface PageData {
  title: string;
  user: SessionUser | null;
  categories: readonly CategoryRow[];
}

/**
 * Two-pass page composition: the content view is rendered first and its
 * markup handed to the "layout" view as `content`.
 */
export async function renderLayout(
  env: RenderEnv,
  view: string,
  context: TemplateContext,
  page: PageData
): Promise<string> {
  const content = await renderView(env, view, context);
  return renderView(env, "layout", { ...page, content });
}

/** Render a full page and wrap it in a text/html Response. */
export async function renderPage(
  env: AppEnv,
  view: string,
  context: TemplateContext,
  page: PageData,
  status = 200
): Promise<Response> {
  return html(await renderLayout(env, view, context, page), status);
}
