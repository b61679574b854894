import type { AppEnv } from "@/env.ts";

import { join } from "node:path";
import { Liquid } from "liquidjs";
import { describeError, html } from "@/common/index.ts";
import { escapeHtml, formatCurrency, pluralForm } from "./format.ts";
import { isHttpError } from "./http.ts";

/**
 * LiquidJS engines keyed by templates directory.
 * - Views live in `<templatesDir>/<name>.liquid`, partials in `partials/`.
 * - HTML output is escaped by default via outputEscape: "escape";
 *   pre-rendered markup is printed with `| raw`.
 */
const engines = new Map<string, Liquid>();

export type RenderEnv = Pick<AppEnv, "config">;
export type TemplateContext = Record<string, unknown>;

function getEngine(templatesDir: string): Liquid {
  const cached = engines.get(templatesDir);
  if (cached) {
    return cached;
  }
  const engine = new Liquid({
    extname: ".liquid",
    root: [templatesDir],
    layouts: [templatesDir],
    partials: [join(templatesDir, "partials")],
    cache: true, // parsed templates only, never rendered output
    jsTruthy: true,
    strictFilters: true,
    outputEscape: "escape",
  });
  engine.registerFilter("price", (value: unknown) => formatCurrency(Number(value)));
  engine.registerFilter("plural", (value: unknown, one: string, few: string, many: string) =>
    pluralForm(Number(value), one, few, many)
  );
  engines.set(templatesDir, engine);
  return engine;
}

/**
 * Render a view (no layout), e.g. "login", "lot".
 * Context entries become template variables.
 *
 * A view that does not exist rejects with the engine's lookup error; there
 * is no fallback, callers let it reach the router's error handler.
 */
export async function renderView(
  env: RenderEnv,
  name: string,
  context: TemplateContext = {}
): Promise<string> {
  const engine = getEngine(env.config.templatesDir);
  const out: string = await engine.renderFile(name, context);
  return out;
}

/**
 * Turn a thrown value into an error page.
 * HttpErrors keep their status and (when exposed) their message; anything
 * else is a 500 with a generic message. The page is rendered in full before
 * the Response is built, so a failing template never yields partial output.
 *
 * @param env - Application environment
 * @param e - Error object or unknown to handle
 * @param fallbackTitle - Title to use for the error page
 */
export async function handleError(
  env: AppEnv,
  e: unknown,
  fallbackTitle = "Ошибка"
): Promise<Response> {
  const http = isHttpError(e) ? e : undefined;
  const status = http?.status ?? 500;
  const message = http?.expose ? http.message : "Что-то пошло не так. Попробуйте позже.";
  if (status >= 500) {
    env.logger.error("request:failed", { status, ...describeError(e) });
  } else {
    env.logger.debug("request:rejected", { status, error: http?.message });
  }
  const debug = env.config.logLevel.toLowerCase() === "debug";
  try {
    const content = await renderView(env, "error", {
      status,
      message,
      stack: debug && status >= 500 ? describeError(e).stack : undefined,
    });
    const page = await renderView(env, "layout", {
      title: fallbackTitle,
      user: null,
      categories: [],
      content,
    });
    return html(page, status);
  } catch (renderError) {
    env.logger.error("error-page:render-failed", describeError(renderError));
  }
  return html(`<h2>${escapeHtml(fallbackTitle)}</h2><p>${escapeHtml(message)}</p>`, status);
}
