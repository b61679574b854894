import { fileURLToPath } from "node:url";
import { resolve } from "node:path";

export type EnvVars = Record<string, string | undefined>;

export interface AppConfig {
  port: number;
  databasePath: string;
  templatesDir: string;
  publicDir: string;
  uploadsDir: string;
  logLevel: string;
  sessionTtlMs: number;
  lotsPerPage: number;
  maxUploadBytes: number;
}

const projectRoot = fileURLToPath(new URL("..", import.meta.url));

export function getConfig(env: EnvVars) {
  // Parse configuration from env vars with sensible defaults.
  // Numeric values are clamped to safe ranges.
  const port = Number(env.PORT ?? 3000);
  const sessionTtlHours = Number(env.SESSION_TTL_HOURS ?? 24 * 7);
  const lotsPerPage = Number(env.LOTS_PER_PAGE ?? 9);
  const uploadMaxMb = Number(env.UPLOAD_MAX_MB ?? 5);
  const clamp = (n: number, min: number, max: number) =>
    Number.isFinite(n) ? Math.max(min, Math.min(max, Math.floor(n))) : min;
  const dir = (value: string | undefined, fallback: string) =>
    resolve(projectRoot, value || fallback);
  const config: AppConfig = {
    port: clamp(port, 1, 65_535),
    databasePath: env.DATABASE_PATH === ":memory:" ? ":memory:" : dir(env.DATABASE_PATH, "auction.sqlite"),
    templatesDir: dir(env.TEMPLATES_DIR, "templates"),
    publicDir: dir(env.PUBLIC_DIR, "public"),
    uploadsDir: dir(env.UPLOADS_DIR, "uploads"),
    logLevel: env.LOG_LEVEL || "info",
    sessionTtlMs: clamp(sessionTtlHours, 1, 24 * 30) * 60 * 60 * 1000,
    lotsPerPage: clamp(lotsPerPage, 1, 60),
    maxUploadBytes: clamp(uploadMaxMb, 1, 50) * 1024 * 1024,
  };
  return config;
}
