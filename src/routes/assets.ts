import type { AuctionRouter } from "./context.ts";

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { getContentTypeFromName, notFound } from "@/web/index.ts";

// Names we generate for uploads: <uuid>.<ext>
const UPLOAD_NAME_RE = /^[0-9a-f-]{36}\.(?:jpg|jpeg|png)$/i;

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

async function serveFile(dir: string, name: string, cacheControl: string): Promise<Response> {
  let body: Buffer;
  try {
    body = await readFile(join(dir, name));
  } catch (e) {
    if (isMissingFile(e)) throw notFound();
    throw e;
  }
  return new Response(new Uint8Array(body), {
    headers: {
      "Content-Type": getContentTypeFromName(name),
      "Cache-Control": cacheControl,
    },
  });
}

export function registerAssetRoutes(router: AuctionRouter) {
  // Serve shared static assets
  router.get(`/base.css`, (_request, env) =>
    serveFile(env.config.publicDir, "base.css", "public, max-age=3600")
  );

  // Uploaded lot images never change once written
  router.get(`/uploads/:name`, (request, env) => {
    const { name } = request.params;
    if (!UPLOAD_NAME_RE.test(name)) throw notFound();
    return serveFile(env.config.uploadsDir, name, "public, max-age=31536000, immutable");
  });
}
