/**
 * Lightweight response helpers to keep handlers concise and consistent.
 * Prefer these over ad-hoc new Response(...) in endpoint code.
 */

/** HTML page response, never cached. */
export function html(body: string, status = 200, headers: Record<string, string> = {}) {
  const h = new Headers(headers);
  if (!h.has("Content-Type")) h.set("Content-Type", "text/html; charset=utf-8");
  if (!h.has("Cache-Control")) h.set("Cache-Control", "no-store, no-cache, must-revalidate");
  return new Response(body, { status, headers: h });
}

/**
 * 302 redirect to `location`, used after a successful form submission.
 * Pass `setCookie` to attach a session cookie.
 */
export function redirect(location: string, setCookie?: string): Response {
  const h = new Headers({ Location: location });
  if (setCookie) h.append("Set-Cookie", setCookie);
  return new Response(null, { status: 302, headers: h });
}

/**
 * Read one cookie from the Cookie header.
 * Returns null when the cookie is missing or empty.
 */
export function getCookie(req: Request, name: string): string | null {
  const header = req.headers.get("Cookie") || "";
  for (const part of header.split(";")) {
    const idx = part.indexOf("=");
    if (idx === -1) continue;
    if (part.slice(0, idx).trim() !== name) continue;
    const value = part.slice(idx + 1).trim();
    if (!value) return null;
    try {
      return decodeURIComponent(value);
    } catch {
      return null;
    }
  }
  return null;
}

export interface CookieOptions {
  maxAgeSeconds?: number;
  path?: string;
  httpOnly?: boolean;
  sameSite?: "Strict" | "Lax" | "None";
  secure?: boolean;
}

export function serializeCookie(name: string, value: string, options: CookieOptions = {}): string {
  const parts = [`${name}=${encodeURIComponent(value)}`];
  parts.push(`Path=${options.path ?? "/"}`);
  if (typeof options.maxAgeSeconds === "number") {
    parts.push(`Max-Age=${Math.max(0, Math.floor(options.maxAgeSeconds))}`);
  }
  if (options.httpOnly ?? true) parts.push("HttpOnly");
  parts.push(`SameSite=${options.sameSite ?? "Lax"}`);
  if (options.secure) parts.push("Secure");
  return parts.join("; ");
}
