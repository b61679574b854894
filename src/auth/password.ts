// Password hashing for user accounts (PBKDF2-SHA256 via Web Crypto)

import { timingSafeEqual, webcrypto } from "node:crypto";

const PBKDF2_ITERATIONS = 100_000;
const SALT_BYTES = 16;
const KEY_BITS = 256;

function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

function fromHex(hex: string): Uint8Array | null {
  if (hex.length % 2 !== 0 || !/^[0-9a-f]*$/i.test(hex)) return null;
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  return out;
}

async function derive(password: string, salt: Uint8Array, iterations: number): Promise<Uint8Array> {
  const keyMaterial = await webcrypto.subtle.importKey(
    "raw",
    new TextEncoder().encode(password),
    "PBKDF2",
    false,
    ["deriveBits"]
  );
  const bits = await webcrypto.subtle.deriveBits(
    { name: "PBKDF2", salt, iterations, hash: "SHA-256" },
    keyMaterial,
    KEY_BITS
  );
  return new Uint8Array(bits);
}

/**
 * Hash a password with a fresh random salt.
 * @returns String in format "salt:iterations:hash" for storage
 */
export async function hashPassword(
  password: string,
  iterations: number = PBKDF2_ITERATIONS
): Promise<string> {
  const salt = webcrypto.getRandomValues(new Uint8Array(SALT_BYTES));
  const hash = await derive(password, salt, iterations);
  return `${toHex(salt)}:${iterations}:${toHex(hash)}`;
}

/**
 * Verifies a password against its stored "salt:iterations:hash" string.
 * Malformed stored values never verify.
 */
export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const parts = stored.split(":");
  if (parts.length !== 3) return false;
  const [saltHex, iterStr, hashHex] = parts;
  const salt = fromHex(saltHex);
  const expected = fromHex(hashHex);
  const iterations = Number(iterStr);
  if (!salt || !expected || !Number.isInteger(iterations) || iterations <= 0) return false;
  const computed = await derive(password, salt, iterations);
  if (computed.length !== expected.length) return false;
  return timingSafeEqual(computed, expected);
}
