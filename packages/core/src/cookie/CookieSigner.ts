import { createHmac, timingSafeEqual } from "node:crypto";

const SEPARATOR = ".";

function computeSignature(value: string, secret: string): string {
  return createHmac("sha256", secret).update(value).digest("base64url");
}

/**
 * Appends an HMAC-SHA256 signature: `<value>.<base64url signature>`.
 */
export function signCookieValue(value: string, secret: string): string {
  return `${value}${SEPARATOR}${computeSignature(value, secret)}`;
}

/**
 * Returns the original value when the signature matches, otherwise `null`.
 */
export function unsignCookieValue(signed: string, secret: string): string | null {
  const idx = signed.lastIndexOf(SEPARATOR);
  if (idx < 0) return null;

  const value = signed.slice(0, idx);
  const given = Buffer.from(signed.slice(idx + 1));
  const expected = Buffer.from(computeSignature(value, secret));

  if (given.length !== expected.length) return null;
  return timingSafeEqual(given, expected) ? value : null;
}
