import { parseCookieHeader, serializeSetCookie, type HttpContext } from "@sessionjar/core";
import type { Context } from "hono";

/**
 * Creates a framework-neutral `HttpContext` from Hono context.
 */
export function createHonoHttpContext(c: Context): HttpContext {
  return {
    getCookie(name: string): string | null {
      const raw = c.req.header("cookie");
      if (!raw) {
        return null;
      }

      return parseCookieHeader(raw)[name] ?? null;
    },

    setCookie(name, value, options) {
      c.header("Set-Cookie", serializeSetCookie(name, value, options), { append: true });
    },
  };
}
