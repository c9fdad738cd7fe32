import { parseCookieHeader, serializeSetCookie, type HttpContext } from "@sessionjar/core";

export type SessionJarExpressRequest = {
  headers: Record<string, string | string[] | undefined>;
};

export type SessionJarExpressResponse = {
  getHeader(name: string): unknown;
  setHeader(name: string, value: unknown): unknown;
};

/**
 * Creates a framework-neutral `HttpContext` from Express request/response objects.
 */
export function createExpressHttpContext(req: SessionJarExpressRequest, res: SessionJarExpressResponse): HttpContext {
  return {
    getCookie(name: string): string | null {
      const header = req.headers.cookie;
      if (!header) {
        return null;
      }

      return parseCookieHeader(header)[name] ?? null;
    },

    setCookie(name, value, options) {
      appendSetCookie(res, serializeSetCookie(name, value, options));
    },
  };
}

function appendSetCookie(res: SessionJarExpressResponse, value: string): void {
  const prev = res.getHeader("Set-Cookie");

  if (!prev) {
    res.setHeader("Set-Cookie", value);
    return;
  }

  const list = Array.isArray(prev) ? prev.map(String) : [String(prev)];
  list.push(value);
  res.setHeader("Set-Cookie", list);
}
