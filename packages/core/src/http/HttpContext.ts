import type { CookieOptions } from "../cookie/CookieCodec";
import type { IssuedCookie } from "../types";

/**
 * Read access to request cookies.
 */
export interface CookieSource {
    /** `null` when the cookie is absent, `""` when it is present but empty. */
    getCookie(name: string): string | null;
}

/**
 * Framework-neutral HTTP context required by the session jar.
 */
export interface HttpContext extends CookieSource {
    setCookie(name: string, value: string, options: CookieOptions): void;
}

/**
 * Returns a cookie source that sees `cookie` on top of `source`, so code later
 * in the same request can retrieve a session that was just issued. `source`
 * itself is left untouched.
 */
export function withIssuedCookie(source: CookieSource, cookie: IssuedCookie): CookieSource {
    return {
        getCookie(name: string): string | null {
            if (name === cookie.name) return cookie.value;
            return source.getCookie(name);
        },
    };
}
