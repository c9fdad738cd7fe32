import { parse, serialize, type SerializeOptions } from "cookie";

/**
 * Cookie attributes applied to the session cookie.
 *
 * Only `path` has a default ("/"). `HttpOnly`, `Secure` and `SameSite` are
 * emitted only when configured.
 */
export type CookieOptions = {
    name?: string; // default "session"
    path?: string;
    domain?: string;
    httpOnly?: boolean;
    secure?: boolean;
    sameSite?: "lax" | "strict" | "none";
    expires?: Date;
};

/**
 * Parses a raw Cookie header into a key/value map. Empty values are kept as
 * `""` so callers can tell them apart from missing cookies.
 */
export function parseCookieHeader(cookieHeader: string | readonly string[] | null | undefined): Record<string, string> {
    const out: Record<string, string> = {};
    if (!cookieHeader) return out;

    const raw = typeof cookieHeader === "string" ? cookieHeader : cookieHeader.join("; ");
    const parsed = parse(raw);
    for (const [key, value] of Object.entries(parsed)) {
        if (value !== undefined) out[key] = value;
    }
    return out;
}

/**
 * Serializes a Set-Cookie header value.
 */
export function serializeSetCookie(name: string, value: string, options: CookieOptions): string {
    const serializeOptions: SerializeOptions = { path: options.path ?? "/" };

    if (options.domain !== undefined) serializeOptions.domain = options.domain;
    if (options.httpOnly !== undefined) serializeOptions.httpOnly = options.httpOnly;
    if (options.secure !== undefined) serializeOptions.secure = options.secure;
    if (options.sameSite !== undefined) serializeOptions.sameSite = options.sameSite;
    if (options.expires !== undefined) serializeOptions.expires = options.expires;

    return serialize(name, value, serializeOptions);
}
