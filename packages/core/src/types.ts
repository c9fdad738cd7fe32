import type {CookieOptions} from "./cookie/CookieCodec";
import type {Store} from "./store/Store";
import type {CookieSource, HttpContext} from "./http/HttpContext";
import type {ErrorCode, Logger} from "./errors";
import type {SessionCodec} from "./session/SessionCodec";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * OAuth token held by a session. `expiry` is in epoch milliseconds.
 */
export type OAuthToken = {
    accessToken: string;
    tokenType?: string;
    refreshToken?: string;
    expiry?: number;
};

/**
 * Session state: typed protocol fields plus a free-form bag for
 * application data.
 */
export type SessionPayload = {
    fhirUrl?: string;
    launchId?: string;
    fhirToken?: OAuthToken;
    values: JsonObject;
};

/**
 * One session as loaded from (or about to be written to) the {@link Store}.
 */
export type Session = {
    readonly id: string;
    /** Epoch ms; `null` when the stored record carries no expiry. */
    readonly expiresAt: number | null;
    payload: SessionPayload;
};

/**
 * Produces a fresh, unique session id.
 */
export type IdentifierGenerator = () => string;

/**
 * Root configuration for creating a {@link SessionJar} instance.
 */
export type SessionJarOptions = {
    store: Store;

    /** When set, cookie values are HMAC-signed and verified on retrieve. */
    secret?: string;

    generateId?: IdentifierGenerator; // default crypto.randomUUID

    session: {
        durationSeconds: number;
        enforceExpiry?: boolean; // default true
    };

    cookie?: Omit<CookieOptions, "expires">;

    codec?: SessionCodec;

    logger?: Logger;
};

/**
 * Cookie issued by {@link SessionJar.newSession}.
 */
export type IssuedCookie = {
    name: string;
    value: string;
    options: CookieOptions & { expires: Date };
};

/**
 * Result returned by {@link SessionJar.newSession}.
 */
export type NewSessionResult = {
    session: Session;
    cookie: IssuedCookie;
};

// Re-export commonly used types
export type {CookieOptions, Store, CookieSource, HttpContext, ErrorCode};
