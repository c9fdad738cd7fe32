import type { IssuedCookie, NewSessionResult, Session, SessionJarOptions } from "./types";
import type { CookieSource, HttpContext } from "./http/HttpContext";
import type { CookieOptions } from "./cookie/CookieCodec";
import { SessionJarError } from "./errors";
import { signCookieValue, unsignCookieValue } from "./cookie/CookieSigner";
import { SessionManager } from "./session/SessionManager";
import { jsonSessionCodec } from "./session/SessionCodec";
import { nowMs, secondsToMs } from "./utils/time";
import { newSessionId } from "./utils/uuid";

export const DEFAULT_COOKIE_NAME = "session";
export const MAX_DURATION_SECONDS = 100 * 365 * 24 * 60 * 60;

function defaultCookieName(opts: SessionJarOptions): string {
    return opts.cookie?.name ?? DEFAULT_COOKIE_NAME;
}

function validateOptions(opts: SessionJarOptions): void {
    const duration = opts.session.durationSeconds;
    if (!Number.isFinite(duration) || duration <= 0) {
        throw new SessionJarError("INVALID_OPTIONS", "session.durationSeconds must be a positive number.", undefined, {
            durationSeconds: duration,
        });
    }
    if (duration > MAX_DURATION_SECONDS) {
        throw new SessionJarError(
            "INVALID_OPTIONS",
            `session.durationSeconds must not exceed ${MAX_DURATION_SECONDS}.`,
            undefined,
            { durationSeconds: duration }
        );
    }

    if (opts.secret !== undefined && opts.secret.length === 0) {
        throw new SessionJarError("INVALID_OPTIONS", "secret must not be empty when provided.");
    }

    if (defaultCookieName(opts).length === 0) {
        throw new SessionJarError("INVALID_OPTIONS", "cookie.name must not be empty.");
    }
}

/**
 * Cookie-bound session lifecycle: issue, retrieve and save sessions kept in a
 * {@link Store} and addressed by a cookie.
 */
export class SessionJar {
    private readonly cookieName: string;
    private readonly manager: SessionManager;

    constructor(private readonly opts: SessionJarOptions) {
        validateOptions(opts);
        this.cookieName = defaultCookieName(opts);
        this.manager = new SessionManager({
            store: opts.store,
            codec: opts.codec ?? jsonSessionCodec,
            generateId: opts.generateId ?? newSessionId,
            enforceExpiry: opts.session.enforceExpiry ?? true,
            logger: opts.logger,
        });
    }

    /**
     * Creates a session and sets its cookie on the response.
     *
     * The incoming request is not modified. To retrieve the new session later
     * in the same request, pass `withIssuedCookie(ctx, result.cookie)` to
     * {@link retrieve}.
     */
    async newSession(ctx: HttpContext): Promise<NewSessionResult> {
        const expiresAt = Math.floor(nowMs() + secondsToMs(this.opts.session.durationSeconds));
        const session = await this.manager.create(expiresAt);

        const cookie = this.issueCookie(session.id, expiresAt);
        ctx.setCookie(cookie.name, cookie.value, cookie.options);

        return { session, cookie };
    }

    /**
     * Loads the session named by the request's session cookie.
     */
    async retrieve(source: CookieSource): Promise<Session> {
        const raw = source.getCookie(this.cookieName);
        if (raw === null) {
            throw new SessionJarError("NO_COOKIE", `Cookie "${this.cookieName}" is not present.`);
        }
        if (raw === "") {
            throw new SessionJarError("EMPTY_SESSION_ID", "Session cookie value is empty.");
        }

        const sessionId = this.readSessionId(raw);
        if (sessionId === "") {
            throw new SessionJarError("EMPTY_SESSION_ID", "Session cookie value is empty.");
        }

        return this.manager.find(sessionId);
    }

    /**
     * Overwrites an existing session. Rejects with `NOT_FOUND` if the
     * session was never created.
     */
    async save(session: Session): Promise<void> {
        await this.manager.save(session);
    }

    private issueCookie(sessionId: string, expiresAt: number): IssuedCookie {
        const configured: Omit<CookieOptions, "expires"> = this.opts.cookie ?? {};
        const { name: _name, ...attributes } = configured;
        const value = this.opts.secret ? signCookieValue(sessionId, this.opts.secret) : sessionId;

        return {
            name: this.cookieName,
            value,
            options: { ...attributes, expires: new Date(expiresAt) },
        };
    }

    private readSessionId(raw: string): string {
        if (!this.opts.secret) return raw;

        const sessionId = unsignCookieValue(raw, this.opts.secret);
        if (sessionId === null) {
            this.opts.logger?.debug("Session cookie signature mismatch.", { sessionId: unverifiedSessionId(raw) });
            throw new SessionJarError("INVALID_SIGNATURE", "Session cookie signature is invalid.");
        }
        return sessionId;
    }
}

function unverifiedSessionId(raw: string): string {
    const idx = raw.lastIndexOf(".");
    return idx < 0 ? raw : raw.slice(0, idx);
}
