import type { Store } from "../store/Store";
import type { IdentifierGenerator, Session } from "../types";
import { SessionJarError, type Logger } from "../errors";
import { emptyPayload, type SessionCodec } from "./SessionCodec";
import { nowMs } from "../utils/time";

export type SessionManagerOptions = {
  store: Store;
  codec: SessionCodec;
  generateId: IdentifierGenerator;
  enforceExpiry: boolean;
  logger?: Logger;
};

/**
 * Store-level session lifecycle. Knows nothing about HTTP or cookies.
 */
export class SessionManager {
  constructor(private readonly opts: SessionManagerOptions) {}

  /**
   * Writes a placeholder record under a fresh id.
   */
  async create(expiresAt: number): Promise<Session> {
    const id = this.opts.generateId();
    if (!id) {
      throw new SessionJarError("INVALID_OPTIONS", "Identifier generator returned an empty id.");
    }

    const session: Session = { id, expiresAt, payload: emptyPayload() };
    await this.opts.store.put(id, this.opts.codec.encode(session));
    this.opts.logger?.debug("Session created.", { sessionId: id, expiresAt });
    return session;
  }

  async find(id: string): Promise<Session> {
    const raw = await this.opts.store.get(id);
    if (raw === null) {
      this.opts.logger?.debug("Session not found.", { sessionId: id });
      throw new SessionJarError("NOT_FOUND", "Session not found.", undefined, { sessionId: id });
    }

    const session = this.opts.codec.decode(id, raw);

    if (this.opts.enforceExpiry && session.expiresAt !== null && nowMs() >= session.expiresAt) {
      this.opts.logger?.debug("Session expired.", { sessionId: id, expiresAt: session.expiresAt });
      throw new SessionJarError("SESSION_EXPIRED", "Session expired.", undefined, {
        sessionId: id,
        expiresAt: session.expiresAt,
      });
    }

    return session;
  }

  /**
   * Overwrites an existing record. Never creates one: a missing id rejects
   * with `NOT_FOUND` and the store is not written. The stored expiry is kept.
   */
  async save(session: Session): Promise<void> {
    const existing = await this.find(session.id);

    const next: Session = { id: existing.id, expiresAt: existing.expiresAt, payload: session.payload };
    await this.opts.store.put(session.id, this.opts.codec.encode(next));
  }
}
