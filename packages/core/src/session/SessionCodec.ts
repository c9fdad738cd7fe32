import { z } from "zod";
import { SessionJarError } from "../errors";
import type { JsonObject, JsonValue, OAuthToken, Session, SessionPayload } from "../types";

/**
 * Converts sessions to and from the bytes held by a {@link Store}.
 */
export interface SessionCodec {
  encode(session: Session): Uint8Array;
  /**
   * `bytes` may be empty: a freshly created entry decodes to a session with
   * an empty payload.
   */
  decode(id: string, bytes: Uint8Array): Session;
}

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

const timestampSchema = z.string().datetime({ offset: true });

const oauthTokenRecordSchema = z
  .object({
    access_token: z.string(),
    token_type: z.string().optional(),
    refresh_token: z.string().optional(),
    expiry: timestampSchema.optional(),
  })
  .strict();

const sessionRecordSchema = z
  .object({
    id: z.string().min(1),
    fhir_url: z.string().optional(),
    launch_id: z.string().optional(),
    fhir_token: oauthTokenRecordSchema.optional(),
    expires_at: timestampSchema.optional(),
    values: z.record(jsonValueSchema).optional(),
  })
  .strict();

type OAuthTokenRecord = z.infer<typeof oauthTokenRecordSchema>;
type SessionRecord = z.infer<typeof sessionRecordSchema>;

// 0000-01-01T00:00:00.000Z to 9999-12-31T23:59:59.999Z: the range a
// four-digit-year timestamp can express.
export const MIN_TIMESTAMP_MS = -62_167_219_200_000;
export const MAX_TIMESTAMP_MS = 253_402_300_799_999;

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export function emptyPayload(): SessionPayload {
  return { values: {} };
}

/**
 * Default codec: UTF-8 JSON with a fixed key order and sorted `values` keys.
 */
export const jsonSessionCodec: SessionCodec = {
  encode(session) {
    return encoder.encode(JSON.stringify(toRecord(session)));
  },

  decode(id, bytes) {
    if (bytes.length === 0) {
      return { id, expiresAt: null, payload: emptyPayload() };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(decoder.decode(bytes));
    } catch (error) {
      throw new SessionJarError("MALFORMED_PAYLOAD", "Session record is not valid JSON.", error, { sessionId: id });
    }

    const result = sessionRecordSchema.safeParse(raw);
    if (!result.success) {
      throw new SessionJarError(
        "MALFORMED_PAYLOAD",
        "Session record does not match the expected shape.",
        result.error,
        { sessionId: id, issues: result.error.issues },
      );
    }

    if (result.data.id !== id) {
      throw new SessionJarError("MALFORMED_PAYLOAD", "Session record id does not match its key.", undefined, {
        sessionId: id,
        recordId: result.data.id,
      });
    }

    // zod rebuilds records by plain assignment, which drops an own "__proto__"
    // key; values are copied from the parsed JSON instead.
    const values = hasValues(raw) ? canonicalize(raw.values, "values", new Set()) : {};
    return fromRecord(result.data, isJsonObject(values) ? values : {});
  },
};

function toRecord(session: Session): SessionRecord {
  const { payload } = session;
  const record: SessionRecord = { id: session.id };

  if (payload.fhirUrl !== undefined) record.fhir_url = payload.fhirUrl;
  if (payload.launchId !== undefined) record.launch_id = payload.launchId;
  if (payload.fhirToken !== undefined) record.fhir_token = toTokenRecord(payload.fhirToken);
  if (session.expiresAt !== null) record.expires_at = toTimestamp(session.expiresAt, "expiresAt");

  const values = canonicalize(payload.values, "values", new Set());
  record.values = isJsonObject(values) ? values : {};
  return record;
}

function toTokenRecord(token: OAuthToken): OAuthTokenRecord {
  const record: OAuthTokenRecord = { access_token: token.accessToken };
  if (token.tokenType !== undefined) record.token_type = token.tokenType;
  if (token.refreshToken !== undefined) record.refresh_token = token.refreshToken;
  if (token.expiry !== undefined) record.expiry = toTimestamp(token.expiry, "fhirToken.expiry");
  return record;
}

function fromRecord(record: SessionRecord, values: JsonObject): Session {
  const payload: SessionPayload = { values };

  if (record.fhir_url !== undefined) payload.fhirUrl = record.fhir_url;
  if (record.launch_id !== undefined) payload.launchId = record.launch_id;
  if (record.fhir_token !== undefined) {
    const token: OAuthToken = { accessToken: record.fhir_token.access_token };
    if (record.fhir_token.token_type !== undefined) token.tokenType = record.fhir_token.token_type;
    if (record.fhir_token.refresh_token !== undefined) token.refreshToken = record.fhir_token.refresh_token;
    if (record.fhir_token.expiry !== undefined) token.expiry = Date.parse(record.fhir_token.expiry);
    payload.fhirToken = token;
  }

  return {
    id: record.id,
    expiresAt: record.expires_at !== undefined ? Date.parse(record.expires_at) : null,
    payload,
  };
}

function toTimestamp(ms: number, path: string): string {
  if (!Number.isInteger(ms) || ms < MIN_TIMESTAMP_MS || ms > MAX_TIMESTAMP_MS) {
    throw new SessionJarError("ENCODE_FAILED", `Invalid timestamp at ${path}.`, undefined, { path, value: ms });
  }
  return new Date(ms).toISOString();
}

function hasValues(raw: unknown): raw is { values: unknown } {
  return typeof raw === "object" && raw !== null && "values" in raw;
}

function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Copies a JSON value with object keys sorted, rejecting what JSON cannot hold.
function canonicalize(value: unknown, path: string, ancestors: Set<object>): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new SessionJarError("ENCODE_FAILED", `Non-finite number at ${path}.`, undefined, { path });
    }
    return value;
  }

  if (typeof value !== "object") {
    throw new SessionJarError("ENCODE_FAILED", `Unsupported value at ${path}.`, undefined, { path });
  }

  if (ancestors.has(value)) {
    throw new SessionJarError("ENCODE_FAILED", `Cyclic value at ${path}.`, undefined, { path });
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown, i) => canonicalize(item, `${path}[${i}]`, ancestors));
    }

    const out: JsonObject = {};
    const entries: [string, unknown][] = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, item] of entries) {
      if (item === undefined) continue;
      // defineProperty keeps keys such as "__proto__" as own data properties
      Object.defineProperty(out, key, {
        value: canonicalize(item, `${path}.${key}`, ancestors),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return out;
  } finally {
    ancestors.delete(value);
  }
}
