import { describe, expect, it } from "vitest";
import { jsonSessionCodec, MAX_TIMESTAMP_MS, MIN_TIMESTAMP_MS, SessionJarError } from "../src";
import type { JsonObject, Session } from "../src";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function encodeFailure(session: Session): unknown {
  try {
    jsonSessionCodec.encode(session);
  } catch (error) {
    return error;
  }
  throw new Error("encode unexpectedly succeeded");
}

function decodeFailure(id: string, bytes: Uint8Array): unknown {
  try {
    jsonSessionCodec.decode(id, bytes);
  } catch (error) {
    return error;
  }
  throw new Error("decode unexpectedly succeeded");
}

const fullSession: Session = {
  id: "s1",
  expiresAt: Date.UTC(2026, 0, 1, 1),
  payload: {
    values: { b: 1, a: { d: true, c: null }, list: ["x", 2] },
    fhirToken: {
      accessToken: "at",
      tokenType: "Bearer",
      refreshToken: "rt",
      expiry: Date.UTC(2026, 0, 1),
    },
    launchId: "launch-1",
    fhirUrl: "https://fhir.test",
  },
};

describe("jsonSessionCodec", () => {
  it("encodes_fixed_key_order_with_sorted_values", () => {
    const json = decoder.decode(jsonSessionCodec.encode(fullSession));

    expect(json).toBe(
      '{"id":"s1","fhir_url":"https://fhir.test","launch_id":"launch-1",' +
        '"fhir_token":{"access_token":"at","token_type":"Bearer","refresh_token":"rt","expiry":"2026-01-01T00:00:00.000Z"},' +
        '"expires_at":"2026-01-01T01:00:00.000Z","values":{"a":{"c":null,"d":true},"b":1,"list":["x",2]}}',
    );
  });

  it("decodes_what_it_encodes", () => {
    expect(jsonSessionCodec.decode("s1", jsonSessionCodec.encode(fullSession))).toEqual(fullSession);

    const minimal: Session = { id: "s2", expiresAt: null, payload: { values: {} } };
    expect(jsonSessionCodec.decode("s2", jsonSessionCodec.encode(minimal))).toEqual(minimal);
  });

  it("decodes_empty_bytes_as_placeholder", () => {
    expect(jsonSessionCodec.decode("s1", new Uint8Array())).toEqual({
      id: "s1",
      expiresAt: null,
      payload: { values: {} },
    });
  });

  it("defaults_missing_values_to_empty_object", () => {
    const session = jsonSessionCodec.decode("s1", encoder.encode('{"id":"s1","launch_id":"l"}'));

    expect(session).toEqual({ id: "s1", expiresAt: null, payload: { launchId: "l", values: {} } });
  });

  it("rejects_malformed_records", () => {
    const cases = [
      "{not json",
      '{"id":"s1","k":"v"}',
      '{"id":"s1","expires_at":"yesterday"}',
      '{"id":"s1","fhir_token":{"refresh_token":"rt"}}',
      '["s1"]',
    ];

    for (const raw of cases) {
      expect(decodeFailure("s1", encoder.encode(raw))).toMatchObject({ code: "MALFORMED_PAYLOAD" });
    }

    expect(decodeFailure("s1", new Uint8Array([0xff, 0xfe]))).toMatchObject({ code: "MALFORMED_PAYLOAD" });
  });

  it("rejects_record_stored_under_another_id", () => {
    const error = decodeFailure("s1", encoder.encode('{"id":"s2"}'));

    expect(error).toBeInstanceOf(SessionJarError);
    expect(error).toMatchObject({
      code: "MALFORMED_PAYLOAD",
      message: "Session record id does not match its key.",
      details: { sessionId: "s1", recordId: "s2" },
    });
  });

  it("rejects_values_json_cannot_hold", () => {
    const cyclic: JsonObject = {};
    cyclic.self = cyclic;

    expect(() => jsonSessionCodec.encode({ id: "s1", expiresAt: null, payload: { values: cyclic } })).toThrow(
      "Cyclic value at values.self.",
    );
    expect(() =>
      jsonSessionCodec.encode({ id: "s1", expiresAt: null, payload: { values: { n: Number.NaN } } }),
    ).toThrow("Non-finite number at values.n.");
  });

  it("keeps_special_keys_as_own_properties", () => {
    const values: JsonObject = JSON.parse('{"__proto__":{"x":1},"k":"v","constructor":"c","":0,"ü":[{"b":[],"a":{}}]}');
    const bytes = jsonSessionCodec.encode({ id: "s1", expiresAt: null, payload: { values } });

    expect(decoder.decode(bytes)).toBe(
      '{"id":"s1","values":{"":0,"__proto__":{"x":1},"constructor":"c","k":"v","ü":[{"a":{},"b":[]}]}}',
    );

    const decoded = jsonSessionCodec.decode("s1", bytes).payload.values;
    expect(Object.keys(decoded)).toEqual(["", "__proto__", "constructor", "k", "ü"]);
    expect(Object.getPrototypeOf(decoded)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(decoded, "__proto__")?.value).toEqual({ x: 1 });
    expect(JSON.stringify(decoded)).toBe('{"":0,"__proto__":{"x":1},"constructor":"c","k":"v","ü":[{"a":{},"b":[]}]}');
  });

  it("decodes_nested_arrays_and_objects", () => {
    const session: Session = {
      id: "s1",
      expiresAt: null,
      payload: {
        values: {
          matrix: [[1, 2], [3, [4, -0.5]]],
          deep: { a: { b: { c: [true, null, "s"] } } },
          empty: { arr: [], obj: {} },
        },
      },
    };

    expect(jsonSessionCodec.decode("s1", jsonSessionCodec.encode(session))).toEqual(session);
  });

  it("round_trips_timestamps_at_the_supported_limits", () => {
    const upper: Session = { id: "s1", expiresAt: MAX_TIMESTAMP_MS, payload: { values: {} } };
    const lower: Session = {
      id: "s1",
      expiresAt: MIN_TIMESTAMP_MS,
      payload: { fhirToken: { accessToken: "at", expiry: MAX_TIMESTAMP_MS }, values: {} },
    };

    expect(decoder.decode(jsonSessionCodec.encode(upper))).toBe(
      '{"id":"s1","expires_at":"9999-12-31T23:59:59.999Z","values":{}}',
    );
    expect(jsonSessionCodec.decode("s1", jsonSessionCodec.encode(upper))).toEqual(upper);
    expect(jsonSessionCodec.decode("s1", jsonSessionCodec.encode(lower))).toEqual(lower);
  });

  it("rejects_timestamps_it_cannot_decode", () => {
    const at = (expiresAt: number): Session => ({ id: "s1", expiresAt, payload: { values: {} } });

    for (const expiresAt of [MAX_TIMESTAMP_MS + 1, MIN_TIMESTAMP_MS - 1, 9e15, 1_700_000_000_000.5]) {
      expect(encodeFailure(at(expiresAt))).toMatchObject({
        code: "ENCODE_FAILED",
        message: "Invalid timestamp at expiresAt.",
      });
    }

    expect(
      encodeFailure({
        id: "s1",
        expiresAt: null,
        payload: { fhirToken: { accessToken: "at", expiry: 1_700_000_000_000.25 }, values: {} },
      }),
    ).toMatchObject({ code: "ENCODE_FAILED", message: "Invalid timestamp at fhirToken.expiry." });
  });
});
