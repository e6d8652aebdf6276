/**
 * @fileoverview Tests for payload validation.
 */

import { describe, it, expect } from "vitest";
import { EnvelopeSchema, FriendsPageSchema, RawProfileSchema, parsePayload } from "../../src/services/schemas.js";

describe("EnvelopeSchema", () => {
  it("accepts response and error envelopes", () => {
    expect(EnvelopeSchema.safeParse({ response: 0 }).success).toBe(true);
    expect(EnvelopeSchema.safeParse({ error: { error_code: 5, error_msg: "auth" } }).success).toBe(true);
  });

  it("rejects envelopes with neither", () => {
    expect(EnvelopeSchema.safeParse({}).success).toBe(false);
    expect(EnvelopeSchema.safeParse([]).success).toBe(false);
  });
});

describe("RawProfileSchema", () => {
  it("turns numeric flags into booleans and keeps unknown fields", () => {
    const parsed = RawProfileSchema.parse({ id: 1, is_closed: 1, can_access_closed: 0, photo_50: "x" });
    expect(parsed).toEqual({ id: 1, is_closed: true, can_access_closed: false, photo_50: "x" });
  });
});

describe("parsePayload", () => {
  it("fills defaults for missing page fields", () => {
    expect(parsePayload("friends.get", FriendsPageSchema, {})).toEqual({
      ok: true,
      value: { count: 0, items: [] },
    });
  });

  it("names the method and the failing path", () => {
    const result = parsePayload("friends.get", FriendsPageSchema, { count: 1, items: [{ id: "x" }] });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        "Unexpected response structure for friends.get: Expected number, received string at items.0.id",
      );
    }
  });
});
