import { describe, it, expect } from "vitest";
import { decodeStringList, encodeStringList } from "../codec.js";
import { ParseError } from "../errors.js";

describe("decodeStringList()", () => {
  it("decodes a JSON array of names", () => {
    expect(decodeStringList("depends_on", '["auth-service","api-gateway"]')).toEqual([
      "auth-service",
      "api-gateway",
    ]);
  });

  it("treats NULL, empty text and JSON null as an empty list", () => {
    expect(decodeStringList("depends_on", null)).toEqual([]);
    expect(decodeStringList("depends_on", undefined)).toEqual([]);
    expect(decodeStringList("depends_on", "")).toEqual([]);
    expect(decodeStringList("depends_on", "null")).toEqual([]);
  });

  it("rejects text that is not JSON", () => {
    try {
      decodeStringList("contributors", "alice,bob");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      if (error instanceof ParseError) {
        expect(error.kind).toBe("parse");
        expect(error.field).toBe("contributors");
        expect(error.message.startsWith("unmarshaling contributors: ")).toBe(true);
      }
    }
  });

  it("rejects JSON that is not an array of strings", () => {
    expect(() => decodeStringList("confirmed_by", '"alice"')).toThrow(
      "unmarshaling confirmed_by: expected a JSON array of strings"
    );
    expect(() => decodeStringList("confirmed_by", '["alice", 7]')).toThrow(ParseError);
  });
});

describe("encodeStringList()", () => {
  it("writes compact JSON", () => {
    expect(encodeStringList(["auth-service", "api-gateway"])).toBe('["auth-service","api-gateway"]');
    expect(encodeStringList([])).toBe("[]");
  });
});
