/**
 * Unit tests for shared type utilities
 */

import { describe, expect, it } from "vitest";
import { assertNever, compareText, deepFreeze, isOneOf } from "../../../src/lib/type-utilities.js";

describe("Type Utilities", () => {
  describe("assertNever", () => {
    type Format = "table" | "json";

    function describeFormat(format: Format): string {
      switch (format) {
        case "table": {
          return "columns";
        }
        case "json": {
          return "document";
        }
        default: {
          return assertNever(format, "output format");
        }
      }
    }

    it("should throw with the context and value", () => {
      const format: Format = JSON.parse('"yaml"');
      expect(() => describeFormat(format)).toThrow('Unreachable output format: "yaml"');
    });
  });

  describe("deepFreeze", () => {
    it("should freeze nested objects and arrays", () => {
      const value = deepFreeze({ rules: [{ id: "rotate", tags: { team: "data" } }] });

      expect(Object.isFrozen(value)).toBe(true);
      expect(Object.isFrozen(value.rules)).toBe(true);
      expect(Object.isFrozen(value.rules[0])).toBe(true);
      expect(Object.isFrozen(value.rules[0]?.tags)).toBe(true);
    });

    it("should return primitives unchanged", () => {
      expect(deepFreeze(7)).toBe(7);
      expect(deepFreeze(null)).toBeNull();
    });
  });

  describe("compareText", () => {
    it("should order by code unit, uppercase first", () => {
      expect(["b", "B", "a", "A"].sort(compareText)).toEqual(["A", "B", "a", "b"]);
    });

    it("should return zero for equal strings", () => {
      expect(compareText("rule", "rule")).toBe(0);
    });
  });

  describe("isOneOf", () => {
    it("should accept listed values only", () => {
      const methods = ["GET", "PUT"] as const;

      expect(isOneOf(methods, "GET")).toBe(true);
      expect(isOneOf(methods, "get")).toBe(false);
    });
  });
});
