import { describe, expect, it } from "vitest";

import {
  asActiveFlag,
  asInt,
  asText,
  formatTimestamp,
  normalizeServiceDate,
  parseServiceDate,
  toIsoDate,
} from "./coerce";

describe("coerce", () => {
  describe("asInt", () => {
    it("returns positive integers unchanged", () => {
      expect(asInt(3)).toBe(3);
      expect(asInt("4")).toBe(4);
      expect(asInt(" 12 ")).toBe(12);
      expect(asInt("+2")).toBe(2);
    });

    it("falls back to 1 for non-positive values", () => {
      expect(asInt(0)).toBe(1);
      expect(asInt("-3")).toBe(1);
      expect(asInt("0")).toBe(1);
    });

    it("falls back to 1 for values that are not integers", () => {
      expect(asInt("abc")).toBe(1);
      expect(asInt("")).toBe(1);
      expect(asInt("2.5")).toBe(1);
      expect(asInt(null)).toBe(1);
      expect(asInt(undefined)).toBe(1);
      expect(asInt(Number.NaN)).toBe(1);
      expect(asInt({})).toBe(1);
    });

    it("truncates finite numbers", () => {
      expect(asInt(2.9)).toBe(2);
      expect(asInt(0.5)).toBe(1);
    });

    it("falls back to 1 above the largest storable integer", () => {
      expect(asInt("2147483647")).toBe(2_147_483_647);
      expect(asInt("2147483648")).toBe(1);
      expect(asInt("99999999999999999999")).toBe(1);
      expect(asInt(1e12)).toBe(1);
    });

    it("honours a custom fallback", () => {
      expect(asInt("x", 7)).toBe(7);
    });
  });

  describe("asActiveFlag", () => {
    it("reads stored 1/0 flags", () => {
      expect(asActiveFlag(1)).toBe(true);
      expect(asActiveFlag(0)).toBe(false);
      expect(asActiveFlag("1")).toBe(true);
      expect(asActiveFlag("0")).toBe(false);
    });

    it("reads words", () => {
      expect(asActiveFlag("false")).toBe(false);
      expect(asActiveFlag(" No ")).toBe(false);
      expect(asActiveFlag("TRUE")).toBe(true);
    });

    it("treats unknown values as active", () => {
      expect(asActiveFlag("maybe")).toBe(true);
      expect(asActiveFlag("")).toBe(true);
      expect(asActiveFlag(undefined)).toBe(true);
    });
  });

  describe("asText", () => {
    it("turns empty values into empty strings", () => {
      expect(asText(null)).toBe("");
      expect(asText(undefined)).toBe("");
      expect(asText(Number.NaN)).toBe("");
    });

    it("stringifies everything else", () => {
      expect(asText(3)).toBe("3");
      expect(asText("note")).toBe("note");
    });
  });

  describe("toIsoDate", () => {
    it("keeps ISO dates", () => {
      expect(toIsoDate("2024-01-07")).toBe("2024-01-07");
    });

    it("drops the time from timestamps", () => {
      expect(toIsoDate("2024-01-07 10:15:00")).toBe("2024-01-07");
    });

    it("reads slash-separated dates", () => {
      expect(toIsoDate("2024/1/7")).toBe("2024-01-07");
      expect(toIsoDate("1/7/2024")).toBe("2024-01-07");
    });

    it("formats Date values", () => {
      expect(toIsoDate(new Date(2024, 0, 7, 18, 30))).toBe("2024-01-07");
    });

    it("returns null for values that are not dates", () => {
      expect(toIsoDate("next sunday")).toBeNull();
      expect(toIsoDate("2024-02-30")).toBeNull();
      expect(toIsoDate("")).toBeNull();
      expect(toIsoDate(42)).toBeNull();
      expect(toIsoDate(new Date(Number.NaN))).toBeNull();
    });
  });

  describe("normalizeServiceDate", () => {
    it("keeps unparsable input verbatim, trimmed", () => {
      expect(normalizeServiceDate("  Easter ")).toBe("Easter");
    });

    it("converts parsable input to ISO", () => {
      expect(normalizeServiceDate("2024/03/31")).toBe("2024-03-31");
    });
  });

  describe("parseServiceDate", () => {
    it("parses strict ISO dates as local calendar dates", () => {
      const parsed = parseServiceDate("2024-01-07");
      expect(parsed?.getFullYear()).toBe(2024);
      expect(parsed?.getMonth()).toBe(0);
      expect(parsed?.getDate()).toBe(7);
    });

    it("rejects anything else", () => {
      expect(parseServiceDate("2024-1-7")).toBeNull();
      expect(parseServiceDate("Easter")).toBeNull();
      expect(parseServiceDate("2023-02-29")).toBeNull();
    });
  });

  it("formats timestamps with second precision", () => {
    expect(formatTimestamp(new Date(2024, 0, 7, 9, 5, 3))).toBe(
      "2024-01-07 09:05:03",
    );
  });
});
