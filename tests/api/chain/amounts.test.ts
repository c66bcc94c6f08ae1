import { describe, it, expect } from "vitest";
import {
  AMOUNT_DECIMALS,
  ONE_UNIT,
  formatAmount,
  formatUsd,
  parseAmount,
  percentOf,
  scaleTokenAmount,
  sumAmounts,
  toWholeUnits,
} from "../../../src/api/chain/amounts";
import { TraceError } from "../../../src/api/chain/types";

describe("amounts", () => {
  describe("parseAmount", () => {
    it("should parse whole and fractional decimals", () => {
      expect(AMOUNT_DECIMALS).toBe(18);
      expect(parseAmount("50")).toBe(50n * ONE_UNIT);
      expect(parseAmount("0.25")).toBe(25n * 10n ** 16n);
      expect(parseAmount(" 7 ")).toBe(7n * ONE_UNIT);
    });

    it("should parse numbers without float noise", () => {
      expect(parseAmount(1000)).toBe(1000n * ONE_UNIT);
      expect(parseAmount(0.1)).toBe(10n ** 17n);
      expect(parseAmount(0)).toBe(0n);
    });

    it("should reject negative, exponent and non-numeric input", () => {
      for (const bad of ["-5", "1e5", "abc", "", "1.2.3"]) {
        expect(() => parseAmount(bad)).toThrow(TraceError);
      }
      expect(() => parseAmount(Number.NaN)).toThrow(TraceError);
      expect(() => parseAmount(-1)).toThrow(TraceError);
    });

    it("should report INVALID_AMOUNT", () => {
      try {
        parseAmount("ten");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(TraceError);
        expect(error).toMatchObject({ code: "INVALID_AMOUNT" });
      }
    });
  });

  describe("scaleTokenAmount", () => {
    it("should scale 6-decimal stablecoin values", () => {
      expect(scaleTokenAmount(1_500_000n, 6)).toBe(15n * 10n ** 17n);
    });

    it("should leave 18-decimal values untouched", () => {
      expect(scaleTokenAmount(123n, 18)).toBe(123n);
    });

    it("should truncate tokens finer than the internal scale", () => {
      expect(scaleTokenAmount(10n ** 24n + 5n, 24)).toBe(ONE_UNIT);
    });

    it("should reject invalid decimals and negative values", () => {
      expect(() => scaleTokenAmount(1n, -1)).toThrow(TraceError);
      expect(() => scaleTokenAmount(1n, 1.5)).toThrow(TraceError);
      expect(() => scaleTokenAmount(-1n, 6)).toThrow(TraceError);
    });
  });

  describe("arithmetic", () => {
    it("should sum amounts exactly", () => {
      expect(sumAmounts([parseAmount("0.1"), parseAmount("0.2")])).toBe(parseAmount("0.3"));
      expect(sumAmounts([])).toBe(0n);
    });

    it("should compute percentages with two decimals", () => {
      expect(percentOf(parseAmount(25), parseAmount(100))).toBe(25);
      expect(percentOf(parseAmount(1), parseAmount(3))).toBe(33.33);
      expect(percentOf(1n, 0n)).toBe(0);
    });

    it("should round whole units down", () => {
      expect(toWholeUnits(parseAmount("99.99"))).toBe(99);
    });
  });

  describe("formatting", () => {
    it("should format decimal strings trimmed to six digits", () => {
      expect(formatAmount(parseAmount(50))).toBe("50");
      expect(formatAmount(parseAmount("1234.5"))).toBe("1234.5");
      expect(formatAmount(parseAmount("0.1234567"))).toBe("0.123456");
      expect(formatAmount(parseAmount("2.000000001"))).toBe("2");
    });

    it("should format dollar figures without cents", () => {
      expect(formatUsd(parseAmount(50000))).toBe("$50,000");
      expect(formatUsd(parseAmount("1234.99"))).toBe("$1,234");
      expect(formatUsd(1234.6)).toBe("$1,235");
    });
  });
});
