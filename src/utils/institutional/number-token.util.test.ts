import { describe, expect, it } from "vitest";
import {
  INTEGER_TOKEN_SOURCE,
  parseDecimal,
  parseIntegerToken,
  splitSharesAndValue,
} from "./number-token.util.js";

describe("integer tokens", () => {
  const token = new RegExp(INTEGER_TOKEN_SOURCE);

  it("matches plain digit runs whole", () => {
    expect("1234".match(token)?.[0]).toBe("1234");
  });

  it("matches comma-grouped numbers whole", () => {
    expect("1,234,567".match(token)?.[0]).toBe("1,234,567");
  });

  it("drops separators when parsing", () => {
    expect(parseIntegerToken("1,234,567")).toBe(1234567);
    expect(parseIntegerToken("42")).toBe(42);
  });
});

describe("parseDecimal", () => {
  it("parses decimal literals", () => {
    expect(parseDecimal(" 7 ")).toBe(7);
    expect(parseDecimal("12.5")).toBe(12.5);
  });

  it("returns null for anything else", () => {
    expect(parseDecimal("abc")).toBeNull();
    expect(parseDecimal("1,000")).toBeNull();
    expect(parseDecimal("")).toBeNull();
  });
});

describe("splitSharesAndValue", () => {
  it("reads the largest number as shares and the smallest as value", () => {
    expect(splitSharesAndValue([500, 10000, 3])).toEqual({ shares: 10000, valueThousands: 3 });
  });

  it("estimates the value from a lone share count", () => {
    expect(splitSharesAndValue([5500])).toEqual({ shares: 5500, valueThousands: 5 });
  });

  it("handles no numbers", () => {
    expect(splitSharesAndValue([])).toEqual({ shares: 0, valueThousands: 0 });
  });
});
