import { describe, expect, it } from "vitest";
import { ValidationError } from "../../errors";
import { centsToDecimalString, isYmd, parseAmountToCents, parseDateRange } from "../validation";

describe("parseAmountToCents", () => {
  it.each([
    ["12.5", 1250],
    ["-3", -300],
    ["$1,200.00", 120000],
    ["  7.05 ", 705],
    ["+0.99", 99],
    ["-0", 0],
  ])("parses %j", (raw, cents) => {
    expect(parseAmountToCents(raw)).toBe(cents);
  });

  it("accepts finite numbers with at most two decimals", () => {
    expect(parseAmountToCents(19.99)).toBe(1999);
    expect(parseAmountToCents(0.1 + 0.2)).toBe(30);
    expect(parseAmountToCents(-42)).toBe(-4200);
  });

  it.each(["abc", "", "1.234", "12.", "1e3", "--5"])("rejects %j", (raw) => {
    expect(parseAmountToCents(raw)).toBeUndefined();
  });

  it("rejects non-finite and non-numeric values", () => {
    expect(parseAmountToCents(Number.NaN)).toBeUndefined();
    expect(parseAmountToCents(Number.POSITIVE_INFINITY)).toBeUndefined();
    expect(parseAmountToCents(1.005)).toBeUndefined();
    expect(parseAmountToCents(null)).toBeUndefined();
  });

  it("rejects numbers whose cents exceed the safe integer range", () => {
    expect(parseAmountToCents(1e20)).toBeUndefined();
    expect(parseAmountToCents(-1e20)).toBeUndefined();
    expect(parseAmountToCents(90_071_992_547_409)).toBe(9_007_199_254_740_900);
  });
});

describe("centsToDecimalString", () => {
  it("formats with two decimals and a sign", () => {
    expect(centsToDecimalString(1999)).toBe("19.99");
    expect(centsToDecimalString(-1999)).toBe("-19.99");
    expect(centsToDecimalString(5)).toBe("0.05");
    expect(centsToDecimalString(320000)).toBe("3200.00");
  });
});

describe("isYmd", () => {
  it("accepts real calendar dates only", () => {
    expect(isYmd("2026-02-28")).toBe(true);
    expect(isYmd("2028-02-29")).toBe(true);
    expect(isYmd("2026-02-30")).toBe(false);
    expect(isYmd("2026-13-01")).toBe(false);
    expect(isYmd("2026-2-3")).toBe(false);
    expect(isYmd("03/10/2026")).toBe(false);
  });
});

describe("parseDateRange", () => {
  it("passes through valid bounds", () => {
    expect(parseDateRange({ from: "2026-01-01", to: "2026-01-31" })).toEqual({
      from: "2026-01-01",
      to: "2026-01-31",
    });
    expect(parseDateRange({})).toEqual({});
  });

  it("rejects a start after the end", () => {
    expect(() => parseDateRange({ from: "2026-02-01", to: "2026-01-01" })).toThrow(
      new ValidationError("Start date cannot be after end date"),
    );
  });

  it("rejects malformed bounds", () => {
    expect(() => parseDateRange({ from: "yesterday" })).toThrow("Start date must be in YYYY-MM-DD format");
  });
});
