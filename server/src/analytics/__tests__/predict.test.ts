import { describe, expect, it } from "vitest";
import { monthlyTotals } from "../aggregate";
import { monthOverMonth, predictNextMonth } from "../predict";
import { SAMPLE } from "./fixtures";

const month = (m: string, expenseCents: number) => ({ month: m, incomeCents: 0, expenseCents });

describe("monthOverMonth", () => {
  it("compares each month with the previous one", () => {
    expect(monthOverMonth(monthlyTotals(SAMPLE))).toEqual([
      { month: "2026-08", expenseCents: 128_000, deltaCents: null, deltaPercent: null },
      { month: "2026-09", expenseCents: 117_000, deltaCents: -11_000, deltaPercent: -8.59375 },
    ]);
  });

  it("has no percentage after a zero month", () => {
    expect(monthOverMonth([month("2026-01", 0), month("2026-02", 500)])[1]).toEqual({
      month: "2026-02",
      expenseCents: 500,
      deltaCents: 500,
      deltaPercent: null,
    });
  });
});

describe("predictNextMonth", () => {
  it("averages monthly expenses", () => {
    expect(predictNextMonth(monthlyTotals(SAMPLE), "average")).toBe(122_500);
  });

  it("extends the least-squares line one month", () => {
    expect(predictNextMonth(monthlyTotals(SAMPLE), "linear")).toBe(106_000);
    expect(predictNextMonth([month("a", 100), month("b", 200), month("c", 300)], "linear")).toBe(400);
  });

  it("never predicts below zero", () => {
    expect(predictNextMonth([month("a", 100_000), month("b", 10_000)], "linear")).toBe(0);
  });

  it("returns zero without history", () => {
    expect(predictNextMonth([], "average")).toBe(0);
    expect(predictNextMonth([], "linear")).toBe(0);
  });

  it("uses the single month for a one-point line", () => {
    expect(predictNextMonth([month("a", 4_200)], "linear")).toBe(4_200);
  });
});
