import { describe, expect, it } from "vitest";
import { analyzeDayOfWeek, categoriesCoveringShare, compareExpenseWindows, projectMonthEnd } from "@/lib/analysis";
import type { MonthlyTrendPoint } from "@/types";

function months(expenses: number[]): MonthlyTrendPoint[] {
  return expenses.map((expenseCents, i) => ({
    month: `2026-${String(i + 1).padStart(2, "0")}`,
    incomeCents: 0,
    expenseCents,
  }));
}

describe("categoriesCoveringShare", () => {
  const breakdown = [
    { category: "Bills", totalCents: 300, count: 1 },
    { category: "Food", totalCents: 500, count: 4 },
    { category: "Other", totalCents: 200, count: 2 },
  ];

  it("counts the largest categories needed to reach the share", () => {
    expect(categoriesCoveringShare(breakdown)).toBe(2);
    expect(categoriesCoveringShare(breakdown, 0.5)).toBe(1);
  });

  it("is zero without spending", () => {
    expect(categoriesCoveringShare([])).toBe(0);
  });
});

describe("compareExpenseWindows", () => {
  it("compares the recent window with the one before it", () => {
    const change = compareExpenseWindows(months([100, 100, 100, 120, 120, 120]), 3);
    expect(change.percent).toBeCloseTo(20);
    expect(change.direction).toBe("up");
  });

  it("treats a missing prior window as flat or a full increase", () => {
    expect(compareExpenseWindows(months([0, 0]), 1)).toEqual({ percent: 0, direction: "flat" });
    expect(compareExpenseWindows(months([0, 50]), 1)).toEqual({ percent: 100, direction: "up" });
    expect(compareExpenseWindows(months([40, 50]), 3)).toEqual({ percent: 100, direction: "up" });
  });
});

describe("analyzeDayOfWeek", () => {
  it("sums spend per weekday and finds the peak", () => {
    const res = analyzeDayOfWeek([
      { date: "2026-10-19", totalCents: 500 }, // Monday
      { date: "2026-10-17", totalCents: 300 }, // Saturday
      { date: "2026-10-12", totalCents: 100 }, // Monday
    ]);
    expect(res.byDay).toEqual([0, 600, 0, 0, 0, 0, 300]);
    expect(res.peakDay).toBe(1);
    expect(res.peakDayName).toBe("Mon");
  });
});

describe("projectMonthEnd", () => {
  it("extends the daily rate over the calendar month", () => {
    expect(projectMonthEnd(1000, new Date(2026, 9, 10))).toEqual({
      projectedCents: 3100,
      dailyCents: 100,
      confidence: "medium",
    });
  });

  it("has low confidence early in the month", () => {
    expect(projectMonthEnd(300, new Date(2026, 8, 3)).confidence).toBe("low");
  });
});
