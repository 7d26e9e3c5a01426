import { getDate, getDay, getDaysInMonth, isValid, parseISO } from "date-fns";
import type { CategoryTotal, DailyTotal, MonthlyTrendPoint } from "@/types";

const DAY_NAMES = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"] as const;

function mean(values: number[]) {
  return values.length ? values.reduce((acc, v) => acc + v, 0) / values.length : 0;
}

/** How many of the largest categories it takes to reach `share` of total spending (0 without spending). */
export function categoriesCoveringShare(breakdown: CategoryTotal[], share = 0.8): number {
  const totals = breakdown.map((c) => Math.max(0, c.totalCents)).sort((a, b) => b - a);
  const total = totals.reduce((acc, v) => acc + v, 0);
  if (total <= 0) return 0;

  let covered = 0;
  for (const [i, cents] of totals.entries()) {
    covered += cents;
    if (covered / total >= share) return i + 1;
  }
  return totals.length;
}

export type ExpenseWindowChange = {
  percent: number;
  direction: "up" | "down" | "flat";
};

/**
 * Mean monthly expense of the last `months` points against the `months`
 * before them. Changes under half a percent count as flat.
 */
export function compareExpenseWindows(monthly: MonthlyTrendPoint[], months: number): ExpenseWindowChange {
  const expenses = monthly.map((p) => p.expenseCents);
  const recent = mean(expenses.slice(-months));
  const prior = mean(expenses.slice(-(months * 2), -months));

  if (prior <= 0) return recent > 0 ? { percent: 100, direction: "up" } : { percent: 0, direction: "flat" };

  const percent = ((recent - prior) / prior) * 100;
  if (Math.abs(percent) < 0.5) return { percent, direction: "flat" };
  return { percent, direction: percent > 0 ? "up" : "down" };
}

/** Expense per weekday from daily totals; 0 = Sunday. */
export function analyzeDayOfWeek(daily: DailyTotal[]): {
  byDay: number[];
  peakDay: number;
  peakDayName: string;
} {
  const byDay = [0, 0, 0, 0, 0, 0, 0];

  for (const d of daily) {
    if (!Number.isFinite(d.totalCents) || d.totalCents <= 0) continue;
    const parsed = parseISO(d.date);
    if (!isValid(parsed)) continue;
    const day = getDay(parsed);
    byDay[day] = (byDay[day] ?? 0) + d.totalCents;
  }

  let peakDay = 0;
  let peakValue = byDay[0] ?? 0;
  for (let i = 1; i < 7; i++) {
    if ((byDay[i] ?? 0) > peakValue) {
      peakValue = byDay[i] ?? 0;
      peakDay = i;
    }
  }

  return { byDay, peakDay, peakDayName: DAY_NAMES[peakDay] ?? "Sun" };
}

export type MonthEndProjection = {
  projectedCents: number;
  dailyCents: number;
  confidence: "high" | "medium" | "low";
};

// Straight-line projection of this month's spending; confidence grows with the days elapsed.
export function projectMonthEnd(spentCents: number, now: Date): MonthEndProjection {
  const elapsed = getDate(now);
  const daily = Math.max(0, spentCents) / elapsed;
  return {
    projectedCents: Math.round(daily * getDaysInMonth(now)),
    dailyCents: Math.round(daily),
    confidence: elapsed >= 14 ? "high" : elapsed >= 7 ? "medium" : "low",
  };
}
