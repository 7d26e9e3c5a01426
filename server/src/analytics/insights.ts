import { addDays, differenceInCalendarDays, format, parseISO, subMonths } from "date-fns";
import {
  categoryMonthly,
  categoryTotals,
  dailyExpenseTotals,
  expensesOf,
  monthKey,
  monthlyTotals,
  summarize,
  sumCents,
  type Aggregatable,
  type CategoryMonthly,
  type CategoryTotal,
  type DailyTotal,
  type MonthlyTotal,
  type Summary,
} from "./aggregate";
import { monthOverMonth, predictNextMonth, type MonthOverMonth } from "./predict";

export const HIGH_SPENDING_THRESHOLD_CENTS = 100_000;
export const MIN_TRANSACTIONS_FOR_PREDICTION = 11;

export type DashboardSummary = Summary & {
  transactionCount: number;
  avgDailySpendCents: number;
};

export type SpendingInsights = {
  totalSpendingCents: number;
  categoryBreakdown: CategoryTotal[];
  monthlyTrend: MonthlyTotal[];
  topCategory: CategoryTotal | null;
  averagePerCategoryCents: number;
  highSpending: boolean;
};

export type MonthComparison =
  | { kind: "change"; currentMonth: string; lastMonth: string; percent: number; direction: "up" | "down" | "flat" }
  | { kind: "no_previous"; currentMonth: string; lastMonth: string };

export type Prediction = {
  monthLabel: string; // e.g. "November 2026"
  averageCents: number;
  linearCents: number;
  basedOnMonths: number;
};

export type AdvancedAnalytics = {
  dailySpending: DailyTotal[];
  categoryTrend: CategoryMonthly;
  monthOverMonth: MonthOverMonth[];
  prediction: Prediction | null;
  comparison: MonthComparison | null;
};

function spanDays(txs: Aggregatable[], range: { from?: string; to?: string }): number {
  const dates = txs.map((t) => t.date).sort();
  const from = range.from ?? dates[0];
  const to = range.to ?? dates[dates.length - 1];
  if (!from || !to) return 0;
  return differenceInCalendarDays(parseISO(to), parseISO(from)) + 1;
}

/** Totals for a date range; the average daily spend covers the whole inclusive range. */
export function dashboardSummary(txs: Aggregatable[], range: { from?: string; to?: string } = {}): DashboardSummary {
  const summary = summarize(txs);
  const days = spanDays(txs, range);
  return {
    ...summary,
    transactionCount: txs.length,
    avgDailySpendCents: summary.expenseCents > 0 && days > 0 ? Math.round(summary.expenseCents / days) : 0,
  };
}

export function spendingInsights(txs: Aggregatable[]): SpendingInsights {
  const expenses = expensesOf(txs);
  const totalSpendingCents = sumCents(expenses);
  const categoryBreakdown = categoryTotals(expenses);

  return {
    totalSpendingCents,
    categoryBreakdown,
    monthlyTrend: monthlyTotals(txs),
    topCategory: categoryBreakdown[0] ?? null,
    averagePerCategoryCents: categoryBreakdown.length ? Math.round(totalSpendingCents / categoryBreakdown.length) : 0,
    highSpending: totalSpendingCents > HIGH_SPENDING_THRESHOLD_CENTS,
  };
}

export function compareWithLastMonth(txs: Aggregatable[], now: Date): MonthComparison | null {
  const currentMonth = format(now, "yyyy-MM");
  const lastMonth = format(subMonths(now, 1), "yyyy-MM");
  const expenses = expensesOf(txs);
  const current = sumCents(expenses.filter((t) => monthKey(t.date) === currentMonth));
  const last = sumCents(expenses.filter((t) => monthKey(t.date) === lastMonth));

  if (last > 0) {
    const change = ((current - last) / last) * 100;
    return {
      kind: "change",
      currentMonth,
      lastMonth,
      percent: Math.abs(change),
      direction: change > 0 ? "up" : change < 0 ? "down" : "flat",
    };
  }
  if (current > 0) return { kind: "no_previous", currentMonth, lastMonth };
  return null;
}

export function advancedAnalytics(txs: Aggregatable[], now: Date): AdvancedAnalytics {
  const monthly = monthlyTotals(txs);
  const expenseMonths = monthlyTotals(expensesOf(txs));

  const prediction =
    txs.length >= MIN_TRANSACTIONS_FOR_PREDICTION
      ? {
          monthLabel: format(addDays(now, 30), "MMMM yyyy"),
          averageCents: predictNextMonth(expenseMonths, "average"),
          linearCents: predictNextMonth(expenseMonths, "linear"),
          basedOnMonths: expenseMonths.length,
        }
      : null;

  return {
    dailySpending: dailyExpenseTotals(txs),
    categoryTrend: categoryMonthly(txs),
    monthOverMonth: monthOverMonth(monthly),
    prediction,
    comparison: compareWithLastMonth(txs, now),
  };
}
