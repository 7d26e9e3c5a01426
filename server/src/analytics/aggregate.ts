import type { Transaction } from "../types";

export type Summary = {
  incomeCents: number;
  expenseCents: number;
  netCents: number; // income - expense
  savingsRate: number; // net / income, 0 without income
};

export type CategoryTotal = {
  category: string;
  totalCents: number;
  count: number;
};

export type MonthlyTotal = {
  month: string; // YYYY-MM
  incomeCents: number;
  expenseCents: number;
};

export type DailyTotal = {
  date: string; // YYYY-MM-DD
  totalCents: number;
};

export type CategoryMonthly = {
  months: string[];
  series: Array<{ category: string; totalCents: number; valuesCents: number[] }>;
};

/** The fields aggregation reads; lets callers pass rows or DTOs alike. */
export type Aggregatable = Pick<Transaction, "amountCents" | "category" | "date" | "type">;

export function monthKey(ymd: string): string {
  return ymd.slice(0, 7);
}

export function expensesOf<T extends Aggregatable>(txs: T[]): T[] {
  return txs.filter((t) => t.type === "expense");
}

export function sumCents(txs: Aggregatable[]): number {
  return txs.reduce((acc, t) => acc + t.amountCents, 0);
}

export function summarize(txs: Aggregatable[]): Summary {
  let incomeCents = 0;
  let expenseCents = 0;
  for (const t of txs) {
    if (t.type === "income") incomeCents += t.amountCents;
    else expenseCents += t.amountCents;
  }
  const netCents = incomeCents - expenseCents;
  return {
    incomeCents,
    expenseCents,
    netCents,
    savingsRate: incomeCents > 0 ? netCents / incomeCents : 0,
  };
}

export function categoryTotals(txs: Aggregatable[]): CategoryTotal[] {
  const byCategory = new Map<string, CategoryTotal>();
  for (const t of txs) {
    const entry = byCategory.get(t.category);
    if (entry) {
      entry.totalCents += t.amountCents;
      entry.count += 1;
    } else {
      byCategory.set(t.category, { category: t.category, totalCents: t.amountCents, count: 1 });
    }
  }
  return [...byCategory.values()].sort(
    (a, b) => b.totalCents - a.totalCents || a.category.localeCompare(b.category),
  );
}

export function monthlyTotals(txs: Aggregatable[]): MonthlyTotal[] {
  const byMonth = new Map<string, MonthlyTotal>();
  for (const t of txs) {
    const month = monthKey(t.date);
    let entry = byMonth.get(month);
    if (!entry) {
      entry = { month, incomeCents: 0, expenseCents: 0 };
      byMonth.set(month, entry);
    }
    if (t.type === "income") entry.incomeCents += t.amountCents;
    else entry.expenseCents += t.amountCents;
  }
  return [...byMonth.values()].sort((a, b) => a.month.localeCompare(b.month));
}

export function dailyExpenseTotals(txs: Aggregatable[]): DailyTotal[] {
  const byDate = new Map<string, number>();
  for (const t of expensesOf(txs)) {
    byDate.set(t.date, (byDate.get(t.date) ?? 0) + t.amountCents);
  }
  return [...byDate.entries()]
    .map(([date, totalCents]) => ({ date, totalCents }))
    .sort((a, b) => a.date.localeCompare(b.date));
}

export function categoryMonthly(txs: Aggregatable[]): CategoryMonthly {
  const expenses = expensesOf(txs);
  const months = [...new Set(expenses.map((t) => monthKey(t.date)))].sort();
  const index = new Map(months.map((m, i) => [m, i]));

  const byCategory = new Map<string, number[]>();
  for (const t of expenses) {
    let values = byCategory.get(t.category);
    if (!values) {
      values = months.map(() => 0);
      byCategory.set(t.category, values);
    }
    const i = index.get(monthKey(t.date));
    if (i !== undefined) values[i] = (values[i] ?? 0) + t.amountCents;
  }

  const series = [...byCategory.entries()]
    .map(([category, valuesCents]) => ({
      category,
      totalCents: valuesCents.reduce((a, v) => a + v, 0),
      valuesCents,
    }))
    .sort((a, b) => b.totalCents - a.totalCents || a.category.localeCompare(b.category));

  return { months, series };
}
