import type { MonthlyTotal } from "./aggregate";

export type MonthOverMonth = {
  month: string;
  expenseCents: number;
  deltaCents: number | null; // null for the first month
  deltaPercent: number | null; // null for the first month or a zero baseline
};

export type PredictionMethod = "average" | "linear";

export function monthOverMonth(monthly: MonthlyTotal[]): MonthOverMonth[] {
  return monthly.map((m, i) => {
    const prev = i > 0 ? monthly[i - 1] : undefined;
    if (!prev) return { month: m.month, expenseCents: m.expenseCents, deltaCents: null, deltaPercent: null };
    const deltaCents = m.expenseCents - prev.expenseCents;
    return {
      month: m.month,
      expenseCents: m.expenseCents,
      deltaCents,
      deltaPercent: prev.expenseCents !== 0 ? (deltaCents / Math.abs(prev.expenseCents)) * 100 : null,
    };
  });
}

function average(values: number[]): number {
  if (!values.length) return 0;
  return values.reduce((a, v) => a + v, 0) / values.length;
}

/** Least-squares line through (i, values[i]) evaluated at i = values.length. */
function linearNext(values: number[]): number {
  const n = values.length;
  if (n === 0) return 0;
  if (n === 1) return values[0] ?? 0;

  const meanX = (n - 1) / 2;
  const meanY = average(values);
  let num = 0;
  let den = 0;
  values.forEach((y, x) => {
    num += (x - meanX) * (y - meanY);
    den += (x - meanX) ** 2;
  });
  const slope = den === 0 ? 0 : num / den;
  return meanY + slope * (n - meanX);
}

/** Next month's expense estimate in cents, never negative. */
export function predictNextMonth(monthly: MonthlyTotal[], method: PredictionMethod = "average"): number {
  const values = monthly.map((m) => m.expenseCents);
  const raw = method === "linear" ? linearNext(values) : average(values);
  return Math.max(0, Math.round(raw));
}
