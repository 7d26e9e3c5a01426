export type DateRange = {
  from?: string; // YYYY-MM-DD, inclusive
  to?: string;
};

export type DashboardSummary = {
  incomeCents: number;
  expenseCents: number;
  netCents: number; // income - expense
  savingsRate: number; // 0..1, 0 without income
  transactionCount: number;
  avgDailySpendCents: number;
};

export type CategoryTotal = {
  category: string;
  totalCents: number;
  count: number;
};

export type MonthlyTrendPoint = {
  month: string; // YYYY-MM
  incomeCents: number;
  expenseCents: number;
};

export type SpendingInsights = {
  totalSpendingCents: number;
  categoryBreakdown: CategoryTotal[]; // expenses only
  monthlyTrend: MonthlyTrendPoint[];
  topCategory: CategoryTotal | null;
  averagePerCategoryCents: number;
  highSpending: boolean;
};

export type DailyTotal = {
  date: string;
  totalCents: number;
};

export type CategoryMonthlySeries = {
  category: string;
  totalCents: number;
  valuesCents: number[]; // aligned with `months`
};

export type CategoryMonthly = {
  months: string[]; // YYYY-MM
  series: CategoryMonthlySeries[];
};

export type MonthOverMonth = {
  month: string;
  expenseCents: number;
  deltaCents: number | null;
  deltaPercent: number | null;
};

export type Prediction = {
  monthLabel: string;
  averageCents: number;
  linearCents: number;
  basedOnMonths: number;
};

export type MonthComparison =
  | { kind: "change"; currentMonth: string; lastMonth: string; percent: number; direction: "up" | "down" | "flat" }
  | { kind: "no_previous"; currentMonth: string; lastMonth: string };

export type AdvancedAnalytics = {
  dailySpending: DailyTotal[];
  categoryTrend: CategoryMonthly;
  monthOverMonth: MonthOverMonth[];
  prediction: Prediction | null;
  comparison: MonthComparison | null;
};
