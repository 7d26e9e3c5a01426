import React from "react";
import { Link } from "react-router-dom";
import { ArrowDownRight, ArrowUpRight, CalendarDays, LineChart, Minus } from "lucide-react";
import { useAdvancedAnalyticsQuery } from "@/api/queries";
import { CategoryTrendChart } from "@/components/analytics/CategoryTrendChart";
import { DailySpendingChart } from "@/components/analytics/DailySpendingChart";
import { MetricCard } from "@/components/dashboard/MetricCard";
import { AnimatedMoneyCents } from "@/components/motion/AnimatedNumber";
import { Button } from "@/components/ui/button";
import { Skeleton } from "@/components/ui/skeleton";
import { analyzeDayOfWeek } from "@/lib/analysis";
import { cn } from "@/lib/cn";
import { formatCents, formatMonthKey } from "@/lib/format";
import type { MonthComparison, MonthOverMonth } from "@/types";

function Section({ title, subtitle, children }: { title: string; subtitle?: string; children: React.ReactNode }) {
  return (
    <section className="rounded-3xl border border-border/60 bg-card/50 p-5 shadow-soft-lg">
      <div className="text-sm font-semibold tracking-tight">{title}</div>
      {subtitle ? <div className="mt-1 text-xs text-muted-foreground">{subtitle}</div> : null}
      <div className="mt-4">{children}</div>
    </section>
  );
}

function ComparisonCard({ comparison }: { comparison: MonthComparison | null }) {
  if (!comparison) {
    return (
      <MetricCard label="vs last month" icon={<Minus className="h-3.5 w-3.5" />} hint="No spending this month or last">
        –
      </MetricCard>
    );
  }
  if (comparison.kind === "no_previous") {
    return (
      <MetricCard
        label="vs last month"
        icon={<Minus className="h-3.5 w-3.5" />}
        hint={`Spending recorded in ${formatMonthKey(comparison.currentMonth)}`}
      >
        No data for last month
      </MetricCard>
    );
  }

  const Icon = comparison.direction === "up" ? ArrowUpRight : comparison.direction === "down" ? ArrowDownRight : Minus;
  return (
    <MetricCard
      label="vs last month"
      tone={comparison.direction === "up" ? "expense" : comparison.direction === "down" ? "income" : "neutral"}
      icon={<Icon className="h-3.5 w-3.5" />}
      hint={`${formatMonthKey(comparison.currentMonth)} compared with ${formatMonthKey(comparison.lastMonth)}`}
    >
      {comparison.direction === "flat" ? "No change" : `${comparison.percent.toFixed(1)}% ${comparison.direction}`}
    </MetricCard>
  );
}

function MonthOverMonthTable({ rows }: { rows: MonthOverMonth[] }) {
  return (
    <div className="overflow-x-auto">
      <table className="w-full text-sm">
        <thead>
          <tr className="text-left text-xs text-muted-foreground">
            <th className="py-2 font-semibold">Month</th>
            <th className="py-2 text-right font-semibold">Spending</th>
            <th className="py-2 text-right font-semibold">Change</th>
          </tr>
        </thead>
        <tbody>
          {[...rows].reverse().map((r) => (
            <tr key={r.month} className="border-t border-border/50">
              <td className="py-2">{formatMonthKey(r.month)}</td>
              <td className="py-2 text-right tabular-nums">{formatCents(r.expenseCents)}</td>
              <td
                className={cn(
                  "py-2 text-right tabular-nums",
                  r.deltaCents !== null && r.deltaCents > 0 && "text-expense",
                  r.deltaCents !== null && r.deltaCents < 0 && "text-income",
                )}
              >
                {r.deltaCents === null
                  ? "–"
                  : `${r.deltaCents > 0 ? "+" : ""}${formatCents(r.deltaCents)}${
                      r.deltaPercent === null ? "" : ` (${r.deltaPercent.toFixed(1)}%)`
                    }`}
              </td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}

export function AdvancedAnalyticsPage() {
  const analytics = useAdvancedAnalyticsQuery();
  const data = analytics.data;

  const weekday = React.useMemo(() => analyzeDayOfWeek(data?.dailySpending ?? []), [data]);

  if (analytics.isPending) {
    return (
      <div className="space-y-4">
        <Skeleton className="h-24" />
        <Skeleton className="h-72" />
        <Skeleton className="h-72" />
      </div>
    );
  }

  if (analytics.isError) {
    return (
      <div className="rounded-2xl border border-danger/40 bg-danger/10 px-4 py-3 text-sm">
        Could not load analytics: {analytics.error.message}
      </div>
    );
  }

  if (!data.dailySpending.length && !data.monthOverMonth.length) {
    return (
      <div className="grid place-items-center gap-3 rounded-3xl border border-border/60 bg-card/40 px-6 py-16 text-center">
        <LineChart className="h-6 w-6 text-muted-foreground" />
        <div className="text-sm text-muted-foreground">No transaction data available for analytics</div>
        <Button asChild variant="secondary">
          <Link to="/add">Add a transaction</Link>
        </Button>
      </div>
    );
  }

  const peakTotal = weekday.byDay[weekday.peakDay] ?? 0;

  return (
    <div className="space-y-6">
      <div>
        <div className="text-xs uppercase tracking-widest text-muted-foreground">Advanced analytics</div>
        <div className="mt-1 text-2xl font-semibold tracking-tight">Spending patterns</div>
      </div>

      <div className="grid grid-cols-1 gap-4 md:grid-cols-3">
        <MetricCard
          label={data.prediction ? `Predicted ${data.prediction.monthLabel}` : "Prediction"}
          icon={<LineChart className="h-3.5 w-3.5" />}
          hint={
            data.prediction
              ? `Trend line ${formatCents(data.prediction.linearCents)} · based on ${data.prediction.basedOnMonths} months`
              : "Add more transactions for spending predictions"
          }
        >
          {data.prediction ? <AnimatedMoneyCents cents={data.prediction.averageCents} /> : "–"}
        </MetricCard>
        <ComparisonCard comparison={data.comparison} />
        <MetricCard
          label="Busiest weekday"
          icon={<CalendarDays className="h-3.5 w-3.5" />}
          hint={peakTotal > 0 ? `${formatCents(peakTotal)} spent on ${weekday.peakDayName}s` : "No spending yet"}
        >
          {peakTotal > 0 ? weekday.peakDayName : "–"}
        </MetricCard>
      </div>

      <Section title="Daily spending">
        <DailySpendingChart daily={data.dailySpending} />
      </Section>

      <div className="grid grid-cols-1 gap-4 xl:grid-cols-5">
        <div className="xl:col-span-3">
          <Section title="Category trends" subtitle="Monthly spending per category">
            <CategoryTrendChart trend={data.categoryTrend} />
          </Section>
        </div>
        <div className="xl:col-span-2">
          <Section title="Month over month" subtitle="Expense change against the previous month">
            <MonthOverMonthTable rows={data.monthOverMonth} />
          </Section>
        </div>
      </div>
    </div>
  );
}
