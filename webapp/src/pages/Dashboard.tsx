import React from "react";
import { ArrowDownRight, ArrowUpRight, CalendarDays, Scale } from "lucide-react";
import { useSearchParams } from "react-router-dom";
import {
  useCategoriesQuery,
  useDashboardInsightsQuery,
  useDashboardSummaryQuery,
  useTransactionsQuery,
} from "@/api/queries";
import { ActiveFilterChips, type DashboardFilterState } from "@/components/dashboard/ActiveFilterChips";
import { CategoryDonut } from "@/components/dashboard/CategoryDonut";
import { ChartLegendList, type LegendItem } from "@/components/dashboard/ChartLegendList";
import { FilterBar } from "@/components/dashboard/FilterBar";
import { InsightCards } from "@/components/dashboard/InsightCards";
import { MetricCard } from "@/components/dashboard/MetricCard";
import { MonthlyTrendChart } from "@/components/dashboard/MonthlyTrendChart";
import { QuickInsights } from "@/components/dashboard/QuickInsights";
import { AnimatedMoneyCents } from "@/components/motion/AnimatedNumber";
import { RECENT_LIMIT, RecentTransactions } from "@/components/transactions/RecentTransactions";
import { Skeleton } from "@/components/ui/skeleton";
import { cn } from "@/lib/cn";
import { defaultRange, isInvertedRange } from "@/lib/dateRanges";
import { formatPercent01, formatRange } from "@/lib/format";
import { readDashboardParams, writeDashboardParams } from "@/lib/urlState";
import { colorForIndex, getChartCategoricalPalette } from "@/theme/palette";

function Panel({ title, children, className }: { title: string; children: React.ReactNode; className?: string }) {
  return (
    <div className={cn("rounded-3xl border border-border/60 bg-card/50 p-5 shadow-soft-lg", className)}>
      <div className="text-sm font-semibold tracking-tight">{title}</div>
      <div className="mt-4">{children}</div>
    </div>
  );
}

export function DashboardPage() {
  const [sp, setSp] = useSearchParams();
  const filters = React.useMemo(() => readDashboardParams(sp, defaultRange()), [sp]);
  const range = React.useMemo(() => ({ from: filters.from, to: filters.to }), [filters.from, filters.to]);
  const inverted = isInvertedRange(range);

  const summaryQuery = useDashboardSummaryQuery(range, { enabled: !inverted });
  const insightsQuery = useDashboardInsightsQuery(range, { enabled: !inverted });
  const categoriesQuery = useCategoriesQuery();
  const recentQuery = useTransactionsQuery({ category: filters.category, type: filters.type, limit: RECENT_LIMIT });

  const onChange = React.useCallback(
    (patch: Partial<DashboardFilterState>) => {
      setSp(
        (prev) => {
          const next = new URLSearchParams(prev);
          writeDashboardParams(next, { ...readDashboardParams(prev, defaultRange()), ...patch });
          return next;
        },
        { replace: true },
      );
    },
    [setSp],
  );

  const selectCategory = React.useCallback(
    (category: string) => onChange({ category: filters.category === category ? undefined : category }),
    [filters.category, onChange],
  );

  const legend = React.useMemo<LegendItem[]>(() => {
    const insights = insightsQuery.data;
    if (!insights) return [];
    const palette = getChartCategoricalPalette();
    const total = insights.totalSpendingCents || 1;
    return insights.categoryBreakdown.map((c, i) => ({
      category: c.category,
      valueCents: c.totalCents,
      percent: c.totalCents / total,
      color: colorForIndex(palette, i),
      active: c.category === filters.category,
    }));
  }, [filters.category, insightsQuery.data]);

  const summary = summaryQuery.data;
  const insights = insightsQuery.data;
  const loadError = summaryQuery.error ?? insightsQuery.error;

  return (
    <div className="space-y-6">
      <div className="flex flex-wrap items-end justify-between gap-4">
        <div>
          <div className="text-xs uppercase tracking-widest text-muted-foreground">Dashboard</div>
          <div className="mt-1 text-2xl font-semibold tracking-tight">Financial overview</div>
          <div className="mt-1 text-sm text-muted-foreground">{formatRange(range.from, range.to)}</div>
        </div>
        <FilterBar range={range} onChange={onChange} />
      </div>

      <ActiveFilterChips filters={filters} onChange={onChange} />

      {inverted ? (
        <div role="alert" className="rounded-2xl border border-danger/40 bg-danger/10 px-4 py-3 text-sm">
          Start date cannot be after end date
        </div>
      ) : loadError ? (
        <div role="alert" className="rounded-2xl border border-danger/40 bg-danger/10 px-4 py-3 text-sm">
          {loadError.message}
        </div>
      ) : null}

      <div className="grid grid-cols-1 gap-4 sm:grid-cols-2 xl:grid-cols-4">
        {summary && insights ? (
          <>
            <MetricCard label="Total spent" icon={<ArrowDownRight className="h-4 w-4" />} tone="expense">
              <AnimatedMoneyCents cents={insights.totalSpendingCents} />
            </MetricCard>
            <MetricCard label="Total income" icon={<ArrowUpRight className="h-4 w-4" />} tone="income">
              <AnimatedMoneyCents cents={summary.incomeCents} />
            </MetricCard>
            <MetricCard
              label="Net cash flow"
              icon={<Scale className="h-4 w-4" />}
              hint={summary.incomeCents > 0 ? `Savings rate ${formatPercent01(summary.savingsRate)}` : undefined}
            >
              <AnimatedMoneyCents cents={summary.netCents} tone="signed" />
            </MetricCard>
            <MetricCard
              label="Avg daily spend"
              icon={<CalendarDays className="h-4 w-4" />}
              hint={`${summary.transactionCount} transactions`}
            >
              <AnimatedMoneyCents cents={summary.avgDailySpendCents} />
            </MetricCard>
          </>
        ) : (
          Array.from({ length: 4 }, (_, i) => <Skeleton key={i} className="h-[118px]" />)
        )}
      </div>

      <div className="grid grid-cols-1 gap-4 xl:grid-cols-5">
        <Panel title="Monthly trend" className="xl:col-span-3">
          {insights ? <MonthlyTrendChart points={insights.monthlyTrend} /> : <Skeleton className="h-[300px]" />}
        </Panel>
        <Panel title="Spending by category" className="xl:col-span-2">
          {insights ? (
            <div className="space-y-3">
              <CategoryDonut items={legend} totalCents={insights.totalSpendingCents} onSelectCategory={selectCategory} />
              <ChartLegendList items={legend} onSelectCategory={selectCategory} />
            </div>
          ) : (
            <Skeleton className="h-[260px]" />
          )}
        </Panel>
      </div>

      <div className="grid grid-cols-1 gap-4 xl:grid-cols-3">
        <div className="space-y-4">
          {summary && insights ? (
            <>
              <QuickInsights summary={summary} insights={insights} range={range} />
              <InsightCards insights={insights} />
            </>
          ) : (
            <Skeleton className="h-[220px]" />
          )}
        </div>
        <Panel title="Recent transactions" className="xl:col-span-2">
          <RecentTransactions
            rows={recentQuery.data ?? []}
            loading={recentQuery.isPending}
            categories={categoriesQuery.data ?? []}
            category={filters.category}
            type={filters.type}
            onChange={onChange}
          />
        </Panel>
      </div>
    </div>
  );
}
