import React from "react";
import { Calendar, Lightbulb, Target, TrendingDown, TrendingUp } from "lucide-react";
import { useNavigate } from "react-router-dom";
import { Button } from "@/components/ui/button";
import { categoriesCoveringShare, compareExpenseWindows, projectMonthEnd } from "@/lib/analysis";
import { cn } from "@/lib/cn";
import { matchPreset } from "@/lib/dateRanges";
import { formatCents } from "@/lib/format";
import type { DashboardSummary, DateRange, SpendingInsights } from "@/types";

const TREND_WINDOW = 3;

function Bullet({
  icon,
  children,
  tone = "neutral",
}: {
  icon: React.ReactNode;
  children: React.ReactNode;
  tone?: "neutral" | "positive" | "negative";
}) {
  return (
    <div className="flex items-center gap-3">
      <span
        className={cn(
          "inline-flex h-8 w-8 shrink-0 items-center justify-center rounded-2xl ring-1",
          "bg-background/40 ring-border/60 text-muted-foreground",
          tone === "positive" && "bg-income/10 ring-income/30 text-income",
          tone === "negative" && "bg-expense/10 ring-expense/30 text-expense",
        )}
      >
        {icon}
      </span>
      <div className="min-w-0 text-sm text-foreground/80">{children}</div>
    </div>
  );
}

export function QuickInsights({
  summary,
  insights,
  range,
  now = new Date(),
  className,
}: {
  summary: DashboardSummary;
  insights: SpendingInsights;
  range: DateRange;
  now?: Date;
  className?: string;
}) {
  const navigate = useNavigate();

  const derived = React.useMemo(() => {
    const topCategories = categoriesCoveringShare(insights.categoryBreakdown);
    const trend = compareExpenseWindows(insights.monthlyTrend, TREND_WINDOW);
    const forecast = matchPreset(range, now) === "thisMonth" ? projectMonthEnd(summary.expenseCents, now) : null;
    return { topCategories, trend, forecast };
  }, [insights.categoryBreakdown, insights.monthlyTrend, now, range, summary.expenseCents]);

  const { trend } = derived;
  const trendTone = trend.direction === "up" ? "negative" : trend.direction === "down" ? "positive" : "neutral";
  const trendIcon =
    trend.direction === "down" ? <TrendingDown className="h-4 w-4" /> : <TrendingUp className="h-4 w-4" />;

  return (
    <div
      className={cn(
        "group relative overflow-hidden rounded-2xl border border-border/60 bg-card/35 p-5",
        "transition-transform duration-150 ease-out hover:-translate-y-0.5 hover:bg-card/45 hover:shadow-lift",
        className,
      )}
    >
      <div className="flex items-center gap-2 text-[11px] font-semibold uppercase tracking-[0.18em] text-muted-foreground">
        <span className="inline-flex h-6 w-6 items-center justify-center rounded-xl bg-background/40 ring-1 ring-border/60 text-muted-foreground">
          <Lightbulb className="h-4 w-4" />
        </span>
        <span>Quick insights</span>
      </div>

      <div className="mt-4 space-y-3">
        <Bullet icon={<Target className="h-4 w-4" />}>
          <span className="font-semibold tabular-nums">{derived.topCategories || "-"}</span>{" "}
          {derived.topCategories === 1 ? "category accounts" : "categories account"} for{" "}
          <span className="font-semibold tabular-nums">80%</span> of spending
        </Bullet>

        <Bullet icon={trendIcon} tone={trendTone}>
          Spending{" "}
          <span className="font-semibold">
            {trend.direction === "flat" ? "is flat" : trend.direction === "up" ? "is up" : "is down"}
          </span>{" "}
          <span className="font-semibold tabular-nums">{Math.abs(trend.percent).toFixed(1)}%</span>{" "}
          <span className="text-foreground/60">vs prior {TREND_WINDOW} months</span>
        </Bullet>

        <Bullet icon={<Calendar className="h-4 w-4" />}>
          {derived.forecast ? (
            <>
              Projected month-end:{" "}
              <span className="font-semibold tabular-nums">{formatCents(derived.forecast.projectedCents)}</span>{" "}
              <span className="text-foreground/60">({derived.forecast.confidence} confidence)</span>
            </>
          ) : (
            <>
              Projected month-end: <span className="text-foreground/60">select “This month”</span>
            </>
          )}
        </Bullet>
      </div>

      <div className="mt-4">
        <Button variant="ghost" size="sm" className="w-full justify-between" onClick={() => navigate("/analytics")}>
          <span>Open advanced analytics</span>
          <span aria-hidden className="text-foreground/50">
            →
          </span>
        </Button>
      </div>
    </div>
  );
}
