import React from "react";
import ReactECharts from "echarts-for-react";
import type { EChartsOption } from "echarts";
import { formatCents, formatMonthKey } from "@/lib/format";
import { themeColor } from "@/theme/palette";
import type { MonthlyTrendPoint } from "@/types";

export function MonthlyTrendChart({ points, height = 300 }: { points: MonthlyTrendPoint[]; height?: number }) {
  const option = React.useMemo<EChartsOption>(() => {
    const axis = themeColor("--muted-foreground", "#94a3b8");
    const grid = themeColor("--border", "#334155", 0.5);
    return {
      grid: { left: 8, right: 8, top: 32, bottom: 8, containLabel: true },
      legend: { top: 0, textStyle: { color: axis } },
      tooltip: {
        trigger: "axis",
        valueFormatter: (v) => (typeof v === "number" ? formatCents(v * 100) : String(v)),
      },
      xAxis: {
        type: "category",
        data: points.map((p) => formatMonthKey(p.month)),
        axisLabel: { color: axis },
        axisLine: { lineStyle: { color: grid } },
      },
      yAxis: {
        type: "value",
        axisLabel: { color: axis },
        splitLine: { lineStyle: { color: grid } },
      },
      series: [
        {
          name: "Expenses",
          type: "line",
          smooth: true,
          showSymbol: points.length < 2,
          areaStyle: { opacity: 0.12 },
          itemStyle: { color: themeColor("--expense", "#f472b6") },
          data: points.map((p) => p.expenseCents / 100),
        },
        {
          name: "Income",
          type: "line",
          smooth: true,
          showSymbol: points.length < 2,
          itemStyle: { color: themeColor("--income", "#34d399") },
          data: points.map((p) => p.incomeCents / 100),
        },
      ],
    };
  }, [points]);

  if (!points.length) {
    return <div className="grid h-[300px] place-items-center text-sm text-muted-foreground">No data for this range</div>;
  }

  return <ReactECharts option={option} style={{ height }} notMerge />;
}
