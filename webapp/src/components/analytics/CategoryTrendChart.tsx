import React from "react";
import ReactECharts from "echarts-for-react";
import type { EChartsOption } from "echarts";
import { formatCents, formatMonthKey } from "@/lib/format";
import { colorForIndex, getChartCategoricalPalette, themeColor } from "@/theme/palette";
import type { CategoryMonthly } from "@/types";

export function CategoryTrendChart({ trend, height = 320 }: { trend: CategoryMonthly; height?: number }) {
  const option = React.useMemo<EChartsOption>(() => {
    const axis = themeColor("--muted-foreground", "#94a3b8");
    const grid = themeColor("--border", "#334155", 0.5);
    const palette = getChartCategoricalPalette();
    return {
      grid: { left: 8, right: 8, top: 40, bottom: 8, containLabel: true },
      legend: { top: 0, type: "scroll", textStyle: { color: axis } },
      tooltip: {
        trigger: "axis",
        valueFormatter: (v) => (typeof v === "number" ? formatCents(v * 100) : String(v)),
      },
      xAxis: {
        type: "category",
        data: trend.months.map(formatMonthKey),
        axisLabel: { color: axis },
        axisLine: { lineStyle: { color: grid } },
      },
      yAxis: {
        type: "value",
        axisLabel: { color: axis },
        splitLine: { lineStyle: { color: grid } },
      },
      series: trend.series.map((s, i) => ({
        name: s.category,
        type: "line",
        smooth: true,
        showSymbol: trend.months.length < 3,
        itemStyle: { color: colorForIndex(palette, i) },
        data: s.valuesCents.map((v) => v / 100),
      })),
    };
  }, [trend]);

  return <ReactECharts option={option} style={{ height }} notMerge />;
}
