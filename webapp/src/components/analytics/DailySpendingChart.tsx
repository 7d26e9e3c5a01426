import React from "react";
import ReactECharts from "echarts-for-react";
import type { EChartsOption } from "echarts";
import { formatCents, formatYmdToShort } from "@/lib/format";
import { themeColor } from "@/theme/palette";
import type { DailyTotal } from "@/types";

export function DailySpendingChart({ daily, height = 280 }: { daily: DailyTotal[]; height?: number }) {
  const option = React.useMemo<EChartsOption>(() => {
    const axis = themeColor("--muted-foreground", "#94a3b8");
    const grid = themeColor("--border", "#334155", 0.5);
    return {
      grid: { left: 8, right: 8, top: 16, bottom: 8, containLabel: true },
      tooltip: {
        trigger: "axis",
        valueFormatter: (v) => (typeof v === "number" ? formatCents(v * 100) : String(v)),
      },
      xAxis: {
        type: "category",
        data: daily.map((d) => formatYmdToShort(d.date)),
        axisLabel: { color: axis },
        axisLine: { lineStyle: { color: grid } },
      },
      yAxis: {
        type: "value",
        axisLabel: { color: axis },
        splitLine: { lineStyle: { color: grid } },
      },
      dataZoom: daily.length > 60 ? [{ type: "inside" }] : undefined,
      series: [
        {
          name: "Spending",
          type: "bar",
          barMaxWidth: 18,
          itemStyle: { color: themeColor("--expense", "#f472b6"), borderRadius: [4, 4, 0, 0] },
          data: daily.map((d) => d.totalCents / 100),
        },
      ],
    };
  }, [daily]);

  return <ReactECharts option={option} style={{ height }} notMerge />;
}
