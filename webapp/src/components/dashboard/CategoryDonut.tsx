import React from "react";
import ReactECharts from "echarts-for-react";
import type { EChartsOption } from "echarts";
import { formatCents } from "@/lib/format";
import { themeColor } from "@/theme/palette";
import type { LegendItem } from "@/components/dashboard/ChartLegendList";

export function CategoryDonut({
  items,
  totalCents,
  onSelectCategory,
}: {
  items: LegendItem[];
  totalCents: number;
  onSelectCategory: (category: string) => void;
}) {
  const option = React.useMemo<EChartsOption>(
    () => ({
      tooltip: {
        trigger: "item",
        valueFormatter: (v) => (typeof v === "number" ? formatCents(v * 100) : String(v)),
      },
      title: {
        text: formatCents(totalCents),
        subtext: "spent",
        left: "center",
        top: "middle",
        textStyle: { fontSize: 18, fontWeight: 600, color: themeColor("--foreground", "#e2e8f0") },
        subtextStyle: { color: themeColor("--muted-foreground", "#94a3b8") },
      },
      series: [
        {
          type: "pie",
          radius: ["58%", "82%"],
          avoidLabelOverlap: true,
          label: { show: false },
          itemStyle: { borderRadius: 6, borderWidth: 2, borderColor: themeColor("--card", "#0f172a") },
          data: items.map((it) => ({ name: it.category, value: it.valueCents / 100, itemStyle: { color: it.color } })),
        },
      ],
    }),
    [items, totalCents],
  );

  const onEvents = React.useMemo(
    () => ({
      click: (params: { name?: string }) => {
        if (params.name) onSelectCategory(params.name);
      },
    }),
    [onSelectCategory],
  );

  if (!items.length) {
    return <div className="grid h-[260px] place-items-center text-sm text-muted-foreground">No spending yet</div>;
  }

  return <ReactECharts option={option} style={{ height: 260 }} onEvents={onEvents} notMerge />;
}
