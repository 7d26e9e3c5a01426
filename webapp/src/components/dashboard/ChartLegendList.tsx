import React from "react";
import { cn } from "@/lib/cn";
import { formatCents } from "@/lib/format";

export type LegendItem = {
  category: string;
  valueCents: number;
  percent: number; // 0..1
  color: string;
  active?: boolean;
};

function pct(v: number) {
  return new Intl.NumberFormat(undefined, { style: "percent", maximumFractionDigits: 0 }).format(v);
}

export function ChartLegendList({
  items,
  onSelectCategory,
}: {
  items: LegendItem[];
  onSelectCategory: (category: string) => void;
}) {
  const maxValueCents = React.useMemo(
    () => items.reduce((acc, it) => Math.max(acc, it.valueCents), 0) || 1,
    [items],
  );

  return (
    <div className="space-y-1">
      {items.map((it) => {
        const w = Math.max(0, Math.min(1, it.valueCents / maxValueCents)) * 100;
        return (
          <button
            key={it.category}
            type="button"
            title={`Show ${it.category} transactions`}
            aria-pressed={it.active ?? false}
            className={cn(
              "w-full rounded-2xl border border-transparent px-3 py-2 text-left transition-colors",
              "hover:bg-accent/40 hover:border-border/50",
              it.active && "border-border/60 bg-accent/40",
              "focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-ring/40",
            )}
            onClick={() => onSelectCategory(it.category)}
          >
            <div className="flex items-start gap-3">
              <span
                className="mt-1 h-3 w-3 shrink-0 rounded-[5px]"
                style={{ backgroundColor: it.color }}
                aria-hidden="true"
              />
              <div className="min-w-0 flex-1">
                <div className="flex items-baseline justify-between gap-3">
                  <div className="truncate text-sm font-semibold tracking-tight">{it.category}</div>
                  <div className="shrink-0 text-sm font-semibold tabular-nums">{formatCents(it.valueCents)}</div>
                </div>

                <div className="mt-1.5 flex items-center gap-2">
                  <div className="h-1.5 flex-1 overflow-hidden rounded-full bg-border/50">
                    <div
                      className="h-full rounded-full"
                      style={{ width: `${w}%`, backgroundColor: it.color, opacity: 0.85 }}
                      aria-hidden="true"
                    />
                  </div>
                  <div className="w-10 shrink-0 text-right text-xs text-muted-foreground tabular-nums">
                    {pct(it.percent)}
                  </div>
                </div>
              </div>
            </div>
          </button>
        );
      })}
    </div>
  );
}
