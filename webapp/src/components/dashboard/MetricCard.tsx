import React from "react";
import { cn } from "@/lib/cn";

export function MetricCard({
  label,
  icon,
  tone = "neutral",
  hint,
  children,
}: {
  label: string;
  icon: React.ReactNode;
  tone?: "neutral" | "income" | "expense";
  hint?: React.ReactNode;
  children: React.ReactNode;
}) {
  return (
    <div
      className={cn(
        "rounded-2xl border border-border/60 bg-card/35 p-5",
        "transition-transform duration-150 ease-out hover:-translate-y-0.5 hover:bg-card/45 hover:shadow-lift",
      )}
    >
      <div className="flex items-center gap-2 text-[11px] font-semibold uppercase tracking-[0.18em] text-muted-foreground">
        <span
          className={cn(
            "inline-flex h-6 w-6 items-center justify-center rounded-xl bg-background/40 ring-1 ring-border/60",
            tone === "income" && "bg-income/10 ring-income/30 text-income",
            tone === "expense" && "bg-expense/10 ring-expense/30 text-expense",
          )}
        >
          {icon}
        </span>
        <span>{label}</span>
      </div>
      <div className="mt-3 text-2xl font-semibold tracking-tight">{children}</div>
      {hint ? <div className="mt-1 text-xs text-muted-foreground">{hint}</div> : null}
    </div>
  );
}
