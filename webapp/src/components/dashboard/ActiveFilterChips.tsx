import React from "react";
import { X } from "lucide-react";
import { AnimatePresence, motion, useReducedMotion } from "framer-motion";
import { Button } from "@/components/ui/button";
import { cn } from "@/lib/cn";
import { defaultRange } from "@/lib/dateRanges";
import { formatYmdToShort } from "@/lib/format";
import type { DashboardParams } from "@/lib/urlState";

export type DashboardFilterState = DashboardParams;

function Chip({ label, onRemove, dotColor }: { label: string; onRemove: () => void; dotColor?: string }) {
  const reduceMotion = useReducedMotion();
  return (
    <motion.button
      type="button"
      initial={reduceMotion ? false : { opacity: 0, y: 4, scale: 0.985 }}
      animate={{ opacity: 1, y: 0, scale: 1 }}
      exit={reduceMotion ? { opacity: 0 } : { opacity: 0, y: -4, scale: 0.985 }}
      transition={reduceMotion ? { duration: 0 } : { duration: 0.18, ease: [0.16, 1, 0.3, 1] }}
      className={cn(
        "inline-flex items-center gap-1.5 rounded-full border border-border/60 bg-background/35 px-3 py-1 text-xs",
        "text-foreground/90 hover:bg-accent/50 hover:text-foreground transition-colors",
        "focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-ring/40",
      )}
      aria-label={`Remove ${label}`}
      onClick={onRemove}
    >
      {dotColor ? (
        <span className="h-2.5 w-2.5 rounded-full" style={{ backgroundColor: dotColor }} aria-hidden="true" />
      ) : null}
      <span className="max-w-[220px] truncate">{label}</span>
      <X className="h-3.5 w-3.5 text-muted-foreground" />
    </motion.button>
  );
}

export function formatDateChip(from?: string, to?: string) {
  if (from && to) return `Date: ${formatYmdToShort(from)} – ${formatYmdToShort(to)}`;
  if (from) return `Date: from ${formatYmdToShort(from)}`;
  if (to) return `Date: to ${formatYmdToShort(to)}`;
  return "Date: all time";
}

export function ActiveFilterChips({
  filters,
  onChange,
  now,
}: {
  filters: DashboardFilterState;
  onChange: (patch: Partial<DashboardFilterState>) => void;
  now?: Date;
}) {
  const chips: React.ReactNode[] = [];
  const baseline = defaultRange(now);
  const isDefaultDate = filters.from === baseline.from && filters.to === baseline.to;

  if (!isDefaultDate) {
    chips.push(
      <Chip
        key="date"
        label={formatDateChip(filters.from, filters.to)}
        onRemove={() => onChange({ from: baseline.from, to: baseline.to })}
      />,
    );
  }

  if (filters.category) {
    chips.push(
      <Chip
        key="category"
        label={`Category: ${filters.category}`}
        onRemove={() => onChange({ category: undefined })}
      />,
    );
  }

  if (filters.type) {
    chips.push(
      <Chip
        key="type"
        label={`Type: ${filters.type}`}
        dotColor={filters.type === "income" ? "hsl(var(--income) / 0.95)" : "hsl(var(--expense) / 0.95)"}
        onRemove={() => onChange({ type: undefined })}
      />,
    );
  }

  if (chips.length === 0) return null;

  return (
    <div className="flex flex-wrap items-center gap-2">
      <div className="text-xs font-semibold text-muted-foreground">Active filters</div>
      <AnimatePresence initial={false}>{chips}</AnimatePresence>
      <Button
        type="button"
        variant="ghost"
        size="sm"
        className="ml-1"
        onClick={() => onChange({ from: baseline.from, to: baseline.to, category: undefined, type: undefined })}
      >
        Clear all
      </Button>
    </div>
  );
}
