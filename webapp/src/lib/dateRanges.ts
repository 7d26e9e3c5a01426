import { endOfMonth, format, startOfMonth, subMonths } from "date-fns";
import type { DateRange } from "@/types";

const ymd = (d: Date) => format(d, "yyyy-MM-dd");

export const RANGE_PRESETS = ["thisMonth", "lastMonth", "ytd", "last12Months"] as const;

export type RangePreset = (typeof RANGE_PRESETS)[number];

export const PRESET_LABELS: Record<RangePreset, string> = {
  thisMonth: "This month",
  lastMonth: "Last month",
  ytd: "YTD",
  last12Months: "Last 12 months",
};

export function presetRange(preset: RangePreset, now = new Date()): Required<DateRange> {
  switch (preset) {
    case "thisMonth":
      return { from: ymd(startOfMonth(now)), to: ymd(endOfMonth(now)) };
    case "lastMonth": {
      const d = subMonths(now, 1);
      return { from: ymd(startOfMonth(d)), to: ymd(endOfMonth(d)) };
    }
    case "ytd":
      return { from: ymd(new Date(now.getFullYear(), 0, 1)), to: ymd(now) };
    case "last12Months":
      // From the first of the month a year back, through today.
      return { from: ymd(startOfMonth(subMonths(now, 12))), to: ymd(now) };
  }
}

/** The dashboard and export default. */
export function defaultRange(now = new Date()) {
  return presetRange("last12Months", now);
}

export function matchPreset(range: DateRange, now = new Date()): RangePreset | undefined {
  return RANGE_PRESETS.find((p) => {
    const r = presetRange(p, now);
    return r.from === range.from && r.to === range.to;
  });
}

export function isInvertedRange(range: DateRange) {
  return Boolean(range.from && range.to && range.from > range.to);
}
