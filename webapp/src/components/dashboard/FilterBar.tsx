import { CalendarRange } from "lucide-react";
import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/input";
import { Label } from "@/components/ui/label";
import { Popover, PopoverContent, PopoverTrigger } from "@/components/ui/popover";
import { cn } from "@/lib/cn";
import { PRESET_LABELS, RANGE_PRESETS, isInvertedRange, matchPreset, presetRange } from "@/lib/dateRanges";
import { formatRange } from "@/lib/format";
import type { DateRange } from "@/types";

function labelForRange(range: DateRange) {
  const preset = matchPreset(range);
  return preset ? PRESET_LABELS[preset] : formatRange(range.from, range.to);
}

export function FilterBar({
  range,
  onChange,
  className,
}: {
  range: DateRange;
  onChange: (patch: DateRange) => void;
  className?: string;
}) {
  const inverted = isInvertedRange(range);

  return (
    <div
      className={cn(
        "flex flex-wrap items-center gap-2 rounded-2xl border border-border/60 bg-card/15 p-2",
        "backdrop-blur-sm",
        className,
      )}
    >
      <Popover>
        <PopoverTrigger asChild>
          <Button variant="secondary" size="sm">
            <CalendarRange className="h-4 w-4" />
            <span>{labelForRange(range)}</span>
          </Button>
        </PopoverTrigger>
        <PopoverContent className="w-[360px]" align="start">
          <div className="space-y-3">
            <div className="text-xs font-semibold text-muted-foreground">Quick ranges</div>
            <div className="grid grid-cols-2 gap-2">
              {RANGE_PRESETS.map((p) => (
                <Button key={p} variant="secondary" size="sm" onClick={() => onChange(presetRange(p))}>
                  {PRESET_LABELS[p]}
                </Button>
              ))}
            </div>

            <div className="pt-1">
              <div className="text-xs font-semibold text-muted-foreground">Custom</div>
              <div className="mt-2 grid grid-cols-2 gap-3">
                <div className="space-y-1.5">
                  <Label htmlFor="range-from">Start date</Label>
                  <Input
                    id="range-from"
                    type="date"
                    value={range.from ?? ""}
                    invalid={inverted}
                    onChange={(e) => onChange({ from: e.target.value || undefined })}
                  />
                </div>
                <div className="space-y-1.5">
                  <Label htmlFor="range-to">End date</Label>
                  <Input
                    id="range-to"
                    type="date"
                    value={range.to ?? ""}
                    invalid={inverted}
                    onChange={(e) => onChange({ to: e.target.value || undefined })}
                  />
                </div>
              </div>
              <div className="mt-2 flex justify-end">
                <Button variant="ghost" size="sm" onClick={() => onChange({ from: undefined, to: undefined })}>
                  All time
                </Button>
              </div>
            </div>
          </div>
        </PopoverContent>
      </Popover>

      {inverted ? <span className="px-2 text-xs text-danger">Start date cannot be after end date</span> : null}
    </div>
  );
}
