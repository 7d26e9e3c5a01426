import * as React from "react";
import { animate, useMotionValue, useMotionValueEvent, useReducedMotion } from "framer-motion";
import { formatCents, getCurrency } from "@/lib/format";
import { cn } from "@/lib/cn";

export type AnimatedNumberProps = {
  value: number;
  format: (value: number) => string;
  className?: string;
  durationMs?: number;
  "aria-label"?: string;
};

function AnimatedNumber({
  value,
  format,
  className,
  durationMs = 520,
  "aria-label": ariaLabel,
}: AnimatedNumberProps) {
  const reduceMotion = useReducedMotion();
  const mv = useMotionValue(0);
  const spanRef = React.useRef<HTMLSpanElement | null>(null);
  const mountedRef = React.useRef(false);

  // Writes straight to the DOM so the count-up does not re-render React.
  useMotionValueEvent(mv, "change", (latest) => {
    const el = spanRef.current;
    if (!el || !Number.isFinite(latest)) return;
    el.textContent = format(latest);
  });

  React.useEffect(() => {
    const el = spanRef.current;
    const next = Number.isFinite(value) ? value : 0;

    // First paint shows the final value.
    if (!mountedRef.current || reduceMotion) {
      mountedRef.current = true;
      mv.set(next);
      if (el) el.textContent = format(next);
      return;
    }

    const controls = animate(mv, next, {
      duration: durationMs / 1000,
      ease: [0.16, 1, 0.3, 1],
    });
    return () => controls.stop();
  }, [durationMs, format, mv, reduceMotion, value]);

  return (
    <span ref={spanRef} className={cn("tabular-nums", className)} aria-label={ariaLabel}>
      {format(Number.isFinite(value) ? value : 0)}
    </span>
  );
}

export function AnimatedMoneyCents({
  cents,
  currency,
  tone = "neutral",
  className,
}: {
  cents: number;
  currency?: string;
  /** "signed" colors positive amounts as income and negative ones as expense. */
  tone?: "neutral" | "signed";
  className?: string;
}) {
  const code = currency ?? getCurrency();
  const format = React.useCallback((v: number) => formatCents(Math.round(v), { currency: code }), [code]);
  return (
    <AnimatedNumber
      value={cents}
      format={format}
      className={cn(tone === "signed" && (cents < 0 ? "text-expense" : cents > 0 ? "text-income" : undefined), className)}
    />
  );
}
