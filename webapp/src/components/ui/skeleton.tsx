import { cn } from "@/lib/cn";

export function Skeleton({ className, rows = 1 }: { className?: string; rows?: number }) {
  if (rows <= 1) {
    return <div className={cn("animate-pulse rounded-2xl bg-accent/50", className)} aria-hidden="true" />;
  }
  return (
    <div className="space-y-2" aria-hidden="true">
      {Array.from({ length: rows }, (_, i) => (
        <div key={i} className={cn("animate-pulse rounded-2xl bg-accent/50", className)} />
      ))}
    </div>
  );
}
