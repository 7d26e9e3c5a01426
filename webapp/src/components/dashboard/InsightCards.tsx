import type { ReactNode } from "react";
import { AlertTriangle, Crown, Layers } from "lucide-react";
import { formatCents } from "@/lib/format";
import type { SpendingInsights } from "@/types";

function Card({ icon, title, children }: { icon: ReactNode; title: string; children: ReactNode }) {
  return (
    <div className="rounded-2xl border border-border/60 bg-background/30 px-4 py-3">
      <div className="flex items-center gap-2 text-xs font-semibold text-muted-foreground">
        {icon}
        {title}
      </div>
      <div className="mt-1 text-sm font-semibold tracking-tight">{children}</div>
    </div>
  );
}

export function InsightCards({ insights }: { insights: SpendingInsights }) {
  if (insights.totalSpendingCents <= 0) {
    return (
      <div className="rounded-2xl border border-dashed border-border/60 px-4 py-6 text-center text-sm text-muted-foreground">
        Add some transactions to see insights
      </div>
    );
  }

  return (
    <div className="space-y-3">
      {insights.topCategory ? (
        <Card icon={<Crown className="h-4 w-4" />} title="Top spending category">
          {insights.topCategory.category} - {formatCents(insights.topCategory.totalCents)}
        </Card>
      ) : null}

      <Card icon={<Layers className="h-4 w-4" />} title="Average per category">
        {formatCents(insights.averagePerCategoryCents)}
      </Card>

      {insights.highSpending ? (
        <div
          role="alert"
          className="flex items-start gap-2 rounded-2xl border border-warning/40 bg-warning/10 px-4 py-3 text-sm"
        >
          <AlertTriangle className="mt-0.5 h-4 w-4 shrink-0 text-warning" />
          <div>
            <span className="font-semibold">High spending alert:</span> consider reviewing your budget
          </div>
        </div>
      ) : null}
    </div>
  );
}
