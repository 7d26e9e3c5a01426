import { Paperclip } from "lucide-react";
import { api } from "@/api/client";
import { Select, SelectContent, SelectItem, SelectTrigger, SelectValue } from "@/components/ui/select";
import { Skeleton } from "@/components/ui/skeleton";
import { cn } from "@/lib/cn";
import { formatCents, formatDateDisplay } from "@/lib/format";
import type { Transaction, TransactionType } from "@/types";

const ALL = "all";

export const RECENT_LIMIT = 10;

export function TransactionTable({ rows }: { rows: Transaction[] }) {
  if (!rows.length) {
    return (
      <div className="rounded-2xl border border-dashed border-border/60 px-4 py-6 text-center text-sm text-muted-foreground">
        No transactions found with the current filters
      </div>
    );
  }

  return (
    <div className="overflow-x-auto">
      <table className="w-full text-sm">
        <thead>
          <tr className="text-left text-xs text-muted-foreground">
            <th className="px-3 py-2 font-semibold">Date</th>
            <th className="px-3 py-2 font-semibold">Description</th>
            <th className="px-3 py-2 text-right font-semibold">Amount</th>
            <th className="px-3 py-2 font-semibold">Category</th>
            <th className="px-3 py-2 font-semibold">Type</th>
          </tr>
        </thead>
        <tbody>
          {rows.map((t) => (
            <tr key={t.id} className="border-t border-border/50">
              <td className="whitespace-nowrap px-3 py-2 text-muted-foreground">{formatDateDisplay(t.date)}</td>
              <td className="px-3 py-2">
                <span className="inline-flex items-center gap-1.5">
                  {t.description}
                  {t.hasReceipt ? (
                    <a
                      href={api.receiptUrl(t.id)}
                      target="_blank"
                      rel="noreferrer"
                      aria-label={`Receipt for ${t.description}`}
                      className="text-muted-foreground hover:text-foreground"
                    >
                      <Paperclip className="h-3.5 w-3.5" />
                    </a>
                  ) : null}
                </span>
              </td>
              <td className="whitespace-nowrap px-3 py-2 text-right font-semibold tabular-nums">
                {formatCents(t.amountCents, { currency: t.currency })}
              </td>
              <td className="px-3 py-2">{t.category}</td>
              <td className="px-3 py-2">
                <span
                  className={cn(
                    "inline-flex items-center gap-1.5 rounded-full px-2 py-0.5 text-xs font-semibold",
                    t.type === "income" ? "bg-income/10 text-income" : "bg-expense/10 text-expense",
                  )}
                >
                  {t.type}
                </span>
              </td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}

export function RecentTransactions({
  rows,
  loading,
  categories,
  category,
  type,
  onChange,
}: {
  rows: Transaction[];
  loading?: boolean;
  categories: string[];
  category?: string;
  type?: TransactionType;
  onChange: (patch: { category?: string; type?: TransactionType }) => void;
}) {
  return (
    <div className="space-y-3">
      <div className="grid grid-cols-2 gap-3">
        <Select value={category ?? ALL} onValueChange={(v) => onChange({ category: v === ALL ? undefined : v })}>
          <SelectTrigger aria-label="Filter category">
            <SelectValue />
          </SelectTrigger>
          <SelectContent>
            <SelectItem value={ALL}>All categories</SelectItem>
            {categories.map((c) => (
              <SelectItem key={c} value={c}>
                {c}
              </SelectItem>
            ))}
          </SelectContent>
        </Select>
        <Select
          value={type ?? ALL}
          onValueChange={(v) => onChange({ type: v === "income" || v === "expense" ? v : undefined })}
        >
          <SelectTrigger aria-label="Filter type">
            <SelectValue />
          </SelectTrigger>
          <SelectContent>
            <SelectItem value={ALL}>All types</SelectItem>
            <SelectItem value="expense">Expense</SelectItem>
            <SelectItem value="income">Income</SelectItem>
          </SelectContent>
        </Select>
      </div>

      {loading ? <Skeleton className="h-9" rows={5} /> : <TransactionTable rows={rows} />}

      {!loading && rows.length ? (
        <div className="text-xs text-muted-foreground">
          Showing {rows.length} most recent {rows.length === 1 ? "transaction" : "transactions"}
        </div>
      ) : null}
    </div>
  );
}
