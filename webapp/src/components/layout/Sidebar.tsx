import React from "react";
import { NavLink } from "react-router-dom";
import { BarChart3, Database, FileSpreadsheet, LayoutDashboard, Lightbulb, Moon, PlusCircle, Sun } from "lucide-react";
import { toast } from "sonner";
import { useLoadSampleDataMutation } from "@/api/queries";
import { Button } from "@/components/ui/button";
import { Label } from "@/components/ui/label";
import { Select, SelectContent, SelectItem, SelectTrigger, SelectValue } from "@/components/ui/select";
import { cn } from "@/lib/cn";
import { CURRENCIES } from "@/lib/format";
import { useTheme } from "@/providers/ThemeProvider";

const NAV_ITEMS = [
  { to: "/", label: "Dashboard", icon: LayoutDashboard },
  { to: "/add", label: "Add Transaction", icon: PlusCircle },
  { to: "/bulk", label: "Bulk Actions", icon: FileSpreadsheet },
  { to: "/analytics", label: "Advanced Analytics", icon: BarChart3 },
] as const;

const TIPS = [
  "Use descriptive transaction names for better AI categorization",
  "Upload receipts for better expense tracking",
];

export function Sidebar({ currency, onCurrencyChange }: { currency: string; onCurrencyChange: (c: string) => void }) {
  const { theme, toggleTheme } = useTheme();
  const loadSample = useLoadSampleDataMutation();

  const onLoadSample = React.useCallback(async () => {
    try {
      const res = await loadSample.mutateAsync();
      toast.success("Sample data loaded!", { description: `${res.loaded} transactions` });
    } catch (e) {
      toast.error(e instanceof Error ? e.message : "Could not load sample data");
    }
  }, [loadSample]);

  return (
    <aside className="flex w-full shrink-0 flex-col gap-6 border-b border-border/70 bg-background/40 px-4 py-5 backdrop-blur-xl md:sticky md:top-0 md:h-screen md:w-64 md:border-b-0 md:border-r">
      <div className="px-2">
        <div className="text-lg font-semibold tracking-tight">Finance Tracker</div>
        <div className="text-xs text-muted-foreground">Personal income & spending</div>
      </div>

      <nav className="flex flex-col gap-1" aria-label="Main">
        {NAV_ITEMS.map(({ to, label, icon: Icon }) => (
          <NavLink
            key={to}
            to={to}
            end={to === "/"}
            className={({ isActive }) =>
              cn(
                "flex items-center gap-2 rounded-xl px-3 py-2 text-sm text-muted-foreground transition-colors hover:bg-card/50 hover:text-foreground",
                isActive && "bg-card/70 text-foreground ring-1 ring-border/60",
              )
            }
          >
            <Icon className="h-4 w-4" />
            {label}
          </NavLink>
        ))}
      </nav>

      <div className="space-y-3 px-1">
        <Button variant="secondary" className="w-full" loading={loadSample.isPending} onClick={onLoadSample}>
          <Database className="h-4 w-4" />
          Load sample data
        </Button>

        <div className="space-y-1.5">
          <Label>Display currency</Label>
          <Select value={currency} onValueChange={onCurrencyChange}>
            <SelectTrigger aria-label="Display currency">
              <SelectValue />
            </SelectTrigger>
            <SelectContent>
              {CURRENCIES.map((c) => (
                <SelectItem key={c} value={c}>
                  {c}
                </SelectItem>
              ))}
            </SelectContent>
          </Select>
        </div>

        <Button variant="ghost" className="w-full justify-start" onClick={toggleTheme}>
          {theme === "dark" ? <Sun className="h-4 w-4" /> : <Moon className="h-4 w-4" />}
          {theme === "dark" ? "Light mode" : "Dark mode"}
        </Button>
      </div>

      <div className="mt-auto space-y-2 rounded-2xl border border-border/60 bg-card/30 px-3 py-3 text-xs text-muted-foreground">
        <div className="flex items-center gap-1.5 font-semibold text-foreground">
          <Lightbulb className="h-3.5 w-3.5" />
          Tips
        </div>
        {TIPS.map((t) => (
          <div key={t}>{t}</div>
        ))}
      </div>
    </aside>
  );
}
