import type { Aggregatable } from "../aggregate";

export const SAMPLE: Aggregatable[] = [
  { type: "income", amountCents: 300_000, category: "Income", date: "2026-08-01" },
  { type: "expense", amountCents: 120_000, category: "Bills", date: "2026-08-02" },
  { type: "expense", amountCents: 8_000, category: "Food", date: "2026-08-10" },
  { type: "expense", amountCents: 2_000, category: "Food", date: "2026-09-05" },
  { type: "expense", amountCents: 115_000, category: "Bills", date: "2026-09-02" },
  { type: "income", amountCents: 14_000, category: "Income", date: "2026-09-20" },
];
