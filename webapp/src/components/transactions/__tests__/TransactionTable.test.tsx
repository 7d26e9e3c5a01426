// @vitest-environment jsdom
import { afterEach, describe, expect, it } from "vitest";
import { cleanup, render, screen } from "@testing-library/react";
import { TransactionTable } from "@/components/transactions/RecentTransactions";
import type { Transaction } from "@/types";

afterEach(() => cleanup());

const rows: Transaction[] = [
  {
    id: 7,
    description: "Grocery run",
    amountCents: 1250,
    category: "Food",
    date: "2026-10-18",
    type: "expense",
    currency: "USD",
    hasReceipt: true,
    createdAt: "2026-10-18T10:00:00.000Z",
  },
  {
    id: 6,
    description: "Paycheck",
    amountCents: 250000,
    category: "Income",
    date: "2026-10-15",
    type: "income",
    currency: "USD",
    hasReceipt: false,
    createdAt: "2026-10-15T10:00:00.000Z",
  },
];

describe("TransactionTable", () => {
  it("shows the empty message without rows", () => {
    render(<TransactionTable rows={[]} />);
    expect(screen.getByText("No transactions found with the current filters")).toBeInTheDocument();
  });

  it("renders one row per transaction with a receipt link where present", () => {
    render(<TransactionTable rows={rows} />);

    expect(screen.getAllByRole("row")).toHaveLength(3);
    expect(screen.getByText("Oct 18, 2026")).toBeInTheDocument();
    expect(screen.getByText("expense")).toBeInTheDocument();

    const link = screen.getByRole("link", { name: "Receipt for Grocery run" });
    expect(link).toHaveAttribute("href", `${window.location.origin}/api/transactions/7/receipt`);
    expect(screen.queryByRole("link", { name: "Receipt for Paycheck" })).toBeNull();
  });
});
