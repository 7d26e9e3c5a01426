import { describe, expect, it } from "vitest";
import type { Transaction } from "../../types";
import { exportFilename, exportTransactions } from "../export";

function tx(overrides: Partial<Transaction>): Transaction {
  return {
    id: 1,
    description: "Groceries",
    amountCents: 1000,
    category: "Food",
    date: "2026-09-01",
    type: "expense",
    currency: "USD",
    receipt: null,
    createdAt: "2026-10-19T12:00:00.000Z",
    ...overrides,
  };
}

const ROWS = [
  tx({ id: 2, description: "Dinner, with friends", amountCents: 6280, date: "2026-09-02" }),
  tx({ id: 1, description: "Salary", amountCents: 320_000, category: "Income", type: "income" }),
];

describe("exportTransactions", () => {
  it("writes CSV with decimal amounts and quoted fields", () => {
    const file = exportTransactions(ROWS, "csv", { from: "2026-09-01", to: "2026-09-30" });
    expect(file.body).toBe(
      "description,amount,date,type,category\r\n" +
        '"Dinner, with friends",62.80,2026-09-02,expense,Food\r\n' +
        "Salary,3200.00,2026-09-01,income,Income",
    );
    expect(file.filename).toBe("transactions_20260901_to_20260930.csv");
    expect(file.contentType).toBe("text/csv; charset=utf-8");
    expect(file.count).toBe(2);
  });

  it("writes JSON records with the same fields", () => {
    const file = exportTransactions([tx({ amountCents: -250 })], "json");
    expect(JSON.parse(file.body)).toEqual([
      { description: "Groceries", amount: "-2.50", date: "2026-09-01", type: "expense", category: "Food" },
    ]);
    expect(file.contentType).toBe("application/json");
  });
});

describe("exportFilename", () => {
  it("uses the data's own span without a range", () => {
    expect(exportFilename(ROWS, {}, "json")).toBe("transactions_20260901_to_20260902.json");
  });

  it("falls back to 'all' for an empty export", () => {
    expect(exportFilename([], {}, "csv")).toBe("transactions_all.csv");
  });
});
