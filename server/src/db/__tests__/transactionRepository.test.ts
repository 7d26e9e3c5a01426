import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DatabaseError } from "../../errors";
import type { NewTransaction } from "../../types";
import { openDatabase, type SqliteDatabase } from "../database";
import { SqliteTransactionRepository } from "../transactionRepository";

const NOW = new Date("2026-10-19T12:00:00.000Z");

function tx(overrides: Partial<NewTransaction> = {}): NewTransaction {
  return {
    description: "Groceries",
    amountCents: 4250,
    category: "Food",
    date: "2026-10-01",
    type: "expense",
    currency: "USD",
    receipt: null,
    ...overrides,
  };
}

describe("SqliteTransactionRepository", () => {
  let db: SqliteDatabase;
  let repo: SqliteTransactionRepository;

  beforeEach(() => {
    db = openDatabase(":memory:");
    repo = new SqliteTransactionRepository(db, { now: () => NOW });
  });

  afterEach(() => db.close());

  it("round-trips inserted transactions unchanged", () => {
    const inputs = [
      tx(),
      tx({ description: "Refund", amountCents: -1999, category: "Shopping", type: "income", date: "2026-09-30" }),
      tx({ description: "Receipt lunch", receipt: { mimeType: "image/png", base64: "iVBORw==" } }),
    ];
    const created = inputs.map((i) => repo.insert(i));

    expect(created.map((t) => t.id)).toEqual([1, 2, 3]);
    const listed = repo.list();
    expect(listed).toHaveLength(3);
    inputs.forEach((input, i) => {
      expect(listed).toContainEqual({ ...input, id: i + 1, createdAt: "2026-10-19T12:00:00.000Z" });
    });
  });

  it("keeps a negative amount on an expense as-is", () => {
    const created = repo.insert(tx({ amountCents: -500, type: "expense" }));
    expect(repo.getById(created.id)?.amountCents).toBe(-500);
  });

  it("filters by inclusive date bounds", () => {
    for (const date of ["2026-01-31", "2026-02-01", "2026-02-15", "2026-02-28", "2026-03-01"]) {
      repo.insert(tx({ date }));
    }
    const dates = repo.list({ from: "2026-02-01", to: "2026-02-28" }).map((t) => t.date);
    expect(dates).toEqual(["2026-02-28", "2026-02-15", "2026-02-01"]);
    expect(repo.list({ from: "2026-03-01" }).map((t) => t.date)).toEqual(["2026-03-01"]);
    expect(repo.list({ to: "2026-01-31" }).map((t) => t.date)).toEqual(["2026-01-31"]);
  });

  it("filters by category, type and limit", () => {
    repo.insert(tx({ category: "Food", type: "expense", date: "2026-10-01" }));
    repo.insert(tx({ category: "Income", type: "income", date: "2026-10-02" }));
    repo.insert(tx({ category: "Food", type: "expense", date: "2026-10-03" }));

    expect(repo.list({ category: "Food" }).map((t) => t.id)).toEqual([3, 1]);
    expect(repo.list({ type: "income" }).map((t) => t.id)).toEqual([2]);
    expect(repo.list({ limit: 2 }).map((t) => t.id)).toEqual([3, 2]);
  });

  it("orders newest date first and breaks ties by id", () => {
    repo.insert(tx({ date: "2026-10-01" }));
    repo.insert(tx({ date: "2026-10-05" }));
    repo.insert(tx({ date: "2026-10-01" }));
    expect(repo.list().map((t) => t.id)).toEqual([2, 3, 1]);
  });

  it("rolls back a bulk insert when any row fails", () => {
    expect(() => repo.insertMany([tx(), tx({ category: "" })])).toThrow(DatabaseError);
    expect(repo.count()).toBe(0);
  });

  it("inserts many rows in one call", () => {
    const created = repo.insertMany([tx(), tx({ date: "2026-10-02" })]);
    expect(created.map((t) => t.id)).toEqual([1, 2]);
    expect(repo.count()).toBe(2);
  });

  it("reset removes everything and restarts ids", () => {
    repo.insert(tx());
    repo.insert(tx());
    repo.reset();
    expect(repo.count()).toBe(0);
    expect(repo.insert(tx()).id).toBe(1);
  });

  it("replaces all rows and restarts ids", () => {
    repo.insert(tx({ description: "Old" }));
    repo.insert(tx({ description: "Old" }));
    const created = repo.replaceAll([tx({ description: "New" })]);
    expect(created.map((t) => t.id)).toEqual([1]);
    expect(repo.list().map((t) => t.description)).toEqual(["New"]);
  });

  it("keeps existing rows when a replacement fails", () => {
    repo.insert(tx({ description: "Kept" }));
    expect(() => repo.replaceAll([tx(), tx({ category: "" })])).toThrow(DatabaseError);
    expect(repo.list().map((t) => t.description)).toEqual(["Kept"]);
  });

  it("returns undefined for unknown ids", () => {
    expect(repo.getById(42)).toBeUndefined();
  });
});
