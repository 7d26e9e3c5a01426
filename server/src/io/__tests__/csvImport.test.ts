import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createDefaultClassifier } from "../../classifier/classifier";
import { openDatabase, type SqliteDatabase } from "../../db/database";
import { SqliteTransactionRepository } from "../../db/transactionRepository";
import { ValidationError } from "../../errors";
import { TransactionService } from "../../transactions/service";
import { importTransactionsCsv } from "../csvImport";

const CSV = [
  "Description,Amount,Date,Type,Category",
  "Coffee at Starbucks,4.50,2026-10-01,expense,",
  "Salary,3200,2026-10-01,Income,Income",
  "Lunch,abc,2026-10-02,expense,Food",
  "Taxi,12,2026-13-01,expense,",
  "Transfer,5,2026-10-03,transfer,",
].join("\n");

describe("importTransactionsCsv", () => {
  let db: SqliteDatabase;
  let repo: SqliteTransactionRepository;
  let service: TransactionService;

  beforeEach(() => {
    db = openDatabase(":memory:");
    repo = new SqliteTransactionRepository(db);
    service = new TransactionService({
      repo,
      classifier: createDefaultClassifier(),
      defaultCurrency: "USD",
      maxReceiptBytes: 1024,
    });
  });

  afterEach(() => db.close());

  it("imports valid rows and reports the rest", () => {
    const res = importTransactionsCsv(CSV, service, { commit: true });

    expect(res).toEqual({
      commit: true,
      totalRows: 5,
      validRows: 2,
      importedRows: 2,
      skippedRows: 3,
      errors: [
        { row: 3, message: "Amount must be a number with at most 2 decimal places" },
        { row: 4, message: "Date must be a valid date in YYYY-MM-DD format" },
        { row: 5, message: "Type must be 'income' or 'expense'" },
      ],
    });
    expect(
      repo.list().map((t) => [t.description, t.amountCents, t.category, t.type]),
    ).toEqual([
      ["Salary", 320_000, "Income", "income"],
      ["Coffee at Starbucks", 450, "Food", "expense"],
    ]);
  });

  it("stores nothing on a dry run", () => {
    const res = importTransactionsCsv(CSV, service, { commit: false });
    expect(res.validRows).toBe(2);
    expect(res.importedRows).toBe(0);
    expect(repo.count()).toBe(0);
  });

  it("matches headers regardless of case, spacing and a leading BOM", () => {
    const csv = "\uFEFF DATE ,type,AMOUNT,description\n2026-09-01,income,10,Refund from shop\n";
    const res = importTransactionsCsv(csv, service, { commit: true });
    expect(res.importedRows).toBe(1);
    expect(repo.list()[0]?.category).toBe("Income");
  });

  it("rejects a file without the required columns", () => {
    expect(() => importTransactionsCsv("description,amount\nTea,2", service, { commit: true })).toThrow(
      new ValidationError("CSV must contain columns: description, amount, date, type"),
    );
  });

  it("skips ragged rows", () => {
    const csv = "description,amount,date,type\nTea,2\nBus ticket,2.75,2026-10-05,expense";
    const res = importTransactionsCsv(csv, service, { commit: true });
    expect(res.errors).toHaveLength(1);
    expect(res.errors[0]?.row).toBe(1);
    expect(res.errors[0]?.message).toMatch(/^Too few fields/);
    expect(repo.list().map((t) => t.category)).toEqual(["Transport"]);
  });

  it("imports rows that leave out only the trailing category", () => {
    const csv = "description,amount,date,type,category\nCoffee,4.5,2026-10-01,expense";
    const res = importTransactionsCsv(csv, service, { commit: true });
    expect(res).toEqual({
      commit: true,
      totalRows: 1,
      validRows: 1,
      importedRows: 1,
      skippedRows: 0,
      errors: [],
    });
    expect(repo.list().map((t) => [t.description, t.category])).toEqual([["Coffee", "Food"]]);
  });

  it("skips rows with extra fields", () => {
    const csv = "description,amount,date,type\nTea,2,2026-10-05,expense,oops";
    const res = importTransactionsCsv(csv, service, { commit: false });
    expect(res.validRows).toBe(0);
    expect(res.errors[0]?.message).toMatch(/^Too many fields/);
  });

  it("skips blank lines", () => {
    const csv = "description,amount,date,type\n\nTea,2,2026-10-05,expense\n   \n";
    expect(importTransactionsCsv(csv, service, { commit: false }).totalRows).toBe(1);
  });
});
