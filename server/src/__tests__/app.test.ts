import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createApp } from "../app";
import { loadConfig } from "../config";
import { closeContext, createContext, type AppContext } from "../context";

const PNG_BYTES = [137, 80, 78, 71, 13, 10, 26, 10];

function jsonPost(body: unknown): RequestInit {
  return { method: "POST", headers: { "Content-Type": "application/json" }, body: JSON.stringify(body) };
}

describe("api", () => {
  let ctx: AppContext;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    ctx = createContext(
      loadConfig({
        DB_PATH: ":memory:",
        LOG_LEVEL: "silent",
        SEED_SAMPLE_DATA: "false",
        STATIC_DIR: "does-not-exist",
      }),
      { now: () => new Date(2026, 9, 19, 12) },
    );
    app = createApp(ctx);
  });

  afterEach(() => closeContext(ctx));

  it("reports health", async () => {
    const res = await app.request("/api/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, transactions: 0 });
  });

  it("lists categories and classifies descriptions", async () => {
    const cats = await (await app.request("/api/categories")).json();
    expect(cats).toContain("Food");
    expect(cats).toContain("Other");

    const res = await app.request("/api/classify", jsonPost({ description: "Netflix subscription" }));
    expect(await res.json()).toEqual({ category: "Entertainment" });
  });

  it("adds a JSON transaction with a suggested category", async () => {
    const res = await app.request(
      "/api/transactions",
      jsonPost({ description: "Starbucks latte", amount: "5.25", date: "2026-10-01", type: "expense" }),
    );
    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      id: 1,
      description: "Starbucks latte",
      amountCents: 525,
      category: "Food",
      date: "2026-10-01",
      type: "expense",
      currency: "USD",
      createdAt: new Date(2026, 9, 19, 12).toISOString(),
      hasReceipt: false,
    });
  });

  it("returns field errors in the envelope", async () => {
    const res = await app.request(
      "/api/transactions",
      jsonPost({ description: "Lunch", amount: "abc", date: "2026-10-01", type: "expense" }),
    );
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "validation_error",
        message: "Amount must be a number with at most 2 decimal places",
        details: { amount: ["Amount must be a number with at most 2 decimal places"] },
      },
    });
    expect(ctx.repo.count()).toBe(0);
  });

  it("rejects a malformed JSON body", async () => {
    const res = await app.request("/api/transactions", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{",
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "validation_error", message: "Request body must be valid JSON" },
    });
  });

  it("stores and serves a receipt from a multipart upload", async () => {
    const form = new FormData();
    form.set("description", "Dinner at restaurant");
    form.set("amount", "42.10");
    form.set("date", "2026-10-02");
    form.set("type", "expense");
    form.set("receipt", new File([new Uint8Array(PNG_BYTES)], "receipt.png", { type: "image/png" }));

    const created = await app.request("/api/transactions", { method: "POST", body: form });
    expect(created.status).toBe(201);
    expect(await created.json()).toMatchObject({ id: 1, hasReceipt: true, category: "Food" });

    const receipt = await app.request("/api/transactions/1/receipt");
    expect(receipt.status).toBe(200);
    expect(receipt.headers.get("content-type")).toBe("image/png");
    expect([...new Uint8Array(await receipt.arrayBuffer())]).toEqual(PNG_BYTES);
  });

  it("rejects receipts that are not images", async () => {
    const form = new FormData();
    form.set("description", "Dinner");
    form.set("amount", "10");
    form.set("date", "2026-10-02");
    form.set("type", "expense");
    form.set("receipt", new File(["hello"], "notes.txt", { type: "text/plain" }));

    const res = await app.request("/api/transactions", { method: "POST", body: form });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { message: "Receipt must be a PNG or JPEG image" } });
  });

  it("answers 404 for missing receipts", async () => {
    expect((await app.request("/api/transactions/99/receipt")).status).toBe(404);

    await app.request(
      "/api/transactions",
      jsonPost({ description: "Bus", amount: 2, date: "2026-10-01", type: "expense" }),
    );
    const res = await app.request("/api/transactions/1/receipt");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { code: "not_found", message: "Transaction has no receipt" } });
  });

  it("filters the transaction list", async () => {
    for (const [description, date, type] of [
      ["Salary", "2026-09-01", "income"],
      ["Groceries", "2026-09-15", "expense"],
      ["Rent", "2026-10-01", "expense"],
    ]) {
      await app.request("/api/transactions", jsonPost({ description, amount: 100, date, type }));
    }

    const res = await app.request("/api/transactions?from=2026-09-01&to=2026-09-30&type=expense");
    const rows: unknown = await res.json();
    expect(rows).toEqual([expect.objectContaining({ description: "Groceries", category: "Food" })]);

    const bad = await app.request("/api/transactions?limit=0");
    expect(bad.status).toBe(400);
  });

  it("imports a CSV upload and exports it again", async () => {
    const csv = "description,amount,date,type\nUber to work,18.40,2026-10-03,expense\nMystery,zz,2026-10-03,expense\n";
    const form = new FormData();
    form.set("file", new File([csv], "bank.csv", { type: "text/csv" }));

    const imported = await app.request("/api/import/csv?commit=true", { method: "POST", body: form });
    expect(await imported.json()).toEqual({
      commit: true,
      totalRows: 2,
      validRows: 1,
      importedRows: 1,
      skippedRows: 1,
      errors: [{ row: 2, message: "Amount must be a number with at most 2 decimal places" }],
    });

    const exported = await app.request("/api/export?format=csv&from=2026-10-01&to=2026-10-31");
    expect(exported.headers.get("content-disposition")).toBe(
      'attachment; filename="transactions_20261001_to_20261031.csv"',
    );
    expect(exported.headers.get("x-transaction-count")).toBe("1");
    expect(await exported.text()).toBe(
      "description,amount,date,type,category\r\nUber to work,18.40,2026-10-03,expense,Transport",
    );
  });

  it("requires a file for CSV import", async () => {
    const res = await app.request("/api/import/csv", { method: "POST", body: new FormData() });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { message: "Upload a CSV file in the 'file' field" } });
  });

  it("validates dashboard date ranges", async () => {
    const res = await app.request("/api/dashboard/summary?from=2026-10-10&to=2026-10-01");
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { message: "Start date cannot be after end date" } });
  });

  it("reloads sample data and builds analytics from it", async () => {
    await app.request(
      "/api/transactions",
      jsonPost({ description: "Temp", amount: 1, date: "2026-10-01", type: "expense" }),
    );

    const res = await app.request("/api/sample-data", { method: "POST" });
    expect(await res.json()).toEqual({ loaded: 41 });
    expect(ctx.repo.count()).toBe(41);
    expect(ctx.repo.list().some((t) => t.description === "Temp")).toBe(false);

    const advanced = await (await app.request("/api/analytics/advanced")).json();
    expect(advanced.prediction.monthLabel).toBe("November 2026");

    const insights = await (await app.request("/api/dashboard/insights")).json();
    expect(insights.categoryBreakdown.length).toBeGreaterThan(0);
  });

  it("answers unknown API routes with the envelope", async () => {
    const res = await app.request("/api/nope");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { code: "not_found", message: "No route for GET /api/nope" } });
  });
});
