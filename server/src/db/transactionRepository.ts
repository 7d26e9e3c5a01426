import type { SqliteDatabase } from "./database";
import { AppError, DatabaseError } from "../errors";
import type {
  NewTransaction,
  Receipt,
  Transaction,
  TransactionFilters,
  TransactionType,
} from "../types";

type TransactionRow = {
  id: number;
  description: string;
  amount_cents: number;
  category: string;
  date: string;
  type: string;
  currency: string;
  receipt_mime: string | null;
  receipt_base64: string | null;
  created_at: string;
};

type InsertParams = {
  description: string;
  amount_cents: number;
  category: string;
  date: string;
  type: TransactionType;
  currency: string;
  receipt_mime: string | null;
  receipt_base64: string | null;
  created_at: string;
};

function rowType(raw: string): TransactionType {
  if (raw === "income" || raw === "expense") return raw;
  throw new DatabaseError("read", new Error(`unexpected transaction type "${raw}"`));
}

function rowReceipt(row: TransactionRow): Receipt | null {
  if (row.receipt_base64 === null) return null;
  const mimeType = row.receipt_mime === "image/png" ? "image/png" : "image/jpeg";
  return { mimeType, base64: row.receipt_base64 };
}

function fromRow(row: TransactionRow): Transaction {
  return {
    id: row.id,
    description: row.description,
    amountCents: row.amount_cents,
    category: row.category,
    date: row.date,
    type: rowType(row.type),
    currency: row.currency,
    receipt: rowReceipt(row),
    createdAt: row.created_at,
  };
}

export interface TransactionRepository {
  insert(input: NewTransaction): Transaction;
  insertMany(inputs: NewTransaction[]): Transaction[];
  list(filters?: TransactionFilters): Transaction[];
  getById(id: number): Transaction | undefined;
  count(): number;
  reset(): void;
  /** Clears the table and inserts `inputs` in one SQL transaction. */
  replaceAll(inputs: NewTransaction[]): Transaction[];
}

export class SqliteTransactionRepository implements TransactionRepository {
  private readonly db: SqliteDatabase;
  private readonly now: () => Date;

  constructor(db: SqliteDatabase, opts?: { now?: () => Date }) {
    this.db = db;
    this.now = opts?.now ?? (() => new Date());
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof AppError) throw err;
      throw new DatabaseError(operation, err);
    }
  }

  private insertOne(input: NewTransaction): Transaction {
    const params: InsertParams = {
      description: input.description,
      amount_cents: input.amountCents,
      category: input.category,
      date: input.date,
      type: input.type,
      currency: input.currency,
      receipt_mime: input.receipt?.mimeType ?? null,
      receipt_base64: input.receipt?.base64 ?? null,
      created_at: this.now().toISOString(),
    };
    const info = this.db
      .prepare<InsertParams>(
        `INSERT INTO transactions
           (description, amount_cents, category, date, type, currency, receipt_mime, receipt_base64, created_at)
         VALUES
           (@description, @amount_cents, @category, @date, @type, @currency, @receipt_mime, @receipt_base64, @created_at)`,
      )
      .run(params);
    const created = this.getById(Number(info.lastInsertRowid));
    if (!created) throw new DatabaseError("insert", new Error("inserted row not found"));
    return created;
  }

  insert(input: NewTransaction): Transaction {
    return this.run("insert", () => this.insertOne(input));
  }

  insertMany(inputs: NewTransaction[]): Transaction[] {
    return this.run("insert many", () => {
      const tx = this.db.transaction((items: NewTransaction[]) => items.map((i) => this.insertOne(i)));
      return tx(inputs);
    });
  }

  list(filters: TransactionFilters = {}): Transaction[] {
    const where: string[] = [];
    const params: Record<string, string | number> = {};

    if (filters.from) {
      where.push("date >= @from");
      params.from = filters.from;
    }
    if (filters.to) {
      where.push("date <= @to");
      params.to = filters.to;
    }
    if (filters.category) {
      where.push("category = @category");
      params.category = filters.category;
    }
    if (filters.type) {
      where.push("type = @type");
      params.type = filters.type;
    }

    let sql = "SELECT * FROM transactions";
    if (where.length) sql += ` WHERE ${where.join(" AND ")}`;
    sql += " ORDER BY date DESC, id DESC";
    if (filters.limit !== undefined) {
      sql += " LIMIT @limit";
      params.limit = filters.limit;
    }

    return this.run("list", () => {
      // Statements without placeholders must be run without a bind object.
      const rows = Object.keys(params).length
        ? this.db.prepare<Record<string, string | number>, TransactionRow>(sql).all(params)
        : this.db.prepare<[], TransactionRow>(sql).all();
      return rows.map(fromRow);
    });
  }

  getById(id: number): Transaction | undefined {
    return this.run("get", () => {
      const row = this.db.prepare<[number], TransactionRow>("SELECT * FROM transactions WHERE id = ?").get(id);
      return row ? fromRow(row) : undefined;
    });
  }

  count(): number {
    return this.run("count", () => {
      const row = this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM transactions").get();
      return row?.n ?? 0;
    });
  }

  private deleteAll() {
    this.db.prepare("DELETE FROM transactions").run();
    this.db.prepare("DELETE FROM sqlite_sequence WHERE name = 'transactions'").run();
  }

  reset(): void {
    this.run("reset", () => {
      this.db.transaction(() => this.deleteAll())();
    });
  }

  replaceAll(inputs: NewTransaction[]): Transaction[] {
    return this.run("replace all", () => {
      const tx = this.db.transaction((items: NewTransaction[]) => {
        this.deleteAll();
        return items.map((i) => this.insertOne(i));
      });
      return tx(inputs);
    });
  }
}
