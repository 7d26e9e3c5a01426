import Papa from "papaparse";
import { ValidationError } from "../errors";
import type { TransactionService } from "../transactions/service";
import type { NewTransaction } from "../types";

export const REQUIRED_COLUMNS = ["description", "amount", "date", "type"] as const;

export type ImportRowError = {
  row: number; // 1-based data row (the header is not counted)
  message: string;
};

export type ImportResult = {
  commit: boolean;
  totalRows: number;
  validRows: number;
  importedRows: number; // 0 on a dry run
  skippedRows: number;
  errors: ImportRowError[];
};

type CsvRow = Record<string, string | undefined>;

function hasRequiredCells(row: CsvRow | undefined): boolean {
  return row !== undefined && REQUIRED_COLUMNS.every((c) => row[c] !== undefined);
}

export function importTransactionsCsv(
  text: string,
  service: TransactionService,
  opts: { commit: boolean },
): ImportResult {
  const parsed = Papa.parse<CsvRow>(text.replace(/^\uFEFF/, ""), {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (h) => h.trim().toLowerCase(),
  });

  const fields = parsed.meta.fields ?? [];
  const missing = REQUIRED_COLUMNS.filter((c) => !fields.includes(c));
  if (missing.length) {
    throw new ValidationError(`CSV must contain columns: ${REQUIRED_COLUMNS.join(", ")}`, {
      columns: [`Missing: ${missing.join(", ")}`],
    });
  }

  // Short rows that still carry every required cell are left to row validation.
  const rowParseErrors = new Map<number, string>();
  for (const e of parsed.errors) {
    if (e.row === undefined || rowParseErrors.has(e.row)) continue;
    if (e.code === "TooFewFields" && hasRequiredCells(parsed.data[e.row])) continue;
    rowParseErrors.set(e.row, e.message);
  }

  const valid: NewTransaction[] = [];
  const errors: ImportRowError[] = [];

  parsed.data.forEach((row, i) => {
    const parseError = rowParseErrors.get(i);
    if (parseError) {
      errors.push({ row: i + 1, message: parseError });
      return;
    }
    try {
      valid.push(
        service.validate({
          description: row.description ?? "",
          amount: row.amount ?? "",
          date: row.date ?? "",
          type: row.type ?? "",
          category: row.category?.trim() || undefined,
          currency: row.currency?.trim() || undefined,
        }),
      );
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      errors.push({ row: i + 1, message: err.message });
    }
  });

  const imported = opts.commit ? service.addMany(valid) : [];

  return {
    commit: opts.commit,
    totalRows: parsed.data.length,
    validRows: valid.length,
    importedRows: imported.length,
    skippedRows: errors.length,
    errors,
  };
}
