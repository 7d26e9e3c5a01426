import Papa from "papaparse";
import { centsToDecimalString } from "../transactions/validation";
import type { Transaction } from "../types";

export type ExportFormat = "csv" | "json";

export const EXPORT_COLUMNS = ["description", "amount", "date", "type", "category"] as const;

export type ExportFile = {
  filename: string;
  contentType: string;
  body: string;
  count: number;
};

function compactYmd(ymd: string) {
  return ymd.replaceAll("-", "");
}

export function exportFilename(txs: Transaction[], range: { from?: string; to?: string }, format: ExportFormat) {
  const dates = txs.map((t) => t.date).sort();
  const from = range.from ?? dates[0];
  const to = range.to ?? dates[dates.length - 1];
  const span = from && to ? `${compactYmd(from)}_to_${compactYmd(to)}` : "all";
  return `transactions_${span}.${format}`;
}

export function exportTransactions(
  txs: Transaction[],
  format: ExportFormat,
  range: { from?: string; to?: string } = {},
): ExportFile {
  const records = txs.map((t) => ({
    description: t.description,
    amount: centsToDecimalString(t.amountCents),
    date: t.date,
    type: t.type,
    category: t.category,
  }));

  const body =
    format === "csv"
      ? Papa.unparse({ fields: [...EXPORT_COLUMNS], data: records.map((r) => EXPORT_COLUMNS.map((c) => r[c])) })
      : JSON.stringify(records);

  return {
    filename: exportFilename(txs, range, format),
    contentType: format === "csv" ? "text/csv; charset=utf-8" : "application/json",
    body,
    count: records.length,
  };
}
