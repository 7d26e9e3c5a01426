import Papa from "papaparse";

export type CsvPreview = {
  fields: string[];
  rows: string[][];
  missingColumns: string[];
};

export const REQUIRED_COLUMNS = ["description", "amount", "date", "type"] as const;

/** First rows of a CSV for display, plus the required columns it lacks. */
export function previewCsv(text: string, maxRows = 5): CsvPreview {
  const parsed = Papa.parse<string[]>(text.replace(/^\uFEFF/, ""), {
    skipEmptyLines: "greedy",
    preview: maxRows + 1,
  });
  const [header = [], ...rows] = parsed.data;
  const fields = header.map((h) => h.trim());
  const lower = new Set(fields.map((f) => f.toLowerCase()));
  return {
    fields,
    rows,
    missingColumns: REQUIRED_COLUMNS.filter((c) => !lower.has(c)),
  };
}

export const MAX_LISTED_ERRORS = 5;

export function summarizeRowErrors(errors: Array<{ row: number; message: string }>) {
  const shown = errors.slice(0, MAX_LISTED_ERRORS).map((e) => `Row ${e.row}: ${e.message}`);
  const hidden = Math.max(0, errors.length - MAX_LISTED_ERRORS);
  return { shown, more: hidden ? `... and ${hidden} more errors` : undefined };
}
