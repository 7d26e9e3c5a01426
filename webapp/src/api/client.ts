import { buildUrl, fetchJson } from "@/api/fetchJson";
import { fetchForm } from "@/api/fetchForm";
import type {
  AdvancedAnalytics,
  DashboardSummary,
  DateRange,
  ExportFormat,
  ImportResult,
  SpendingInsights,
  Transaction,
  TransactionCreate,
  TransactionFilters,
} from "@/types";

export type Health = { ok: boolean; transactions: number };

function createTransaction(input: TransactionCreate, receipt?: File | null): Promise<Transaction> {
  if (!receipt) {
    return fetchJson<Transaction>("/api/transactions", { method: "POST", body: JSON.stringify(input) });
  }
  const fd = new FormData();
  for (const [k, v] of Object.entries(input)) {
    if (v !== undefined && v !== "") fd.append(k, v);
  }
  fd.append("receipt", receipt, receipt.name);
  return fetchForm<Transaction>("/api/transactions", { method: "POST", body: fd });
}

function importCsv(file: File, opts: { commit: boolean }): Promise<ImportResult> {
  const fd = new FormData();
  fd.append("file", file, file.name);
  return fetchForm<ImportResult>("/api/import/csv", { method: "POST", body: fd, query: { commit: opts.commit } });
}

export const api = {
  health: () => fetchJson<Health>("/api/health"),
  categories: () => fetchJson<string[]>("/api/categories"),
  classify: (description: string) =>
    fetchJson<{ category: string }>("/api/classify", { method: "POST", body: JSON.stringify({ description }) }),

  listTransactions: (filters: TransactionFilters = {}) =>
    fetchJson<Transaction[]>("/api/transactions", { query: filters }),
  createTransaction,
  receiptUrl: (id: number) => buildUrl(`/api/transactions/${id}/receipt`).toString(),

  dashboardSummary: (range: DateRange) => fetchJson<DashboardSummary>("/api/dashboard/summary", { query: range }),
  dashboardInsights: (range: DateRange) => fetchJson<SpendingInsights>("/api/dashboard/insights", { query: range }),
  advancedAnalytics: () => fetchJson<AdvancedAnalytics>("/api/analytics/advanced"),

  importCsv,
  exportUrl: (format: ExportFormat, range: DateRange) => buildUrl("/api/export", { format, ...range }).toString(),
  loadSampleData: () => fetchJson<{ loaded: number }>("/api/sample-data", { method: "POST" }),
};
