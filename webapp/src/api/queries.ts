import { useMutation, useQuery, useQueryClient, type QueryClient } from "@tanstack/react-query";
import { api } from "@/api/client";
import type { DateRange, TransactionCreate, TransactionFilters } from "@/types";

export const queryKeys = {
  categories: ["categories"] as const,
  transactions: (filters: TransactionFilters) => ["transactions", filters] as const,
  dashboardSummary: (range: DateRange) => ["dashboardSummary", range] as const,
  dashboardInsights: (range: DateRange) => ["dashboardInsights", range] as const,
  advancedAnalytics: ["advancedAnalytics"] as const,
  classify: (description: string) => ["classify", description] as const,
};

/** Everything derived from stored transactions goes stale after a write. */
export async function invalidateFinanceData(qc: QueryClient) {
  await Promise.all([
    qc.invalidateQueries({ queryKey: ["transactions"] }),
    qc.invalidateQueries({ queryKey: ["dashboardSummary"] }),
    qc.invalidateQueries({ queryKey: ["dashboardInsights"] }),
    qc.invalidateQueries({ queryKey: queryKeys.advancedAnalytics }),
  ]);
}

export function useCategoriesQuery() {
  return useQuery({ queryKey: queryKeys.categories, queryFn: api.categories, staleTime: Infinity });
}

export function useTransactionsQuery(filters: TransactionFilters) {
  return useQuery({ queryKey: queryKeys.transactions(filters), queryFn: () => api.listTransactions(filters) });
}

export function useDashboardSummaryQuery(range: DateRange, opts?: { enabled?: boolean }) {
  return useQuery({
    queryKey: queryKeys.dashboardSummary(range),
    queryFn: () => api.dashboardSummary(range),
    enabled: opts?.enabled ?? true,
  });
}

export function useDashboardInsightsQuery(range: DateRange, opts?: { enabled?: boolean }) {
  return useQuery({
    queryKey: queryKeys.dashboardInsights(range),
    queryFn: () => api.dashboardInsights(range),
    enabled: opts?.enabled ?? true,
  });
}

export function useAdvancedAnalyticsQuery() {
  return useQuery({ queryKey: queryKeys.advancedAnalytics, queryFn: api.advancedAnalytics });
}

export function useClassifyQuery(description: string) {
  const trimmed = description.trim();
  return useQuery({
    queryKey: queryKeys.classify(trimmed),
    queryFn: () => api.classify(trimmed),
    enabled: trimmed.length >= 3,
    staleTime: Infinity,
  });
}

export function useCreateTransactionMutation() {
  const qc = useQueryClient();
  return useMutation({
    mutationFn: (vars: { input: TransactionCreate; receipt?: File | null }) =>
      api.createTransaction(vars.input, vars.receipt),
    onSuccess: () => invalidateFinanceData(qc),
  });
}

export function useImportCsvMutation() {
  const qc = useQueryClient();
  return useMutation({
    mutationFn: (vars: { file: File; commit: boolean }) => api.importCsv(vars.file, { commit: vars.commit }),
    onSuccess: (res) => (res.commit ? invalidateFinanceData(qc) : undefined),
  });
}

export function useLoadSampleDataMutation() {
  const qc = useQueryClient();
  return useMutation({
    mutationFn: api.loadSampleData,
    onSuccess: () => invalidateFinanceData(qc),
  });
}
