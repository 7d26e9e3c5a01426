import React from "react";
import { BrowserRouter, Navigate, Route, Routes } from "react-router-dom";
import { Toaster } from "sonner";
import { Sidebar } from "@/components/layout/Sidebar";
import { getCurrency, setCurrency } from "@/lib/format";
import { AddTransactionPage } from "@/pages/AddTransaction";
import { AdvancedAnalyticsPage } from "@/pages/AdvancedAnalytics";
import { BulkActionsPage } from "@/pages/BulkActions";
import { DashboardPage } from "@/pages/Dashboard";
import { QueryProvider } from "@/providers/QueryProvider";
import { ThemeProvider, useTheme } from "@/providers/ThemeProvider";

function Shell() {
  const { theme } = useTheme();
  const [currency, setCurrencyState] = React.useState(getCurrency);

  const onCurrencyChange = React.useCallback((next: string) => {
    setCurrency(next);
    setCurrencyState(next);
  }, []);

  return (
    <div className="min-h-screen bg-background text-foreground md:flex">
      <Sidebar currency={currency} onCurrencyChange={onCurrencyChange} />
      {/* amounts read the display currency at render time */}
      <main key={currency} className="min-w-0 flex-1 px-5 py-6 md:px-8">
        <Routes>
          <Route path="/" element={<DashboardPage />} />
          <Route path="/add" element={<AddTransactionPage />} />
          <Route path="/bulk" element={<BulkActionsPage />} />
          <Route path="/analytics" element={<AdvancedAnalyticsPage />} />
          <Route path="*" element={<Navigate to="/" replace />} />
        </Routes>
      </main>
      <Toaster theme={theme} position="bottom-right" richColors />
    </div>
  );
}

export function App() {
  return (
    <QueryProvider>
      <ThemeProvider>
        <BrowserRouter>
          <Shell />
        </BrowserRouter>
      </ThemeProvider>
    </QueryProvider>
  );
}
