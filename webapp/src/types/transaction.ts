export type TransactionType = "income" | "expense";

export type Transaction = {
  id: number;
  description: string;
  amountCents: number; // signed; the label is `type`, not the sign
  category: string;
  date: string; // YYYY-MM-DD
  type: TransactionType;
  currency: string;
  hasReceipt: boolean;
  createdAt: string; // ISO
};

export type TransactionCreate = {
  description: string;
  amount: string; // decimal text, at most 2 places
  date: string;
  type: TransactionType;
  category?: string; // blank: classified by the server
};

export type TransactionFilters = {
  from?: string;
  to?: string;
  category?: string;
  type?: TransactionType;
  limit?: number;
};
