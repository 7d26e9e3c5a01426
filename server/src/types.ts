export type TransactionType = "income" | "expense";

export const TRANSACTION_TYPES = ["income", "expense"] as const satisfies readonly TransactionType[];

export type ReceiptMimeType = "image/png" | "image/jpeg";

export type Receipt = {
  mimeType: ReceiptMimeType;
  base64: string;
};

export type Transaction = {
  id: number;
  description: string;
  amountCents: number; // signed; independent of `type`
  category: string;
  date: string; // YYYY-MM-DD
  type: TransactionType;
  currency: string;
  receipt: Receipt | null;
  createdAt: string; // ISO
};

export type NewTransaction = Omit<Transaction, "id" | "createdAt">;

export type TransactionFilters = {
  from?: string;
  to?: string;
  category?: string;
  type?: TransactionType;
  limit?: number;
};

/** Wire shape: receipt bytes are served separately. */
export type TransactionDto = Omit<Transaction, "receipt"> & { hasReceipt: boolean };

export function toDto(t: Transaction): TransactionDto {
  const { receipt, ...rest } = t;
  return { ...rest, hasReceipt: receipt !== null };
}
