import type { ExpenseClassifier } from "../classifier/classifier";
import type { TransactionRepository } from "../db/transactionRepository";
import { PayloadTooLargeError, ValidationError } from "../errors";
import type { NewTransaction, Receipt, ReceiptMimeType, Transaction } from "../types";
import { toValidationError, transactionInputSchema } from "./validation";

export type ReceiptUpload = {
  mimeType: string;
  bytes: Uint8Array;
};

const RECEIPT_TYPES: Record<string, ReceiptMimeType> = {
  "image/png": "image/png",
  "image/jpeg": "image/jpeg",
  "image/jpg": "image/jpeg",
};

export type TransactionServiceDeps = {
  repo: TransactionRepository;
  classifier: ExpenseClassifier;
  defaultCurrency: string;
  maxReceiptBytes: number;
};

export class TransactionService {
  private readonly deps: TransactionServiceDeps;

  constructor(deps: TransactionServiceDeps) {
    this.deps = deps;
  }

  encodeReceipt(upload: ReceiptUpload): Receipt {
    const mimeType = RECEIPT_TYPES[upload.mimeType.toLowerCase()];
    if (!mimeType) {
      throw new ValidationError("Receipt must be a PNG or JPEG image", {
        receipt: [`Unsupported type: ${upload.mimeType || "unknown"}`],
      });
    }
    if (upload.bytes.byteLength > this.deps.maxReceiptBytes) {
      const mb = (this.deps.maxReceiptBytes / (1024 * 1024)).toFixed(0);
      throw new PayloadTooLargeError(`Receipt file size must be less than ${mb}MB`);
    }
    return { mimeType, base64: Buffer.from(upload.bytes).toString("base64") };
  }

  /** Validates raw input; a blank category is filled in by the classifier. */
  validate(raw: unknown, receipt?: ReceiptUpload | null): NewTransaction {
    const parsed = transactionInputSchema.safeParse(raw);
    if (!parsed.success) throw toValidationError(parsed.error);

    const v = parsed.data;
    const category = v.category ? v.category : this.deps.classifier.classify(v.description);
    return {
      description: v.description,
      amountCents: v.amount,
      category,
      date: v.date,
      type: v.type,
      currency: v.currency ?? this.deps.defaultCurrency,
      receipt: receipt ? this.encodeReceipt(receipt) : null,
    };
  }

  add(raw: unknown, receipt?: ReceiptUpload | null): Transaction {
    return this.deps.repo.insert(this.validate(raw, receipt));
  }

  addMany(items: NewTransaction[]): Transaction[] {
    if (!items.length) return [];
    return this.deps.repo.insertMany(items);
  }
}
