import { format, isValid, parseISO } from "date-fns";
import { z } from "zod";
import { ValidationError, type ErrorDetails } from "../errors";
import { TRANSACTION_TYPES } from "../types";

const YMD_RE = /^\d{4}-\d{2}-\d{2}$/;
const AMOUNT_RE = /^[-+]?\d+(\.\d{1,2})?$/;

export function isYmd(value: string): boolean {
  if (!YMD_RE.test(value)) return false;
  const d = parseISO(value);
  // Round-trip rejects overflowing days such as 2026-02-30.
  return isValid(d) && format(d, "yyyy-MM-dd") === value;
}

/**
 * Parses "12.5", "-3", "$1,200.00" or a finite number into integer cents.
 * Returns undefined for anything non-numeric or with more than two decimals.
 */
export function parseAmountToCents(raw: unknown): number | undefined {
  if (typeof raw === "number") {
    if (!Number.isFinite(raw)) return undefined;
    const cents = Math.round(raw * 100);
    if (!Number.isSafeInteger(cents)) return undefined;
    if (Math.abs(raw * 100 - cents) > 1e-6) return undefined;
    return cents === 0 ? 0 : cents;
  }
  if (typeof raw !== "string") return undefined;

  const cleaned = raw.trim().replace(/[$,]/g, "");
  if (!AMOUNT_RE.test(cleaned)) return undefined;

  const negative = cleaned.startsWith("-");
  const [whole = "0", frac = ""] = cleaned.replace(/^[-+]/, "").split(".");
  const cents = Number(whole) * 100 + Number(frac.padEnd(2, "0"));
  if (!Number.isSafeInteger(cents)) return undefined;
  return negative && cents !== 0 ? -cents : cents;
}

export function centsToDecimalString(cents: number): string {
  const sign = cents < 0 ? "-" : "";
  const abs = Math.abs(cents);
  return `${sign}${Math.floor(abs / 100)}.${String(abs % 100).padStart(2, "0")}`;
}

export const transactionInputSchema = z.object({
  description: z
    .string({ required_error: "Description is required", invalid_type_error: "Description must be text" })
    .trim()
    .min(1, "Description is required")
    .max(500, "Description must be at most 500 characters"),
  amount: z
    .union([z.number(), z.string()], {
      required_error: "Amount is required",
      invalid_type_error: "Amount must be a number",
    })
    .transform((v, ctx) => {
      const cents = parseAmountToCents(v);
      if (cents === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "Amount must be a number with at most 2 decimal places",
        });
        return z.NEVER;
      }
      return cents;
    }),
  date: z
    .string({ required_error: "Date is required", invalid_type_error: "Date must be text" })
    .trim()
    .refine(isYmd, "Date must be a valid date in YYYY-MM-DD format"),
  type: z
    .string({ required_error: "Type is required", invalid_type_error: "Type must be text" })
    .trim()
    .toLowerCase()
    .pipe(z.enum(TRANSACTION_TYPES, { errorMap: () => ({ message: "Type must be 'income' or 'expense'" }) })),
  category: z.string().trim().max(64, "Category must be at most 64 characters").optional(),
  currency: z
    .string()
    .trim()
    .toUpperCase()
    .regex(/^[A-Z]{3}$/, "Currency must be a 3-letter ISO code")
    .optional(),
});

export type TransactionInput = z.input<typeof transactionInputSchema>;
export type ParsedTransactionInput = z.output<typeof transactionInputSchema>;

export function toValidationError(error: z.ZodError, fallback = "Invalid input"): ValidationError {
  const details: ErrorDetails = {};
  for (const issue of error.issues) {
    const key = issue.path.length ? issue.path.join(".") : "_";
    (details[key] ??= []).push(issue.message);
  }
  return new ValidationError(error.issues[0]?.message ?? fallback, details);
}

export const rangeQuerySchema = z
  .object({
    from: z.string().trim().refine(isYmd, "Start date must be in YYYY-MM-DD format").optional(),
    to: z.string().trim().refine(isYmd, "End date must be in YYYY-MM-DD format").optional(),
  })
  .refine((r) => !r.from || !r.to || r.from <= r.to, {
    message: "Start date cannot be after end date",
    path: ["from"],
  });

export type DateRange = z.infer<typeof rangeQuerySchema>;

export function parseDateRange(raw: unknown): DateRange {
  const parsed = rangeQuerySchema.safeParse(raw);
  if (!parsed.success) throw toValidationError(parsed.error);
  return parsed.data;
}
