// @vitest-environment jsdom
import { describe, expect, it } from "vitest";
import { MAX_RECEIPT_BYTES, checkReceipt, transactionFormSchema } from "@/pages/AddTransaction";

const base = { description: "Coffee", amount: "4.50", date: "2026-10-19", type: "expense", category: "auto" };

describe("transactionFormSchema", () => {
  it("accepts signed amounts with up to two decimals", () => {
    expect(transactionFormSchema.safeParse(base).success).toBe(true);
    expect(transactionFormSchema.safeParse({ ...base, amount: "-12" }).success).toBe(true);
    expect(transactionFormSchema.safeParse({ ...base, amount: "0" }).success).toBe(true);
  });

  it("rejects amounts with more decimals or text", () => {
    for (const amount of ["4.505", "abc", ""]) {
      const res = transactionFormSchema.safeParse({ ...base, amount });
      expect(res.success).toBe(false);
      if (res.success) continue;
      expect(res.error.issues[0]?.message).toBe("Amount must be a number with at most 2 decimal places");
    }
  });

  it("requires a description after trimming", () => {
    const res = transactionFormSchema.safeParse({ ...base, description: "   " });
    expect(res.success).toBe(false);
  });
});

describe("checkReceipt", () => {
  it("allows small PNG and JPEG files", () => {
    expect(checkReceipt(new File(["x"], "r.png", { type: "image/png" }))).toBeUndefined();
    expect(checkReceipt(new File(["x"], "r.jpg", { type: "image/jpeg" }))).toBeUndefined();
  });

  it("rejects other types and oversized files", () => {
    expect(checkReceipt(new File(["x"], "r.pdf", { type: "application/pdf" }))).toBe(
      "Receipt must be a PNG or JPEG image",
    );
    const big = new File([new Uint8Array(MAX_RECEIPT_BYTES + 1)], "r.png", { type: "image/png" });
    expect(checkReceipt(big)).toBe("Receipt file size must be less than 5MB");
  });
});
