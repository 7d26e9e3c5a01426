import { describe, expect, it } from "vitest";
import { previewCsv, summarizeRowErrors } from "@/lib/csvPreview";

describe("previewCsv", () => {
  it("lists header fields, the first rows and missing required columns", () => {
    const text = "\uFEFF Description ,Amount,Date\nCoffee,4.50,2026-10-01\nBus,2.75,2026-10-02\n";
    expect(previewCsv(text)).toEqual({
      fields: ["Description", "Amount", "Date"],
      rows: [
        ["Coffee", "4.50", "2026-10-01"],
        ["Bus", "2.75", "2026-10-02"],
      ],
      missingColumns: ["type"],
    });
  });

  it("caps the preview rows", () => {
    const lines = ["description,amount,date,type"];
    for (let i = 1; i <= 8; i++) lines.push(`Item ${i},1.00,2026-10-0${i},expense`);
    const res = previewCsv(lines.join("\n"), 3);
    expect(res.rows).toHaveLength(3);
    expect(res.missingColumns).toEqual([]);
  });
});

describe("summarizeRowErrors", () => {
  it("shows five errors and counts the rest", () => {
    const errors = Array.from({ length: 7 }, (_, i) => ({ row: i + 1, message: "Invalid amount" }));
    const res = summarizeRowErrors(errors);
    expect(res.shown).toHaveLength(5);
    expect(res.shown[0]).toBe("Row 1: Invalid amount");
    expect(res.more).toBe("... and 2 more errors");
  });

  it("has no overflow line for short lists", () => {
    expect(summarizeRowErrors([{ row: 2, message: "Invalid date" }]).more).toBeUndefined();
  });
});
