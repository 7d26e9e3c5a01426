import { describe, expect, it } from "vitest";
import { readDashboardParams, writeDashboardParams } from "@/lib/urlState";

const fallback = { from: "2025-10-01", to: "2026-10-19" };

describe("readDashboardParams", () => {
  it("uses the fallback range when no dates are given", () => {
    expect(readDashboardParams(new URLSearchParams(""), fallback)).toEqual({
      from: "2025-10-01",
      to: "2026-10-19",
      category: undefined,
      type: undefined,
    });
  });

  it("treats range=all as unbounded", () => {
    const p = readDashboardParams(new URLSearchParams("range=all"), fallback);
    expect(p.from).toBeUndefined();
    expect(p.to).toBeUndefined();
  });

  it("reads explicit filters and ignores unknown types", () => {
    const p = readDashboardParams(new URLSearchParams("from=2026-01-01&category=Food&type=refund"), fallback);
    expect(p).toEqual({ from: "2026-01-01", to: undefined, category: "Food", type: undefined });
  });
});

describe("writeDashboardParams", () => {
  it("marks an empty range as all time", () => {
    const sp = new URLSearchParams("from=2026-01-01&to=2026-02-01");
    writeDashboardParams(sp, { type: "expense" });
    expect(sp.toString()).toBe("range=all&type=expense");
  });

  it("drops range=all once a bound is set", () => {
    const sp = new URLSearchParams("range=all");
    writeDashboardParams(sp, { from: "2026-03-01", to: "2026-03-31", category: "Bills" });
    expect(sp.toString()).toBe("from=2026-03-01&to=2026-03-31&category=Bills");
  });
});
