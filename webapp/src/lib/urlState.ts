export function readString(sp: URLSearchParams, key: string) {
  const v = sp.get(key);
  return v && v.trim().length ? v : undefined;
}

export function readEnum<T extends string>(sp: URLSearchParams, key: string, allowed: readonly T[]): T | undefined {
  const v = sp.get(key);
  return allowed.find((a) => a === v);
}

export function writeOrDelete(sp: URLSearchParams, key: string, value: string | undefined) {
  if (value === undefined || value.trim() === "") sp.delete(key);
  else sp.set(key, value);
}

export type DashboardParams = {
  from?: string;
  to?: string;
  category?: string;
  type?: "income" | "expense";
};

const ALL_TIME = "all";

/**
 * Reads dashboard filters from the query string. Without any date keys the
 * fallback range applies; `range=all` asks for every date.
 */
export function readDashboardParams(sp: URLSearchParams, fallback: { from: string; to: string }): DashboardParams {
  const from = readString(sp, "from");
  const to = readString(sp, "to");
  const allTime = sp.get("range") === ALL_TIME;
  const useFallback = !from && !to && !allTime;
  return {
    from: useFallback ? fallback.from : from,
    to: useFallback ? fallback.to : to,
    category: readString(sp, "category"),
    type: readEnum(sp, "type", ["income", "expense"] as const),
  };
}

export function writeDashboardParams(sp: URLSearchParams, params: DashboardParams) {
  writeOrDelete(sp, "from", params.from);
  writeOrDelete(sp, "to", params.to);
  writeOrDelete(sp, "range", params.from || params.to ? undefined : ALL_TIME);
  writeOrDelete(sp, "category", params.category);
  writeOrDelete(sp, "type", params.type);
}
