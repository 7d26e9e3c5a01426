type CssVarName = `--${string}`;

function canReadDom() {
  return typeof window !== "undefined" && typeof document !== "undefined";
}

export function readCssVar(name: CssVarName): string | undefined {
  if (!canReadDom()) return undefined;
  const v = getComputedStyle(document.documentElement).getPropertyValue(name).trim();
  return v || undefined;
}

export function readCssList(name: CssVarName): string[] {
  const raw = readCssVar(name);
  if (!raw) return [];
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/** `hsl(...)` for a theme token such as `--income`, for chart libraries that cannot read Tailwind classes. */
export function themeColor(name: CssVarName, fallback: string, alpha = 1): string {
  const v = readCssVar(name);
  return v ? `hsl(${v} / ${alpha})` : fallback;
}

const DEFAULT_CHART_CATEGORICAL = [
  "#60a5fa",
  "#a78bfa",
  "#34d399",
  "#fb7185",
  "#fbbf24",
  "#22d3ee",
  "#c084fc",
  "#f472b6",
  "#93c5fd",
  "#86efac",
] as const;

export function getChartCategoricalPalette(): string[] {
  const list = readCssList("--palette-chart-categorical");
  return list.length ? list : [...DEFAULT_CHART_CATEGORICAL];
}

/** Cycles the palette by series index. */
export function colorForIndex(palette: string[], index: number): string {
  return palette[index % palette.length] ?? DEFAULT_CHART_CATEGORICAL[0];
}
