import { API_BASE_URL } from "@/api/config";

export type QueryParams = Record<string, string | number | boolean | undefined>;

export class ApiError extends Error {
  status: number;
  bodyText?: string;

  constructor(message: string, opts: { status: number; bodyText?: string }) {
    super(message);
    this.name = "ApiError";
    this.status = opts.status;
    this.bodyText = opts.bodyText;
  }
}

export function buildUrl(path: string, query?: QueryParams) {
  const url = new URL(path, API_BASE_URL);
  if (query) {
    for (const [k, v] of Object.entries(query)) {
      if (v === undefined || v === "") continue;
      url.searchParams.set(k, String(v));
    }
  }
  return url;
}

/** Pulls `error.message` out of the server's `{ error: { code, message, details? } }` envelope. */
export function extractErrorMessage(bodyText?: string): string | undefined {
  if (!bodyText) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(bodyText);
  } catch {
    return undefined;
  }
  if (typeof parsed !== "object" || parsed === null || !("error" in parsed)) return undefined;
  const { error } = parsed;
  if (typeof error !== "object" || error === null || !("message" in error)) return undefined;
  return typeof error.message === "string" && error.message.trim() ? error.message : undefined;
}

export async function readResponse<T>(res: Response): Promise<T> {
  if (!res.ok) {
    const text = await res.text().catch(() => undefined);
    const message = extractErrorMessage(text) ?? `Request failed: ${res.status}`;
    throw new ApiError(message, { status: res.status, bodyText: text });
  }

  // 204 no-content
  if (res.status === 204) return undefined as T;
  return (await res.json()) as T;
}

export async function fetchJson<T>(path: string, init?: RequestInit & { query?: QueryParams }): Promise<T> {
  const { query, ...rest } = init ?? {};
  const res = await fetch(buildUrl(path, query).toString(), {
    ...rest,
    headers: {
      "content-type": "application/json",
      ...(rest.headers ?? {}),
    },
  });
  return readResponse<T>(res);
}
