import { buildUrl, readResponse, type QueryParams } from "@/api/fetchJson";

// No content-type header: the browser sets the multipart boundary itself.
export async function fetchForm<T>(path: string, init: RequestInit & { body: FormData; query?: QueryParams }): Promise<T> {
  const { query, ...rest } = init;
  const res = await fetch(buildUrl(path, query).toString(), rest);
  return readResponse<T>(res);
}
