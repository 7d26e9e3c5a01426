import type { Context } from "hono";
import { ValidationError } from "../errors";

export async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch {
    throw new ValidationError("Request body must be valid JSON");
  }
}

export function isMultipart(c: Context): boolean {
  return (c.req.header("content-type") ?? "").toLowerCase().includes("multipart/form-data");
}
