import { Hono } from "hono";
import { z } from "zod";
import type { AppContext } from "../context";
import { NotFoundError } from "../errors";
import type { ReceiptUpload } from "../transactions/service";
import { rangeQuerySchema, toValidationError } from "../transactions/validation";
import { TRANSACTION_TYPES, toDto } from "../types";
import { isMultipart, readJson } from "./body";

const listQuerySchema = z.intersection(
  rangeQuerySchema,
  z.object({
    category: z.string().trim().min(1).optional(),
    type: z.enum(TRANSACTION_TYPES).optional(),
    limit: z.coerce.number().int().min(1).max(1000).optional(),
  }),
);

const idSchema = z.coerce.number().int().positive();

export function transactionRoutes(ctx: AppContext) {
  const app = new Hono();

  app.get("/", (c) => {
    const parsed = listQuerySchema.safeParse(c.req.query());
    if (!parsed.success) throw toValidationError(parsed.error);
    return c.json(ctx.repo.list(parsed.data).map(toDto));
  });

  app.post("/", async (c) => {
    if (!isMultipart(c)) {
      const created = ctx.service.add(await readJson(c));
      return c.json(toDto(created), 201);
    }

    const { receipt, ...fields } = await c.req.parseBody();
    let upload: ReceiptUpload | null = null;
    if (receipt instanceof File && receipt.size > 0) {
      upload = { mimeType: receipt.type, bytes: new Uint8Array(await receipt.arrayBuffer()) };
    }
    const created = ctx.service.add(fields, upload);
    ctx.log.debug(`added transaction ${created.id} (${created.category})`);
    return c.json(toDto(created), 201);
  });

  app.get("/:id/receipt", (c) => {
    const id = idSchema.safeParse(c.req.param("id"));
    if (!id.success) throw new NotFoundError("Transaction not found");
    const tx = ctx.repo.getById(id.data);
    if (!tx) throw new NotFoundError("Transaction not found");
    if (!tx.receipt) throw new NotFoundError("Transaction has no receipt");

    const bytes = new Uint8Array(Buffer.from(tx.receipt.base64, "base64"));
    return new Response(bytes, { status: 200, headers: { "Content-Type": tx.receipt.mimeType } });
  });

  return app;
}
