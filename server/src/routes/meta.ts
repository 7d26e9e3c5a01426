import { Hono } from "hono";
import { z } from "zod";
import type { AppContext } from "../context";
import { toValidationError } from "../transactions/validation";
import { readJson } from "./body";

const classifySchema = z.object({
  description: z.string({ required_error: "Description is required" }),
});

export function metaRoutes(ctx: AppContext) {
  const app = new Hono();

  app.get("/health", (c) => c.json({ ok: true, transactions: ctx.repo.count() }));

  app.get("/categories", (c) => c.json(ctx.classifier.categories()));

  app.post("/classify", async (c) => {
    const parsed = classifySchema.safeParse(await readJson(c));
    if (!parsed.success) throw toValidationError(parsed.error);
    return c.json({ category: ctx.classifier.classify(parsed.data.description) });
  });

  return app;
}
