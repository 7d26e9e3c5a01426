import { Hono } from "hono";
import { z } from "zod";
import type { AppContext } from "../context";
import { ValidationError } from "../errors";
import { importTransactionsCsv } from "../io/csvImport";
import { exportTransactions } from "../io/export";
import { loadSampleData } from "../sample/loadSampleData";
import { parseDateRange, toValidationError } from "../transactions/validation";

const commitSchema = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((v) => v === "true" || v === "1");

const formatSchema = z.enum(["csv", "json"]).default("csv");

export function bulkRoutes(ctx: AppContext) {
  const app = new Hono();
  const log = ctx.log.child("bulk");

  app.post("/import/csv", async (c) => {
    const commit = commitSchema.safeParse(c.req.query("commit"));
    if (!commit.success) throw toValidationError(commit.error);

    const { file } = await c.req.parseBody();
    if (!(file instanceof File)) {
      throw new ValidationError("Upload a CSV file in the 'file' field", { file: ["Required"] });
    }

    const result = importTransactionsCsv(await file.text(), ctx.service, { commit: commit.data });
    log.info(
      `import ${file.name}: ${result.importedRows}/${result.totalRows} imported, ${result.skippedRows} skipped` +
        (result.commit ? "" : " (dry run)"),
    );
    return c.json(result);
  });

  app.get("/export", (c) => {
    const format = formatSchema.safeParse(c.req.query("format"));
    if (!format.success) throw toValidationError(format.error);
    const range = parseDateRange(c.req.query());

    const file = exportTransactions(ctx.repo.list(range), format.data, range);
    return c.body(file.body, 200, {
      "Content-Type": file.contentType,
      "Content-Disposition": `attachment; filename="${file.filename}"`,
      "X-Transaction-Count": String(file.count),
    });
  });

  app.post("/sample-data", (c) => {
    const loaded = loadSampleData(ctx.repo, ctx.service);
    log.info(`sample data reloaded (${loaded} transactions)`);
    return c.json({ loaded });
  });

  return app;
}
