import { Hono } from "hono";
import type { AppContext } from "../context";
import { advancedAnalytics, dashboardSummary, spendingInsights } from "../analytics/insights";
import { parseDateRange } from "../transactions/validation";

export function dashboardRoutes(ctx: AppContext) {
  const app = new Hono();

  app.get("/dashboard/summary", (c) => {
    const range = parseDateRange(c.req.query());
    return c.json(dashboardSummary(ctx.repo.list(range), range));
  });

  app.get("/dashboard/insights", (c) => {
    const range = parseDateRange(c.req.query());
    return c.json(spendingInsights(ctx.repo.list(range)));
  });

  app.get("/analytics/advanced", (c) => c.json(advancedAnalytics(ctx.repo.list(), ctx.now())));

  return app;
}
