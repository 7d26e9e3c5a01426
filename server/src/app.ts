import { existsSync } from "node:fs";
import { serveStatic } from "@hono/node-server/serve-static";
import { Hono } from "hono";
import { logger as requestLogger } from "hono/logger";
import type { AppContext } from "./context";
import { AppError, errorMessage, type ErrorEnvelope } from "./errors";
import { bulkRoutes } from "./routes/bulk";
import { dashboardRoutes } from "./routes/dashboard";
import { metaRoutes } from "./routes/meta";
import { transactionRoutes } from "./routes/transactions";

export function createApp(ctx: AppContext) {
  const app = new Hono();
  const httpLog = ctx.log.child("http");

  if (ctx.config.LOG_LEVEL !== "silent") {
    app.use("*", requestLogger((line, ...rest) => httpLog.info([line, ...rest].join(" "))));
  }

  app.route("/api", metaRoutes(ctx));
  app.route("/api/transactions", transactionRoutes(ctx));
  app.route("/api", bulkRoutes(ctx));
  app.route("/api", dashboardRoutes(ctx));

  const staticDir = ctx.config.STATIC_DIR;
  if (existsSync(staticDir)) {
    app.use("*", serveStatic({ root: staticDir }));
    const spaFallback = serveStatic({ root: staticDir, path: "index.html" });
    app.get("*", (c, next) => (c.req.path.startsWith("/api/") ? next() : spaFallback(c, next)));
  }

  app.notFound((c) => {
    const body: ErrorEnvelope = {
      error: { code: "not_found", message: `No route for ${c.req.method} ${c.req.path}` },
    };
    return c.json(body, 404);
  });

  app.onError((err, c) => {
    if (err instanceof AppError) {
      if (err.status >= 500) httpLog.error(err.message, err.cause === undefined ? undefined : errorMessage(err.cause));
      return c.json(err.toEnvelope(), err.status);
    }
    httpLog.error(`unhandled error on ${c.req.method} ${c.req.path}`, err);
    const body: ErrorEnvelope = {
      error: { code: "internal_error", message: "Something went wrong. Please try again." },
    };
    return c.json(body, 500);
  });

  return app;
}
