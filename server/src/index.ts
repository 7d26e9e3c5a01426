import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { closeContext, createContext } from "./context";
import { loadSampleData } from "./sample/loadSampleData";

const config = loadConfig();
const ctx = createContext(config);

if (config.SEED_SAMPLE_DATA && ctx.repo.count() === 0) {
  const loaded = loadSampleData(ctx.repo, ctx.service);
  ctx.log.info(`seeded empty database with ${loaded} sample transactions`);
}

const server = serve({ fetch: createApp(ctx).fetch, port: config.PORT, hostname: config.HOST }, (info) => {
  ctx.log.info(`listening on http://${info.address}:${info.port} (db: ${config.DB_PATH})`);
});

function shutdown(signal: string) {
  ctx.log.info(`${signal} received, shutting down`);
  server.close(() => {
    closeContext(ctx);
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
