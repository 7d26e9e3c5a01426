import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigError, loadConfig } from "../config";
import { createLogger } from "../logger";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      PORT: 8123,
      HOST: "127.0.0.1",
      DB_PATH: "finance.db",
      DEFAULT_CURRENCY: "USD",
      MAX_RECEIPT_BYTES: 5 * 1024 * 1024,
      SEED_SAMPLE_DATA: true,
      STATIC_DIR: "dist/webapp",
      LOG_LEVEL: "info",
    });
  });

  it("coerces values and treats empty strings as unset", () => {
    const config = loadConfig({ PORT: "9000", SEED_SAMPLE_DATA: "0", DB_PATH: "", LOG_LEVEL: "debug" });
    expect(config.PORT).toBe(9000);
    expect(config.SEED_SAMPLE_DATA).toBe(false);
    expect(config.DB_PATH).toBe("finance.db");
    expect(config.LOG_LEVEL).toBe("debug");
  });

  it("lists every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: "http", DEFAULT_CURRENCY: "usd" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues).toHaveLength(2);
    expect(caught.issues[1]).toBe("DEFAULT_CURRENCY: DEFAULT_CURRENCY must be a 3-letter ISO code");
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes the scope and filters by level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const logger = createLogger("finance", "info").child("db");
    logger.debug("hidden");
    logger.info("opened");
    logger.warn("slow query", { ms: 120 });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("[finance:db] opened");
    expect(warn).toHaveBeenCalledWith("[finance:db] slow query", { ms: 120 });
  });

  it("writes nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    createLogger("finance", "silent").error("boom");
    expect(error).not.toHaveBeenCalled();
  });
});
