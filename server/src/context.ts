import { createDefaultClassifier, type ExpenseClassifier } from "./classifier/classifier";
import type { AppConfig } from "./config";
import { openDatabase, type SqliteDatabase } from "./db/database";
import { SqliteTransactionRepository, type TransactionRepository } from "./db/transactionRepository";
import { createLogger, type Logger } from "./logger";
import { TransactionService } from "./transactions/service";

/** Everything a request handler may touch; built once per process (or per test). */
export type AppContext = {
  config: AppConfig;
  log: Logger;
  db: SqliteDatabase;
  repo: TransactionRepository;
  classifier: ExpenseClassifier;
  service: TransactionService;
  now: () => Date;
};

export function createContext(
  config: AppConfig,
  opts: { now?: () => Date; classifier?: ExpenseClassifier } = {},
): AppContext {
  const now = opts.now ?? (() => new Date());
  const log = createLogger("finance", config.LOG_LEVEL);
  const db = openDatabase(config.DB_PATH, log.child("db"));
  const repo = new SqliteTransactionRepository(db, { now });
  const classifier = opts.classifier ?? createDefaultClassifier();
  const service = new TransactionService({
    repo,
    classifier,
    defaultCurrency: config.DEFAULT_CURRENCY,
    maxReceiptBytes: config.MAX_RECEIPT_BYTES,
  });
  return { config, log, db, repo, classifier, service, now };
}

export function closeContext(ctx: AppContext) {
  if (ctx.db.open) ctx.db.close();
}
