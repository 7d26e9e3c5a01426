import type { TransactionRepository } from "../db/transactionRepository";
import type { TransactionService } from "../transactions/service";
import sampleRows from "./sampleData.json";

/** Replaces every stored transaction with the bundled demo set. */
export function loadSampleData(repo: TransactionRepository, service: TransactionService): number {
  const items = sampleRows.map((row) => service.validate(row));
  return repo.replaceAll(items).length;
}
