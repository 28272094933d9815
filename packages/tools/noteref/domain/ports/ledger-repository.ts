// Ledger repository port - persistence interface for the task ledger

import type { TaskLedger } from "../entities/ledger.js";

export interface LedgerRepository {
  /** Load and parse the ledger. Returns the default document when absent. */
  load(path: string): Promise<TaskLedger>;

  /** Serialize and write the whole ledger in a single write. */
  save(ledger: TaskLedger, path: string): Promise<void>;

  /** Serialize without writing (dry runs). */
  render(ledger: TaskLedger): string;
}
