/**
 * Adapter: MarkdownLedgerRepository
 *
 * Implements the LedgerRepository port over a FileSystem and the ledger
 * parser. A missing file loads as the default document; saving writes the
 * whole document in one call.
 *
 * Dependencies:
 *   - FileSystem (port) for file operations
 *   - ParseLedgerUseCase for parsing/serialization
 *   - pino logger for debug diagnostics
 */

import {
  DEFAULT_LEDGER_TEXT,
  type TaskLedger,
} from "../../domain/entities/ledger.js";
import type { FileSystem } from "../../domain/ports/filesystem.js";
import type { LedgerRepository } from "../../domain/ports/ledger-repository.js";
import type { ParseLedgerUseCase } from "../../domain/use-cases/ledger/parse-ledger.js";
import type { Logger } from "../logging/logger.js";

export class MarkdownLedgerRepository implements LedgerRepository {
  constructor(
    private readonly fs: FileSystem,
    private readonly parser: ParseLedgerUseCase,
    private readonly logger: Logger,
  ) {}

  async load(path: string): Promise<TaskLedger> {
    if (!(await this.fs.exists(path))) {
      this.logger.debug({ path }, "ledger missing, using default document");
      return this.parser.execute({ content: DEFAULT_LEDGER_TEXT });
    }
    const content = await this.fs.readFile(path);
    const ledger = this.parser.execute({ content });
    this.logger.debug(
      { path, body: ledger.body.length, references: ledger.references.length },
      "ledger loaded",
    );
    return ledger;
  }

  async save(ledger: TaskLedger, path: string): Promise<void> {
    await this.fs.writeFile(path, this.render(ledger));
    this.logger.debug({ path }, "ledger saved");
  }

  render(ledger: TaskLedger): string {
    return this.parser.serialize(ledger);
  }
}
