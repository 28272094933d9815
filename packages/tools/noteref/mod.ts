// Main module exports for noteref

// ============================================================================
// Domain entities
// ============================================================================

export * from "./types.js";
export {
  DAILY_DIR,
  DAILY_INDEX_FILE,
  DEFAULT_TASK_FILE,
  NOTE_DIR,
} from "./domain/entities/collection.js";

// ============================================================================
// Domain ports (interfaces)
// ============================================================================

export type { Clock } from "./domain/ports/clock.js";
export type { DirEntry, FileSystem } from "./domain/ports/filesystem.js";
export type { LedgerRepository } from "./domain/ports/ledger-repository.js";
export type { NoteTree } from "./domain/ports/note-tree.js";
export type { SlugService } from "./domain/ports/slug-service.js";
export type { YamlService } from "./domain/ports/yaml-service.js";

// ============================================================================
// Use cases
// ============================================================================

export { ParseReferenceUseCase } from "./domain/use-cases/reference/parse-reference.js";
export { ResolutionRuleChain } from "./domain/use-cases/reference/resolution-rules.js";
export {
  ResolveReferenceUseCase,
  resolveUnique,
  selectPaths,
} from "./domain/use-cases/reference/resolve-reference.js";
export { ParseLedgerUseCase } from "./domain/use-cases/ledger/parse-ledger.js";
export { AddTaskUseCase } from "./domain/use-cases/task/add-task.js";
export { TakeTaskUseCase } from "./domain/use-cases/task/take-task.js";
export { CommentTaskUseCase } from "./domain/use-cases/task/comment-task.js";
export { ReleaseTaskUseCase } from "./domain/use-cases/task/release-task.js";
export { ListTasksUseCase, NO_OWNER } from "./domain/use-cases/task/list-tasks.js";
export { CreateDailyNoteUseCase } from "./domain/use-cases/note/create-daily-note.js";
export { CreatePermanentNoteUseCase } from "./domain/use-cases/note/create-permanent-note.js";
export { PrintNoteUseCase } from "./domain/use-cases/note/print-note.js";
export { ListNotesUseCase } from "./domain/use-cases/note/list-notes.js";

// ============================================================================
// Adapters
// ============================================================================

export { NodeFileSystem } from "./adapters/filesystem/node-fs.js";
export { InMemoryFileSystem } from "./adapters/filesystem/in-memory-fs.js";
export { FileSystemNoteTree } from "./adapters/filesystem/note-tree.js";
export { Sha256SlugService } from "./adapters/services/sha256-slug.js";
export { SystemClock } from "./adapters/services/system-clock.js";
export { YamlParserService } from "./adapters/services/yaml-parser.js";
export { MarkdownLedgerRepository } from "./adapters/repositories/markdown-ledger-repo.js";
export { createLogger } from "./adapters/logging/logger.js";
export { type Config, loadConfig } from "./config.js";

// ============================================================================
// CLI
// ============================================================================

export { main } from "./cli.js";

// ============================================================================
// Functional API over the local filesystem
// ============================================================================

import { NodeFileSystem } from "./adapters/filesystem/node-fs.js";
import { FileSystemNoteTree } from "./adapters/filesystem/note-tree.js";
import { silentLogger } from "./adapters/logging/logger.js";
import { MarkdownLedgerRepository } from "./adapters/repositories/markdown-ledger-repo.js";
import { Sha256SlugService } from "./adapters/services/sha256-slug.js";
import { YamlParserService } from "./adapters/services/yaml-parser.js";
import { ParseLedgerUseCase } from "./domain/use-cases/ledger/parse-ledger.js";
import { ParseReferenceUseCase } from "./domain/use-cases/reference/parse-reference.js";
import { ResolutionRuleChain } from "./domain/use-cases/reference/resolution-rules.js";
import { ResolveReferenceUseCase } from "./domain/use-cases/reference/resolve-reference.js";
import type {
  AmbiguityOutcome,
  QueryShape,
  ResolutionContext,
} from "./domain/entities/reference.js";
import type { TaskLedger } from "./domain/entities/ledger.js";

const nodeFs = new NodeFileSystem();
const slugService = new Sha256SlugService();
const tree = new FileSystemNoteTree(nodeFs);
const parser = new ParseReferenceUseCase(slugService);
const resolver = new ResolveReferenceUseCase(
  parser,
  new ResolutionRuleChain(tree, slugService),
  tree,
);
const ledgerRepo = new MarkdownLedgerRepository(
  nodeFs,
  new ParseLedgerUseCase(new YamlParserService()),
  silentLogger(),
);

/** Classify a raw reference (total, no disk access). */
export function parseReference(raw: string): QueryShape {
  return parser.execute({ raw });
}

/** Resolve a raw reference against the local filesystem. */
export async function resolveReference(
  raw: string,
  context: ResolutionContext,
): Promise<AmbiguityOutcome> {
  return (await resolver.execute({ raw, context })).outcome;
}

/** Search context for the collection rooted at `root`. */
export function resolutionContext(
  root: string,
  todayDate: string,
): Promise<ResolutionContext> {
  return resolver.contextFor(root, todayDate);
}

export function loadLedger(path: string): Promise<TaskLedger> {
  return ledgerRepo.load(path);
}

export function saveLedger(ledger: TaskLedger, path: string): Promise<void> {
  return ledgerRepo.save(ledger, path);
}
