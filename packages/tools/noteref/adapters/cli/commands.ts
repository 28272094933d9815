/**
 * CLI commands for noteref.
 *
 * Wires commander commands to use cases, adapters, and formatters.
 * Ledger commands: load -> run use case -> save (or print on --dry-run) -> format output.
 * Errors are thrown to the caller of `parseAsync`; `main` turns them into
 * exit codes.
 */

import { join } from "node:path";
import { Command } from "commander";
import { NoteError } from "../../domain/entities/errors.js";
import {
  isValidTaskStatus,
  type TaskLedger,
  type TaskView,
} from "../../domain/entities/ledger.js";
import type { Clock } from "../../domain/ports/clock.js";
import type { FileSystem } from "../../domain/ports/filesystem.js";
import type { SlugService } from "../../domain/ports/slug-service.js";
import type { YamlService } from "../../domain/ports/yaml-service.js";
import {
  formatComment,
  ParseLedgerUseCase,
} from "../../domain/use-cases/ledger/parse-ledger.js";
import { CreateDailyNoteUseCase } from "../../domain/use-cases/note/create-daily-note.js";
import { CreatePermanentNoteUseCase } from "../../domain/use-cases/note/create-permanent-note.js";
import { ListNotesUseCase } from "../../domain/use-cases/note/list-notes.js";
import { PrintNoteUseCase } from "../../domain/use-cases/note/print-note.js";
import { ParseReferenceUseCase } from "../../domain/use-cases/reference/parse-reference.js";
import { ResolutionRuleChain } from "../../domain/use-cases/reference/resolution-rules.js";
import {
  type ResolveReferenceResult,
  ResolveReferenceUseCase,
  selectPaths,
} from "../../domain/use-cases/reference/resolve-reference.js";
import { AddTaskUseCase } from "../../domain/use-cases/task/add-task.js";
import { CommentTaskUseCase } from "../../domain/use-cases/task/comment-task.js";
import { ListTasksUseCase } from "../../domain/use-cases/task/list-tasks.js";
import { ReleaseTaskUseCase } from "../../domain/use-cases/task/release-task.js";
import { TakeTaskUseCase } from "../../domain/use-cases/task/take-task.js";
import type { Config } from "../../config.js";
import { validateAgentName } from "../../config.js";
import { FileSystemNoteTree } from "../filesystem/note-tree.js";
import type { Logger } from "../logging/logger.js";
import { MarkdownLedgerRepository } from "../repositories/markdown-ledger-repo.js";
import {
  formatTaskList,
  formatTaskLog,
  formatTaskOneline,
  formatTaskShow,
} from "./formatter.js";

// ============================================================================
// Dependencies container
// ============================================================================

export interface CommandDeps {
  readonly fs: FileSystem;
  readonly slugService: SlugService;
  readonly yamlService: YamlService;
  readonly clock: Clock;
  readonly config: Config;
  readonly logger: Logger;
  /** Writes one block of command output (a trailing newline is added). */
  readonly out: (text: string) => void;
}

type GlobalOptions = {
  home?: string;
  agent?: string;
};

interface JsonOption {
  json?: boolean;
}

interface DryRunOption extends JsonOption {
  dryRun?: boolean;
}

// ============================================================================
// Command factories
// ============================================================================

export function createCommands(deps: CommandDeps) {
  const { fs, slugService, yamlService, clock, config, logger, out } = deps;

  // Instantiate use cases
  const tree = new FileSystemNoteTree(fs);
  const parseReference = new ParseReferenceUseCase(slugService);
  const ruleChain = new ResolutionRuleChain(tree, slugService);
  const resolveReference = new ResolveReferenceUseCase(
    parseReference,
    ruleChain,
    tree,
  );
  const ledgerRepo = new MarkdownLedgerRepository(
    fs,
    new ParseLedgerUseCase(yamlService),
    logger,
  );
  const addTask = new AddTaskUseCase(resolveReference);
  const takeTask = new TakeTaskUseCase(clock);
  const commentTask = new CommentTaskUseCase(clock);
  const releaseTask = new ReleaseTaskUseCase();
  const listTasks = new ListTasksUseCase();
  const createDaily = new CreateDailyNoteUseCase(fs, slugService, clock);
  const createPermanent = new CreatePermanentNoteUseCase(
    fs,
    slugService,
    clock,
  );
  const printNote = new PrintNoteUseCase(resolveReference, tree);
  const listNotes = new ListNotesUseCase(tree, slugService);

  // ========================================================================
  // Helpers
  // ========================================================================

  function globals(cmd: Command): GlobalOptions {
    return cmd.optsWithGlobals<GlobalOptions>();
  }

  function homeOf(cmd: Command): string {
    return globals(cmd).home ?? config.home;
  }

  function agentOf(cmd: Command): string | null {
    const flag = globals(cmd).agent;
    return flag !== undefined ? validateAgentName(flag) : config.agent;
  }

  function ledgerPath(cmd: Command): string {
    return join(homeOf(cmd), config.taskFile);
  }

  function print(value: unknown, json: boolean | undefined, text: string) {
    out(json ? JSON.stringify(value) : text);
  }

  /** Persist a mutated ledger, or print it instead on a dry run. */
  async function commit(
    ledger: TaskLedger,
    path: string,
    dryRun: boolean | undefined,
  ): Promise<boolean> {
    if (dryRun) {
      out(ledgerRepo.render(ledger).replace(/\n$/, ""));
      return false;
    }
    await ledgerRepo.save(ledger, path);
    return true;
  }

  async function resolve(
    home: string,
    ref: string | undefined,
    source: string | undefined,
  ): Promise<ResolveReferenceResult> {
    const context = await resolveReference.contextFor(home, clock.now().date);
    let result: ResolveReferenceResult;
    if (source !== undefined) {
      result = await resolveReference.executeSource(source, context);
    } else if (ref !== undefined) {
      result = await resolveReference.execute({ raw: ref, context });
    } else {
      throw new NoteError(
        "invalid_args",
        "Provide a note reference or --source <text>",
      );
    }
    logger.debug(
      {
        reference: ref ?? source,
        shape: result.shape.kind,
        rules: ruleChain.ruleNames(result.shape.kind),
        outcome: result.outcome.kind,
        candidates: result.candidates.length,
      },
      "reference resolved",
    );
    return result;
  }

  // ========================================================================
  // Note commands
  // ========================================================================

  const resolveCmd = new Command("resolve")
    .description("Resolve a short note reference to file path(s)")
    .argument("[ref]", "reference: HHmmSS prefix, YYYYMMDD/prefix, timestamp or title")
    .option("--source <text>", "look up permanent notes filed under a source string")
    .option("--force", "print every candidate instead of failing on ambiguity")
    .option("--json", "Output as JSON")
    .action(
      async (
        ref: string | undefined,
        options: JsonOption & { source?: string; force?: boolean },
        cmd: Command,
      ) => {
        const result = await resolve(homeOf(cmd), ref, options.source);
        const reference = options.source ?? ref ?? "";
        const paths = selectPaths(result.outcome, reference, {
          force: options.force,
        });
        print(
          {
            reference,
            shape: result.shape.kind,
            outcome: result.outcome.kind,
            paths,
            rule: result.candidates[0]?.rule ?? null,
          },
          options.json,
          paths.join("\n"),
        );
      },
    );

  const dailyCmd = new Command("daily")
    .description("Create a daily note for the current time")
    .argument("[title...]", "note title")
    .option("--json", "Output as JSON")
    .action(async (title: string[], options: JsonOption, cmd: Command) => {
      const output = await createDaily.execute({
        root: homeOf(cmd),
        title: title.join(" "),
      });
      logger.debug({ path: output.path }, "daily note created");
      print(output, options.json, output.path);
    });

  const noteCmd = new Command("note")
    .description("Create a permanent note")
    .argument("[title...]", "note title")
    .option("--source <text>", "file the note under the hash of a source string")
    .option("--json", "Output as JSON")
    .action(
      async (
        title: string[],
        options: JsonOption & { source?: string },
        cmd: Command,
      ) => {
        const output = await createPermanent.execute({
          root: homeOf(cmd),
          title: title.join(" "),
          source: options.source,
        });
        logger.debug({ path: output.path }, "permanent note created");
        print(output, options.json, output.path);
      },
    );

  const printCmd = new Command("print")
    .description("Print the content of the note a reference resolves to")
    .argument("<ref>", "note reference; must resolve to exactly one note")
    .option("--json", "Output as JSON")
    .action(async (ref: string, options: JsonOption, cmd: Command) => {
      const context = await resolveReference.contextFor(
        homeOf(cmd),
        clock.now().date,
      );
      const output = await printNote.execute({ raw: ref, context });
      logger.debug({ path: output.path }, "note printed");
      print(output, options.json, output.content.replace(/\n$/, ""));
    });

  const listCmd = new Command("list")
    .description("List permanent notes, a day, a source directory or a tag index")
    .argument("[filter]", "YYYYMMDD, #daily, #tag or a source string")
    .option("--json", "Output as JSON")
    .action(
      async (filter: string | undefined, options: JsonOption, cmd: Command) => {
        const output = await listNotes.execute({ root: homeOf(cmd), filter });
        if (output.kind === "index") {
          print(output, options.json, output.content.replace(/\n$/, ""));
          return;
        }
        const text = output.names.length > 0
          ? output.names.join("\n")
          : "No notes";
        print(output, options.json, text);
      },
    );

  // ========================================================================
  // Task commands
  // ========================================================================

  const taskAddCmd = new Command("add")
    .description("Register a note as a backlog task (idempotent per node_ref)")
    .argument("<node_ref>", "note reference; must resolve to exactly one note")
    .option("--json", "Output as JSON")
    .action(async (nodeRef: string, options: JsonOption, cmd: Command) => {
      const home = homeOf(cmd);
      const path = ledgerPath(cmd);
      const ledger = await ledgerRepo.load(path);
      const context = await resolveReference.contextFor(
        home,
        clock.now().date,
      );
      const output = await addTask.execute({ ledger, nodeRef, context });
      if (output.created) {
        await ledgerRepo.save(output.ledger, path);
      }
      print(
        {
          id: output.id,
          created: output.created,
          node_ref: nodeRef.trim(),
          path: output.path,
        },
        options.json,
        output.id,
      );
    });

  const taskTakeCmd = new Command("take")
    .description("Take ownership of a task and mark it in progress")
    .argument("<id>", "task id")
    .option("--title <title>", "task title (recorded as a comment if one exists)")
    .option("--header <header>", "place the entry under this body heading")
    .option("--dry-run", "print the resulting ledger without writing it")
    .option("--json", "Output as JSON")
    .action(
      async (
        id: string,
        options: DryRunOption & { title?: string; header?: string },
        cmd: Command,
      ) => {
        const path = ledgerPath(cmd);
        const output = takeTask.execute({
          ledger: await ledgerRepo.load(path),
          id,
          title: options.title,
          header: options.header,
          agent: agentOf(cmd),
        });
        if (await commit(output.ledger, path, options.dryRun)) {
          print(output.task, options.json, formatTaskOneline(output.task));
        }
      },
    );

  const taskCommentCmd = new Command("comment")
    .description("Append a timestamped comment to an in-progress task")
    .argument("<id>", "task id")
    .argument("<text...>", "comment text")
    .option("--git <hash>", "reference a commit hash")
    .option("--dry-run", "print the resulting ledger without writing it")
    .option("--json", "Output as JSON")
    .action(
      async (
        id: string,
        text: string[],
        options: DryRunOption & { git?: string },
        cmd: Command,
      ) => {
        const path = ledgerPath(cmd);
        const output = commentTask.execute({
          ledger: await ledgerRepo.load(path),
          id,
          text: text.join(" "),
          gitHash: options.git,
        });
        if (await commit(output.ledger, path, options.dryRun)) {
          print(
            { id, comment: output.comment },
            options.json,
            `${id}: ${
              formatComment({ ...output.comment, indent: "", bullet: false })
            }`,
          );
        }
      },
    );

  const taskReleaseCmd = new Command("release")
    .description("Release ownership of task(s), optionally marking them done")
    .argument("<ids...>", "task ids")
    .option("--done", "mark the task(s) done")
    .option("--force", "release a task that has no owner (single id only)")
    .option("--dry-run", "print the resulting ledger without writing it")
    .option("--json", "Output as JSON")
    .action(
      async (
        ids: string[],
        options: DryRunOption & { done?: boolean; force?: boolean },
        cmd: Command,
      ) => {
        const path = ledgerPath(cmd);
        const output = releaseTask.execute({
          ledger: await ledgerRepo.load(path),
          ids,
          done: options.done,
          force: options.force,
        });
        if (await commit(output.ledger, path, options.dryRun)) {
          print(
            output.tasks,
            options.json,
            output.tasks.map(formatTaskOneline).join("\n"),
          );
        }
      },
    );

  const taskListCmd = new Command("list")
    .description("List tasks with their computed status")
    .option("--status <status>", "backlog, doing or done")
    .option("--owner <agent>", "filter by owner; '(none)' for unowned tasks")
    .option("--oneline", "one line per task, no grouping")
    .option("--json", "Output as JSON")
    .action(
      async (
        options: JsonOption & {
          status?: string;
          owner?: string;
          oneline?: boolean;
        },
        cmd: Command,
      ) => {
        const ledger = await ledgerRepo.load(ledgerPath(cmd));
        const filter = options.status;
        let tasks: TaskView[];
        if (filter === undefined || isValidTaskStatus(filter)) {
          tasks = listTasks.execute({
            ledger,
            status: filter,
            owner: options.owner,
          });
        } else {
          logger.warn({ status: filter }, "unknown status filter, no task matches");
          tasks = [];
        }
        const text = options.oneline
          ? tasks.map(formatTaskOneline).join("\n")
          : formatTaskList(tasks);
        print(tasks, options.json, text);
      },
    );

  const taskShowCmd = new Command("show")
    .description("Show one task")
    .argument("<id>", "task id")
    .option("--json", "Output as JSON")
    .action(async (id: string, options: JsonOption, cmd: Command) => {
      const task = listTasks.show(await ledgerRepo.load(ledgerPath(cmd)), id);
      print(task, options.json, formatTaskShow(task));
    });

  const taskLogCmd = new Command("log")
    .description("Show the comments of a task")
    .argument("<id>", "task id")
    .option("--json", "Output as JSON")
    .action(async (id: string, options: JsonOption, cmd: Command) => {
      const task = listTasks.show(await ledgerRepo.load(ledgerPath(cmd)), id);
      print(task.comments, options.json, formatTaskLog(task));
    });

  const taskFindCmd = new Command("find")
    .description("Find tasks whose node_ref contains the given text")
    .argument("<node_ref>", "text to look for")
    .option("--json", "Output as JSON")
    .action(async (text: string, options: JsonOption, cmd: Command) => {
      const tasks = listTasks.find(
        await ledgerRepo.load(ledgerPath(cmd)),
        text,
      );
      print(
        tasks,
        options.json,
        tasks.length === 0 ? "No tasks" : tasks.map(formatTaskOneline).join("\n"),
      );
    });

  const taskCmd = new Command("task")
    .description("Manage the task ledger")
    .addCommand(taskAddCmd)
    .addCommand(taskTakeCmd)
    .addCommand(taskCommentCmd)
    .addCommand(taskReleaseCmd)
    .addCommand(taskListCmd)
    .addCommand(taskShowCmd)
    .addCommand(taskLogCmd)
    .addCommand(taskFindCmd);

  return {
    resolveCmd,
    dailyCmd,
    noteCmd,
    printCmd,
    listCmd,
    taskCmd,
  };
}
