#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { Command, CommanderError } from "commander";
import { NoteError } from "./domain/entities/errors.js";
import type { FileSystem } from "./domain/ports/filesystem.js";
import { type CommandDeps, createCommands } from "./adapters/cli/commands.js";
import { formatError } from "./adapters/cli/formatter.js";
import { NodeFileSystem } from "./adapters/filesystem/node-fs.js";
import { createLogger } from "./adapters/logging/logger.js";
import { Sha256SlugService } from "./adapters/services/sha256-slug.js";
import { SystemClock } from "./adapters/services/system-clock.js";
import { YamlParserService } from "./adapters/services/yaml-parser.js";
import { type Env, loadConfig } from "./config.js";

// ============================================================================
// Version
// ============================================================================

const VERSION = "0.1.0";

// ============================================================================
// Runtime
// ============================================================================

export interface CliRuntime {
  readonly env: Env;
  readonly cwd: string;
  readonly fs: FileSystem;
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

function nodeRuntime(): CliRuntime {
  return {
    env: process.env,
    cwd: process.cwd(),
    fs: new NodeFileSystem(),
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  };
}

function handleError(e: unknown, json: boolean, runtime: CliRuntime): number {
  if (e instanceof NoteError) {
    runtime.stderr(
      `${json ? JSON.stringify(e.toJSON()) : formatError(e)}\n`,
    );
    return 1;
  }
  if (e instanceof CommanderError) {
    return e.exitCode;
  }
  throw e;
}

// ============================================================================
// Main CLI
// ============================================================================

export function buildProgram(deps: CommandDeps, runtime: CliRuntime): Command {
  const { resolveCmd, dailyCmd, noteCmd, printCmd, listCmd, taskCmd } =
    createCommands(deps);

  const program = new Command()
    .name("noteref")
    .version(VERSION)
    .description(
      "noteref - Resolve short note references and track tasks over a note collection\n\n" +
        "Layout of a collection:\n" +
        "  #daily/YYYYMMDD/HHmmSS-title.md   daily notes\n" +
        "  note/title.md, note/<hash>/...    permanent notes\n" +
        "  #tag.md, #daily.md                index files\n" +
        "  TASK.md                           task ledger\n\n" +
        "Examples:\n" +
        "  noteref resolve 22                # today's note starting at 22h\n" +
        "  noteref resolve 20260212/some     # title prefix in a given day\n" +
        "  noteref print 143022              # print a note's content\n" +
        "  noteref list 20260212             # list a day's notes\n" +
        "  noteref task add 143022           # register a note as a task\n" +
        "  noteref task take task-1 --title 'Implement X'",
    )
    .option("--home <dir>", "collection root (default: $NOTEREF_HOME or cwd)")
    .option("--agent <name>", "agent identity (default: $NOTEREF_AGENT_NAME)")
    .addCommand(resolveCmd)
    .addCommand(dailyCmd)
    .addCommand(noteCmd)
    .addCommand(printCmd)
    .addCommand(listCmd)
    .addCommand(taskCmd)
    .configureOutput({
      writeOut: runtime.stdout,
      writeErr: runtime.stderr,
    })
    .exitOverride();

  // Subcommands report usage errors through the same streams.
  for (const cmd of program.commands) {
    cmd.configureOutput({ writeOut: runtime.stdout, writeErr: runtime.stderr });
    cmd.exitOverride();
    for (const sub of cmd.commands) {
      sub.configureOutput({
        writeOut: runtime.stdout,
        writeErr: runtime.stderr,
      });
      sub.exitOverride();
    }
  }
  return program;
}

/**
 * Run the CLI with `args` (no node/script prefix). Resolves to the process
 * exit code.
 */
export async function main(
  args: string[],
  runtime: CliRuntime = nodeRuntime(),
): Promise<number> {
  const json = args.includes("--json");
  try {
    const config = loadConfig(runtime.env, runtime.cwd);
    const program = buildProgram(
      {
        fs: runtime.fs,
        slugService: new Sha256SlugService(),
        yamlService: new YamlParserService(),
        clock: new SystemClock(config.timestamp),
        config,
        logger: createLogger(config.logLevel),
        out: (text) => runtime.stdout(`${text}\n`),
      },
      runtime,
    );
    if (args.length === 0) {
      program.outputHelp();
      return 0;
    }
    await program.parseAsync(args, { from: "user" });
    return 0;
  } catch (e) {
    return handleError(e, json, runtime);
  }
}

// Run if executed directly (npm links the bin through a symlink)
function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  process.exitCode = await main(process.argv.slice(2));
}
