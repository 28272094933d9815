// Environment configuration for noteref, validated once at startup

import { z } from "zod/mini";
import { DEFAULT_TASK_FILE } from "./domain/entities/collection.js";
import { NoteError } from "./domain/entities/errors.js";
import { LOG_LEVELS, type LogLevel } from "./adapters/logging/logger.js";
import { parseTimestampOverride } from "./adapters/services/system-clock.js";

export type Env = Readonly<Record<string, string | undefined>>;

export interface Config {
  readonly home: string;
  readonly taskFile: string;
  readonly agent: string | null;
  readonly timestamp: Date | null;
  readonly logLevel: LogLevel;
}

const EnvSchema = z.object({
  NOTEREF_HOME: z.optional(z.string()),
  NOTEREF_TASKFILE: z.optional(z.string()),
  NOTEREF_AGENT_NAME: z.optional(
    z.string().check(z.regex(/^\S+$/, "must not contain whitespace")),
  ),
  NOTEREF_TIMESTAMP: z.optional(
    z.string().check(
      z.regex(
        /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}(?::\d{2})?$/,
        "expected YYYY-MM-DD HH:MM[:SS]",
      ),
    ),
  ),
  NOTEREF_LOG_LEVEL: z.optional(z.enum(LOG_LEVELS)),
});

/** Agent names are single tokens written after `@` in the ledger. */
export function validateAgentName(name: string): string {
  if (!/^\S+$/.test(name)) {
    throw new NoteError(
      "invalid_args",
      `Invalid agent name '${name}': must be non-empty and contain no whitespace`,
    );
  }
  return name;
}

/**
 * Read noteref settings from an environment map. Empty variables count as
 * unset.
 */
export function loadConfig(env: Env, cwd: string = process.cwd()): Config {
  const present: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) present[key] = value;
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.map(String).join(".") : "environment";
    const message = issue ? issue.message : "invalid value";
    throw new NoteError("invalid_args", `Invalid ${where}: ${message}`);
  }

  const vars = parsed.data;
  return {
    home: vars.NOTEREF_HOME ?? cwd,
    taskFile: vars.NOTEREF_TASKFILE ?? DEFAULT_TASK_FILE,
    agent: vars.NOTEREF_AGENT_NAME ?? null,
    timestamp: vars.NOTEREF_TIMESTAMP
      ? parseTimestampOverride(vars.NOTEREF_TIMESTAMP)
      : null,
    logLevel: vars.NOTEREF_LOG_LEVEL ?? "warn",
  };
}
