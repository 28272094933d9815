/**
 * Use Case: ParseLedger
 *
 * Round-trips the task ledger between text and the TaskLedger model.
 *
 * Layout, split on horizontal rules (`---` / `***` alone on a line):
 *
 *   ---            meta open (only when on the first line)
 *   PREFIX: task-
 *   ---            meta close
 *   description    (only when two or more rules follow the meta block)
 *   ---
 *   body           entries, headings, free text
 *   ---            last rule: reference block follows
 *   [task-1]: 20260212/some-note
 *
 * Lines the parser does not understand are kept verbatim in place.
 *
 * Dependencies: YamlService (port), zod/mini for the meta block.
 */

import { z } from "zod/mini";
import { NoteError } from "../../entities/errors.js";
import {
  type BodyNode,
  DEFAULT_TASK_PREFIX,
  type LedgerLayout,
  type ReferenceNode,
  type TaskComment,
  type TaskEntry,
  type TaskLedger,
} from "../../entities/ledger.js";
import type { YamlService } from "../../ports/yaml-service.js";

export interface ParseLedgerInput {
  readonly content: string;
}

const LedgerMetaSchema = z.object({
  PREFIX: z.optional(z.string().check(z.minLength(1))),
});

const RULE_RE = /^(?:---|\*\*\*)$/;
const HEADING_RE = /^(#{1,6})\s+(.*?)\s*#*\s*$/;
const ENTRY_RE =
  /^- \[([ xX])\] \[([^\]]*)\](?:\[([^\]]+)\])?(?:\s+@(\S+))?\s*$/;
const DEFINITION_RE = /^\[([^\]]+)\]:[ \t]*(.*?)[ \t]*$/;
const COMMENT_RE = /^(\s+)(- )?(.*)$/;
const COMMENT_TIMESTAMP_RE = /^(\d{4}-\d{2}-\d{2} \d{2}:\d{2})(?: (.*))?$/;
const COMMENT_HASH_RE = /^(?:(.*) )?\[([0-9a-fA-F]{4,40})\]$/;

function isRule(line: string): boolean {
  return RULE_RE.test(line.trim());
}

function isDefinition(line: string): boolean {
  const m = DEFINITION_RE.exec(line.trim());
  return m !== null && m[2] !== "";
}

export function parseComment(line: string): TaskComment | null {
  const m = COMMENT_RE.exec(line);
  if (!m || line.trim() === "") return null;
  let rest = m[3];
  let timestamp: string | null = null;
  let hash: string | null = null;

  const ts = COMMENT_TIMESTAMP_RE.exec(rest);
  if (ts) {
    timestamp = ts[1];
    rest = ts[2] ?? "";
  }
  const h = COMMENT_HASH_RE.exec(rest);
  if (h) {
    hash = h[2];
    rest = h[1] ?? "";
  }

  return { indent: m[1], bullet: m[2] !== undefined, timestamp, text: rest, hash };
}

export function formatComment(comment: TaskComment): string {
  const parts: string[] = [];
  if (comment.timestamp) parts.push(comment.timestamp);
  if (comment.text) parts.push(comment.text);
  if (comment.hash) parts.push(`[${comment.hash}]`);
  return `${comment.indent}${comment.bullet ? "- " : ""}${parts.join(" ")}`;
}

export function formatEntry(entry: TaskEntry): string[] {
  const checkbox = entry.done ? "[x]" : "[ ]";
  const link = entry.title !== null
    ? `[${entry.title}][${entry.id}]`
    : `[${entry.id}]`;
  const owner = entry.owner ? ` @${entry.owner}` : "";
  return [
    `- ${checkbox} ${link}${owner}`,
    ...entry.comments.map(formatComment),
  ];
}

export class ParseLedgerUseCase {
  constructor(private readonly yamlService: YamlService) {}

  execute(input: ParseLedgerInput): TaskLedger {
    let text = input.content.replace(/\r\n/g, "\n");
    const trailingNewline = text.endsWith("\n");
    if (trailingNewline) text = text.slice(0, -1);
    const lines = text === "" ? [] : text.split("\n");

    const rules: number[] = [];
    lines.forEach((line, i) => {
      if (isRule(line)) rules.push(i);
    });

    let metaRules: LedgerLayout["metaRules"] = null;
    let metaLines: string[] = [];
    let description: string[] = [];
    let descriptionRule: string | null = null;
    let referenceRule: string | null = null;
    let bodyStart = 0;
    let remaining = rules;

    if (rules.length >= 2 && rules[0] === 0) {
      metaRules = { open: lines[0], close: lines[rules[1]] };
      metaLines = lines.slice(1, rules[1]);
      bodyStart = rules[1] + 1;
      remaining = rules.slice(2);
      if (remaining.length >= 2) {
        description = lines.slice(bodyStart, remaining[0]);
        descriptionRule = lines[remaining[0]];
        bodyStart = remaining[0] + 1;
        remaining = remaining.slice(1);
      }
    }

    let bodyLines: string[];
    let referenceLines: string[];
    if (remaining.length > 0) {
      const last = remaining[remaining.length - 1];
      bodyLines = lines.slice(bodyStart, last);
      referenceRule = lines[last];
      referenceLines = lines.slice(last + 1);
    } else {
      const split = this.trailingReferenceStart(lines, bodyStart);
      bodyLines = lines.slice(bodyStart, split);
      referenceLines = lines.slice(split);
    }

    const prefix = this.parsePrefix(metaLines);
    const references = this.parseReferences(referenceLines);
    const defined = new Set<string>();
    for (const node of references) {
      if (node.kind === "definition") defined.add(node.id);
    }

    return {
      meta: { lines: metaLines, prefix },
      description,
      body: this.parseBody(bodyLines, defined),
      references,
      layout: { metaRules, descriptionRule, referenceRule, trailingNewline },
    };
  }

  serialize(ledger: TaskLedger): string {
    const out: string[] = [];
    const { layout } = ledger;

    if (layout.metaRules) {
      out.push(layout.metaRules.open, ...ledger.meta.lines, layout.metaRules.close);
    }
    if (layout.descriptionRule !== null) {
      out.push(...ledger.description, layout.descriptionRule);
    }
    for (const node of ledger.body) {
      if (node.kind === "entry") {
        out.push(...formatEntry(node.entry));
      } else {
        out.push(node.line);
      }
    }
    if (layout.referenceRule !== null) {
      out.push(layout.referenceRule);
    }
    for (const node of ledger.references) {
      out.push(node.kind === "definition" ? `[${node.id}]: ${node.target}` : node.line);
    }

    const text = out.join("\n");
    return layout.trailingNewline ? `${text}\n` : text;
  }

  private parsePrefix(metaLines: readonly string[]): string {
    const parsed = LedgerMetaSchema.safeParse(
      this.yamlService.parse(metaLines.join("\n")),
    );
    if (!parsed.success) {
      throw new NoteError(
        "malformed_ledger",
        "Ledger meta block: PREFIX must be a non-empty string",
      );
    }
    return parsed.data.PREFIX ?? DEFAULT_TASK_PREFIX;
  }

  /**
   * Without a reference rule, a trailing run of definitions (blank lines
   * allowed) forms the reference block. Returns the index where it starts.
   */
  private trailingReferenceStart(lines: readonly string[], from: number): number {
    let start = lines.length;
    while (
      start > from &&
      (lines[start - 1].trim() === "" || isDefinition(lines[start - 1]))
    ) {
      start--;
    }
    while (start < lines.length && lines[start].trim() === "") start++;
    return start < lines.length ? start : lines.length;
  }

  private parseReferences(lines: readonly string[]): ReferenceNode[] {
    const nodes: ReferenceNode[] = [];
    const seen = new Set<string>();
    for (const line of lines) {
      const m = DEFINITION_RE.exec(line.trim());
      if (!m || m[2] === "") {
        nodes.push({ kind: "text", line });
        continue;
      }
      const id = m[1];
      if (seen.has(id)) {
        throw new NoteError(
          "duplicate_id",
          `Task id '${id}' is defined more than once in the reference block`,
        );
      }
      seen.add(id);
      nodes.push({ kind: "definition", id, target: m[2] });
    }
    return nodes;
  }

  private parseBody(
    lines: readonly string[],
    defined: ReadonlySet<string>,
  ): BodyNode[] {
    const nodes: BodyNode[] = [];
    const seen = new Set<string>();
    let i = 0;

    while (i < lines.length) {
      const line = lines[i];
      const entry = this.parseEntryLine(line, defined);
      if (entry) {
        if (seen.has(entry.id)) {
          throw new NoteError(
            "duplicate_id",
            `Task id '${entry.id}' appears more than once in the body`,
          );
        }
        seen.add(entry.id);
        i++;
        const comments: TaskComment[] = [];
        while (i < lines.length) {
          const comment = /^\s/.test(lines[i]) ? parseComment(lines[i]) : null;
          if (!comment) break;
          comments.push(comment);
          i++;
        }
        nodes.push({ kind: "entry", entry: { ...entry, comments } });
        continue;
      }

      const heading = HEADING_RE.exec(line);
      if (heading) {
        nodes.push({
          kind: "heading",
          level: heading[1].length,
          title: heading[2],
          line,
        });
      } else {
        nodes.push({ kind: "text", line });
      }
      i++;
    }
    return nodes;
  }

  private parseEntryLine(
    line: string,
    defined: ReadonlySet<string>,
  ): TaskEntry | null {
    const m = ENTRY_RE.exec(line);
    if (!m) return null;
    const done = m[1] !== " ";
    const owner = m[4] ?? null;

    if (m[3] === undefined) {
      // Shortcut form `- [ ] [id]`: an entry only when the id is defined.
      if (!defined.has(m[2])) return null;
      return { id: m[2], title: null, done, owner, comments: [] };
    }

    if (!defined.has(m[3])) {
      throw new NoteError(
        "malformed_ledger",
        `Task entry '${m[3]}' has no reference definition`,
      );
    }
    return {
      id: m[3],
      title: m[2] === "" ? null : m[2],
      done,
      owner,
      comments: [],
    };
  }
}
