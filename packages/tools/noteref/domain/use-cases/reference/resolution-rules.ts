/**
 * Resolution rule chain.
 *
 * Each query shape owns an ordered list of named rules. Rules run in order
 * and the first one that yields at least one path wins; candidates from
 * different rules are never merged.
 *
 * Dependencies: NoteTree (port), SlugService (port).
 */

import { dirname, join } from "node:path";
import type {
  Candidate,
  DayQuery,
  QueryShape,
  ResolutionContext,
  RuleName,
} from "../../entities/reference.js";
import type { NoteTree } from "../../ports/note-tree.js";
import type { SlugService } from "../../ports/slug-service.js";

type ShapeOf<K extends QueryShape["kind"]> = Extract<QueryShape, { kind: K }>;

type NamedRule<S> = {
  readonly name: RuleName;
  readonly find: (
    shape: S,
    context: ResolutionContext,
  ) => Promise<readonly string[]>;
};

const TIMED_STEM_RE = /^(\d{6})(?:-(.*))?$/;
const MARKDOWN_LINK_RE = /\[([^\]]*)\]\(([^)\s]+)\)/g;

/**
 * Title match inside a day directory: the whole stem, or the title part
 * after an `HHmmSS-` time prefix, starts with `text`.
 */
export function titleMatches(stem: string, text: string): boolean {
  if (stem.startsWith(text)) return true;
  const timed = TIMED_STEM_RE.exec(stem);
  return timed !== null && (timed[2] ?? "").startsWith(text);
}

export function matchesDayQuery(stem: string, query: DayQuery): boolean {
  switch (query.kind) {
    case "time_prefix":
      return stem.startsWith(query.digits);
    case "hybrid_timestamp": {
      const head = `${query.time}-`;
      return stem.startsWith(head) &&
        stem.slice(head.length).startsWith(query.titlePrefix);
    }
    case "title_prefix":
      return titleMatches(stem, query.text);
  }
}

export class ResolutionRuleChain {
  private readonly rules: {
    readonly [K in QueryShape["kind"]]: readonly NamedRule<ShapeOf<K>>[];
  };

  constructor(
    private readonly tree: NoteTree,
    private readonly slugService: SlugService,
  ) {
    this.rules = {
      date_prefix: [
        {
          name: "date_prefix",
          find: (s, ctx) =>
            this.findInDay(join(ctx.dailyRoot, s.date), s.inner),
        },
      ],
      full_timestamp: [
        {
          name: "full_timestamp_daily",
          find: (s, ctx) =>
            this.findInDay(join(ctx.dailyRoot, s.date), {
              kind: "time_prefix",
              digits: s.time,
            }),
        },
        {
          name: "full_timestamp_permanent",
          find: (s, ctx) =>
            this.findInPermanent(ctx.permanentRoot, `${s.date}${s.time}`, true),
        },
      ],
      time_prefix: [
        {
          name: "time_prefix",
          find: (s, ctx) =>
            this.findInDay(join(ctx.dailyRoot, ctx.todayDate), s),
        },
      ],
      hybrid_timestamp: [
        {
          name: "hybrid_timestamp",
          find: (s, ctx) =>
            this.findInDay(join(ctx.dailyRoot, ctx.todayDate), s),
        },
      ],
      title_prefix: [
        {
          name: "title_daily",
          find: (s, ctx) =>
            this.findInDay(join(ctx.dailyRoot, ctx.todayDate), s),
        },
        {
          name: "title_permanent",
          find: (s, ctx) =>
            this.findInPermanent(ctx.permanentRoot, s.text, false),
        },
        {
          name: "title_index",
          find: (s, ctx) => this.findInIndexFiles(ctx.indexFiles, s.text),
        },
      ],
      literal: [
        {
          name: "source_hash",
          find: (s, ctx) => this.findBySource(ctx.permanentRoot, s.text),
        },
      ],
    };
  }

  /** Rule names tried for a shape, in priority order. */
  ruleNames(kind: QueryShape["kind"]): RuleName[] {
    return this.rules[kind].map((r) => r.name);
  }

  async resolve(
    shape: QueryShape,
    context: ResolutionContext,
  ): Promise<Candidate[]> {
    switch (shape.kind) {
      case "date_prefix":
        return await this.run(shape, this.rules.date_prefix, context);
      case "full_timestamp":
        return await this.run(shape, this.rules.full_timestamp, context);
      case "time_prefix":
        return await this.run(shape, this.rules.time_prefix, context);
      case "hybrid_timestamp":
        return await this.run(shape, this.rules.hybrid_timestamp, context);
      case "title_prefix":
        return await this.run(shape, this.rules.title_prefix, context);
      case "literal":
        return await this.run(shape, this.rules.literal, context);
    }
  }

  private async run<S>(
    shape: S,
    rules: readonly NamedRule<S>[],
    context: ResolutionContext,
  ): Promise<Candidate[]> {
    for (const rule of rules) {
      const paths = await rule.find(shape, context);
      if (paths.length > 0) {
        return paths.map((path) => ({ path, rule: rule.name }));
      }
    }
    return [];
  }

  private async findInDay(dir: string, query: DayQuery): Promise<string[]> {
    const entries = await this.tree.listEntries(dir);
    return entries
      .filter((e) => matchesDayQuery(e.stem, query))
      .map((e) => e.path);
  }

  private async findInPermanent(
    root: string,
    prefix: string,
    includeHashDirs: boolean,
  ): Promise<string[]> {
    const paths = (await this.tree.listEntries(root))
      .filter((e) => e.stem.startsWith(prefix))
      .map((e) => e.path);
    if (!includeHashDirs) return paths;

    for (const sub of await this.tree.listDirectories(root)) {
      const entries = await this.tree.listEntries(join(root, sub));
      for (const e of entries) {
        if (e.stem.startsWith(prefix)) paths.push(e.path);
      }
    }
    return paths;
  }

  private async findInIndexFiles(
    indexFiles: readonly string[],
    text: string,
  ): Promise<string[]> {
    const seen = new Set<string>();
    const paths: string[] = [];
    for (const indexFile of indexFiles) {
      const content = await this.tree.readFile(indexFile);
      for (const match of content.matchAll(MARKDOWN_LINK_RE)) {
        const [, name, target] = match;
        if (target.includes("://")) continue;
        if (!this.slugService.slugify(name).startsWith(text)) continue;

        const path = join(dirname(indexFile), target);
        if (seen.has(path)) continue;
        if (await this.tree.exists(path)) {
          seen.add(path);
          paths.push(path);
        }
      }
    }
    return paths;
  }

  private async findBySource(root: string, source: string): Promise<string[]> {
    const dir = join(root, this.slugService.hashSource(source));
    return (await this.tree.listEntries(dir)).map((e) => e.path);
  }
}
