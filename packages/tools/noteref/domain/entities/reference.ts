// Reference entity - query shapes, candidates and resolution outcomes

/** Shapes that can be matched inside a single day directory. */
export type DayQuery =
  | { readonly kind: "time_prefix"; readonly digits: string }
  | {
    readonly kind: "hybrid_timestamp";
    readonly time: string;
    readonly titlePrefix: string;
  }
  | { readonly kind: "title_prefix"; readonly text: string };

/**
 * Classified form of a raw note reference.
 * `literal` is never produced by the parser: callers build it for opaque
 * source strings that are looked up by hash.
 */
export type QueryShape =
  | {
    readonly kind: "full_timestamp";
    readonly date: string; // YYYYMMDD
    readonly time: string; // HHmmSS
  }
  | {
    readonly kind: "date_prefix";
    readonly date: string;
    readonly rest: string;
    readonly inner: DayQuery;
  }
  | DayQuery
  | { readonly kind: "literal"; readonly text: string };

export type QueryKind = QueryShape["kind"];

export type RuleName =
  | "date_prefix"
  | "full_timestamp_daily"
  | "full_timestamp_permanent"
  | "time_prefix"
  | "hybrid_timestamp"
  | "title_daily"
  | "title_permanent"
  | "title_index"
  | "source_hash";

/** A resolved path plus the rule that produced it. */
export type Candidate = {
  readonly path: string;
  readonly rule: RuleName;
};

export type AmbiguityOutcome =
  | { readonly kind: "unique"; readonly path: string }
  | { readonly kind: "not_found" }
  | { readonly kind: "ambiguous"; readonly candidates: readonly Candidate[] };

/**
 * Directories a resolution pass searches. Paths are absolute or relative to
 * the process working directory; `indexFiles` are read for markdown links.
 */
export type ResolutionContext = {
  readonly dailyRoot: string;
  readonly todayDate: string; // YYYYMMDD
  readonly permanentRoot: string;
  readonly indexFiles: readonly string[];
};

/** One note file as seen by the tree walker. */
export type NoteEntry = {
  readonly path: string;
  readonly stem: string;
  readonly extension: string;
};

/** Recognized note extensions, in preference order. */
export const NOTE_EXTENSIONS = [".md", ".txt"] as const;
