/**
 * Use Case: ParseReference
 *
 * Classify a raw note reference into a query shape without touching disk.
 * Rules, first match wins:
 *   1. `YYYYMMDD/rest`      -> date_prefix (rest re-parsed as a day query)
 *   2. `YYYYMMDDHHmmSS`     -> full_timestamp
 *   3. `H..HHmmSS`          -> time_prefix, `HHmmSS-title` -> hybrid_timestamp
 *   4. anything else        -> title_prefix (slugified)
 *
 * `execute` is total: malformed numeric input falls through to rule 4.
 * `validate` is the strict check callers run first to reject such input.
 *
 * Dependencies: SlugService (port).
 */

import type { DayQuery, QueryShape } from "../../entities/reference.js";
import { NoteError } from "../../entities/errors.js";
import type { SlugService } from "../../ports/slug-service.js";

export interface ParseReferenceInput {
  readonly raw: string;
}

const DATE_RE = /^\d{8}$/;
const TIMESTAMP_RE = /^\d{14}$/;
const TIME_PREFIX_RE = /^\d{1,6}$/;
const HYBRID_RE = /^(\d{6})-(.+)$/;
const DIGITS_RE = /^\d+$/;

export function normalizeReference(raw: string): string {
  return raw.trim().replace(/\\/g, "/");
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/** Calendar check for `YYYYMMDD`, years 1900-2100. */
export function isValidDate(s: string): boolean {
  if (!DATE_RE.test(s)) return false;
  const year = parseInt(s.slice(0, 4), 10);
  const month = parseInt(s.slice(4, 6), 10);
  const day = parseInt(s.slice(6, 8), 10);
  if (year < 1900 || year > 2100 || month < 1 || month > 12 || day < 1) {
    return false;
  }
  const daysInMonth = [
    31,
    isLeapYear(year) ? 29 : 28,
    31,
    30,
    31,
    30,
    31,
    31,
    30,
    31,
    30,
    31,
  ];
  return day <= daysInMonth[month - 1];
}

/** Clock check for `HHmmSS`. */
export function isValidTime(s: string): boolean {
  return /^\d{6}$/.test(s) && isValidTimePrefix(s);
}

/**
 * Check the complete two-digit components of a 1-6 digit time prefix.
 * "2" and "23" pass, "25" and "2360" do not.
 */
export function isValidTimePrefix(digits: string): boolean {
  if (!TIME_PREFIX_RE.test(digits)) return false;
  const limits = [23, 59, 59];
  for (let i = 0; i < 3; i++) {
    const pair = digits.slice(i * 2, i * 2 + 2);
    if (pair.length < 2) break;
    if (parseInt(pair, 10) > limits[i]) return false;
  }
  return true;
}

export class ParseReferenceUseCase {
  constructor(private readonly slugService: SlugService) {}

  execute(input: ParseReferenceInput): QueryShape {
    const reference = normalizeReference(input.raw);

    const slash = reference.indexOf("/");
    if (slash >= 0) {
      const date = reference.slice(0, slash).trim();
      const rest = reference.slice(slash + 1).trim();
      if (DATE_RE.test(date) && isValidDate(date) && rest !== "") {
        return {
          kind: "date_prefix",
          date,
          rest,
          inner: this.parseDayQuery(rest),
        };
      }
    }

    if (TIMESTAMP_RE.test(reference)) {
      const date = reference.slice(0, 8);
      const time = reference.slice(8, 14);
      if (isValidDate(date) && isValidTime(time)) {
        return { kind: "full_timestamp", date, time };
      }
    }

    return this.parseDayQuery(reference);
  }

  /**
   * Reject references whose numeric parts are malformed, and references
   * that leave nothing to match once slugified.
   */
  validate(raw: string): void {
    const reference = normalizeReference(raw);
    if (reference === "") {
      throw new NoteError("invalid_reference_syntax", "Empty note reference");
    }

    const slash = reference.indexOf("/");
    if (slash >= 0) {
      const date = reference.slice(0, slash).trim();
      const rest = reference.slice(slash + 1).trim();
      if (DATE_RE.test(date)) {
        if (!isValidDate(date)) {
          throw new NoteError(
            "invalid_reference_syntax",
            `Invalid date '${date}' in reference '${raw}'`,
          );
        }
        if (rest === "") {
          throw new NoteError(
            "invalid_reference_syntax",
            `Missing prefix after '${date}/' in reference '${raw}'`,
          );
        }
        this.validateDayPart(rest, raw);
        return;
      }
    }

    if (DIGITS_RE.test(reference) && reference.length > 6) {
      if (reference.length !== 14) {
        throw new NoteError(
          "invalid_reference_syntax",
          `Numeric reference '${reference}' must be a 1-6 digit time prefix or a 14 digit timestamp`,
        );
      }
      if (
        !isValidDate(reference.slice(0, 8)) ||
        !isValidTime(reference.slice(8, 14))
      ) {
        throw new NoteError(
          "invalid_reference_syntax",
          `Invalid timestamp '${reference}'`,
        );
      }
      return;
    }

    this.validateDayPart(reference, raw);
  }

  private validateDayPart(part: string, raw: string): void {
    if (DIGITS_RE.test(part)) {
      if (part.length > 6) {
        throw new NoteError(
          "invalid_reference_syntax",
          `Time prefix '${part}' in reference '${raw}' is longer than 6 digits`,
        );
      }
      return;
    }

    const hybrid = HYBRID_RE.exec(part);
    if (hybrid && !isValidTime(hybrid[1])) {
      throw new NoteError(
        "invalid_reference_syntax",
        `Invalid time '${hybrid[1]}' in reference '${raw}'`,
      );
    }

    if (this.slugService.slugify(part) === "") {
      throw new NoteError(
        "invalid_reference_syntax",
        `Reference '${raw}' has nothing to match`,
      );
    }
  }

  private parseDayQuery(part: string): DayQuery {
    if (TIME_PREFIX_RE.test(part)) {
      return { kind: "time_prefix", digits: part };
    }

    const hybrid = HYBRID_RE.exec(part);
    if (hybrid) {
      const titlePrefix = this.slugService.slugify(hybrid[2]);
      if (titlePrefix !== "") {
        return { kind: "hybrid_timestamp", time: hybrid[1], titlePrefix };
      }
    }

    return { kind: "title_prefix", text: this.slugService.slugify(part) };
  }
}
