// SystemClock - local wall-clock time, or a fixed instant when overridden

import type { Clock, DateTimeParts } from "../../domain/ports/clock.js";
import { NoteError } from "../../domain/entities/errors.js";

const OVERRIDE_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})(?::(\d{2}))?$/;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

export function toDateTimeParts(d: Date): DateTimeParts {
  const year = pad(d.getFullYear(), 4);
  const month = pad(d.getMonth() + 1);
  const day = pad(d.getDate());
  const hour = pad(d.getHours());
  const minute = pad(d.getMinutes());
  const second = pad(d.getSeconds());
  return {
    date: `${year}${month}${day}`,
    time: `${hour}${minute}${second}`,
    stamp: `${year}-${month}-${day} ${hour}:${minute}`,
  };
}

/**
 * Parse a `YYYY-MM-DD HH:MM[:SS]` override as local time.
 * Rolled-over components (month 13, 25:00) are rejected.
 */
export function parseTimestampOverride(value: string): Date {
  const m = OVERRIDE_RE.exec(value.trim());
  if (!m) {
    throw new NoteError(
      "invalid_args",
      `Invalid timestamp '${value}': expected YYYY-MM-DD HH:MM[:SS]`,
    );
  }
  const [year, month, day, hour, minute] = m.slice(1, 6).map(Number);
  const second = m[6] === undefined ? 0 : Number(m[6]);
  const date = new Date(year, month - 1, day, hour, minute, second);
  if (
    date.getFullYear() !== year || date.getMonth() !== month - 1 ||
    date.getDate() !== day || date.getHours() !== hour ||
    date.getMinutes() !== minute || date.getSeconds() !== second
  ) {
    throw new NoteError("invalid_args", `Invalid timestamp '${value}'`);
  }
  return date;
}

export class SystemClock implements Clock {
  constructor(private readonly fixed: Date | null = null) {}

  now(): DateTimeParts {
    return toDateTimeParts(this.fixed ?? new Date());
  }
}
