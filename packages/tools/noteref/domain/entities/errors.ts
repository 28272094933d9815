// Error types for the noteref domain

export type NoteErrorCode =
  | "not_found"
  | "ambiguous"
  | "invalid_reference_syntax"
  | "header_not_found"
  | "already_owned"
  | "not_owned"
  | "duplicate_id"
  | "malformed_ledger"
  | "invalid_args"
  | "io_error";

export class NoteError extends Error {
  constructor(
    public readonly code: NoteErrorCode,
    message: string,
    public readonly candidates: readonly string[] = [],
  ) {
    super(message);
    this.name = "NoteError";
  }

  toJSON(): {
    error: string;
    code: NoteErrorCode;
    message: string;
    candidates?: readonly string[];
  } {
    return {
      error: this.code,
      code: this.code,
      message: this.message,
      ...(this.candidates.length > 0 ? { candidates: this.candidates } : {}),
    };
  }
}
