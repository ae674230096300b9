export type PreconditionCode =
  | "INPUT_NOT_FOUND"
  | "MISSING_COLUMNS"
  | "INVALID_CONFIG"
  | "INVALID_RULES"
  | "UNKNOWN_ANALYZER";

/** Raised before any row is classified; the run exits non-zero. */
export class PreconditionError extends Error {
  readonly code: PreconditionCode;

  constructor(code: PreconditionCode, message: string) {
    super(message);
    this.name = "PreconditionError";
    this.code = code;
  }
}
