import type { Side } from "./types";

export type ErrorCode = "parse_error" | "alignment_error" | "invariant_violation" | "gate_rejected";

export class ParseError extends Error {
  readonly code: ErrorCode = "parse_error";

  constructor(
    message: string,
    readonly side: Side,
    readonly line: number | null = null,
    readonly column: number | null = null
  ) {
    super(message);
    this.name = "ParseError";
  }
}

export class AlignmentError extends Error {
  readonly code: ErrorCode = "alignment_error";

  /** `upstream` marks failures of the embedding provider rather than of the alignment itself. */
  constructor(message: string, readonly upstream = false) {
    super(message);
    this.name = "AlignmentError";
  }
}

export class InvariantError extends Error {
  readonly code: ErrorCode = "invariant_violation";

  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

export class GateRejectedError extends Error {
  readonly code: ErrorCode = "gate_rejected";

  constructor(readonly queued: number) {
    super(`alignment queue is full (${queued} waiting)`);
    this.name = "GateRejectedError";
  }
}

export function httpStatusForError(e: unknown): number {
  if (e instanceof ParseError) return 400;
  if (e instanceof GateRejectedError) return 503;
  if (e instanceof AlignmentError) return e.upstream ? 502 : 500;
  return 500;
}

export function errorCodeOf(e: unknown): string {
  if (e instanceof ParseError || e instanceof AlignmentError || e instanceof InvariantError || e instanceof GateRejectedError) {
    return e.code;
  }
  return "internal_error";
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
