export const ErrorCode = {
  PARSE_ERROR: "PARSE_ERROR",
  INVALID_SPEC: "INVALID_SPEC",
  PAST_TIME: "PAST_TIME",
  TOOL_MISSING: "TOOL_MISSING",
  SUBMISSION_FAILED: "SUBMISSION_FAILED",
  AUTH_FAILURE: "AUTH_FAILURE",
  NOT_FOUND: "NOT_FOUND",
  SERVICE_ERROR: "SERVICE_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class CueplayError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "CueplayError";
    this.code = code;
  }
}

/** Malformed user input: media reference, time, date or volume. */
export class ParseError extends CueplayError {
  constructor(message: string, code: typeof ErrorCode.PARSE_ERROR | typeof ErrorCode.INVALID_SPEC = ErrorCode.PARSE_ERROR) {
    super(code, message);
    this.name = "ParseError";
  }
}

export class PastTimeError extends CueplayError {
  constructor(message: string) {
    super(ErrorCode.PAST_TIME, message);
    this.name = "PastTimeError";
  }
}

export class ToolMissingError extends CueplayError {
  constructor(readonly tool: string) {
    super(ErrorCode.TOOL_MISSING, `'${tool}' is not available on this system`);
    this.name = "ToolMissingError";
  }
}

/** The facility ran but refused the job; `message` is its own diagnostic text. */
export class SubmissionFailedError extends CueplayError {
  constructor(message: string) {
    super(ErrorCode.SUBMISSION_FAILED, message);
    this.name = "SubmissionFailedError";
  }
}

export class AuthFailureError extends CueplayError {
  constructor(message: string) {
    super(ErrorCode.AUTH_FAILURE, message);
    this.name = "AuthFailureError";
  }
}

export class NotFoundError extends CueplayError {
  constructor(message: string) {
    super(ErrorCode.NOT_FOUND, message);
    this.name = "NotFoundError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
