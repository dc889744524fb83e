export type FilterErrorKind =
  | "MalformedDirective"
  | "PolicyViolation"
  | "LookupFailure"
  | "InvalidRequest"
  | "UnsupportedSyntax";

/**
 * A rejection raised while normalizing a job. The message is shown to the
 * submitting user as-is.
 */
export class JobFilterError extends Error {
  constructor(
    readonly kind: FilterErrorKind,
    message: string,
    readonly line: number | null = null
  ) {
    super(message);
    this.name = "JobFilterError";
  }
}

export class MalformedDirectiveError extends JobFilterError {
  constructor(
    readonly line: number,
    detail: string
  ) {
    super("MalformedDirective", `GridEngine directive error at line ${line}: ${detail}`, line);
    this.name = "MalformedDirectiveError";
  }
}

export class PolicyViolationError extends JobFilterError {
  constructor(message: string) {
    super("PolicyViolation", message);
    this.name = "PolicyViolationError";
  }
}

export class LookupFailureError extends JobFilterError {
  constructor(message: string) {
    super("LookupFailure", message);
    this.name = "LookupFailureError";
  }
}

export class InvalidRequestError extends JobFilterError {
  constructor(message: string) {
    super("InvalidRequest", message);
    this.name = "InvalidRequestError";
  }
}
