// functions/src/core/answers/errors.ts

export type AnswersErrorCode =
  | "VALIDATION_ERROR"
  | "UNAUTHENTICATED"
  | "NOT_FOUND"
  | "STORE_UNAVAILABLE"
  | "CONFLICT_RETRY_EXHAUSTED";

/**
 * Base for every error the answers service surfaces to a caller.
 * `message` is safe to send over the wire; the underlying failure stays on `cause`.
 */
export abstract class AnswersError extends Error {
  abstract readonly code: AnswersErrorCode;
  abstract readonly httpStatus: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AnswersError {
  readonly code = "VALIDATION_ERROR";
  readonly httpStatus = 400;

  constructor(readonly field: string, message: string) {
    super(message);
  }
}

export class Unauthenticated extends AnswersError {
  readonly code = "UNAUTHENTICATED";
  readonly httpStatus = 401;
}

export class NotFoundError extends AnswersError {
  readonly code = "NOT_FOUND";
  readonly httpStatus = 404;

  constructor(message = "No AI answers found for user") {
    super(message);
  }
}

export class StoreUnavailableError extends AnswersError {
  readonly code = "STORE_UNAVAILABLE";
  readonly httpStatus = 503;

  constructor(options?: { cause?: unknown }) {
    super("Answer store is temporarily unavailable", options);
  }
}

// Contention, not outage: callers may back off and retry.
export class ConflictRetryExhausted extends AnswersError {
  readonly code = "CONFLICT_RETRY_EXHAUSTED";
  readonly httpStatus = 503;

  constructor(options?: { cause?: unknown }) {
    super("Answers are being modified concurrently, please retry", options);
  }
}

export function isAnswersError(err: unknown): err is AnswersError {
  return err instanceof AnswersError;
}
