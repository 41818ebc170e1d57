export const REVIEW_ERROR_CODES = Object.freeze({
  VALIDATION_ERROR: "VALIDATION_ERROR",
  COMMENT_NOT_FOUND: "COMMENT_NOT_FOUND",
  PERSISTENCE_IO_ERROR: "PERSISTENCE_IO_ERROR",
  SESSION_CLOSED: "SESSION_CLOSED",
} as const);

export type ReviewErrorCode = (typeof REVIEW_ERROR_CODES)[keyof typeof REVIEW_ERROR_CODES];

export abstract class ReviewError extends Error {
  abstract readonly code: ReviewErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ReviewValidationError extends ReviewError {
  readonly code = REVIEW_ERROR_CODES.VALIDATION_ERROR;

  constructor(detail: string) {
    super(`VALIDATION_ERROR ${detail}`);
    this.name = "ReviewValidationError";
  }
}

export class CommentNotFoundError extends ReviewError {
  readonly code = REVIEW_ERROR_CODES.COMMENT_NOT_FOUND;
  readonly commentId: string;

  constructor(commentId: string) {
    super(`COMMENT_NOT_FOUND id=${commentId}`);
    this.name = "CommentNotFoundError";
    this.commentId = commentId;
  }
}

/** Raised by mutations that arrive after the final flush has started. */
export class SessionClosedError extends ReviewError {
  readonly code = REVIEW_ERROR_CODES.SESSION_CLOSED;

  constructor(operation: string) {
    super(`SESSION_CLOSED ${operation} rejected; the review session is shutting down`);
    this.name = "SessionClosedError";
  }
}

/** Disk failure while reading or writing a review artifact. Logged, never surfaced to mutating callers. */
export class PersistenceIOError extends ReviewError {
  readonly code = REVIEW_ERROR_CODES.PERSISTENCE_IO_ERROR;
  readonly targetPath: string;

  constructor(targetPath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`PERSISTENCE_IO_ERROR ${targetPath}: ${detail}`, { cause });
    this.name = "PersistenceIOError";
    this.targetPath = targetPath;
  }
}
