import {
  CommentNotFoundError,
  ReviewValidationError,
  SessionClosedError,
} from "../src/review/review.errors";

export const RUNTIME_ERROR_CODES = Object.freeze({
  BAD_REQUEST: "BAD_REQUEST",
  VALIDATION_ERROR: "VALIDATION_ERROR",
  COMMENT_NOT_FOUND: "COMMENT_NOT_FOUND",
  SESSION_CLOSED: "SESSION_CLOSED",
  RUNTIME_FAILED: "RUNTIME_FAILED",
} as const);

export type RuntimeErrorCode = (typeof RUNTIME_ERROR_CODES)[keyof typeof RUNTIME_ERROR_CODES];

export interface RuntimeErrorPayload {
  readonly errorCode: RuntimeErrorCode;
  readonly guideMessage: string;
}

export class RuntimeError extends Error {
  readonly errorCode: RuntimeErrorCode;
  readonly guideMessage: string;
  readonly httpStatus: number;

  constructor(
    message: string,
    input: {
      readonly errorCode: RuntimeErrorCode;
      readonly guideMessage: string;
      readonly httpStatus: number;
      readonly cause?: unknown;
    }
  ) {
    super(message, "cause" in input ? { cause: input.cause } : undefined);
    this.name = "RuntimeError";
    this.errorCode = input.errorCode;
    this.guideMessage = input.guideMessage;
    this.httpStatus = input.httpStatus;
  }

  toPayload(): RuntimeErrorPayload & { readonly message: string } {
    return {
      errorCode: this.errorCode,
      guideMessage: this.guideMessage,
      message: this.message,
    };
  }
}

function asMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function createBadRequestError(detail: string): RuntimeError {
  return new RuntimeError(`BAD_REQUEST ${detail}`, {
    errorCode: RUNTIME_ERROR_CODES.BAD_REQUEST,
    guideMessage: "fix_request(malformed_body)",
    httpStatus: 400,
  });
}

export function toRuntimeError(error: unknown): RuntimeError {
  if (error instanceof RuntimeError) {
    return error;
  }

  if (error instanceof ReviewValidationError) {
    return new RuntimeError(error.message, {
      errorCode: RUNTIME_ERROR_CODES.VALIDATION_ERROR,
      guideMessage: "fix_request(invalid_comment)",
      httpStatus: 400,
      cause: error,
    });
  }

  if (error instanceof CommentNotFoundError) {
    return new RuntimeError(error.message, {
      errorCode: RUNTIME_ERROR_CODES.COMMENT_NOT_FOUND,
      guideMessage: "reload_comments(comment_missing)",
      httpStatus: 404,
      cause: error,
    });
  }

  if (error instanceof SessionClosedError) {
    return new RuntimeError(error.message, {
      errorCode: RUNTIME_ERROR_CODES.SESSION_CLOSED,
      guideMessage: "abort_with_error(session_closed)",
      httpStatus: 409,
      cause: error,
    });
  }

  const message = asMessage(error);
  return new RuntimeError(message, {
    errorCode: RUNTIME_ERROR_CODES.RUNTIME_FAILED,
    guideMessage: "abort_with_error(runtime_failed)",
    httpStatus: 500,
    cause: error,
  });
}
