import test from "node:test";
import assert from "node:assert/strict";
import {
  RUNTIME_ERROR_CODES,
  RuntimeError,
  createBadRequestError,
  toRuntimeError,
} from "../../runtime/error";
import {
  CommentNotFoundError,
  PersistenceIOError,
  ReviewValidationError,
  SessionClosedError,
} from "../../src/review/review.errors";

test("validation errors map to 400 with a fix_request guide", () => {
  const mapped = toRuntimeError(new ReviewValidationError("comment body is required"));
  assert.equal(mapped.httpStatus, 400);
  assert.deepEqual(mapped.toPayload(), {
    errorCode: RUNTIME_ERROR_CODES.VALIDATION_ERROR,
    guideMessage: "fix_request(invalid_comment)",
    message: "VALIDATION_ERROR comment body is required",
  });
});

test("missing comments map to 404", () => {
  const mapped = toRuntimeError(new CommentNotFoundError("c7"));
  assert.equal(mapped.httpStatus, 404);
  assert.equal(mapped.errorCode, "COMMENT_NOT_FOUND");
  assert.equal(mapped.message, "COMMENT_NOT_FOUND id=c7");
});

test("mutations after shutdown map to 409 SESSION_CLOSED", () => {
  const mapped = toRuntimeError(new SessionClosedError("add comment"));
  assert.equal(mapped.httpStatus, 409);
  assert.deepEqual(mapped.toPayload(), {
    errorCode: "SESSION_CLOSED",
    guideMessage: "abort_with_error(session_closed)",
    message: "SESSION_CLOSED add comment rejected; the review session is shutting down",
  });
});

test("CLI configuration messages are not special-cased", () => {
  const mapped = toRuntimeError(new Error("CONFIGURATION_ERROR --port requires a value"));
  assert.equal(mapped.httpStatus, 500);
  assert.equal(mapped.errorCode, "RUNTIME_FAILED");
});

test("anything else is a 500 RUNTIME_FAILED", () => {
  const cause = new PersistenceIOError("/review/plan.review.md", new Error("EIO"));
  const mapped = toRuntimeError(cause);
  assert.equal(mapped.httpStatus, 500);
  assert.equal(mapped.errorCode, "RUNTIME_FAILED");
  assert.equal(mapped.message, "PERSISTENCE_IO_ERROR /review/plan.review.md: EIO");
  assert.equal(mapped.cause, cause);

  assert.equal(toRuntimeError("plain string").message, "plain string");
});

test("runtime errors pass through unchanged", () => {
  const original = createBadRequestError("request body must be valid JSON");
  assert.equal(toRuntimeError(original), original);
  assert.ok(original instanceof RuntimeError);
  assert.equal(original.httpStatus, 400);
  assert.equal(original.message, "BAD_REQUEST request body must be valid JSON");
  assert.equal(original.guideMessage, "fix_request(malformed_body)");
});
