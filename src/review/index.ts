export { computeContentFingerprint, FINGERPRINT_PREFIX } from "./fingerprint";
export { CommentLedger, formatCommentId, parseCommentSequence } from "./comment.ledger";
export { ReviewDocument, STALE_SESSION_NOTICE } from "./review.document";
export { renderAnnotatedDocument } from "./annotation.renderer";
export { FileReviewArtifactStore, type ReviewArtifactStore } from "./snapshot.store";
export { resolveArtifactPaths, type ReviewArtifactPaths } from "./review.paths";
export {
  DEFAULT_DEBOUNCE_MS,
  ReviewPersistenceEngine,
  type DelayScheduler,
  type FlushOutcome,
  type ScheduledTask,
} from "./persistence.engine";
export { loadReviewDocument, ReviewSession, type ReviewLoadStatus } from "./review.session";
export {
  CommentNotFoundError,
  PersistenceIOError,
  ReviewError,
  ReviewValidationError,
  SessionClosedError,
} from "./review.errors";
export type { ReviewComment, ReviewSnapshot, PersistedComment } from "./review.types";
