import path from "node:path";
import { CommentLedger } from "./comment.ledger";
import { SessionClosedError } from "./review.errors";
import type { Clock, ReviewComment } from "./review.types";

export const STALE_SESSION_NOTICE =
  "The source file has changed since the last review session. Previous comments may not align with the current content.";

export interface ReviewDocumentInit {
  readonly sourcePath: string;
  readonly outputDir: string;
  readonly content: string;
  readonly fingerprint: string;
  readonly now?: Clock;
}

type MutationListener = () => void;

/**
 * One reviewed file for the lifetime of a run. Content and fingerprint are
 * fixed at construction; only the ledger and the stale notice change.
 *
 * Every public method runs to completion synchronously, so each call is an
 * exclusive section on the event loop and readers never see a half-applied
 * mutation.
 */
export class ReviewDocument {
  readonly sourcePath: string;
  readonly fileName: string;
  readonly outputDir: string;
  readonly content: string;
  readonly fingerprint: string;
  private readonly ledger: CommentLedger;
  private staleNotice = "";
  private mutationListener: MutationListener | null = null;
  private sealed = false;

  constructor(init: ReviewDocumentInit) {
    this.sourcePath = init.sourcePath;
    this.fileName = path.basename(init.sourcePath);
    this.outputDir = init.outputDir;
    this.content = init.content;
    this.fingerprint = init.fingerprint;
    this.ledger = new CommentLedger({
      now: init.now,
      onMutation: () => this.mutationListener?.(),
    });
  }

  /** Single subscriber, replaced on each call. The persistence engine owns it. */
  onMutation(listener: MutationListener | null): void {
    this.mutationListener = listener;
  }

  /** Rejects every later mutation. State read by an in-flight flush stays final. */
  seal(): void {
    this.sealed = true;
  }

  get nextCommentId(): number {
    return this.ledger.nextId;
  }

  addComment(startLine: number, endLine: number, body: string): ReviewComment {
    this.assertOpen("add comment");
    return this.ledger.add(startLine, endLine, body);
  }

  updateComment(id: string, body: string): ReviewComment {
    this.assertOpen("update comment");
    return this.ledger.update(id, body);
  }

  deleteComment(id: string): boolean {
    this.assertOpen("delete comment");
    return this.ledger.delete(id);
  }

  getComments(): ReviewComment[] {
    return this.ledger.list();
  }

  restoreComments(comments: readonly ReviewComment[], storedNextId?: number): void {
    this.ledger.restore(comments, storedNextId);
  }

  getStaleNotice(): string {
    return this.staleNotice;
  }

  markStale(notice: string = STALE_SESSION_NOTICE): void {
    this.staleNotice = notice;
  }

  clearStaleNotice(): void {
    this.staleNotice = "";
  }

  private assertOpen(operation: string): void {
    if (this.sealed) {
      throw new SessionClosedError(operation);
    }
  }
}
