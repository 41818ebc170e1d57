import { CommentNotFoundError, ReviewValidationError } from "./review.errors";
import type { Clock, ReviewComment } from "./review.types";

export const COMMENT_ID_PREFIX = "c";
const COMMENT_ID_PATTERN = /^c(\d+)$/;

export interface CommentLedgerOptions {
  readonly now?: Clock;
  readonly onMutation?: () => void;
}

export function formatCommentId(sequence: number): string {
  return `${COMMENT_ID_PREFIX}${String(sequence)}`;
}

export function parseCommentSequence(id: string): number | null {
  const matched = COMMENT_ID_PATTERN.exec(id);
  if (!matched || matched[1] === undefined) {
    return null;
  }
  const parsed = Number(matched[1]);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * Next free sequence after adopting `comments`. A stored counter wins when it
 * is ahead of the ids actually present.
 */
export function resolveNextSequence(
  comments: readonly ReviewComment[],
  storedNextId?: number
): number {
  let next = 1;
  for (const comment of comments) {
    const sequence = parseCommentSequence(comment.id);
    if (sequence !== null && sequence >= next) {
      next = sequence + 1;
    }
  }
  if (typeof storedNextId === "number" && Number.isSafeInteger(storedNextId) && storedNextId > next) {
    next = storedNextId;
  }
  return next;
}

function assertBody(body: string): void {
  if (typeof body !== "string" || body === "") {
    throw new ReviewValidationError("comment body is required");
  }
}

function assertLineRange(startLine: number, endLine: number): void {
  if (!Number.isInteger(startLine) || !Number.isInteger(endLine)) {
    throw new ReviewValidationError("line numbers must be integers");
  }
  if (startLine < 1 || endLine < startLine) {
    throw new ReviewValidationError(
      `invalid line range start=${String(startLine)} end=${String(endLine)}`
    );
  }
}

export class CommentLedger {
  private comments: ReviewComment[] = [];
  private nextSequence = 1;
  private readonly now: Clock;
  private readonly onMutation?: () => void;

  constructor(options: CommentLedgerOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.onMutation = options.onMutation;
  }

  get size(): number {
    return this.comments.length;
  }

  get nextId(): number {
    return this.nextSequence;
  }

  add(startLine: number, endLine: number, body: string): ReviewComment {
    assertBody(body);
    assertLineRange(startLine, endLine);

    const stamp = this.now().toISOString();
    const comment: ReviewComment = Object.freeze({
      id: formatCommentId(this.nextSequence),
      startLine,
      endLine,
      body,
      createdAt: stamp,
      updatedAt: stamp,
    });
    this.nextSequence += 1;
    this.comments = [...this.comments, comment];
    this.onMutation?.();
    return comment;
  }

  update(id: string, body: string): ReviewComment {
    assertBody(body);
    const index = this.comments.findIndex((comment) => comment.id === id);
    const existing = this.comments[index];
    if (index < 0 || existing === undefined) {
      throw new CommentNotFoundError(id);
    }

    const next: ReviewComment = Object.freeze({
      ...existing,
      body,
      updatedAt: this.now().toISOString(),
    });
    const updated = [...this.comments];
    updated[index] = next;
    this.comments = updated;
    this.onMutation?.();
    return next;
  }

  delete(id: string): boolean {
    const remaining = this.comments.filter((comment) => comment.id !== id);
    if (remaining.length === this.comments.length) {
      return false;
    }
    this.comments = remaining;
    this.onMutation?.();
    return true;
  }

  list(): ReviewComment[] {
    return [...this.comments];
  }

  /** Adopts comments from a resumed snapshot. Does not count as a mutation. */
  restore(comments: readonly ReviewComment[], storedNextId?: number): void {
    const seen = new Set<string>();
    const adopted: ReviewComment[] = [];
    for (const comment of comments) {
      if (seen.has(comment.id)) {
        continue;
      }
      seen.add(comment.id);
      adopted.push(Object.freeze({ ...comment }));
    }
    this.comments = adopted;
    this.nextSequence = resolveNextSequence(this.comments, storedNextId);
  }
}
