import fs from "node:fs";
import path from "node:path";
import { computeContentFingerprint } from "./fingerprint";
import { ReviewDocument } from "./review.document";
import { resolveArtifactPaths } from "./review.paths";
import {
  ReviewPersistenceEngine,
  type FlushOutcome,
  type PersistenceEngineOptions,
  type ReviewLogger,
} from "./persistence.engine";
import { FileReviewArtifactStore, type ReviewArtifactStore } from "./snapshot.store";
import {
  fromPersistedComment,
  type Clock,
  type ReviewComment,
  type ReviewSnapshot,
} from "./review.types";

export type ReviewLoadStatus = "fresh" | "resumed" | "stale";

export interface LoadReviewDocumentInput {
  readonly sourcePath: string;
  readonly outputDir?: string;
  readonly readSource?: (sourcePath: string) => Buffer;
  readonly store?: ReviewArtifactStore;
  readonly now?: Clock;
  readonly logger?: ReviewLogger;
}

export interface LoadedReviewDocument {
  readonly document: ReviewDocument;
  readonly store: ReviewArtifactStore;
  readonly status: ReviewLoadStatus;
}

function asMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reads the source once, fingerprints it and adopts the sidecar snapshot when
 * its fingerprint matches. A mismatching snapshot only raises the stale
 * notice; the file stays on disk until the next flush replaces it.
 */
export function loadReviewDocument(input: LoadReviewDocumentInput): LoadedReviewDocument {
  const sourcePath = path.resolve(input.sourcePath);
  const outputDir = path.resolve(input.outputDir ?? path.dirname(sourcePath));
  const logger = input.logger ?? console;
  const readSource = input.readSource ?? ((target: string) => fs.readFileSync(target));

  let raw: Buffer;
  try {
    raw = readSource(sourcePath);
  } catch (error) {
    throw new Error(`REVIEW_SOURCE_READ_ERROR ${sourcePath}: ${asMessage(error)}`);
  }

  const document = new ReviewDocument({
    sourcePath,
    outputDir,
    content: raw.toString("utf8"),
    fingerprint: computeContentFingerprint(raw),
    now: input.now,
  });
  const store =
    input.store ??
    new FileReviewArtifactStore(resolveArtifactPaths(outputDir, document.fileName), {
      onWarning: (message) => logger.warn(`[review] ${message}`),
    });

  let snapshot: ReviewSnapshot | null;
  try {
    snapshot = store.loadSnapshot();
  } catch (error) {
    logger.warn(`[review] ignoring unreadable snapshot: ${asMessage(error)}`);
    snapshot = null;
  }

  if (snapshot === null) {
    return { document, store, status: "fresh" };
  }

  if (snapshot.file_hash !== document.fingerprint) {
    document.markStale();
    logger.log(
      `[review] source changed since last session (expected=${snapshot.file_hash} actual=${document.fingerprint})`
    );
    return { document, store, status: "stale" };
  }

  document.restoreComments(snapshot.comments.map(fromPersistedComment), snapshot.next_id);
  logger.log(
    `[review] resumed ${String(snapshot.comments.length)} comment(s) from ${store.paths.snapshotPath}`
  );
  return { document, store, status: "resumed" };
}

export interface OpenReviewSessionOptions extends LoadReviewDocumentInput {
  readonly engine?: Omit<PersistenceEngineOptions, "now" | "logger">;
}

export interface ReviewDocumentView {
  readonly fileName: string;
  readonly content: string;
}

export class ReviewSession {
  readonly document: ReviewDocument;
  readonly engine: ReviewPersistenceEngine;
  readonly loadStatus: ReviewLoadStatus;
  private readonly logger: ReviewLogger;
  private sourceChanged = false;

  constructor(input: {
    readonly document: ReviewDocument;
    readonly engine: ReviewPersistenceEngine;
    readonly loadStatus?: ReviewLoadStatus;
    readonly logger?: ReviewLogger;
  }) {
    this.document = input.document;
    this.engine = input.engine;
    this.loadStatus = input.loadStatus ?? "fresh";
    this.logger = input.logger ?? console;
    this.engine.attach();
  }

  static open(options: OpenReviewSessionOptions): ReviewSession {
    const logger = options.logger ?? console;
    const loaded = loadReviewDocument(options);
    const engine = new ReviewPersistenceEngine(loaded.document, loaded.store, {
      ...options.engine,
      now: options.now,
      logger,
    });
    return new ReviewSession({
      document: loaded.document,
      engine,
      loadStatus: loaded.status,
      logger,
    });
  }

  get reviewFilePath(): string {
    return this.engine.reviewFilePath;
  }

  get sourceChangedOnDisk(): boolean {
    return this.sourceChanged;
  }

  getDocument(): ReviewDocumentView {
    return { fileName: this.document.fileName, content: this.document.content };
  }

  getComments(): ReviewComment[] {
    return this.document.getComments();
  }

  addComment(startLine: number, endLine: number, body: string): ReviewComment {
    return this.document.addComment(startLine, endLine, body);
  }

  updateComment(id: string, body: string): ReviewComment {
    return this.document.updateComment(id, body);
  }

  deleteComment(id: string): boolean {
    return this.document.deleteComment(id);
  }

  getStaleNotice(): string {
    return this.document.getStaleNotice();
  }

  clearStaleNotice(): void {
    this.document.clearStaleNotice();
  }

  /** Flushes both artifacts immediately. The host decides when to exit. */
  async finish(): Promise<{ reviewFilePath: string }> {
    await this.engine.flush();
    return { reviewFilePath: this.reviewFilePath };
  }

  /**
   * The source was modified by another process. Content stays pinned to what
   * was read at startup; the fingerprint check on the next load reports it.
   */
  noteSourceChanged(): void {
    if (this.sourceChanged) {
      return;
    }
    this.sourceChanged = true;
    this.logger.warn(
      `[review] ${this.document.fileName} changed on disk; comments still refer to the content loaded at startup`
    );
  }

  shutdown(): Promise<FlushOutcome> {
    return this.engine.shutdown();
  }
}
