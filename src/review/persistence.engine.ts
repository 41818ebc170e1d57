import { renderAnnotatedDocument } from "./annotation.renderer";
import { PersistenceIOError } from "./review.errors";
import type { ReviewDocument } from "./review.document";
import type { ReviewArtifactStore } from "./snapshot.store";
import { toPersistedComment, type Clock, type ReviewSnapshot } from "./review.types";

export const DEFAULT_DEBOUNCE_MS = 200;

export interface ScheduledTask {
  cancel(): void;
}

export interface DelayScheduler {
  schedule(callback: () => void, delayMs: number): ScheduledTask;
}

export type ReviewLogger = Pick<Console, "log" | "warn">;

export interface FlushOutcome {
  readonly commentCount: number;
  readonly errors: readonly PersistenceIOError[];
}

export interface PersistenceEngineOptions {
  readonly debounceMs?: number;
  readonly scheduler?: DelayScheduler;
  readonly now?: Clock;
  readonly logger?: ReviewLogger;
  readonly verbose?: boolean;
}

const systemScheduler: DelayScheduler = {
  schedule(callback, delayMs) {
    const handle = setTimeout(callback, delayMs);
    return { cancel: () => clearTimeout(handle) };
  },
};

function toIOError(targetPath: string, error: unknown): PersistenceIOError {
  return error instanceof PersistenceIOError ? error : new PersistenceIOError(targetPath, error);
}

/**
 * Keeps the sidecar snapshot and the annotated document eventually consistent
 * with a ReviewDocument. Mutations restart one debounce timer; the timer path
 * and forced flushes share a serial queue so two writes never interleave.
 */
export class ReviewPersistenceEngine {
  private readonly document: ReviewDocument;
  private readonly store: ReviewArtifactStore;
  private readonly debounceMs: number;
  private readonly scheduler: DelayScheduler;
  private readonly now: Clock;
  private readonly logger: ReviewLogger;
  private readonly verbose: boolean;
  private timer: ScheduledTask | null = null;
  private writeQueue: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(
    document: ReviewDocument,
    store: ReviewArtifactStore,
    options: PersistenceEngineOptions = {}
  ) {
    this.document = document;
    this.store = store;
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.scheduler = options.scheduler ?? systemScheduler;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? console;
    this.verbose = options.verbose ?? false;
  }

  /** Subscribes to document mutations. */
  attach(): void {
    this.document.onMutation(() => this.schedule());
  }

  get hasPendingWrite(): boolean {
    return this.timer !== null;
  }

  get reviewFilePath(): string {
    return this.store.paths.reviewFilePath;
  }

  schedule(): void {
    if (this.closed) {
      return;
    }
    this.cancelTimer();
    this.timer = this.scheduler.schedule(() => {
      this.timer = null;
      this.flush().catch((error: unknown) => {
        this.logger.warn(
          `[review] REVIEW_PERSIST_ERROR ${error instanceof Error ? error.message : String(error)}`
        );
      });
    }, this.debounceMs);
  }

  /** Cancels any pending timer and writes current state now. */
  flush(): Promise<FlushOutcome> {
    this.cancelTimer();
    return this.enqueue(() => this.writeArtifacts());
  }

  /** Final flush. The document is sealed first so nothing can change after it. */
  async shutdown(): Promise<FlushOutcome> {
    this.closed = true;
    this.document.seal();
    this.document.onMutation(null);
    return this.flush();
  }

  whenIdle(): Promise<void> {
    return this.writeQueue;
  }

  private cancelTimer(): void {
    if (this.timer !== null) {
      this.timer.cancel();
      this.timer = null;
    }
  }

  private enqueue<T>(action: () => Promise<T>): Promise<T> {
    const next = this.writeQueue.then(action);
    this.writeQueue = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  private async writeArtifacts(): Promise<FlushOutcome> {
    const comments = this.document.getComments();
    const snapshot: ReviewSnapshot = {
      file: this.document.fileName,
      file_hash: this.document.fingerprint,
      updated_at: this.now().toISOString(),
      next_id: this.document.nextCommentId,
      comments: comments.map(toPersistedComment),
    };
    const errors: PersistenceIOError[] = [];

    try {
      await this.store.saveSnapshot(snapshot);
    } catch (error) {
      errors.push(toIOError(this.store.paths.snapshotPath, error));
    }

    try {
      if (comments.length === 0) {
        await this.store.removeReview();
      } else {
        await this.store.writeReview(renderAnnotatedDocument(this.document.content, comments));
      }
    } catch (error) {
      errors.push(toIOError(this.store.paths.reviewFilePath, error));
    }

    for (const error of errors) {
      this.logger.warn(`[review] REVIEW_PERSIST_ERROR ${error.message}`);
    }
    if (this.verbose && errors.length === 0) {
      this.logger.log(
        `[review] saved ${String(comments.length)} comment(s) to ${this.store.paths.snapshotPath}`
      );
    }

    return { commentCount: comments.length, errors };
  }
}
