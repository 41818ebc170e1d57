import fs from "node:fs";
import { removeArtifact, replaceArtifact } from "../../runtime/fs/artifact_write";
import { PersistenceIOError } from "./review.errors";
import type { ReviewArtifactPaths } from "./review.paths";
import type { PersistedComment, ReviewSnapshot } from "./review.types";

export interface ReviewArtifactStore {
  readonly paths: ReviewArtifactPaths;
  loadSnapshot(): ReviewSnapshot | null;
  saveSnapshot(snapshot: ReviewSnapshot): Promise<void>;
  writeReview(text: string): Promise<void>;
  removeReview(): Promise<void>;
}

interface ArtifactFs {
  readFileSync(path: string, encoding: BufferEncoding): string;
}

export interface FileReviewArtifactStoreOptions {
  readonly fsImpl?: ArtifactFs;
  readonly writeFile?: (targetPath: string, data: string) => Promise<void>;
  readonly removeFile?: (targetPath: string) => Promise<unknown>;
  readonly onWarning?: (message: string) => void;
}

function asObject(value: unknown): Record<string, unknown> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return null;
  }
  return value as Record<string, unknown>;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1;
}

function normalizeComment(value: unknown): PersistedComment | null {
  const row = asObject(value);
  if (!row) {
    return null;
  }
  const { id, start_line, end_line, body, created_at, updated_at } = row;
  if (typeof id !== "string" || id === "") {
    return null;
  }
  if (!isPositiveInteger(start_line) || !isPositiveInteger(end_line) || end_line < start_line) {
    return null;
  }
  if (typeof body !== "string" || body === "") {
    return null;
  }
  const createdAt = typeof created_at === "string" ? created_at : "";
  return {
    id,
    start_line,
    end_line,
    body,
    created_at: createdAt,
    updated_at: typeof updated_at === "string" ? updated_at : createdAt,
  };
}

/**
 * Parses a sidecar payload. Root-level shape errors throw; individual comment
 * rows that do not validate are dropped and reported through `onSkip`.
 */
export function parseReviewSnapshot(
  value: unknown,
  onSkip?: (index: number) => void
): ReviewSnapshot {
  const root = asObject(value);
  if (!root) {
    throw new Error("SNAPSHOT_VALIDATION_ERROR snapshot must be an object");
  }
  if (typeof root.file_hash !== "string" || root.file_hash === "") {
    throw new Error("SNAPSHOT_VALIDATION_ERROR file_hash must be a non-empty string");
  }
  if (!Array.isArray(root.comments)) {
    throw new Error("SNAPSHOT_VALIDATION_ERROR comments must be an array");
  }

  const comments: PersistedComment[] = [];
  root.comments.forEach((entry: unknown, index: number) => {
    const parsed = normalizeComment(entry);
    if (parsed) {
      comments.push(parsed);
    } else {
      onSkip?.(index);
    }
  });

  return {
    file: typeof root.file === "string" ? root.file : "",
    file_hash: root.file_hash,
    updated_at: typeof root.updated_at === "string" ? root.updated_at : "",
    next_id: isPositiveInteger(root.next_id) ? root.next_id : undefined,
    comments,
  };
}

export function serializeReviewSnapshot(snapshot: ReviewSnapshot): string {
  return `${JSON.stringify(
    {
      file: snapshot.file,
      file_hash: snapshot.file_hash,
      updated_at: snapshot.updated_at,
      next_id: snapshot.next_id,
      comments: snapshot.comments,
    },
    null,
    2
  )}\n`;
}

export class FileReviewArtifactStore implements ReviewArtifactStore {
  readonly paths: ReviewArtifactPaths;
  private readonly fsImpl: ArtifactFs;
  private readonly writeFile: (targetPath: string, data: string) => Promise<void>;
  private readonly removeFile: (targetPath: string) => Promise<unknown>;
  private readonly onWarning?: (message: string) => void;

  constructor(paths: ReviewArtifactPaths, options: FileReviewArtifactStoreOptions = {}) {
    this.paths = paths;
    this.fsImpl = options.fsImpl ?? fs;
    this.writeFile = options.writeFile ?? replaceArtifact;
    this.removeFile = options.removeFile ?? removeArtifact;
    this.onWarning = options.onWarning;
  }

  loadSnapshot(): ReviewSnapshot | null {
    const targetPath = this.paths.snapshotPath;

    let serialized: string;
    try {
      serialized = this.fsImpl.readFileSync(targetPath, "utf8");
    } catch (error) {
      const nodeError = error as NodeJS.ErrnoException;
      if (nodeError?.code === "ENOENT") {
        return null;
      }
      throw new PersistenceIOError(targetPath, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(serialized) as unknown;
    } catch (error) {
      throw new Error(
        `SNAPSHOT_PARSE_ERROR ${targetPath}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    return parseReviewSnapshot(parsed, (index) => {
      this.onWarning?.(`SNAPSHOT_COMMENT_SKIPPED ${targetPath} index=${String(index)}`);
    });
  }

  async saveSnapshot(snapshot: ReviewSnapshot): Promise<void> {
    await this.guard(this.paths.snapshotPath, () =>
      this.writeFile(this.paths.snapshotPath, serializeReviewSnapshot(snapshot))
    );
  }

  async writeReview(text: string): Promise<void> {
    await this.guard(this.paths.reviewFilePath, () => this.writeFile(this.paths.reviewFilePath, text));
  }

  async removeReview(): Promise<void> {
    await this.guard(this.paths.reviewFilePath, () => this.removeFile(this.paths.reviewFilePath));
  }

  private async guard(targetPath: string, action: () => Promise<unknown>): Promise<void> {
    try {
      await action();
    } catch (error) {
      if (error instanceof PersistenceIOError) {
        throw error;
      }
      throw new PersistenceIOError(targetPath, error);
    }
  }
}
