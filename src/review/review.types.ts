export interface ReviewComment {
  readonly id: string;
  readonly startLine: number;
  readonly endLine: number;
  readonly body: string;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/** On-disk comment shape inside the sidecar file. */
export interface PersistedComment {
  readonly id: string;
  readonly start_line: number;
  readonly end_line: number;
  readonly body: string;
  readonly created_at: string;
  readonly updated_at: string;
}

export interface ReviewSnapshot {
  readonly file: string;
  readonly file_hash: string;
  readonly updated_at: string;
  readonly next_id?: number;
  readonly comments: readonly PersistedComment[];
}

export type Clock = () => Date;

export function toPersistedComment(comment: ReviewComment): PersistedComment {
  return {
    id: comment.id,
    start_line: comment.startLine,
    end_line: comment.endLine,
    body: comment.body,
    created_at: comment.createdAt,
    updated_at: comment.updatedAt,
  };
}

export function fromPersistedComment(row: PersistedComment): ReviewComment {
  return {
    id: row.id,
    startLine: row.start_line,
    endLine: row.end_line,
    body: row.body,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
