export interface WebErrorDTO {
  readonly errorCode: string;
  readonly guideMessage: string;
  readonly message?: string;
}

export interface DocumentDTO {
  readonly filename: string;
  readonly content: string;
}

export interface CommentDTO {
  readonly id: string;
  readonly start_line: number;
  readonly end_line: number;
  readonly body: string;
  readonly created_at: string;
  readonly updated_at: string;
}

export interface CreateCommentRequestDTO {
  readonly start_line: number;
  readonly end_line: number;
  readonly body: string;
}

export interface UpdateCommentRequestDTO {
  readonly body: string;
}

export interface StaleNoticeDTO {
  readonly notice: string;
}

export interface FinishResultDTO {
  readonly status: "finished";
  readonly review_file: string;
}

export interface StatusDTO {
  readonly status: string;
}

export interface ReviewCommentView {
  readonly id: string;
  readonly startLine: number;
  readonly endLine: number;
  readonly body: string;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/** Operations the HTTP layer needs from a review session. */
export interface IReviewSessionApi {
  getDocument(): { readonly fileName: string; readonly content: string };
  getComments(): readonly ReviewCommentView[];
  addComment(startLine: number, endLine: number, body: string): ReviewCommentView;
  updateComment(id: string, body: string): ReviewCommentView;
  deleteComment(id: string): boolean;
  getStaleNotice(): string;
  clearStaleNotice(): void;
  finish(): Promise<{ readonly reviewFilePath: string }>;
}
