import type {
  CommentDTO,
  DocumentDTO,
  ReviewCommentView,
} from "../../src/adapters/web/web.types";

export function mapCommentToDTO(comment: ReviewCommentView): CommentDTO {
  return {
    id: comment.id,
    start_line: comment.startLine,
    end_line: comment.endLine,
    body: comment.body,
    created_at: comment.createdAt,
    updated_at: comment.updatedAt,
  };
}

export function mapCommentsToDTO(comments: readonly ReviewCommentView[]): CommentDTO[] {
  return comments.map(mapCommentToDTO);
}

export function mapDocumentToDTO(document: {
  readonly fileName: string;
  readonly content: string;
}): DocumentDTO {
  return {
    filename: document.fileName,
    content: document.content,
  };
}
