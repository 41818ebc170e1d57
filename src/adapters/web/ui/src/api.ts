import type {
  CommentDTO,
  CreateCommentRequestDTO,
  DocumentDTO,
  FinishResultDTO,
  StaleNoticeDTO,
  StatusDTO,
  UpdateCommentRequestDTO,
  WebErrorDTO,
} from "../../web.types";

async function jsonFetch<T>(url: string, init?: RequestInit): Promise<T> {
  const response = await fetch(url, init);
  const payload = (await response.json().catch(() => ({}))) as Record<string, unknown>;
  if (!response.ok) {
    const error: WebErrorDTO = {
      errorCode: typeof payload.errorCode === "string" ? payload.errorCode : "RUNTIME_FAILED",
      guideMessage: typeof payload.guideMessage === "string" ? payload.guideMessage : "",
      message: typeof payload.message === "string" ? payload.message : response.statusText,
    };
    throw new Error(`${error.errorCode}: ${error.message ?? ""}`);
  }
  return payload as T;
}

function jsonInit(
  method: string,
  body: CreateCommentRequestDTO | UpdateCommentRequestDTO
): RequestInit {
  return {
    method,
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  };
}

export const reviewApi = {
  getDocument: () => jsonFetch<DocumentDTO>("/api/document"),
  getComments: () => jsonFetch<CommentDTO[]>("/api/comments"),
  addComment: (startLine: number, endLine: number, body: string) =>
    jsonFetch<CommentDTO>(
      "/api/comments",
      jsonInit("POST", { start_line: startLine, end_line: endLine, body })
    ),
  updateComment: (id: string, body: string) =>
    jsonFetch<CommentDTO>(`/api/comments/${encodeURIComponent(id)}`, jsonInit("PUT", { body })),
  deleteComment: (id: string) =>
    jsonFetch<StatusDTO>(`/api/comments/${encodeURIComponent(id)}`, { method: "DELETE" }),
  getStaleNotice: () => jsonFetch<StaleNoticeDTO>("/api/stale"),
  clearStaleNotice: () => jsonFetch<StatusDTO>("/api/stale", { method: "DELETE" }),
  finish: () => jsonFetch<FinishResultDTO>("/api/finish", { method: "POST" }),
};

export function toMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
