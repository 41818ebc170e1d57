import { useCallback, useEffect, useState } from "react";
import type { CommentDTO, DocumentDTO } from "../../web.types";
import { reviewApi, toMessage } from "./api";
import { CommentPanel } from "./CommentPanel";
import { DocumentView, type LineSelection } from "./DocumentView";

function extendSelection(
  current: LineSelection | null,
  line: number,
  extend: boolean
): LineSelection {
  if (!extend || current === null) {
    return { startLine: line, endLine: line };
  }
  return {
    startLine: Math.min(current.startLine, line),
    endLine: Math.max(current.endLine, line),
  };
}

export function App(): JSX.Element {
  const [reviewDocument, setReviewDocument] = useState<DocumentDTO | null>(null);
  const [comments, setComments] = useState<readonly CommentDTO[]>([]);
  const [staleNotice, setStaleNotice] = useState("");
  const [selection, setSelection] = useState<LineSelection | null>(null);
  const [clientError, setClientError] = useState("");
  const [commentError, setCommentError] = useState("");
  const [finishedPath, setFinishedPath] = useState<string | null>(null);

  const refreshComments = useCallback(async (): Promise<void> => {
    setComments(await reviewApi.getComments());
  }, []);

  useEffect(() => {
    let disposed = false;

    const initialize = async (): Promise<void> => {
      try {
        const [loadedDocument, loadedComments, stale] = await Promise.all([
          reviewApi.getDocument(),
          reviewApi.getComments(),
          reviewApi.getStaleNotice(),
        ]);
        if (disposed) {
          return;
        }
        setReviewDocument(loadedDocument);
        setComments(loadedComments);
        setStaleNotice(stale.notice);
      } catch (error) {
        if (!disposed) {
          setClientError(toMessage(error));
        }
      }
    };

    void initialize();
    return () => {
      disposed = true;
    };
  }, []);

  const handleAdd = async (body: string): Promise<boolean> => {
    if (!selection) {
      return false;
    }
    setCommentError("");
    try {
      await reviewApi.addComment(selection.startLine, selection.endLine, body);
      await refreshComments();
      setSelection(null);
      return true;
    } catch (error) {
      setCommentError(toMessage(error));
      return false;
    }
  };

  const handleUpdate = async (id: string, body: string): Promise<boolean> => {
    setCommentError("");
    try {
      await reviewApi.updateComment(id, body);
      await refreshComments();
      return true;
    } catch (error) {
      setCommentError(toMessage(error));
      return false;
    }
  };

  const handleDelete = (id: string): void => {
    setCommentError("");
    void reviewApi
      .deleteComment(id)
      .then(refreshComments)
      .catch((error: unknown) => setCommentError(toMessage(error)));
  };

  const handleDismissStale = (): void => {
    void reviewApi
      .clearStaleNotice()
      .then(() => setStaleNotice(""))
      .catch((error: unknown) => setClientError(toMessage(error)));
  };

  const handleFinish = async (): Promise<void> => {
    setClientError("");
    try {
      const result = await reviewApi.finish();
      setFinishedPath(result.review_file);
    } catch (error) {
      setClientError(toMessage(error));
    }
  };

  if (!reviewDocument && !clientError) {
    return (
      <main className="app">
        <section className="panel">
          <p>Loading...</p>
        </section>
      </main>
    );
  }

  return (
    <main className="app">
      <header className="topbar">
        <h1>{reviewDocument?.filename ?? "Line Review"}</h1>
        <div className="actions">
          <span className="chip">{comments.length} comment(s)</span>
          <button type="button" onClick={() => void handleFinish()} disabled={finishedPath !== null}>
            Finish review
          </button>
        </div>
      </header>

      {finishedPath ? (
        <section className="panel done">
          Review written to <code>{finishedPath}</code>. You can close this tab.
        </section>
      ) : null}

      {staleNotice ? (
        <section className="panel stale">
          <span>{staleNotice}</span>
          <button type="button" className="secondary" onClick={handleDismissStale}>
            Dismiss
          </button>
        </section>
      ) : null}

      {clientError ? (
        <section className="panel error">
          <pre>{clientError}</pre>
        </section>
      ) : null}

      <div className="layout">
        <DocumentView
          content={reviewDocument?.content ?? ""}
          comments={comments}
          selection={selection}
          onSelectLine={(line, extend) => setSelection((current) => extendSelection(current, line, extend))}
        />
        <CommentPanel
          comments={comments}
          selection={selection}
          errorMessage={commentError}
          onAdd={handleAdd}
          onUpdate={handleUpdate}
          onDelete={handleDelete}
        />
      </div>
    </main>
  );
}
