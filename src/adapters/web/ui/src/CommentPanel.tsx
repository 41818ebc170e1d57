import { useState } from "react";
import type { CommentDTO } from "../../web.types";
import type { LineSelection } from "./DocumentView";

interface CommentPanelProps {
  readonly comments: readonly CommentDTO[];
  readonly selection: LineSelection | null;
  readonly errorMessage: string;
  readonly onAdd: (body: string) => Promise<boolean>;
  readonly onUpdate: (id: string, body: string) => Promise<boolean>;
  readonly onDelete: (id: string) => void;
}

function formatRange(startLine: number, endLine: number): string {
  return startLine === endLine ? `Line ${startLine}` : `Lines ${startLine}-${endLine}`;
}

function byLine(left: CommentDTO, right: CommentDTO): number {
  return left.end_line - right.end_line || left.start_line - right.start_line;
}

export function CommentPanel(props: CommentPanelProps): JSX.Element {
  const [draft, setDraft] = useState("");
  const [editingId, setEditingId] = useState<string | null>(null);
  const [editDraft, setEditDraft] = useState("");

  const handleAdd = async (): Promise<void> => {
    if (await props.onAdd(draft)) {
      setDraft("");
    }
  };

  const handleSave = async (id: string): Promise<void> => {
    if (await props.onUpdate(id, editDraft)) {
      setEditingId(null);
    }
  };

  return (
    <section className="panel comments">
      <h2>Comments</h2>
      <div className="comment-form">
        <label htmlFor="comment-draft">
          {props.selection
            ? formatRange(props.selection.startLine, props.selection.endLine)
            : "Click a line (shift-click to extend)"}
        </label>
        <textarea
          id="comment-draft"
          value={draft}
          onChange={(event) => setDraft(event.target.value)}
          disabled={!props.selection}
        />
        <button type="button" onClick={() => void handleAdd()} disabled={!props.selection}>
          Add comment
        </button>
      </div>

      {props.errorMessage ? <div className="comment-error">{props.errorMessage}</div> : null}

      <ul className="comment-list">
        {[...props.comments].sort(byLine).map((comment) => (
          <li key={comment.id} className="comment-item">
            <div className="comment-range">{formatRange(comment.start_line, comment.end_line)}</div>
            {editingId === comment.id ? (
              <>
                <textarea value={editDraft} onChange={(event) => setEditDraft(event.target.value)} />
                <div className="actions">
                  <button type="button" onClick={() => void handleSave(comment.id)}>
                    Save
                  </button>
                  <button type="button" className="secondary" onClick={() => setEditingId(null)}>
                    Cancel
                  </button>
                </div>
              </>
            ) : (
              <>
                <pre className="comment-body">{comment.body}</pre>
                <div className="actions">
                  <button
                    type="button"
                    className="secondary"
                    onClick={() => {
                      setEditingId(comment.id);
                      setEditDraft(comment.body);
                    }}
                  >
                    Edit
                  </button>
                  <button type="button" className="warn" onClick={() => props.onDelete(comment.id)}>
                    Delete
                  </button>
                </div>
              </>
            )}
          </li>
        ))}
      </ul>
    </section>
  );
}
