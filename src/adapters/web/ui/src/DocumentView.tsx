import type { CommentDTO } from "../../web.types";

export interface LineSelection {
  readonly startLine: number;
  readonly endLine: number;
}

interface DocumentViewProps {
  readonly content: string;
  readonly comments: readonly CommentDTO[];
  readonly selection: LineSelection | null;
  readonly onSelectLine: (line: number, extend: boolean) => void;
}

function splitLines(content: string): string[] {
  const body = content.endsWith("\n") ? content.slice(0, -1) : content;
  return body === "" ? [] : body.split("\n");
}

function isSelected(line: number, selection: LineSelection | null): boolean {
  return selection !== null && line >= selection.startLine && line <= selection.endLine;
}

export function DocumentView(props: DocumentViewProps): JSX.Element {
  const lines = splitLines(props.content);
  const anchored = new Map<number, number>();
  for (const comment of props.comments) {
    const anchor = Math.min(comment.end_line, Math.max(lines.length, 1));
    anchored.set(anchor, (anchored.get(anchor) ?? 0) + 1);
  }

  return (
    <section className="panel document">
      <ol className="document-lines">
        {lines.map((text, index) => {
          const line = index + 1;
          const count = anchored.get(line) ?? 0;
          return (
            <li
              key={line}
              className={`document-line${isSelected(line, props.selection) ? " document-line-selected" : ""}`}
              onClick={(event) => props.onSelectLine(line, event.shiftKey)}
            >
              <span className="line-number">{line}</span>
              <code className="line-text">{text === "" ? " " : text}</code>
              {count > 0 ? <span className="line-badge">{count}</span> : null}
            </li>
          );
        })}
      </ol>
    </section>
  );
}
