import type { ReviewComment } from "./review.types";

type RenderableComment = Pick<ReviewComment, "startLine" | "endLine" | "body">;

interface AnchoredComment {
  readonly comment: RenderableComment;
  readonly anchor: number;
  readonly order: number;
}

export function splitSourceLines(content: string): { lines: string[]; trailingNewline: boolean } {
  if (content === "") {
    return { lines: [], trailingNewline: false };
  }
  const trailingNewline = content.endsWith("\n");
  const body = trailingNewline ? content.slice(0, -1) : content;
  return { lines: body.split("\n"), trailingNewline };
}

export function formatLineRange(startLine: number, endLine: number): string {
  if (startLine === endLine) {
    return `Line ${String(startLine)}`;
  }
  return `Lines ${String(startLine)}-${String(endLine)}`;
}

export function formatAnnotationBlock(comment: RenderableComment): string[] {
  const bodyLines = comment.body.replace(/\r\n/g, "\n").split("\n");
  const [first = "", ...rest] = bodyLines;
  const header = `> **[REVIEW COMMENT: ${formatLineRange(comment.startLine, comment.endLine)}]**: ${first}`;
  return [header, ...rest.map((line) => (line === "" ? ">" : `> ${line}`))];
}

function groupByAnchor(
  comments: readonly RenderableComment[],
  lastLine: number
): Map<number, RenderableComment[]> {
  const anchored: AnchoredComment[] = comments.map((comment, order) => ({
    comment,
    anchor: Math.min(comment.endLine, lastLine),
    order,
  }));

  anchored.sort(
    (left, right) =>
      left.anchor - right.anchor ||
      left.comment.startLine - right.comment.startLine ||
      left.order - right.order
  );

  const groups = new Map<number, RenderableComment[]>();
  for (const entry of anchored) {
    const group = groups.get(entry.anchor);
    if (group) {
      group.push(entry.comment);
    } else {
      groups.set(entry.anchor, [entry.comment]);
    }
  }
  return groups;
}

function emitGroup(out: string[], group: readonly RenderableComment[] | undefined): void {
  if (!group || group.length === 0) {
    return;
  }
  out.push("");
  group.forEach((comment, index) => {
    if (index > 0) {
      out.push("");
    }
    out.push(...formatAnnotationBlock(comment));
  });
  out.push("");
}

/**
 * Interleaves comments into the source text. Each comment is emitted after its
 * end line; comments past the last line follow the final line. Output depends
 * only on the arguments.
 */
export function renderAnnotatedDocument(
  content: string,
  comments: readonly RenderableComment[]
): string {
  const { lines, trailingNewline } = splitSourceLines(content);
  const groups = groupByAnchor(comments, lines.length);
  const out: string[] = [];

  // anchor 0 only happens for an empty document
  emitGroup(out, groups.get(0));
  lines.forEach((line, index) => {
    out.push(line);
    emitGroup(out, groups.get(index + 1));
  });

  const rendered = out.join("\n");
  return trailingNewline ? `${rendered}\n` : rendered;
}
