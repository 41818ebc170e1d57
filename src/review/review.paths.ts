import path from "node:path";

export const SNAPSHOT_FILE_SUFFIX = ".comments.json";
export const REVIEW_FILE_INFIX = ".review";

export interface ReviewArtifactPaths {
  readonly snapshotPath: string;
  readonly reviewFilePath: string;
}

/** `.plan.md.comments.json` beside the review output. Hidden so it stays out of directory listings. */
export function buildSnapshotPath(outputDir: string, fileName: string): string {
  return path.join(outputDir, `.${fileName}${SNAPSHOT_FILE_SUFFIX}`);
}

export function buildReviewFilePath(outputDir: string, fileName: string): string {
  const ext = path.extname(fileName);
  const base = ext === "" ? fileName : fileName.slice(0, -ext.length);
  return path.join(outputDir, `${base}${REVIEW_FILE_INFIX}${ext}`);
}

export function resolveArtifactPaths(outputDir: string, fileName: string): ReviewArtifactPaths {
  return {
    snapshotPath: buildSnapshotPath(outputDir, fileName),
    reviewFilePath: buildReviewFilePath(outputDir, fileName),
  };
}
