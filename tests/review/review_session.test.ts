import test, { type TestContext } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { computeContentFingerprint } from "../../src/review/fingerprint";
import { STALE_SESSION_NOTICE } from "../../src/review/review.document";
import { SessionClosedError } from "../../src/review/review.errors";
import { ReviewSession, loadReviewDocument } from "../../src/review/review.session";
import { ManualScheduler, makeClock, makeLogger } from "../helpers/review_fakes";

const SOURCE = "line one\nline two\n";

function makeWorkspace(t: TestContext, content: string = SOURCE) {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "review-session-"));
  t.after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });
  const sourcePath = path.join(dir, "plan.md");
  fs.writeFileSync(sourcePath, content, "utf8");
  return {
    dir,
    sourcePath,
    snapshotPath: path.join(dir, ".plan.md.comments.json"),
    reviewPath: path.join(dir, "plan.review.md"),
  };
}

function openSession(sourcePath: string, outputDir?: string) {
  const logger = makeLogger();
  const scheduler = new ManualScheduler();
  const session = ReviewSession.open({
    sourcePath,
    outputDir,
    logger,
    now: makeClock(),
    engine: { scheduler },
  });
  return { session, logger, scheduler };
}

test("fresh load: no sidecar, no notice, nothing written yet", async (t) => {
  const workspace = makeWorkspace(t);
  const { session } = openSession(workspace.sourcePath);

  assert.equal(session.loadStatus, "fresh");
  assert.deepEqual(session.getDocument(), { fileName: "plan.md", content: SOURCE });
  assert.equal(session.getStaleNotice(), "");
  assert.deepEqual(session.getComments(), []);
  assert.equal(fs.existsSync(workspace.snapshotPath), false);

  await session.shutdown();
});

test("resume keeps comments and never reuses a deleted id", async (t) => {
  const workspace = makeWorkspace(t);
  const first = openSession(workspace.sourcePath);
  first.session.addComment(1, 1, "first");
  const second = first.session.addComment(2, 2, "second");
  first.session.deleteComment(second.id);
  first.session.addComment(1, 2, "third");
  await first.session.shutdown();

  assert.equal(
    fs.readFileSync(workspace.reviewPath, "utf8"),
    "line one\n\n> **[REVIEW COMMENT: Line 1]**: first\n\nline two\n\n> **[REVIEW COMMENT: Lines 1-2]**: third\n\n"
  );
  const stored = JSON.parse(fs.readFileSync(workspace.snapshotPath, "utf8")) as {
    file_hash: string;
    next_id: number;
  };
  assert.equal(stored.file_hash, computeContentFingerprint(SOURCE));
  assert.equal(stored.next_id, 4);

  const resumed = openSession(workspace.sourcePath);
  assert.equal(resumed.session.loadStatus, "resumed");
  assert.deepEqual(
    resumed.session.getComments().map((comment) => comment.id),
    ["c1", "c3"]
  );
  assert.deepEqual(resumed.logger.logs, [
    `[review] resumed 2 comment(s) from ${workspace.snapshotPath}`,
  ]);
  assert.equal(resumed.session.addComment(2, 2, "fourth").id, "c4");
  await resumed.session.shutdown();
});

test("changed source starts empty with the stale notice and leaves the sidecar alone", async (t) => {
  const workspace = makeWorkspace(t);
  const first = openSession(workspace.sourcePath);
  first.session.addComment(1, 1, "before edit");
  await first.session.shutdown();
  const previousSidecar = fs.readFileSync(workspace.snapshotPath, "utf8");

  fs.writeFileSync(workspace.sourcePath, "line one\nline 2\n", "utf8");
  const reopened = openSession(workspace.sourcePath);

  assert.equal(reopened.session.loadStatus, "stale");
  assert.equal(reopened.session.getStaleNotice(), STALE_SESSION_NOTICE);
  assert.deepEqual(reopened.session.getComments(), []);
  assert.equal(fs.readFileSync(workspace.snapshotPath, "utf8"), previousSidecar);

  reopened.session.clearStaleNotice();
  assert.equal(reopened.session.getStaleNotice(), "");
  assert.equal(reopened.scheduler.tasks.length, 0);

  reopened.session.addComment(2, 2, "after edit");
  await reopened.session.shutdown();
  const replaced = JSON.parse(fs.readFileSync(workspace.snapshotPath, "utf8")) as {
    file_hash: string;
    comments: Array<{ body: string }>;
  };
  assert.equal(replaced.file_hash, computeContentFingerprint("line one\nline 2\n"));
  assert.deepEqual(
    replaced.comments.map((comment) => comment.body),
    ["after edit"]
  );
});

test("shutdown persists a mutation whose debounce has not elapsed", async (t) => {
  const workspace = makeWorkspace(t);
  const session = ReviewSession.open({
    sourcePath: workspace.sourcePath,
    logger: makeLogger(),
    engine: { debounceMs: 10_000 },
  });

  session.addComment(2, 2, "last second");
  assert.equal(session.engine.hasPendingWrite, true);
  await session.shutdown();

  assert.equal(session.engine.hasPendingWrite, false);
  assert.equal(
    fs.readFileSync(workspace.reviewPath, "utf8"),
    "line one\nline two\n\n> **[REVIEW COMMENT: Line 2]**: last second\n\n"
  );
});

test("corrupt sidecar is reported and treated as absent", async (t) => {
  const workspace = makeWorkspace(t);
  fs.writeFileSync(workspace.snapshotPath, "{oops", "utf8");

  const { session, logger } = openSession(workspace.sourcePath);

  assert.equal(session.loadStatus, "fresh");
  assert.equal(logger.warnings.length, 1);
  assert.match(
    logger.warnings[0] ?? "",
    /^\[review\] ignoring unreadable snapshot: SNAPSHOT_PARSE_ERROR /
  );
  await session.shutdown();
});

test("unreadable source fails the load", () => {
  assert.throws(
    () =>
      loadReviewDocument({
        sourcePath: "/docs/plan.md",
        readSource: () => {
          throw new Error("ENOENT: no such file or directory");
        },
        logger: makeLogger(),
      }),
    {
      message: "REVIEW_SOURCE_READ_ERROR /docs/plan.md: ENOENT: no such file or directory",
    }
  );
});

test("artifacts go to the output directory when one is given", async (t) => {
  const workspace = makeWorkspace(t);
  const outputDir = path.join(workspace.dir, "out");
  fs.mkdirSync(outputDir);
  const { session } = openSession(workspace.sourcePath, outputDir);

  session.addComment(1, 1, "elsewhere");
  const result = await session.finish();

  assert.deepEqual(result, { reviewFilePath: path.join(outputDir, "plan.review.md") });
  assert.equal(fs.existsSync(path.join(outputDir, ".plan.md.comments.json")), true);
  assert.equal(fs.existsSync(workspace.reviewPath), false);
  await session.shutdown();
});

test("deleting the last comment removes the annotated document", async (t) => {
  const workspace = makeWorkspace(t);
  const { session } = openSession(workspace.sourcePath);

  const comment = session.addComment(1, 1, "short lived");
  await session.finish();
  assert.equal(fs.existsSync(workspace.reviewPath), true);

  session.deleteComment(comment.id);
  await session.finish();
  assert.equal(fs.existsSync(workspace.reviewPath), false);
  const stored = JSON.parse(fs.readFileSync(workspace.snapshotPath, "utf8")) as {
    comments: unknown[];
  };
  assert.deepEqual(stored.comments, []);
  await session.shutdown();
});

test("source change notification is logged once", async (t) => {
  const workspace = makeWorkspace(t);
  const { session, logger } = openSession(workspace.sourcePath);

  session.noteSourceChanged();
  session.noteSourceChanged();

  assert.equal(session.sourceChangedOnDisk, true);
  assert.deepEqual(logger.warnings, [
    "[review] plan.md changed on disk; comments still refer to the content loaded at startup",
  ]);
  assert.equal(session.getStaleNotice(), "");
  await session.shutdown();
});

test("a mutation that arrives while the final flush runs is refused, not lost", async (t) => {
  const workspace = makeWorkspace(t);
  const { session } = openSession(workspace.sourcePath);
  session.addComment(1, 1, "before");

  const closing = session.shutdown();
  await new Promise<void>((resolve) => setImmediate(resolve));
  assert.throws(() => session.addComment(2, 2, "late request"), SessionClosedError);
  await closing;

  const stored = JSON.parse(fs.readFileSync(workspace.snapshotPath, "utf8")) as {
    comments: Array<{ body: string }>;
  };
  assert.deepEqual(
    stored.comments.map((comment) => comment.body),
    ["before"]
  );
  assert.deepEqual(
    session.getComments().map((comment) => comment.body),
    ["before"]
  );
});
