import test, { type TestContext } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { buildTempPath, removeArtifact, replaceArtifact } from "../../../runtime/fs/artifact_write";

function makeTempDir(t: TestContext): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "artifact-write-"));
  t.after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });
  return dir;
}

test("temp files are hidden siblings of the target", () => {
  const tempPath = buildTempPath(path.join("/out", "plan.review.md"));
  assert.equal(path.dirname(tempPath), path.join("/out"));
  assert.match(path.basename(tempPath), /^\.plan\.review\.md\.[0-9a-f-]{36}\.tmp$/);
});

test("replace creates missing directories and leaves no temp files", async (t) => {
  const dir = makeTempDir(t);
  const target = path.join(dir, "nested", "plan.review.md");

  await replaceArtifact(target, "first\n");
  await replaceArtifact(target, "second\n");

  assert.equal(fs.readFileSync(target, "utf8"), "second\n");
  assert.deepEqual(fs.readdirSync(path.dirname(target)), ["plan.review.md"]);
});

test("replace keeps the permission bits of an existing artifact", async (t) => {
  const dir = makeTempDir(t);
  const target = path.join(dir, "plan.review.md");
  fs.writeFileSync(target, "old\n", "utf8");
  fs.chmodSync(target, 0o600);

  await replaceArtifact(target, "new\n");

  assert.equal(fs.readFileSync(target, "utf8"), "new\n");
  if (process.platform !== "win32") {
    assert.equal(fs.statSync(target).mode & 0o777, 0o600);
  }
});

test("failed rename removes its temp file", async (t) => {
  const dir = makeTempDir(t);
  // a file cannot be renamed over a non-empty directory
  const blockedTarget = path.join(dir, "blocked");
  fs.mkdirSync(path.join(blockedTarget, "child"), { recursive: true });

  await assert.rejects(() => replaceArtifact(blockedTarget, "never\n"));

  assert.deepEqual(fs.readdirSync(dir), ["blocked"]);
  assert.deepEqual(fs.readdirSync(blockedTarget), ["child"]);
});

test("removeArtifact reports whether a file was removed", async (t) => {
  const dir = makeTempDir(t);
  const target = path.join(dir, "plan.review.md");
  fs.writeFileSync(target, "x", "utf8");

  assert.equal(await removeArtifact(target), true);
  assert.equal(await removeArtifact(target), false);
  assert.equal(fs.existsSync(target), false);
});
