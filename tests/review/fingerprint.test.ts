import test from "node:test";
import assert from "node:assert/strict";
import { computeContentFingerprint } from "../../src/review/fingerprint";

test("fingerprint: sha256 of empty input carries the algorithm prefix", () => {
  assert.equal(
    computeContentFingerprint(""),
    "sha256:e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
  );
});

test("fingerprint: string and utf8 bytes of the same text agree", () => {
  const text = "# Plan\n\nStep one — ship it\n";
  assert.equal(computeContentFingerprint(text), computeContentFingerprint(Buffer.from(text, "utf8")));
});

test("fingerprint: a one-byte change produces a different digest", () => {
  assert.notEqual(computeContentFingerprint("line a\n"), computeContentFingerprint("line b\n"));
});

test("fingerprint: repeated calls are deterministic", () => {
  const data = Buffer.from("alpha\nbeta\n");
  assert.equal(computeContentFingerprint(data), computeContentFingerprint(data));
});
