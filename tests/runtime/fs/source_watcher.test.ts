import test from "node:test";
import assert from "node:assert/strict";
import {
  DEFAULT_WATCH_INTERVAL_MS,
  hasSourceChanged,
  watchSourceFile,
  type WatchedStat,
} from "../../../runtime/fs/source_watcher";

type Listener = (current: WatchedStat, previous: WatchedStat) => void;

class FakeWatchFs {
  readonly watched: Array<{ filename: string; interval: number; persistent: boolean; listener: Listener }> = [];
  readonly unwatched: string[] = [];

  watchFile(
    filename: string,
    options: { interval: number; persistent: boolean },
    listener: Listener
  ): void {
    this.watched.push({ filename, ...options, listener });
  }

  unwatchFile(filename: string, listener: Listener): void {
    assert.equal(this.watched.some((entry) => entry.listener === listener), true);
    this.unwatched.push(filename);
  }

  emit(current: WatchedStat, previous: WatchedStat): void {
    for (const entry of this.watched) {
      entry.listener(current, previous);
    }
  }
}

test("hasSourceChanged compares mtime and size", () => {
  assert.equal(hasSourceChanged({ mtimeMs: 1, size: 10 }, { mtimeMs: 1, size: 10 }), false);
  assert.equal(hasSourceChanged({ mtimeMs: 2, size: 10 }, { mtimeMs: 1, size: 10 }), true);
  assert.equal(hasSourceChanged({ mtimeMs: 1, size: 11 }, { mtimeMs: 1, size: 10 }), true);
});

test("watcher polls without keeping the process alive and reports changes", () => {
  const fsImpl = new FakeWatchFs();
  let changes = 0;

  const stop = watchSourceFile("/docs/plan.md", () => {
    changes += 1;
  }, { fsImpl });

  assert.equal(fsImpl.watched.length, 1);
  assert.equal(fsImpl.watched[0]?.filename, "/docs/plan.md");
  assert.equal(fsImpl.watched[0]?.interval, DEFAULT_WATCH_INTERVAL_MS);
  assert.equal(fsImpl.watched[0]?.persistent, false);

  fsImpl.emit({ mtimeMs: 5, size: 3 }, { mtimeMs: 5, size: 3 });
  assert.equal(changes, 0);
  fsImpl.emit({ mtimeMs: 6, size: 3 }, { mtimeMs: 5, size: 3 });
  assert.equal(changes, 1);

  stop();
  stop();
  assert.deepEqual(fsImpl.unwatched, ["/docs/plan.md"]);
});

test("watcher honours a custom interval", () => {
  const fsImpl = new FakeWatchFs();
  const stop = watchSourceFile("/docs/plan.md", () => undefined, { fsImpl, intervalMs: 50 });
  assert.equal(fsImpl.watched[0]?.interval, 50);
  stop();
});
