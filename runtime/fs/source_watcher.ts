import fs from "node:fs";

export const DEFAULT_WATCH_INTERVAL_MS = 1000;

export interface WatchedStat {
  readonly mtimeMs: number;
  readonly size: number;
}

type StatListener = (current: WatchedStat, previous: WatchedStat) => void;

interface WatchFs {
  watchFile(
    filename: string,
    options: { interval: number; persistent: boolean },
    listener: StatListener
  ): unknown;
  unwatchFile(filename: string, listener: StatListener): void;
}

export interface SourceWatcherOptions {
  readonly intervalMs?: number;
  readonly fsImpl?: WatchFs;
}

export function hasSourceChanged(current: WatchedStat, previous: WatchedStat): boolean {
  return current.mtimeMs !== previous.mtimeMs || current.size !== previous.size;
}

/**
 * Polls `sourcePath` and calls `onChange` whenever its mtime or size moves.
 * Returns the stop function.
 */
export function watchSourceFile(
  sourcePath: string,
  onChange: () => void,
  options: SourceWatcherOptions = {}
): () => void {
  const fsImpl = options.fsImpl ?? fs;
  const listener: StatListener = (current, previous) => {
    if (hasSourceChanged(current, previous)) {
      onChange();
    }
  };

  fsImpl.watchFile(
    sourcePath,
    { interval: options.intervalMs ?? DEFAULT_WATCH_INTERVAL_MS, persistent: false },
    listener
  );

  let stopped = false;
  return () => {
    if (stopped) {
      return;
    }
    stopped = true;
    fsImpl.unwatchFile(sourcePath, listener);
  };
}
