import type { DelayScheduler, ScheduledTask } from "../../src/review/persistence.engine";
import type { ReviewArtifactPaths } from "../../src/review/review.paths";
import type { ReviewArtifactStore } from "../../src/review/snapshot.store";
import type { Clock, ReviewSnapshot } from "../../src/review/review.types";

interface ManualTask {
  readonly callback: () => void;
  readonly delayMs: number;
  cancelled: boolean;
  fired: boolean;
}

export class ManualScheduler implements DelayScheduler {
  readonly tasks: ManualTask[] = [];

  schedule(callback: () => void, delayMs: number): ScheduledTask {
    const task: ManualTask = { callback, delayMs, cancelled: false, fired: false };
    this.tasks.push(task);
    return {
      cancel: () => {
        task.cancelled = true;
      },
    };
  }

  pending(): ManualTask[] {
    return this.tasks.filter((task) => !task.cancelled && !task.fired);
  }

  fireAll(): number {
    const due = this.pending();
    for (const task of due) {
      task.fired = true;
      task.callback();
    }
    return due.length;
  }
}

export class MemoryArtifactStore implements ReviewArtifactStore {
  readonly paths: ReviewArtifactPaths = {
    snapshotPath: "/review/.plan.md.comments.json",
    reviewFilePath: "/review/plan.review.md",
  };
  readonly snapshots: ReviewSnapshot[] = [];
  readonly reviews: string[] = [];
  removals = 0;
  failSnapshotWrites = false;

  loadSnapshot(): ReviewSnapshot | null {
    return this.snapshots[this.snapshots.length - 1] ?? null;
  }

  async saveSnapshot(snapshot: ReviewSnapshot): Promise<void> {
    if (this.failSnapshotWrites) {
      throw new Error("EACCES: permission denied");
    }
    this.snapshots.push(snapshot);
  }

  async writeReview(text: string): Promise<void> {
    this.reviews.push(text);
  }

  async removeReview(): Promise<void> {
    this.removals += 1;
  }
}

export interface RecordingLogger {
  readonly logs: string[];
  readonly warnings: string[];
  log(message: string): void;
  warn(message: string): void;
}

export function makeLogger(): RecordingLogger {
  const logs: string[] = [];
  const warnings: string[] = [];
  return {
    logs,
    warnings,
    log: (message: string) => {
      logs.push(message);
    },
    warn: (message: string) => {
      warnings.push(message);
    },
  };
}

/** Each call advances one second from 2026-01-01T00:00:00.000Z. */
export function makeClock(): Clock {
  let tick = 0;
  return () => {
    const value = new Date(Date.UTC(2026, 0, 1, 0, 0, tick));
    tick += 1;
    return value;
  };
}
