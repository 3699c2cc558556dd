/**
 * packages/core/src/app/scheduler.ts — Render job queue.
 *
 * Why: State changes never render inline. They enqueue a job and the scheduler
 * drains the queue in passes, so any number of updates between two passes
 * cost one render per scope and the surface never shows a half-patched tree.
 *
 * Invariants:
 *   - A job is queued at most once (deduplicated by jobId)
 *   - Jobs pop shallowest-depth first, ties in enqueue order, so a parent
 *     renders (and hands new props down) before its children
 *   - Jobs enqueued during a pass run in the same pass
 *   - Re-entrant flush() throws TRL_REENTRANT_CALL
 *   - A pass running more than maxJobsPerPass jobs throws TRL_UPDATE_DEPTH_EXCEEDED
 *   - A throwing job does not stop the pass; the first error is rethrown after it
 */

import { TrellisError } from "../abi.js";

export interface SchedulerJob {
  readonly jobId: number;
  /** Tree depth, read when the job is queued. */
  depth(): number;
  /** Dead jobs are skipped when popped. */
  isAlive(): boolean;
  run(): void;
}

export type SchedulerStats = Readonly<{
  /** Accepted (non-duplicate) enqueues since creation. */
  enqueued: number;
  jobsRun: number;
  passes: number;
}>;

export type SchedulerConfig = Readonly<{
  autoFlush: boolean;
  maxJobsPerPass: number;
  /** Receives errors from passes the scheduler started itself. */
  onError: (error: unknown) => void;
}>;

export type Scheduler = Readonly<{
  /** Returns false when the job was already queued. */
  enqueue: (job: SchedulerJob) => boolean;
  /** Run one pass to exhaustion. */
  flush: () => void;
  isFlushing: () => boolean;
  pending: () => number;
  stats: () => SchedulerStats;
  /** Drop queued jobs and stop scheduling auto-flushes. */
  dispose: () => void;
}>;

type QueueEntry = Readonly<{ job: SchedulerJob; depth: number; seq: number }>;

function before(a: QueueEntry, b: QueueEntry): boolean {
  return a.depth < b.depth || (a.depth === b.depth && a.seq < b.seq);
}

/** Binary min-heap over (depth, seq). */
class JobHeap {
  private readonly items: QueueEntry[] = [];

  get size(): number {
    return this.items.length;
  }

  push(entry: QueueEntry): void {
    const items = this.items;
    items.push(entry);
    let i = items.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      const p = items[parent];
      if (p === undefined || !before(entry, p)) break;
      items[i] = p;
      i = parent;
    }
    items[i] = entry;
  }

  pop(): QueueEntry | undefined {
    const items = this.items;
    const top = items[0];
    const last = items.pop();
    if (top === undefined || last === undefined || items.length === 0) return top;

    let i = 0;
    const n = items.length;
    for (;;) {
      const l = 2 * i + 1;
      if (l >= n) break;
      const r = l + 1;
      const left = items[l];
      const right = items[r];
      if (left === undefined) break;
      const child = right !== undefined && before(right, left) ? right : left;
      const childIndex = child === left ? l : r;
      if (!before(child, last)) break;
      items[i] = child;
      i = childIndex;
    }
    items[i] = last;
    return top;
  }

  clear(): void {
    this.items.length = 0;
  }
}

export function createScheduler(config: SchedulerConfig): Scheduler {
  const heap = new JobHeap();
  const queued = new Set<number>();
  let seq = 0;
  let flushing = false;
  let flushScheduled = false;
  let disposed = false;
  let enqueued = 0;
  let jobsRun = 0;
  let passes = 0;

  function scheduleAutoFlush(): void {
    if (!config.autoFlush || flushScheduled || flushing || disposed) return;
    flushScheduled = true;
    queueMicrotask(() => {
      flushScheduled = false;
      if (flushing || disposed || heap.size === 0) return;
      try {
        flush();
      } catch (e: unknown) {
        config.onError(e);
      }
    });
  }

  function flush(): void {
    if (flushing) {
      throw new TrellisError("TRL_REENTRANT_CALL", "flush: called while a pass is running");
    }
    flushing = true;
    passes++;
    let ran = 0;
    let firstError: unknown = undefined;
    let failed = false;
    try {
      for (;;) {
        const entry = heap.pop();
        if (entry === undefined) break;
        queued.delete(entry.job.jobId);
        if (!entry.job.isAlive()) continue;

        ran++;
        if (ran > config.maxJobsPerPass) {
          heap.clear();
          queued.clear();
          throw new TrellisError(
            "TRL_UPDATE_DEPTH_EXCEEDED",
            `flush: more than ${String(config.maxJobsPerPass)} jobs in one pass (update loop?)`,
          );
        }

        jobsRun++;
        try {
          entry.job.run();
        } catch (e: unknown) {
          if (!failed) {
            failed = true;
            firstError = e;
          }
        }
      }
    } finally {
      flushing = false;
    }
    if (failed) throw firstError;
  }

  return Object.freeze({
    enqueue(job: SchedulerJob): boolean {
      if (disposed || queued.has(job.jobId)) return false;
      queued.add(job.jobId);
      enqueued++;
      heap.push({ job, depth: job.depth(), seq: seq++ });
      scheduleAutoFlush();
      return true;
    },
    flush,
    isFlushing(): boolean {
      return flushing;
    },
    pending(): number {
      return heap.size;
    },
    stats(): SchedulerStats {
      return Object.freeze({ enqueued, jobsRun, passes });
    },
    dispose(): void {
      disposed = true;
      heap.clear();
      queued.clear();
    },
  });
}
