/**
 * FIFO microtask mailbox.
 *
 * Host-thread actors never run inside the caller's stack: every delivery is
 * queued and drained on a microtask, in post order. A task that throws stops
 * nothing else; the error goes to `onError` and the drain continues.
 */

export type Mailbox = Readonly<{
  post: (task: () => void) => void;
  /** Drop queued tasks; later posts are ignored. */
  close: () => void;
  pending: () => number;
}>;

export function createMailbox(onError: (error: unknown) => void): Mailbox {
  let queue: (() => void)[] = [];
  let scheduled = false;
  let closed = false;

  function drain(): void {
    scheduled = false;
    while (queue.length > 0 && !closed) {
      const batch = queue;
      queue = [];
      for (const task of batch) {
        if (closed) break;
        try {
          task();
        } catch (e: unknown) {
          onError(e);
        }
      }
    }
  }

  return Object.freeze({
    post(task: () => void): void {
      if (closed) return;
      queue.push(task);
      if (!scheduled) {
        scheduled = true;
        queueMicrotask(drain);
      }
    },
    close(): void {
      closed = true;
      queue = [];
    },
    pending(): number {
      return queue.length;
    },
  });
}
