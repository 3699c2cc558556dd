/**
 * packages/node/src/backend/portEndpoint.ts — IsolateEndpoint over worker_threads ports.
 *
 * Why: Envelopes cross threads as transferred ArrayBuffers. The sender copies
 * into a fresh buffer before transferring, so callers keep ownership of the
 * bytes they passed in.
 *
 * @see packages/core/src/actor/types.ts
 */

import type { MessagePort, Worker } from "node:worker_threads";
import type { IsolateEndpoint } from "@trellis-ui/core";

function toBytes(m: unknown): Uint8Array {
  if (m instanceof ArrayBuffer) return new Uint8Array(m);
  if (m instanceof Uint8Array) return m;
  // Non-binary messages fail envelope decoding on the receiving side.
  return new Uint8Array(0);
}

function transferable(bytes: Uint8Array): ArrayBuffer {
  const buf = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buf).set(bytes);
  return buf;
}

/** Endpoint over a MessagePort (either end of a MessageChannel, or a worker's parentPort). */
export function createPortEndpoint(port: MessagePort): IsolateEndpoint {
  let closed = false;
  let onMessage: ((bytes: Uint8Array) => void) | null = null;
  let onClose: ((error: Error | null) => void) | null = null;

  port.on("message", (m: unknown) => {
    if (closed) return;
    onMessage?.(toBytes(m));
  });
  port.on("close", () => {
    if (closed) return;
    closed = true;
    onClose?.(null);
  });

  return Object.freeze({
    send(bytes: Uint8Array): void {
      if (closed) throw new Error("port endpoint is closed");
      const buf = transferable(bytes);
      port.postMessage(buf, [buf]);
    },
    onMessage(handler: (bytes: Uint8Array) => void): void {
      onMessage = handler;
    },
    onClose(handler: (error: Error | null) => void): void {
      onClose = handler;
    },
    close(): void {
      if (closed) return;
      closed = true;
      port.close();
    },
  });
}

export type WorkerEndpointOptions = Readonly<{
  /** Terminate the worker if it has not exited this long after close(). */
  exitGraceMs: number;
  onTerminateError: (error: unknown) => void;
}>;

/** Host end of a worker running the actor entry. */
export function createWorkerEndpoint(worker: Worker, opts: WorkerEndpointOptions): IsolateEndpoint {
  let closed = false;
  let exited = false;
  let onMessage: ((bytes: Uint8Array) => void) | null = null;
  let onClose: ((error: Error | null) => void) | null = null;

  function finish(error: Error | null): void {
    if (closed) return;
    closed = true;
    onClose?.(error);
  }

  worker.on("message", (m: unknown) => {
    if (closed) return;
    onMessage?.(toBytes(m));
  });
  worker.on("error", (err: Error) => {
    finish(err);
  });
  worker.on("exit", (code: number) => {
    exited = true;
    finish(code === 0 ? null : new Error(`actor worker exited with code ${String(code)}`));
  });

  return Object.freeze({
    send(bytes: Uint8Array): void {
      if (closed) throw new Error("worker endpoint is closed");
      const buf = transferable(bytes);
      worker.postMessage(buf, [buf]);
    },
    onMessage(handler: (bytes: Uint8Array) => void): void {
      onMessage = handler;
    },
    onClose(handler: (error: Error | null) => void): void {
      onClose = handler;
    },
    close(): void {
      if (closed) return;
      closed = true;
      // The worker exits by itself once it has processed DESTROY.
      worker.unref();
      const timer = setTimeout(() => {
        if (exited) return;
        void worker.terminate().catch(opts.onTerminateError);
      }, opts.exitGraceMs);
      timer.unref();
    },
  });
}
