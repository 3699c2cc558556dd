/**
 * packages/node/src/backend/workerSpawner.ts — worker_threads isolate spawner.
 *
 * Why: Public and private actors run on their own thread. Each spawn starts a
 * worker on the actor entry, which imports `moduleUrl`, finds the definition
 * by name and serves it over its parentPort.
 *
 * @see packages/node/src/worker/actorWorker.ts
 */

import { Worker } from "node:worker_threads";
import {
  type IsolateSpawner,
  TrellisError,
  describeThrown,
  warnDev,
} from "@trellis-ui/core";
import type { ActorWorkerData } from "../worker/protocol.js";
import { createWorkerEndpoint } from "./portEndpoint.js";

export type WorkerSpawnerConfig = Readonly<{
  /** ES module exporting every isolated definition this spawner may start. */
  moduleUrl: string | URL;
  /** Worker entry; defaults to {@link defaultActorWorkerEntry}. */
  entry?: URL;
  /** Grace period before an unresponsive worker is terminated. */
  exitGraceMs?: number;
}>;

export const DEFAULT_EXIT_GRACE_MS = 1000;

/**
 * The actor worker beside `spawnerUrl`: actorWorker.ts when running from
 * sources under a TypeScript loader (workers inherit its execArgv), the
 * emitted actorWorker.js otherwise.
 */
export function defaultActorWorkerEntry(spawnerUrl: string = import.meta.url): URL {
  const ext = new URL(spawnerUrl).pathname.endsWith(".ts") ? "ts" : "js";
  return new URL(`../worker/actorWorker.${ext}`, spawnerUrl);
}

export function createWorkerSpawner(config: WorkerSpawnerConfig): IsolateSpawner {
  const moduleUrl = String(config.moduleUrl);
  if (moduleUrl.length === 0) {
    throw new TrellisError("TRL_INVALID_PROPS", "createWorkerSpawner: moduleUrl must be non-empty");
  }
  const exitGraceMs = config.exitGraceMs ?? DEFAULT_EXIT_GRACE_MS;
  if (!Number.isInteger(exitGraceMs) || exitGraceMs < 0) {
    throw new TrellisError(
      "TRL_INVALID_PROPS",
      `createWorkerSpawner: exitGraceMs must be a non-negative integer (got ${String(exitGraceMs)})`,
    );
  }
  const entry = config.entry ?? defaultActorWorkerEntry();

  return (request) => {
    const workerData: ActorWorkerData = { moduleUrl, name: request.name };
    const worker = new Worker(entry, { workerData });
    return createWorkerEndpoint(worker, {
      exitGraceMs,
      onTerminateError: (e) => {
        warnDev(`[trellis][actor] terminating worker for ${request.name} failed: ${describeThrown(e)}`);
      },
    });
  };
}
