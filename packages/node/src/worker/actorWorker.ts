/**
 * Node worker-thread entrypoint serving one isolated actor.
 * @see packages/node/src/backend/workerSpawner.ts
 */

import { parentPort, workerData } from "node:worker_threads";
import { describeThrown, serveActor } from "@trellis-ui/core";
import { createPortEndpoint } from "../backend/portEndpoint.js";
import { findActorDefinition, parseActorWorkerData } from "./protocol.js";

const port = parentPort;
if (port === null) {
  throw new Error("actorWorker: parentPort is null (not running in worker_threads)");
}

const data = parseActorWorkerData(workerData);
if (data === null) {
  throw new Error("actorWorker: workerData must be { moduleUrl, name }");
}

let moduleExports: unknown;
try {
  moduleExports = await import(data.moduleUrl);
} catch (e: unknown) {
  throw new Error(`actorWorker: cannot import ${data.moduleUrl}: ${describeThrown(e)}`, { cause: e });
}

const def =
  typeof moduleExports === "object" && moduleExports !== null
    ? findActorDefinition(moduleExports, data.name)
    : null;
if (def === null) {
  throw new Error(`actorWorker: ${data.moduleUrl} exports no actor named ${data.name}`);
}

serveActor(def, createPortEndpoint(port));
