import {
  type ActorRuntime,
  type ActorRuntimeConfig,
  createActorRegistry,
  createActorRuntime,
} from "@trellis-ui/core";
import { type WorkerSpawnerConfig, createWorkerSpawner } from "./backend/workerSpawner.js";

export { createPortEndpoint, createWorkerEndpoint } from "./backend/portEndpoint.js";
export type { WorkerEndpointOptions } from "./backend/portEndpoint.js";
export {
  DEFAULT_EXIT_GRACE_MS,
  createWorkerSpawner,
  defaultActorWorkerEntry,
} from "./backend/workerSpawner.js";
export type { WorkerSpawnerConfig } from "./backend/workerSpawner.js";
export { findActorDefinition, parseActorWorkerData } from "./worker/protocol.js";
export type { ActorWorkerData } from "./worker/protocol.js";

export type NodeActorRuntimeConfig = Readonly<
  Omit<ActorRuntimeConfig, "registry" | "spawner"> &
    WorkerSpawnerConfig & { registry?: ActorRuntimeConfig["registry"] }
>;

/**
 * Actor runtime whose public/private actors run on worker threads.
 * A fresh registry is created unless one is passed.
 */
export function createNodeActorRuntime(config: NodeActorRuntimeConfig): ActorRuntime {
  const spawnerConfig: WorkerSpawnerConfig = {
    moduleUrl: config.moduleUrl,
    ...(config.entry === undefined ? {} : { entry: config.entry }),
    ...(config.exitGraceMs === undefined ? {} : { exitGraceMs: config.exitGraceMs }),
  };
  return createActorRuntime({
    registry: config.registry ?? createActorRegistry(),
    spawner: createWorkerSpawner(spawnerConfig),
    ...(config.devMode === undefined ? {} : { devMode: config.devMode }),
    ...(config.onDiagnostic === undefined ? {} : { onDiagnostic: config.onDiagnostic }),
    ...(config.onError === undefined ? {} : { onError: config.onError }),
  });
}
