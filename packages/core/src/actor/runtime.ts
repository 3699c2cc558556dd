/**
 * packages/core/src/actor/runtime.ts — Bridge and dispatcher factory.
 *
 * Why: Consumers open bridges here. The runtime picks or creates the instance
 * for a definition's reach, hands out per-runtime handler ids, and owns the
 * bridge side of every closure: whatever closes a bridge (consumer, actor
 * completion, decode failure, transport loss) passes through one path that
 * fires onClose once and releases the instance reference.
 *
 * Instance release:
 *   - Shared reach: registry refcount; the last release tears the instance down
 *   - Per-bridge reach: closing the bridge tears its instance down
 */

import { TrellisError, describeThrown } from "../abi.js";
import {
  DEFAULT_DEV_MODE,
  type DiagnosticSink,
  createConsoleDiagnosticSink,
  warnDev,
} from "../debug/diagnostics.js";
import type { ActorDefinition } from "./definition.js";
import { IsolatedActorInstance } from "./isolatedInstance.js";
import { LocalActorInstance } from "./localInstance.js";
import type { ActorRegistry } from "./registry.js";
import type {
  ActorInstance,
  Bridge,
  BridgeCloseReason,
  BridgeOptions,
  BridgePort,
  Dispatcher,
  HandlerId,
  IsolateSpawner,
} from "./types.js";

export type ActorRuntimeConfig = Readonly<{
  registry: ActorRegistry;
  /** Required before any public/private definition is bridged. */
  spawner?: IsolateSpawner;
  devMode?: boolean;
  onDiagnostic?: DiagnosticSink;
  /** Receives throws from consumer callbacks and late actor hooks. */
  onError?: (error: unknown) => void;
}>;

export type ActorRuntime = Readonly<{
  bridge: <I, O>(def: ActorDefinition<I, O>, onOutput: (output: O) => void, opts?: BridgeOptions) => Bridge<I>;
  /** Send-only bridge. */
  dispatcher: <I, O>(def: ActorDefinition<I, O>, opts?: BridgeOptions) => Dispatcher<I>;
  openBridges: () => number;
  /** Disconnect every open bridge. */
  dispose: () => void;
}>;

function invalidProps(detail: string): never {
  throw new TrellisError("TRL_INVALID_PROPS", `createActorRuntime: ${detail}`);
}

export function createActorRuntime(config: ActorRuntimeConfig): ActorRuntime {
  if (typeof config.registry !== "object" || config.registry === null) {
    invalidProps("registry is required");
  }
  if (config.spawner !== undefined && typeof config.spawner !== "function") {
    invalidProps("spawner must be a function");
  }
  const registry = config.registry;
  const report = config.onDiagnostic ?? createConsoleDiagnosticSink(config.devMode ?? DEFAULT_DEV_MODE);
  const reportError =
    config.onError ?? ((e: unknown) => warnDev(`[trellis][actor] unhandled error: ${describeThrown(e)}`));
  const open = new Set<Bridge<unknown>>();
  let nextId: HandlerId = 1;

  function createInstance<I, O>(def: ActorDefinition<I, O>): ActorInstance<I, O> {
    if (!def.isolated) return new LocalActorInstance(def, reportError);
    const spawner = config.spawner;
    if (spawner === undefined) {
      throw new TrellisError(
        "TRL_INVALID_STATE",
        `actor ${def.name} has ${def.reach} reach but the runtime has no spawner`,
      );
    }
    const endpoint = spawner({ name: def.name, reach: def.reach === "public" ? "public" : "private" });
    return new IsolatedActorInstance(def, endpoint, report);
  }

  function openBridge<I, O>(
    def: ActorDefinition<I, O>,
    onOutput: ((output: O) => void) | null,
    opts: BridgeOptions,
  ): Bridge<I> {
    const id = nextId++;
    let closed = false;
    let disconnectedHere = false;

    const instance = def.shared ? registry.acquire(def, () => createInstance(def)) : createInstance(def);

    function close(reason: BridgeCloseReason): void {
      if (closed) return;
      closed = true;
      open.delete(bridge);
      try {
        opts.onClose?.(reason);
      } catch (e: unknown) {
        reportError(e);
      }
      if (!def.shared) {
        instance.teardown(reason);
      } else if (registry.release(def, instance)) {
        instance.teardown({ kind: "disconnected" });
      }
    }

    const port: BridgePort<O> = Object.freeze({
      id,
      deliver(output: O): void {
        if (closed || onOutput === null) return;
        try {
          onOutput(output);
        } catch (e: unknown) {
          reportError(e);
        }
      },
      close,
    });

    const bridge: Bridge<I> = Object.freeze({
      id,
      get closed(): boolean {
        return closed;
      },
      send(input: I): void {
        if (disconnectedHere) {
          throw new TrellisError("TRL_BRIDGE_CLOSED", `bridge ${String(id)} to ${def.name} was disconnected`);
        }
        if (closed) {
          report({
            code: "TRL_SEND_AFTER_CLOSE",
            severity: "warn",
            subsystem: "actor",
            detail: `${def.name} bridge ${String(id)}: input dropped, bridge is closed`,
          });
          return;
        }
        instance.send(id, input);
      },
      disconnect(): void {
        if (closed) return;
        disconnectedHere = true;
        instance.disconnect(id);
        close({ kind: "disconnected" });
      },
    });

    open.add(bridge);
    instance.connect(port);
    return bridge;
  }

  return Object.freeze({
    bridge<I, O>(def: ActorDefinition<I, O>, onOutput: (output: O) => void, opts: BridgeOptions = {}): Bridge<I> {
      return openBridge(def, onOutput, opts);
    },
    dispatcher<I, O>(def: ActorDefinition<I, O>, opts: BridgeOptions = {}): Dispatcher<I> {
      return openBridge(def, null, opts);
    },
    openBridges(): number {
      return open.size;
    },
    dispose(): void {
      for (const bridge of [...open]) bridge.disconnect();
    },
  });
}
