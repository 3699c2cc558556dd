/**
 * packages/core/src/actor/types.ts — Actor runtime contracts.
 *
 * Why: Actors run either on the host thread (context, job) or in an isolate
 * (public, private). Consumers only ever see Bridges and Dispatchers; the
 * reach decides whether the instance behind them is shared, per bridge, local
 * or isolated.
 *
 * Reach:
 *   - context: one shared instance per registry, host thread
 *   - job: fresh instance per bridge, host thread
 *   - public: one shared instance per registry, isolated
 *   - private: fresh instance per bridge, isolated
 *
 * @see docs/guide/actors.md
 */

import type { TrellisError } from "../abi.js";
import type { ParseResult } from "../protocol/types.js";

export type ActorReach = "context" | "job" | "public" | "private";

export type IsolatedReach = "public" | "private";

/** Identifies one bridge at its actor instance. */
export type HandlerId = number;

/** Actor-side handle for talking back to bridges. */
export interface ActorLink<O> {
  /** Send `output` to the bridge `id`. Dropped when that bridge is gone. */
  respond(id: HandlerId, output: O): void;
  /** Signal completion. Job and private instances are torn down. */
  complete(): void;
}

export interface Actor<I> {
  handleInput(input: I, id: HandlerId): void;
  connected?(id: HandlerId): void;
  disconnected?(id: HandlerId): void;
  destroy?(): void;
}

/** Bytes codec for values crossing an isolate boundary. */
export interface PayloadCodec<T> {
  encode(value: T): Uint8Array;
  decode(bytes: Uint8Array): ParseResult<T>;
}

export type BridgeCloseReason =
  | Readonly<{ kind: "disconnected" }>
  | Readonly<{ kind: "completed" }>
  | Readonly<{ kind: "failed"; error: TrellisError }>;

export type BridgeOptions = Readonly<{
  /** Terminal callback; runs once, whatever closed the bridge. */
  onClose?: (reason: BridgeCloseReason) => void;
}>;

/** Consumer-side channel to one actor instance. */
export interface Bridge<I> {
  readonly id: HandlerId;
  readonly closed: boolean;
  /** Deliver `input` to the actor, in send order. */
  send(input: I): void;
  disconnect(): void;
}

/** Send-only channel: outputs addressed to it are dropped. */
export type Dispatcher<I> = Bridge<I>;

/** Where an instance pushes outputs and closure for one bridge. */
export type BridgePort<O> = Readonly<{
  id: HandlerId;
  deliver: (output: O) => void;
  close: (reason: BridgeCloseReason) => void;
}>;

/** Host-side instance behind one or more bridges. */
export interface ActorInstance<I, O> {
  readonly name: string;
  readonly live: boolean;
  readonly bridgeCount: number;
  connect(port: BridgePort<O>): void;
  send(id: HandlerId, input: I): void;
  /** Consumer-initiated disconnect of one bridge. */
  disconnect(id: HandlerId): void;
  /** Tear down now, closing every bridge with `reason`. */
  teardown(reason: BridgeCloseReason): void;
}

/** Byte pipe to an isolate. Delivery is in order. */
export interface IsolateEndpoint {
  send(bytes: Uint8Array): void;
  onMessage(handler: (bytes: Uint8Array) => void): void;
  /** `error` is null for an orderly close. */
  onClose(handler: (error: Error | null) => void): void;
  close(): void;
}

export type SpawnRequest = Readonly<{ name: string; reach: IsolatedReach }>;

/** Starts an isolate running `serveActor` for the named definition. */
export type IsolateSpawner = (request: SpawnRequest) => IsolateEndpoint;
