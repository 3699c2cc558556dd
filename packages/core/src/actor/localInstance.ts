/**
 * packages/core/src/actor/localInstance.ts — Host-thread actor instance.
 *
 * Why: Context and job actors run on the host thread but must still behave
 * like remote ones: inputs and outputs are delivered asynchronously, in order,
 * through a microtask mailbox. A consumer's send() never re-enters the actor,
 * and an actor's respond() never re-enters the consumer.
 *
 * Failure model:
 *   - A throwing actor hook tears the instance down; every bridge closes with
 *     a TRL_USER_CODE_THROW failure
 *   - complete() tears down job instances; shared instances ignore it
 *   - Throws after teardown (a failing destroy hook) go to reportError
 */

import { TrellisError, describeThrown } from "../abi.js";
import { type ActorDefinition, createActor } from "./definition.js";
import { type Mailbox, createMailbox } from "./mailbox.js";
import type {
  Actor,
  ActorInstance,
  ActorLink,
  BridgeCloseReason,
  BridgePort,
  HandlerId,
} from "./types.js";

export class LocalActorInstance<I, O> implements ActorInstance<I, O> {
  readonly name: string;
  readonly #shared: boolean;
  readonly #ports = new Map<HandlerId, BridgePort<O>>();
  readonly #mailbox: Mailbox;
  readonly #actor: Actor<I>;
  readonly #reportError: (error: unknown) => void;
  #live = true;

  constructor(def: ActorDefinition<I, O>, reportError: (error: unknown) => void) {
    this.name = def.name;
    this.#reportError = reportError;
    this.#shared = def.shared;
    this.#mailbox = createMailbox((e) => this.#fail(e));
    const link: ActorLink<O> = {
      respond: (id, output) => this.#respond(id, output),
      complete: () => this.#complete(),
    };
    this.#actor = createActor(def, link);
  }

  get live(): boolean {
    return this.#live;
  }

  get bridgeCount(): number {
    return this.#ports.size;
  }

  connect(port: BridgePort<O>): void {
    if (!this.#live) {
      throw new TrellisError("TRL_INVALID_STATE", `actor ${this.name} is not live`);
    }
    this.#ports.set(port.id, port);
    this.#mailbox.post(() => this.#actor.connected?.(port.id));
  }

  send(id: HandlerId, input: I): void {
    if (!this.#live || !this.#ports.has(id)) return;
    this.#mailbox.post(() => {
      if (this.#live) this.#actor.handleInput(input, id);
    });
  }

  disconnect(id: HandlerId): void {
    if (!this.#ports.delete(id) || !this.#live) return;
    this.#mailbox.post(() => this.#actor.disconnected?.(id));
  }

  teardown(reason: BridgeCloseReason): void {
    if (!this.#live) return;
    this.#live = false;
    const ports = [...this.#ports.values()];
    this.#ports.clear();
    // Queued behind pending deliveries: outputs sent before complete() still arrive.
    this.#mailbox.post(() => {
      try {
        for (const port of ports) port.close(reason);
        this.#actor.destroy?.();
      } finally {
        this.#mailbox.close();
      }
    });
  }

  #respond(id: HandlerId, output: O): void {
    const port = this.#ports.get(id);
    if (!this.#live || port === undefined) return;
    this.#mailbox.post(() => port.deliver(output));
  }

  #complete(): void {
    if (this.#shared) return;
    this.teardown({ kind: "completed" });
  }

  #fail(error: unknown): void {
    if (!this.#live) {
      this.#reportError(error);
      return;
    }
    this.teardown({
      kind: "failed",
      error: new TrellisError("TRL_USER_CODE_THROW", `actor ${this.name} threw: ${describeThrown(error)}`, {
        cause: error,
      }),
    });
  }
}
