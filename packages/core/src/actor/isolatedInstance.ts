/**
 * packages/core/src/actor/isolatedInstance.ts — Host-side proxy for an isolated actor.
 *
 * Why: Public and private actors run behind an IsolateEndpoint. Everything
 * crossing it is a binary envelope; this proxy owns the host end, encodes
 * consumer inputs and routes decoded outputs to the right bridge.
 *
 * Decode failures:
 *   - Bad RESPONSE payload: only that bridge closes (TRL_PROTOCOL_ERROR)
 *   - Bad envelope: the transport is untrustworthy; every bridge closes
 *     (TRL_ACTOR_TRANSPORT) and the instance is torn down
 *
 * @see packages/core/src/protocol/envelope.ts
 */

import {
  ENVELOPE_KIND_COMPLETE,
  ENVELOPE_KIND_CONNECTED,
  ENVELOPE_KIND_DESTROY,
  ENVELOPE_KIND_DISCONNECTED,
  ENVELOPE_KIND_REQUEST,
  ENVELOPE_KIND_RESPONSE,
  type EnvelopeKind,
  TrellisError,
  describeThrown,
} from "../abi.js";
import type { DiagnosticSink } from "../debug/diagnostics.js";
import { decodeEnvelope, encodeEnvelope } from "../protocol/envelope.js";
import type { ActorCodecs, ActorDefinition } from "./definition.js";
import type {
  ActorInstance,
  BridgeCloseReason,
  BridgePort,
  HandlerId,
  IsolateEndpoint,
} from "./types.js";

export class IsolatedActorInstance<I, O> implements ActorInstance<I, O> {
  readonly name: string;
  readonly #shared: boolean;
  readonly #codecs: ActorCodecs<I, O>;
  readonly #endpoint: IsolateEndpoint;
  readonly #report: DiagnosticSink;
  readonly #ports = new Map<HandlerId, BridgePort<O>>();
  #live = true;
  #endpointOpen = true;

  constructor(def: ActorDefinition<I, O>, endpoint: IsolateEndpoint, report: DiagnosticSink) {
    this.name = def.name;
    this.#shared = def.shared;
    this.#codecs = def.codecs();
    this.#endpoint = endpoint;
    this.#report = report;
    endpoint.onMessage((bytes) => this.#onMessage(bytes));
    endpoint.onClose((error) => this.#onEndpointClosed(error));
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
    this.#post(ENVELOPE_KIND_CONNECTED, port.id);
  }

  send(id: HandlerId, input: I): void {
    if (!this.#live || !this.#ports.has(id)) return;
    this.#post(ENVELOPE_KIND_REQUEST, id, this.#codecs.input.encode(input));
  }

  disconnect(id: HandlerId): void {
    if (!this.#ports.delete(id) || !this.#live) return;
    this.#post(ENVELOPE_KIND_DISCONNECTED, id);
  }

  teardown(reason: BridgeCloseReason): void {
    if (!this.#live) return;
    this.#live = false;
    const ports = [...this.#ports.values()];
    this.#ports.clear();
    for (const port of ports) port.close(reason);
    if (!this.#endpointOpen) return;
    this.#endpointOpen = false;
    try {
      this.#endpoint.send(encodeEnvelope(ENVELOPE_KIND_DESTROY, 0));
    } finally {
      this.#endpoint.close();
    }
  }

  #post(kind: EnvelopeKind, id: HandlerId, payload?: Uint8Array): void {
    try {
      this.#endpoint.send(encodeEnvelope(kind, id, payload));
    } catch (e: unknown) {
      this.#endpointOpen = false;
      this.#transportFailure(`send to ${this.name} failed: ${describeThrown(e)}`, e);
    }
  }

  #onMessage(bytes: Uint8Array): void {
    if (!this.#live) return;
    const decoded = decodeEnvelope(bytes);
    if (!decoded.ok) {
      const { code, offset, detail } = decoded.error;
      this.#report({
        code: "TRL_ENVELOPE_DECODE_FAILED",
        severity: "error",
        subsystem: "actor",
        detail: `${this.name}: ${code} at offset ${String(offset)}: ${detail}`,
      });
      this.#transportFailure(`malformed envelope from ${this.name}`, undefined);
      return;
    }
    const { kind, handlerId, payload } = decoded.value;
    switch (kind) {
      case ENVELOPE_KIND_RESPONSE:
        this.#onResponse(handlerId, payload);
        return;
      case ENVELOPE_KIND_DISCONNECTED:
        this.#closePort(
          handlerId,
          new TrellisError("TRL_PROTOCOL_ERROR", `${this.name} rejected bridge ${String(handlerId)}`),
          false,
        );
        return;
      case ENVELOPE_KIND_COMPLETE:
        if (!this.#shared) this.teardown({ kind: "completed" });
        return;
      default:
        this.#transportFailure(`unexpected envelope kind ${String(kind)} from ${this.name}`, undefined);
    }
  }

  #onResponse(id: HandlerId, payload: Uint8Array): void {
    const port = this.#ports.get(id);
    if (port === undefined) return;
    const decoded = this.#codecs.output.decode(payload);
    if (!decoded.ok) {
      this.#report({
        code: "TRL_PAYLOAD_DECODE_FAILED",
        severity: "error",
        subsystem: "actor",
        detail: `${this.name} bridge ${String(id)}: ${decoded.error.detail}`,
      });
      this.#closePort(
        id,
        new TrellisError("TRL_PROTOCOL_ERROR", `${this.name} sent an undecodable output to bridge ${String(id)}`),
        true,
      );
      return;
    }
    port.deliver(decoded.value);
  }

  #closePort(id: HandlerId, error: TrellisError, notifyActor: boolean): void {
    const port = this.#ports.get(id);
    if (port === undefined) return;
    this.#ports.delete(id);
    if (notifyActor) this.#post(ENVELOPE_KIND_DISCONNECTED, id);
    port.close({ kind: "failed", error });
  }

  #onEndpointClosed(error: Error | null): void {
    this.#endpointOpen = false;
    if (!this.#live) return;
    const detail = error === null ? "closed" : `crashed: ${describeThrown(error)}`;
    this.#transportFailure(`isolate for ${this.name} ${detail}`, error ?? undefined);
  }

  #transportFailure(message: string, cause: unknown): void {
    this.teardown({
      kind: "failed",
      error: new TrellisError("TRL_ACTOR_TRANSPORT", message, { cause }),
    });
  }
}
