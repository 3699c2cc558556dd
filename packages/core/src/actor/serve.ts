/**
 * packages/core/src/actor/serve.ts — Isolate-side actor host.
 *
 * Why: The inner end of an IsolateEndpoint runs one actor instance and speaks
 * the same envelopes as IsolatedActorInstance. Worker entries and the loopback
 * spawner both run this.
 *
 * Inbound kinds: CONNECTED, DISCONNECTED, REQUEST, DESTROY.
 * Outbound kinds: RESPONSE, DISCONNECTED (request rejected), COMPLETE.
 */

import {
  ENVELOPE_KIND_COMPLETE,
  ENVELOPE_KIND_CONNECTED,
  ENVELOPE_KIND_DESTROY,
  ENVELOPE_KIND_DISCONNECTED,
  ENVELOPE_KIND_REQUEST,
  ENVELOPE_KIND_RESPONSE,
  describeThrown,
} from "../abi.js";
import { type DiagnosticSink, DEFAULT_DEV_MODE, createConsoleDiagnosticSink, warnDev } from "../debug/diagnostics.js";
import { decodeEnvelope, encodeEnvelope } from "../protocol/envelope.js";
import { type ActorDefinition, createActor } from "./definition.js";
import type { Actor, ActorLink, HandlerId, IsolateEndpoint } from "./types.js";

export type ServeOptions = Readonly<{
  onDiagnostic?: DiagnosticSink;
  /** Receives actor hook throws. The server stops after reporting. */
  onError?: (error: unknown) => void;
}>;

export type ActorServer = Readonly<{
  running: () => boolean;
  /** Destroy the actor and close the endpoint. */
  stop: () => void;
}>;

export function serveActor<I, O>(
  def: ActorDefinition<I, O>,
  endpoint: IsolateEndpoint,
  opts: ServeOptions = {},
): ActorServer {
  const codecs = def.codecs();
  const report = opts.onDiagnostic ?? createConsoleDiagnosticSink(DEFAULT_DEV_MODE);
  const onError =
    opts.onError ?? ((e: unknown) => warnDev(`[trellis][actor] ${def.name} threw: ${describeThrown(e)}`));
  const bridges = new Set<HandlerId>();
  let running = true;

  const link: ActorLink<O> = {
    respond(id, output) {
      if (!running || !bridges.has(id)) return;
      endpoint.send(encodeEnvelope(ENVELOPE_KIND_RESPONSE, id, codecs.output.encode(output)));
    },
    complete() {
      if (!running) return;
      endpoint.send(encodeEnvelope(ENVELOPE_KIND_COMPLETE, 0));
    },
  };

  function stop(): void {
    if (!running) return;
    running = false;
    bridges.clear();
    try {
      actor?.destroy?.();
    } catch (e: unknown) {
      onError(e);
    }
    endpoint.close();
  }

  function guarded(hook: () => void): void {
    try {
      hook();
    } catch (e: unknown) {
      onError(e);
      stop();
    }
  }

  function onMessage(current: Actor<I>, bytes: Uint8Array): void {
    if (!running) return;
    const decoded = decodeEnvelope(bytes);
    if (!decoded.ok) {
      report({
        code: "TRL_ENVELOPE_DECODE_FAILED",
        severity: "error",
        subsystem: "actor",
        detail: `${def.name}: ${decoded.error.code} at offset ${String(decoded.error.offset)}: ${decoded.error.detail}`,
      });
      stop();
      return;
    }
    const { kind, handlerId: id, payload } = decoded.value;
    switch (kind) {
      case ENVELOPE_KIND_CONNECTED:
        bridges.add(id);
        guarded(() => current.connected?.(id));
        return;
      case ENVELOPE_KIND_DISCONNECTED:
        if (bridges.delete(id)) guarded(() => current.disconnected?.(id));
        return;
      case ENVELOPE_KIND_REQUEST: {
        if (!bridges.has(id)) return;
        const input = codecs.input.decode(payload);
        if (!input.ok) {
          report({
            code: "TRL_PAYLOAD_DECODE_FAILED",
            severity: "error",
            subsystem: "actor",
            detail: `${def.name} bridge ${String(id)}: ${input.error.detail}`,
          });
          bridges.delete(id);
          endpoint.send(encodeEnvelope(ENVELOPE_KIND_DISCONNECTED, id));
          guarded(() => current.disconnected?.(id));
          return;
        }
        guarded(() => current.handleInput(input.value, id));
        return;
      }
      case ENVELOPE_KIND_DESTROY:
        stop();
        return;
      default:
        report({
          code: "TRL_ENVELOPE_DECODE_FAILED",
          severity: "error",
          subsystem: "actor",
          detail: `${def.name}: unexpected envelope kind ${String(kind)}`,
        });
        stop();
    }
  }

  let actor: Actor<I> | null = null;
  try {
    actor = createActor(def, link);
  } catch (e: unknown) {
    onError(e);
    running = false;
    endpoint.close();
  }
  if (actor !== null) {
    const current = actor;
    endpoint.onMessage((bytes) => onMessage(current, bytes));
    endpoint.onClose(() => stop());
  }

  return Object.freeze({
    running: () => running,
    stop,
  });
}
