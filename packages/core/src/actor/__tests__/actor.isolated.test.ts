import { assert, describe, flushMicrotasks, test } from "@trellis-ui/testkit";
import { ENVELOPE_KIND_RESPONSE, TrellisError } from "../../abi.js";
import type { Diagnostic } from "../../debug/diagnostics.js";
import { encodeEnvelope } from "../../protocol/envelope.js";
import { createLoopbackSpawner } from "../../testing/loopbackIsolate.js";
import { jsonCodec, stringCodec } from "../codec.js";
import { type ActorDefinition, defineActor } from "../definition.js";
import { createActorRegistry } from "../registry.js";
import { createActorRuntime } from "../runtime.js";
import type { BridgeCloseReason, IsolatedReach } from "../types.js";

function upper(reach: IsolatedReach): ActorDefinition<string, string> {
  return defineActor<string, string>({
    name: "upper",
    reach,
    input: stringCodec,
    output: stringCodec,
    create: (link) => ({
      handleInput(input, id) {
        link.respond(id, input.toUpperCase());
        if (input === "last") link.complete();
      },
    }),
  });
}

function isolatedFixture(workers: readonly ActorDefinition<unknown, unknown>[]) {
  const diagnostics: Diagnostic[] = [];
  const actorDiagnostics: Diagnostic[] = [];
  const actorErrors: unknown[] = [];
  const spawner = createLoopbackSpawner(workers, {
    onDiagnostic: (d) => actorDiagnostics.push(d),
    onError: (e) => actorErrors.push(e),
  });
  const runtime = createActorRuntime({
    registry: createActorRegistry(),
    spawner: spawner.spawn,
    onDiagnostic: (d) => diagnostics.push(d),
  });
  return { spawner, runtime, diagnostics, actorDiagnostics, actorErrors };
}

function isolate(spawner: ReturnType<typeof createLoopbackSpawner>, index = 0) {
  const found = spawner.isolates()[index];
  if (found === undefined) throw new Error(`no isolate ${String(index)}`);
  return found;
}

function failure(reason: BridgeCloseReason | undefined): TrellisError | null {
  return reason?.kind === "failed" ? reason.error : null;
}

describe("private reach over a loopback isolate", () => {
  test("round-trips inputs and outputs as envelopes", async () => {
    const def = upper("private");
    const { spawner, runtime } = isolatedFixture([def]);
    const outputs: string[] = [];
    const bridge = runtime.bridge(def, (out) => outputs.push(out));
    bridge.send("hi");
    bridge.send("there");
    await flushMicrotasks();
    assert.deepEqual(outputs, ["HI", "THERE"]);

    bridge.disconnect();
    await flushMicrotasks();
    assert.equal(isolate(spawner).closed(), true);
    assert.equal(isolate(spawner).server.running(), false);
  });

  test("each bridge spawns its own isolate", () => {
    const def = upper("private");
    const { spawner, runtime } = isolatedFixture([def]);
    runtime.bridge(def, () => {});
    runtime.bridge(def, () => {});
    assert.equal(spawner.isolates().length, 2);
  });

  test("COMPLETE from the actor closes the bridge after its last output", async () => {
    const def = upper("private");
    const { runtime } = isolatedFixture([def]);
    const events: string[] = [];
    runtime.bridge(def, (out) => events.push(out), {
      onClose: (r) => events.push(`close:${r.kind}`),
    }).send("last");
    await flushMicrotasks();
    assert.deepEqual(events, ["LAST", "close:completed"]);
  });

  test("an undecodable output closes only that bridge", async () => {
    const def = upper("private");
    const { spawner, runtime, diagnostics } = isolatedFixture([def]);
    const closes: BridgeCloseReason[] = [];
    const bridge = runtime.bridge(def, () => {}, { onClose: (r) => closes.push(r) });
    isolate(spawner).sendToHost(encodeEnvelope(ENVELOPE_KIND_RESPONSE, bridge.id, new Uint8Array([0xff])));
    await flushMicrotasks();

    assert.deepEqual(diagnostics, [
      {
        code: "TRL_PAYLOAD_DECODE_FAILED",
        severity: "error",
        subsystem: "actor",
        detail: "upper bridge 1: payload is not valid UTF-8",
      },
    ]);
    assert.equal(failure(closes[0])?.code, "TRL_PROTOCOL_ERROR");
    assert.equal(failure(closes[0])?.message, "upper sent an undecodable output to bridge 1");
  });

  test("a malformed envelope tears the transport down", async () => {
    const def = upper("private");
    const { spawner, runtime, diagnostics } = isolatedFixture([def]);
    const closes: BridgeCloseReason[] = [];
    runtime.bridge(def, () => {}, { onClose: (r) => closes.push(r) });
    isolate(spawner).sendToHost(new Uint8Array([1, 2, 3]));
    await flushMicrotasks();

    assert.deepEqual(
      diagnostics.map((d) => d.detail),
      ["upper: TRL_TRUNCATED at offset 0: envelope header needs 16 bytes, got 3"],
    );
    assert.equal(failure(closes[0])?.code, "TRL_ACTOR_TRANSPORT");
    assert.equal(failure(closes[0])?.message, "malformed envelope from upper");
  });

  test("an isolate crash fails the bridge", async () => {
    const def = upper("private");
    const { spawner, runtime } = isolatedFixture([def]);
    const closes: BridgeCloseReason[] = [];
    runtime.bridge(def, () => {}, { onClose: (r) => closes.push(r) });
    isolate(spawner).crash(new Error("segfault"));
    await flushMicrotasks();
    assert.equal(failure(closes[0])?.message, "isolate for upper crashed: Error: segfault");
  });

  test("an input the actor cannot decode is rejected per bridge", async () => {
    const isNumber = (v: unknown): v is number => typeof v === "number";
    // Host and isolate disagree on the input codec, as after a version skew.
    const hostSide = defineActor<string, number>({
      name: "sq",
      reach: "private",
      input: stringCodec,
      output: jsonCodec(isNumber),
      create: () => ({ handleInput: () => {} }),
    });
    const isolateSide = defineActor<number, number>({
      name: "sq",
      reach: "private",
      input: jsonCodec(isNumber),
      output: jsonCodec(isNumber),
      create: (link) => ({ handleInput: (n, id) => link.respond(id, n * n) }),
    });
    const { runtime, actorDiagnostics, actorErrors } = isolatedFixture([isolateSide]);
    const closes: BridgeCloseReason[] = [];
    runtime.bridge(hostSide, () => {}, { onClose: (r) => closes.push(r) }).send("four");
    await flushMicrotasks();

    assert.deepEqual(
      actorDiagnostics.map((d) => d.code),
      ["TRL_PAYLOAD_DECODE_FAILED"],
    );
    assert.deepEqual(actorErrors, []);
    assert.equal(failure(closes[0])?.code, "TRL_PROTOCOL_ERROR");
    assert.equal(failure(closes[0])?.message, "sq rejected bridge 1");
  });
});

describe("public reach over a loopback isolate", () => {
  test("bridges share one isolate until the last disconnect", async () => {
    const def = upper("public");
    const { spawner, runtime } = isolatedFixture([def]);
    const first: string[] = [];
    const second: string[] = [];
    const b1 = runtime.bridge(def, (out) => first.push(out));
    const b2 = runtime.bridge(def, (out) => second.push(out));
    assert.equal(spawner.isolates().length, 1);

    b1.send("a");
    b2.send("b");
    await flushMicrotasks();
    assert.deepEqual([first, second], [["A"], ["B"]]);

    b1.disconnect();
    await flushMicrotasks();
    assert.equal(isolate(spawner).server.running(), true);
    b2.disconnect();
    await flushMicrotasks();
    assert.equal(isolate(spawner).server.running(), false);
  });

  test("bridging without a spawner is an error", () => {
    const runtime = createActorRuntime({ registry: createActorRegistry(), onDiagnostic: () => {} });
    assert.throws(
      () => runtime.bridge(upper("public"), () => {}),
      (e: unknown) =>
        e instanceof TrellisError &&
        e.code === "TRL_INVALID_STATE" &&
        e.message === "actor upper has public reach but the runtime has no spawner",
    );
  });
});
