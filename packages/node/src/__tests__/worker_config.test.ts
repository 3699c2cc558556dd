import assert from "node:assert/strict";
import test from "node:test";
import { TrellisError, defineActor, stringCodec } from "@trellis-ui/core";
import {
  createNodeActorRuntime,
  createWorkerSpawner,
  findActorDefinition,
  parseActorWorkerData,
} from "../index.js";

function invalidProps(message: string): (e: unknown) => boolean {
  return (e) => e instanceof TrellisError && e.code === "TRL_INVALID_PROPS" && e.message === message;
}

test("parseActorWorkerData accepts only non-empty moduleUrl and name", () => {
  assert.deepEqual(parseActorWorkerData({ moduleUrl: "file:///actors.js", name: "upper" }), {
    moduleUrl: "file:///actors.js",
    name: "upper",
  });
  assert.equal(parseActorWorkerData(null), null);
  assert.equal(parseActorWorkerData({ moduleUrl: "file:///actors.js" }), null);
  assert.equal(parseActorWorkerData({ moduleUrl: "", name: "upper" }), null);
  assert.equal(parseActorWorkerData({ moduleUrl: "file:///actors.js", name: 3 }), null);
});

test("findActorDefinition picks the exported definition by name", () => {
  const create = () => ({ handleInput: () => {} });
  const upper = defineActor<string, string>({
    name: "upper",
    reach: "private",
    input: stringCodec,
    output: stringCodec,
    create,
  });
  const lower = defineActor<string, string>({
    name: "lower",
    reach: "public",
    input: stringCodec,
    output: stringCodec,
    create,
  });
  const moduleExports = { helper: () => 1, upper, lower, name: "upper" };
  assert.equal(findActorDefinition(moduleExports, "lower"), lower);
  assert.equal(findActorDefinition(moduleExports, "upper"), upper);
  assert.equal(findActorDefinition(moduleExports, "missing"), null);
});

test("createWorkerSpawner validates its config without starting workers", () => {
  assert.throws(
    () => createWorkerSpawner({ moduleUrl: "" }),
    invalidProps("createWorkerSpawner: moduleUrl must be non-empty"),
  );
  assert.throws(
    () => createWorkerSpawner({ moduleUrl: "file:///actors.js", exitGraceMs: -1 }),
    invalidProps("createWorkerSpawner: exitGraceMs must be a non-negative integer (got -1)"),
  );
  assert.equal(typeof createWorkerSpawner({ moduleUrl: new URL("file:///actors.js") }), "function");
});

test("createNodeActorRuntime runs host-thread actors without a worker", async () => {
  const echo = defineActor<string, string>({
    name: "echo",
    reach: "context",
    create: (link) => ({ handleInput: (input, id) => link.respond(id, input) }),
  });
  const runtime = createNodeActorRuntime({ moduleUrl: "file:///actors.js", onDiagnostic: () => {} });
  const outputs: string[] = [];
  const bridge = runtime.bridge(echo, (out) => outputs.push(out));
  bridge.send("ping");
  await new Promise((resolve) => setImmediate(resolve));
  assert.deepEqual(outputs, ["ping"]);
  runtime.dispose();
  assert.equal(bridge.closed, true);
});
