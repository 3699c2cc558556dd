import { assert, describe, test } from "@trellis-ui/testkit";
import { TrellisError } from "../../abi.js";
import { stringCodec } from "../codec.js";
import { defineActor, isActorDefinition } from "../definition.js";
import { createActorRegistry } from "../registry.js";
import type { ActorInstance, BridgeCloseReason } from "../types.js";

class FakeInstance implements ActorInstance<string, string> {
  readonly name = "counter";
  live = true;
  bridgeCount = 0;
  readonly closes: BridgeCloseReason[] = [];

  connect(): void {
    this.bridgeCount++;
  }
  send(): void {}
  disconnect(): void {
    this.bridgeCount--;
  }
  teardown(reason: BridgeCloseReason): void {
    this.live = false;
    this.closes.push(reason);
  }
}

const counter = defineActor<string, string>({
  name: "counter",
  reach: "context",
  create: () => ({ handleInput: () => {} }),
});

function trellisError(code: string, message: string): (e: unknown) => boolean {
  return (e) => e instanceof TrellisError && e.code === code && e.message === message;
}

describe("actor registry", () => {
  test("one instance per definition, counted per acquire", () => {
    const registry = createActorRegistry();
    let created = 0;
    const make = (): FakeInstance => {
      created++;
      return new FakeInstance();
    };
    const first = registry.acquire(counter, make);
    const second = registry.acquire(counter, make);
    assert.equal(first, second);
    assert.equal(created, 1);
    assert.equal(registry.refCount(counter), 2);
    assert.deepEqual(registry.entries(), [{ name: "counter", reach: "context", refs: 2 }]);

    assert.equal(registry.release(counter, first), false);
    assert.equal(registry.release(counter, first), true);
    assert.equal(registry.size(), 0);
    assert.equal(registry.refCount(counter), 0);

    const third = registry.acquire(counter, make);
    assert.notEqual(third, first);
    assert.equal(created, 2);
  });

  test("registries do not share instances", () => {
    const a = createActorRegistry();
    const b = createActorRegistry();
    const fromA = a.acquire(counter, () => new FakeInstance());
    const fromB = b.acquire(counter, () => new FakeInstance());
    assert.notEqual(fromA, fromB);
    assert.equal(a.refCount(counter), 1);
    assert.equal(b.refCount(counter), 1);
  });

  test("a dead instance is replaced on the next acquire", () => {
    const registry = createActorRegistry();
    const dead = new FakeInstance();
    registry.acquire(counter, () => dead);
    dead.live = false;
    const fresh = registry.acquire(counter, () => new FakeInstance());
    assert.notEqual(fresh, dead);
    assert.equal(registry.refCount(counter), 1);
    assert.equal(registry.release(counter, dead), false);
  });
});

describe("actor definitions", () => {
  test("names must be non-empty", () => {
    assert.throws(
      () => defineActor({ name: "", reach: "job", create: () => ({ handleInput: () => {} }) }),
      trellisError("TRL_INVALID_PROPS", "defineActor: name must be a non-empty string"),
    );
  });

  test("isolated reach needs both codecs", () => {
    assert.throws(
      () =>
        defineActor<string, string>({
          name: "search",
          reach: "public",
          input: stringCodec,
          create: () => ({ handleInput: () => {} }),
        }),
      trellisError("TRL_INVALID_PROPS", "defineActor(search): public reach needs input and output codecs"),
    );
  });

  test("reach decides sharing and isolation", () => {
    const isolated = defineActor<string, string>({
      name: "search",
      reach: "private",
      input: stringCodec,
      output: stringCodec,
      create: () => ({ handleInput: () => {} }),
    });
    assert.deepEqual([counter.shared, counter.isolated], [true, false]);
    assert.deepEqual([isolated.shared, isolated.isolated], [false, true]);
    assert.equal(isolated.codecs().input, stringCodec);
    assert.throws(
      () => counter.codecs(),
      trellisError("TRL_INVALID_STATE", "actor counter has no payload codecs"),
    );
  });

  test("isActorDefinition recognises definitions only", () => {
    assert.equal(isActorDefinition(counter), true);
    assert.equal(isActorDefinition({ name: "counter", reach: "context" }), false);
  });
});
