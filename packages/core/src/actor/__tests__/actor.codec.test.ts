import { assert, describe, flushMicrotasks, test } from "@trellis-ui/testkit";
import { bytesCodec, jsonCodec, stringCodec } from "../codec.js";
import { createMailbox } from "../mailbox.js";

type Point = Readonly<{ x: number; y: number }>;

function isPoint(v: unknown): v is Point {
  return (
    typeof v === "object" &&
    v !== null &&
    typeof Reflect.get(v, "x") === "number" &&
    typeof Reflect.get(v, "y") === "number"
  );
}

const utf8 = new TextEncoder();

describe("payload codecs", () => {
  test("stringCodec rejects invalid UTF-8", () => {
    assert.deepEqual(stringCodec.decode(new Uint8Array([0xff])), {
      ok: false,
      error: { code: "TRL_INVALID_PAYLOAD", offset: 0, detail: "payload is not valid UTF-8" },
    });
  });

  test("stringCodec decodes multi-byte text", () => {
    assert.deepEqual(stringCodec.decode(stringCodec.encode("grüße")), { ok: true, value: "grüße" });
  });

  test("jsonCodec validates with its guard", () => {
    const codec = jsonCodec(isPoint);
    assert.deepEqual(codec.decode(codec.encode({ x: 1, y: 2 })), { ok: true, value: { x: 1, y: 2 } });

    const partial = codec.decode(utf8.encode('{"x":1}'));
    assert.equal(partial.ok ? null : partial.error.detail, "payload failed validation");

    const garbage = codec.decode(utf8.encode("{x"));
    assert.equal(garbage.ok, false);
    if (!garbage.ok) assert.match(garbage.error.detail, /^payload is not JSON: /);
  });

  test("bytesCodec copies in both directions", () => {
    const source = new Uint8Array([1, 2]);
    const encoded = bytesCodec.encode(source);
    source[0] = 9;
    assert.deepEqual([...encoded], [1, 2]);
    const decoded = bytesCodec.decode(encoded);
    encoded[1] = 7;
    assert.deepEqual(decoded.ok ? [...decoded.value] : null, [1, 2]);
  });
});

describe("mailbox", () => {
  test("runs tasks in post order on a microtask", async () => {
    const log: string[] = [];
    const box = createMailbox((e) => {
      throw e;
    });
    box.post(() => log.push("a"));
    box.post(() => {
      log.push("b");
      box.post(() => log.push("d"));
    });
    box.post(() => log.push("c"));
    assert.deepEqual(log, []);
    assert.equal(box.pending(), 3);
    await flushMicrotasks();
    assert.deepEqual(log, ["a", "b", "c", "d"]);
  });

  test("a throwing task is reported and the drain continues", async () => {
    const log: string[] = [];
    const errors: unknown[] = [];
    const box = createMailbox((e) => errors.push(e));
    const boom = new Error("boom");
    box.post(() => log.push("a"));
    box.post(() => {
      throw boom;
    });
    box.post(() => log.push("c"));
    await flushMicrotasks();
    assert.deepEqual(log, ["a", "c"]);
    assert.deepEqual(errors, [boom]);
  });

  test("close drops queued and later tasks", async () => {
    const log: string[] = [];
    const box = createMailbox(() => {});
    box.post(() => {
      log.push("a");
      box.close();
    });
    box.post(() => log.push("b"));
    await flushMicrotasks();
    box.post(() => log.push("c"));
    await flushMicrotasks();
    assert.deepEqual(log, ["a"]);
    assert.equal(box.pending(), 0);
  });
});
