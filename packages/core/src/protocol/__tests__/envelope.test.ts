import { assert, assertBytesEqual, describe, test } from "@trellis-ui/testkit";
import {
  ENVELOPE_KIND_COMPLETE,
  ENVELOPE_KIND_DESTROY,
  ENVELOPE_KIND_REQUEST,
} from "../../abi.js";
import { decodeEnvelope, encodeEnvelope } from "../envelope.js";
import type { ParseErrorCode } from "../types.js";

const REQUEST_7 = new Uint8Array([
  0x54, 0x52, 0x41, 0x45, 0x01, 0x03, 0x00, 0x00, 0x07, 0x00, 0x00, 0x00, 0x03, 0x00, 0x00, 0x00,
  0x01, 0x02, 0x03,
]);

function mutated(edit: (bytes: Uint8Array) => void): Uint8Array {
  const copy = REQUEST_7.slice();
  edit(copy);
  return copy;
}

function expectError(bytes: Uint8Array, code: ParseErrorCode, offset: number): void {
  const res = decodeEnvelope(bytes);
  assert.equal(res.ok, false);
  if (res.ok) return;
  assert.equal(res.error.code, code);
  assert.equal(res.error.offset, offset);
}

describe("envelope encoding", () => {
  test("REQUEST matches the pinned layout", () => {
    assertBytesEqual(
      encodeEnvelope(ENVELOPE_KIND_REQUEST, 7, new Uint8Array([1, 2, 3])),
      REQUEST_7,
      "request",
    );
  });

  test("an empty payload is header only", () => {
    const bytes = encodeEnvelope(ENVELOPE_KIND_DESTROY, 0);
    assert.equal(bytes.byteLength, 16);
    assert.equal(bytes[5], ENVELOPE_KIND_DESTROY);
    assert.equal(bytes[12], 0);
  });

  test("handler ids outside u32 are rejected", () => {
    assert.throws(() => encodeEnvelope(ENVELOPE_KIND_REQUEST, -1), RangeError);
    assert.throws(() => encodeEnvelope(ENVELOPE_KIND_REQUEST, 2 ** 32), RangeError);
    assert.throws(() => encodeEnvelope(ENVELOPE_KIND_REQUEST, 1.5), RangeError);
  });
});

describe("envelope decoding", () => {
  test("decodes a well-formed envelope into an owned payload", () => {
    const source = REQUEST_7.slice();
    const res = decodeEnvelope(source);
    assert.equal(res.ok, true);
    if (!res.ok) return;
    assert.equal(res.value.kind, ENVELOPE_KIND_REQUEST);
    assert.equal(res.value.handlerId, 7);
    assert.deepEqual([...res.value.payload], [1, 2, 3]);
    source[16] = 9;
    assert.equal(res.value.payload[0], 1);
  });

  test("decodes from a view with a non-zero byte offset", () => {
    const framed = new Uint8Array(4 + REQUEST_7.byteLength);
    framed.set(REQUEST_7, 4);
    const res = decodeEnvelope(framed.subarray(4));
    assert.equal(res.ok && res.value.handlerId, 7);
  });

  test("COMPLETE round-trips with handler 0", () => {
    const res = decodeEnvelope(encodeEnvelope(ENVELOPE_KIND_COMPLETE, 0));
    assert.deepEqual(res.ok ? [res.value.kind, res.value.handlerId, res.value.payload.byteLength] : null, [
      ENVELOPE_KIND_COMPLETE,
      0,
      0,
    ]);
  });

  test("rejects a short header", () => {
    const res = decodeEnvelope(new Uint8Array(3));
    assert.deepEqual(res, {
      ok: false,
      error: { code: "TRL_TRUNCATED", offset: 0, detail: "envelope header needs 16 bytes, got 3" },
    });
  });

  test("rejects bad magic", () => {
    expectError(
      mutated((b) => {
        b[0] = 0;
      }),
      "TRL_BAD_MAGIC",
      0,
    );
  });

  test("rejects an unknown version", () => {
    expectError(
      mutated((b) => {
        b[4] = 2;
      }),
      "TRL_UNSUPPORTED_VERSION",
      4,
    );
  });

  test("rejects kinds outside 1..6", () => {
    expectError(
      mutated((b) => {
        b[5] = 0;
      }),
      "TRL_INVALID_RECORD",
      5,
    );
    expectError(
      mutated((b) => {
        b[5] = 7;
      }),
      "TRL_INVALID_RECORD",
      5,
    );
  });

  test("rejects a non-zero reserved field", () => {
    expectError(
      mutated((b) => {
        b[7] = 1;
      }),
      "TRL_INVALID_RECORD",
      6,
    );
  });

  test("rejects a payload shorter than declared", () => {
    expectError(REQUEST_7.subarray(0, 18), "TRL_TRUNCATED", 16);
  });

  test("rejects trailing bytes", () => {
    const padded = new Uint8Array(REQUEST_7.byteLength + 2);
    padded.set(REQUEST_7);
    expectError(padded, "TRL_SIZE_MISMATCH", 19);
  });
});
