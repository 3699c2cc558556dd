import { assert, assertBytesEqual, createRng, describe, hexdump, test } from "../index.js";

describe("createRng", () => {
  test("produces the same sequence for the same seed", () => {
    const rng = createRng(1);
    assert.deepEqual([rng.u32(), rng.u32(), rng.u32()], [1015568748, 1586005467, 2165703038]);
  });

  test("int stays within the inclusive range", () => {
    assert.equal(createRng(42).int(3, 7), 6);
    const rng = createRng(7);
    for (let i = 0; i < 200; i++) {
      const v = rng.int(-2, 2);
      assert.ok(v >= -2 && v <= 2);
    }
  });

  test("float is in [0, 1)", () => {
    assert.equal(createRng(1).float(), 1015568748 / 4294967296);
  });
});

describe("golden helpers", () => {
  test("hexdump prints 16 bytes per line with offsets", () => {
    const bytes = new Uint8Array(17).map((_, i) => i);
    assert.equal(
      hexdump(bytes),
      "0000: 00 01 02 03 04 05 06 07 08 09 0a 0b 0c 0d 0e 0f\n0010: 10",
    );
  });

  test("assertBytesEqual reports the first differing byte", () => {
    assert.throws(
      () => assertBytesEqual(new Uint8Array([1, 2, 3]), new Uint8Array([1, 9, 3]), "case"),
      /case: first difference at byte 1/,
    );
    assertBytesEqual(new Uint8Array([4, 5]), new Uint8Array([4, 5]), "equal");
  });
});
