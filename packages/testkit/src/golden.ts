import { AssertionError } from "node:assert";

/** `offset: xx xx ...` lines, 16 bytes per line. */
export function hexdump(bytes: Uint8Array): string {
  const lines: string[] = [];
  for (let off = 0; off < bytes.byteLength; off += 16) {
    const row = Array.from(bytes.subarray(off, off + 16), (b) => b.toString(16).padStart(2, "0"));
    lines.push(`${off.toString(16).padStart(4, "0")}: ${row.join(" ")}`);
  }
  return lines.join("\n");
}

export function assertBytesEqual(actual: Uint8Array, expected: Uint8Array, label: string): void {
  const len = Math.max(actual.byteLength, expected.byteLength);
  for (let i = 0; i < len; i++) {
    if (actual[i] !== expected[i]) {
      throw new AssertionError({
        message: `${label}: first difference at byte ${String(i)} (actual ${String(actual.byteLength)} bytes, expected ${String(expected.byteLength)})\nactual:\n${hexdump(actual)}\nexpected:\n${hexdump(expected)}`,
      });
    }
  }
}
