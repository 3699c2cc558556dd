/**
 * Payload codecs for isolated actors.
 *
 * Decoding validates: a JSON codec takes a type guard, and a value that parses
 * but fails the guard is a decode error like malformed bytes are.
 */

import type { ParseResult } from "../protocol/types.js";
import type { PayloadCodec } from "./types.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

function invalid<T>(detail: string): ParseResult<T> {
  return { ok: false, error: { code: "TRL_INVALID_PAYLOAD", offset: 0, detail } };
}

function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return decoder.decode(bytes);
  } catch {
    return null;
  }
}

/** UTF-8 JSON; `guard` validates the parsed value. */
export function jsonCodec<T>(guard: (value: unknown) => value is T): PayloadCodec<T> {
  return Object.freeze({
    encode(value: T): Uint8Array {
      return encoder.encode(JSON.stringify(value));
    },
    decode(bytes: Uint8Array): ParseResult<T> {
      const text = decodeUtf8(bytes);
      if (text === null) return invalid("payload is not valid UTF-8");
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch (e: unknown) {
        return invalid(`payload is not JSON: ${e instanceof Error ? e.message : String(e)}`);
      }
      if (!guard(parsed)) return invalid("payload failed validation");
      return { ok: true, value: parsed };
    },
  });
}

export const stringCodec: PayloadCodec<string> = Object.freeze({
  encode(value: string): Uint8Array {
    return encoder.encode(value);
  },
  decode(bytes: Uint8Array): ParseResult<string> {
    const text = decodeUtf8(bytes);
    return text === null ? invalid("payload is not valid UTF-8") : { ok: true, value: text };
  },
});

export const bytesCodec: PayloadCodec<Uint8Array> = Object.freeze({
  encode(value: Uint8Array): Uint8Array {
    return value.slice();
  },
  decode(bytes: Uint8Array): ParseResult<Uint8Array> {
    return { ok: true, value: bytes.slice() };
  },
});
