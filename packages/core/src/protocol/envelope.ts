/**
 * packages/core/src/protocol/envelope.ts — Actor envelope codec.
 *
 * Layout (little-endian):
 *   0   u32  magic 'TRAE'
 *   4   u8   version
 *   5   u8   kind
 *   6   u16  reserved (0)
 *   8   u32  handler id
 *   12  u32  payload byte length
 *   16  ...  payload
 *
 * @see docs/protocol/actor-envelope.md
 */

import {
  ENVELOPE_KIND_DESTROY,
  type EnvelopeKind,
  TRELLIS_ENVELOPE_HEADER_SIZE,
  TRELLIS_ENVELOPE_MAGIC,
  TRELLIS_ENVELOPE_VERSION_V1,
} from "../abi.js";
import type { Envelope, ParseErrorCode, ParseResult } from "./types.js";

const U32_MAX = 0xffff_ffff;

function fail(code: ParseErrorCode, offset: number, detail: string): ParseResult<Envelope> {
  return { ok: false, error: { code, offset, detail } };
}

function isEnvelopeKind(v: number): v is EnvelopeKind {
  return Number.isInteger(v) && v >= 1 && v <= ENVELOPE_KIND_DESTROY;
}

/** Encode one envelope into a fresh buffer. Throws RangeError on an out-of-range handler id. */
export function encodeEnvelope(
  kind: EnvelopeKind,
  handlerId: number,
  payload: Uint8Array = new Uint8Array(0),
): Uint8Array {
  if (!Number.isInteger(handlerId) || handlerId < 0 || handlerId > U32_MAX) {
    throw new RangeError(`encodeEnvelope: handlerId must be a u32 (got ${String(handlerId)})`);
  }
  const bytes = new Uint8Array(TRELLIS_ENVELOPE_HEADER_SIZE + payload.byteLength);
  const dv = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  dv.setUint32(0, TRELLIS_ENVELOPE_MAGIC, true);
  dv.setUint8(4, TRELLIS_ENVELOPE_VERSION_V1);
  dv.setUint8(5, kind);
  dv.setUint16(6, 0, true);
  dv.setUint32(8, handlerId, true);
  dv.setUint32(12, payload.byteLength, true);
  bytes.set(payload, TRELLIS_ENVELOPE_HEADER_SIZE);
  return bytes;
}

/** Decode exactly one envelope; trailing bytes are an error. */
export function decodeEnvelope(bytes: Uint8Array): ParseResult<Envelope> {
  if (bytes.byteLength < TRELLIS_ENVELOPE_HEADER_SIZE) {
    return fail(
      "TRL_TRUNCATED",
      0,
      `envelope header needs ${String(TRELLIS_ENVELOPE_HEADER_SIZE)} bytes, got ${String(bytes.byteLength)}`,
    );
  }
  const dv = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  const magic = dv.getUint32(0, true);
  if (magic !== TRELLIS_ENVELOPE_MAGIC) {
    return fail("TRL_BAD_MAGIC", 0, `bad magic 0x${magic.toString(16).padStart(8, "0")}`);
  }
  const version = dv.getUint8(4);
  if (version !== TRELLIS_ENVELOPE_VERSION_V1) {
    return fail("TRL_UNSUPPORTED_VERSION", 4, `unsupported envelope version ${String(version)}`);
  }
  const kind = dv.getUint8(5);
  if (!isEnvelopeKind(kind)) {
    return fail("TRL_INVALID_RECORD", 5, `unknown envelope kind ${String(kind)}`);
  }
  const reserved = dv.getUint16(6, true);
  if (reserved !== 0) {
    return fail("TRL_INVALID_RECORD", 6, `reserved field must be 0 (got ${String(reserved)})`);
  }
  const handlerId = dv.getUint32(8, true);
  const payloadLen = dv.getUint32(12, true);
  const end = TRELLIS_ENVELOPE_HEADER_SIZE + payloadLen;
  if (bytes.byteLength < end) {
    return fail(
      "TRL_TRUNCATED",
      TRELLIS_ENVELOPE_HEADER_SIZE,
      `payload declares ${String(payloadLen)} bytes, ${String(bytes.byteLength - TRELLIS_ENVELOPE_HEADER_SIZE)} present`,
    );
  }
  if (bytes.byteLength > end) {
    return fail("TRL_SIZE_MISMATCH", end, `${String(bytes.byteLength - end)} trailing bytes`);
  }

  return {
    ok: true,
    value: {
      kind,
      handlerId,
      payload: bytes.slice(TRELLIS_ENVELOPE_HEADER_SIZE, end),
    },
  };
}
