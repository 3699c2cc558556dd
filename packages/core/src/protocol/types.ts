/**
 * packages/core/src/protocol/types.ts — Actor envelope type definitions.
 *
 * Why: Defines the TypeScript representation of decoded actor envelopes and
 * the parse result union shared by the envelope decoder and payload codecs.
 * Decoding never throws; callers branch on `ok`.
 *
 * Envelope format: 16-byte little-endian header followed by the payload.
 *
 * @see docs/protocol/actor-envelope.md
 */

import type { EnvelopeKind } from "../abi.js";

/**
 * Error codes for envelope and payload parsing failures.
 *
 * Error categories:
 *   - TRL_BAD_MAGIC: Magic bytes don't match 'TRAE' (0x45415254)
 *   - TRL_UNSUPPORTED_VERSION: Envelope version not supported by this decoder
 *   - TRL_TRUNCATED: Buffer ends before the header or declared payload
 *   - TRL_SIZE_MISMATCH: Bytes follow the declared payload
 *   - TRL_INVALID_RECORD: Unknown kind or non-zero reserved field
 *   - TRL_INVALID_PAYLOAD: Payload bytes rejected by the codec
 */
export type ParseErrorCode =
  | "TRL_BAD_MAGIC"
  | "TRL_UNSUPPORTED_VERSION"
  | "TRL_TRUNCATED"
  | "TRL_SIZE_MISMATCH"
  | "TRL_INVALID_RECORD"
  | "TRL_INVALID_PAYLOAD";

/**
 * Structured parse error with precise diagnostic context.
 * Offset points to the byte position where parsing failed.
 */
export type ParseError = Readonly<{
  code: ParseErrorCode;
  offset: number;
  detail: string;
}>;

/**
 * Discriminated union result type for parse operations.
 * Enforces explicit error handling (no thrown exceptions for parse failures).
 */
export type ParseResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; error: ParseError }>;

/** A decoded envelope. `payload` is an owned copy. */
export type Envelope = Readonly<{
  kind: EnvelopeKind;
  handlerId: number;
  payload: Uint8Array;
}>;
