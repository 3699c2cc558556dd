/**
 * Wire constants and error types for Trellis.
 * @see docs/protocol/actor-envelope.md
 */

// =============================================================================
// Actor envelope pins
// =============================================================================

/** Magic bytes for actor envelopes ('TRAE' as little-endian u32). */
export const TRELLIS_ENVELOPE_MAGIC = 0x45415254;
export const TRELLIS_ENVELOPE_VERSION_V1 = 1;
export const TRELLIS_ENVELOPE_HEADER_SIZE = 16;

/**
 * Envelope kind discriminants.
 * Host → actor: CONNECTED, DISCONNECTED, REQUEST, DESTROY.
 * Actor → host: RESPONSE, COMPLETE.
 */
export const ENVELOPE_KIND_CONNECTED = 1;
export const ENVELOPE_KIND_DISCONNECTED = 2;
export const ENVELOPE_KIND_REQUEST = 3;
export const ENVELOPE_KIND_RESPONSE = 4;
export const ENVELOPE_KIND_COMPLETE = 5;
export const ENVELOPE_KIND_DESTROY = 6;

export type EnvelopeKind = 1 | 2 | 3 | 4 | 5 | 6;

// =============================================================================
// TrellisErrorCode Union
// =============================================================================

/**
 * Deterministic error codes for runtime violations that propagate to the caller.
 * Recoverable conditions are reported as diagnostics instead.
 */
export type TrellisErrorCode =
  | "TRL_INVALID_PROPS"
  | "TRL_INVALID_STATE"
  | "TRL_REENTRANT_CALL"
  | "TRL_UPDATE_DEPTH_EXCEEDED"
  | "TRL_USER_CODE_THROW"
  | "TRL_SURFACE_ERROR"
  | "TRL_PROTOCOL_ERROR"
  | "TRL_ACTOR_TRANSPORT"
  | "TRL_BRIDGE_CLOSED";

// =============================================================================
// TrellisError Class
// =============================================================================

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class TrellisError extends Error {
  override readonly name = "TrellisError";
  readonly code: TrellisErrorCode;

  constructor(code: TrellisErrorCode, message?: string, options?: Readonly<{ cause?: unknown }>) {
    super(message ?? code, options?.cause === undefined ? undefined : { cause: options.cause });
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TrellisError);
    }
  }
}

/** Render an unknown thrown value as a single-line detail string. */
export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}
