/**
 * packages/core/src/debug/diagnostics.ts — Recoverable runtime diagnostics.
 *
 * Why: Malformed keyed lists, misused suspensions and late actor messages are
 * recovered locally and never thrown. They are reported as structured records
 * so hosts can log, count or assert on them.
 *
 * Severity levels (low to high):
 *   - info: Expected-but-noteworthy (late resume after destroy)
 *   - warn: Caller error that was recovered (duplicate key, dropped handle)
 *   - error: A channel was closed because of bad data
 */

export type DiagnosticSeverity = "info" | "warn" | "error";

export type DiagnosticSubsystem = "reconcile" | "scope" | "suspense" | "scheduler" | "actor";

export type DiagnosticCode =
  | "TRL_DUPLICATE_KEY"
  | "TRL_MISSING_KEY"
  | "TRL_MESSAGE_AFTER_DESTROY"
  | "TRL_SUSPENDED_WITHOUT_BOUNDARY"
  | "TRL_SUSPENSION_DROPPED"
  | "TRL_SUSPENSION_COLLECTED"
  | "TRL_STALE_RESUME"
  | "TRL_FUTURE_REJECTED"
  | "TRL_SEND_AFTER_CLOSE"
  | "TRL_ENVELOPE_DECODE_FAILED"
  | "TRL_PAYLOAD_DECODE_FAILED";

export type Diagnostic = Readonly<{
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  subsystem: DiagnosticSubsystem;
  detail: string;
}>;

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";
export const DEFAULT_DEV_MODE = NODE_ENV !== "production";

export function warnDev(message: string): void {
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

export function formatDiagnostic(d: Diagnostic): string {
  return `[trellis][${d.subsystem}] ${d.code}: ${d.detail}`;
}

/**
 * Default sink: warn/error diagnostics go to the console in dev mode,
 * everything is dropped in production.
 */
export function createConsoleDiagnosticSink(devMode: boolean): DiagnosticSink {
  return (d) => {
    if (!devMode || d.severity === "info") return;
    warnDev(formatDiagnostic(d));
  };
}

/**
 * Sink that forwards every diagnostic and records those reported between
 * begin() and take(). Used by the root to return per-call diagnostics in
 * PatchResult; auto-flushed passes forward only.
 */
export type DiagnosticRecorder = Readonly<{
  sink: DiagnosticSink;
  begin: () => void;
  take: () => readonly Diagnostic[];
}>;

export function createDiagnosticRecorder(forward: DiagnosticSink): DiagnosticRecorder {
  let entries: Diagnostic[] | null = null;
  return Object.freeze({
    sink(d: Diagnostic): void {
      entries?.push(d);
      forward(d);
    },
    begin(): void {
      entries = [];
    },
    take(): readonly Diagnostic[] {
      const out = entries ?? [];
      entries = null;
      return Object.freeze(out);
    },
  });
}
