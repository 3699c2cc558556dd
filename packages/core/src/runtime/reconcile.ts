/**
 * packages/core/src/runtime/reconcile.ts — Sibling matching.
 *
 * Why: Matches the next sibling list against the previously mounted siblings to
 * decide which records are patched in place, which are new, and which are
 * unmounted. The patcher applies the surface mutations; this module is pure.
 *
 * Matching rules:
 *   - Fully keyed lists match by key (stable across reordering)
 *   - Unkeyed lists match by index (position-based)
 *   - Duplicate keys, or a mix of keyed and unkeyed siblings, fall back to
 *     positional matching and report a diagnostic
 *   - Matched children whose previous positions form the longest increasing
 *     subsequence are "stable": they keep their surface position
 *
 * @see docs/guide/reconciliation.md
 */

import type { Diagnostic } from "../debug/diagnostics.js";
import type { VNode } from "../tree/types.js";
import type { RecordId } from "./instance.js";
import { computeLIS } from "./lis.js";

/** A previously mounted sibling. */
export type PrevChild = Readonly<{ recordId: RecordId; key: string | undefined }>;

/** A sibling of the next render. */
export type NextChild = Readonly<{ key: string | undefined; node: VNode }>;

/** Result of matching a single next child. */
export type ChildMatch = Readonly<{
  node: VNode;
  key: string | undefined;
  /** Matched previous record, or null for a fresh mount. */
  recordId: RecordId | null;
  prevIndex: number | null;
  /** True when this child keeps its position relative to other matched children. */
  stable: boolean;
}>;

export type ReconcileChildrenResult = Readonly<{
  mode: "keyed" | "positional";
  matches: readonly ChildMatch[];
  /** Previous records with no counterpart, in previous order. */
  unmatched: readonly RecordId[];
  diagnostic: Diagnostic | null;
}>;

const EMPTY_RECORD_IDS: readonly RecordId[] = Object.freeze([]);

function duplicateKeyDetail(key: string, aIndex: number, bIndex: number): string {
  return `duplicate sibling key "${key}" (child indices ${String(aIndex)} and ${String(
    bIndex,
  )}); falling back to positional diffing for this list`;
}

function missingKeyDetail(index: number, keyedCount: number): string {
  return `child index ${String(index)} has no key while ${String(
    keyedCount,
  )} sibling(s) do; falling back to positional diffing for this list`;
}

type KeyScan =
  | Readonly<{ kind: "none" }>
  | Readonly<{ kind: "keyed" }>
  | Readonly<{ kind: "malformed"; diagnostic: Diagnostic }>;

/** Classify a next sibling list as unkeyed, fully keyed, or malformed. */
export function scanKeys(next: readonly NextChild[]): KeyScan {
  let keyedCount = 0;
  let firstUnkeyed = -1;
  const seen = new Map<string, number>();
  for (let i = 0; i < next.length; i++) {
    const key = next[i]?.key;
    if (key === undefined) {
      if (firstUnkeyed < 0) firstUnkeyed = i;
      continue;
    }
    keyedCount++;
    const existing = seen.get(key);
    if (existing !== undefined) {
      return {
        kind: "malformed",
        diagnostic: {
          code: "TRL_DUPLICATE_KEY",
          severity: "warn",
          subsystem: "reconcile",
          detail: duplicateKeyDetail(key, existing, i),
        },
      };
    }
    seen.set(key, i);
  }
  if (keyedCount === 0) return { kind: "none" };
  if (firstUnkeyed >= 0) {
    return {
      kind: "malformed",
      diagnostic: {
        code: "TRL_MISSING_KEY",
        severity: "warn",
        subsystem: "reconcile",
        detail: missingKeyDetail(firstUnkeyed, keyedCount),
      },
    };
  }
  return { kind: "keyed" };
}

function reconcilePositional(
  prev: readonly PrevChild[],
  next: readonly NextChild[],
  diagnostic: Diagnostic | null,
): ReconcileChildrenResult {
  const shared = Math.min(prev.length, next.length);
  const matches: ChildMatch[] = [];
  for (let i = 0; i < next.length; i++) {
    const child = next[i];
    if (!child) continue;
    const p = i < shared ? prev[i] : undefined;
    matches.push({
      node: child.node,
      key: child.key,
      recordId: p ? p.recordId : null,
      prevIndex: p ? i : null,
      stable: true,
    });
  }

  let unmatched: readonly RecordId[] = EMPTY_RECORD_IDS;
  if (prev.length > shared) {
    const out: RecordId[] = [];
    for (let i = shared; i < prev.length; i++) {
      const p = prev[i];
      if (p) out.push(p.recordId);
    }
    unmatched = out;
  }

  return { mode: "positional", matches, unmatched, diagnostic };
}

function reconcileKeyed(prev: readonly PrevChild[], next: readonly NextChild[]): ReconcileChildrenResult {
  const prevByKey = new Map<string, number>();
  for (let i = 0; i < prev.length; i++) {
    const key = prev[i]?.key;
    // Previous siblings always came from a validated render; first occurrence wins.
    if (key !== undefined && !prevByKey.has(key)) prevByKey.set(key, i);
  }

  const prevIndices: number[] = new Array<number>(next.length);
  const claimed = new Uint8Array(prev.length);
  for (let i = 0; i < next.length; i++) {
    const key = next[i]?.key;
    const prevIndex = key === undefined ? undefined : prevByKey.get(key);
    if (prevIndex === undefined) {
      prevIndices[i] = -1;
      continue;
    }
    prevIndices[i] = prevIndex;
    claimed[prevIndex] = 1;
  }

  const stable = new Set<number>(computeLIS(prevIndices));

  const matches: ChildMatch[] = [];
  for (let i = 0; i < next.length; i++) {
    const child = next[i];
    if (!child) continue;
    const prevIndex = prevIndices[i] ?? -1;
    const p = prevIndex >= 0 ? prev[prevIndex] : undefined;
    matches.push({
      node: child.node,
      key: child.key,
      recordId: p ? p.recordId : null,
      prevIndex: p ? prevIndex : null,
      stable: p !== undefined && stable.has(i),
    });
  }

  const unmatched: RecordId[] = [];
  for (let i = 0; i < prev.length; i++) {
    const p = prev[i];
    if (p && claimed[i] === 0) unmatched.push(p.recordId);
  }

  return {
    mode: "keyed",
    matches,
    unmatched: unmatched.length === 0 ? EMPTY_RECORD_IDS : unmatched,
    diagnostic: null,
  };
}

/**
 * Match `next` against `prev`.
 *
 * Never fails: malformed keyed input is reported through `diagnostic` and
 * resolved by positional matching.
 */
export function reconcileChildren(
  prev: readonly PrevChild[],
  next: readonly NextChild[],
): ReconcileChildrenResult {
  const scan = scanKeys(next);
  switch (scan.kind) {
    case "keyed":
      return reconcileKeyed(prev, next);
    case "malformed":
      return reconcilePositional(prev, next, scan.diagnostic);
    default:
      return reconcilePositional(prev, next, null);
  }
}
