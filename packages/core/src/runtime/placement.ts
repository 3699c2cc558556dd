/**
 * packages/core/src/runtime/placement.ts — Where a record's nodes live.
 *
 * Lists, components, suspense boundaries and empty nodes have no surface
 * handle of their own; their "surface nodes" are the top-level handles of the
 * records below them. These helpers answer the three questions placement needs:
 * which handles does a record contribute, which container holds them, and
 * which handle follows them in that container.
 */

import { TrellisError } from "../abi.js";
import type { RecordId } from "./instance.js";
import type { MountRecord, RecordArena } from "./records.js";

/** Append the top-level surface handles of `id` to `out`, in order. */
export function collectSurfaceNodes<H>(arena: RecordArena<H>, id: RecordId, out: H[]): H[] {
  const rec = arena.require(id);
  switch (rec.kind) {
    case "element":
    case "text":
      out.push(rec.handle);
      break;
    case "list":
      for (const child of rec.children) collectSurfaceNodes(arena, child, out);
      break;
    case "component":
    case "root":
      if (rec.child !== null) collectSurfaceNodes(arena, rec.child, out);
      break;
    case "suspense":
      if (rec.mode === "primary") collectSurfaceNodes(arena, rec.primary, out);
      else if (rec.fallback !== null) collectSurfaceNodes(arena, rec.fallback, out);
      break;
    case "empty":
      break;
  }
  return out;
}

export function surfaceNodes<H>(arena: RecordArena<H>, id: RecordId): H[] {
  return collectSurfaceNodes(arena, id, []);
}

/** First top-level handle of `id`, or null when it renders nothing. */
export function firstSurfaceNode<H>(arena: RecordArena<H>, id: RecordId): H | null {
  const rec = arena.require(id);
  switch (rec.kind) {
    case "element":
    case "text":
      return rec.handle;
    case "list":
      for (const child of rec.children) {
        const first = firstSurfaceNode(arena, child);
        if (first !== null) return first;
      }
      return null;
    case "component":
    case "root":
      return rec.child === null ? null : firstSurfaceNode(arena, rec.child);
    case "suspense":
      if (rec.mode === "primary") return firstSurfaceNode(arena, rec.primary);
      return rec.fallback === null ? null : firstSurfaceNode(arena, rec.fallback);
    case "empty":
      return null;
  }
}

/** True when `parent` is the container that physically holds `child`'s nodes. */
function holdsDirectly<H>(parent: MountRecord<H>, child: RecordId): boolean {
  switch (parent.kind) {
    case "element":
    case "root":
      return true;
    case "suspense":
      return parent.mode === "fallback" && parent.primary === child;
    default:
      return false;
  }
}

/** Container handle holding the top-level nodes of `id`. */
export function hostOf<H>(arena: RecordArena<H>, id: RecordId): H {
  let cur = arena.require(id);
  for (;;) {
    if (cur.parent === null) {
      if (cur.kind === "root") return cur.container;
      break;
    }
    const parent = arena.require(cur.parent);
    if (holdsDirectly(parent, cur.id)) {
      if (parent.kind === "element") return parent.handle;
      if (parent.kind === "root") return parent.container;
      if (parent.kind === "suspense" && parent.offscreen !== null) return parent.offscreen;
      break;
    }
    cur = parent;
  }
  throw new TrellisError("TRL_INVALID_STATE", `mount record ${String(id)} has no host container`);
}

/**
 * Handle that directly follows the nodes of `id` inside its host, or null when
 * they are last. Only following siblings up to the host boundary are searched.
 */
export function nextSurfaceAfter<H>(arena: RecordArena<H>, id: RecordId): H | null {
  let cur = arena.require(id);
  for (;;) {
    if (cur.parent === null) return null;
    const parent = arena.require(cur.parent);
    if (parent.kind === "element" || parent.kind === "list") {
      const siblings = parent.children;
      const at = siblings.indexOf(cur.id);
      if (at < 0) {
        throw new TrellisError("TRL_INVALID_STATE", `mount record ${String(cur.id)} is detached`);
      }
      for (let i = at + 1; i < siblings.length; i++) {
        const sibling = siblings[i];
        if (sibling === undefined) continue;
        const first = firstSurfaceNode(arena, sibling);
        if (first !== null) return first;
      }
    }
    if (holdsDirectly(parent, cur.id)) return null;
    cur = parent;
  }
}
