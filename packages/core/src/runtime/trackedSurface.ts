/**
 * packages/core/src/runtime/trackedSurface.ts — Index bookkeeping around a MutationSurface.
 *
 * Why: The surface speaks in child indices, the patcher in "before this
 * handle". A shadow child list per container translates between the two, so
 * placement never depends on counting nodes through a half-patched record tree.
 * The wrapper also counts every operation for PatchResult and turns anything a
 * surface throws into TRL_SURFACE_ERROR.
 */

import { TrellisError, describeThrown } from "../abi.js";
import type { Listener, MutationSurface, PatchOpCounts } from "../surface.js";

type MutableCounts = { -readonly [K in keyof PatchOpCounts]: number };

function zeroCounts(): MutableCounts {
  return {
    created: 0,
    inserted: 0,
    moved: 0,
    removed: 0,
    attributesSet: 0,
    attributesRemoved: 0,
    textsSet: 0,
    listenersSet: 0,
  };
}

export type TrackedSurface<H> = Readonly<{
  createElement: (tag: string, namespace: string | null) => H;
  createText: (value: string) => H;
  setText: (handle: H, value: string) => void;
  setAttribute: (handle: H, key: string, value: string) => void;
  removeAttribute: (handle: H, key: string) => void;
  setListener: (handle: H, event: string, listener: Listener | null) => void;
  /** Attach `handle` to `parent` before `anchor` (null appends). */
  insertBefore: (parent: H, handle: H, anchor: H | null) => void;
  /** Move an attached `handle` before `anchor`; no-op when already there. */
  moveBefore: (parent: H, handle: H, anchor: H | null) => void;
  remove: (parent: H, handle: H) => void;
  /** Drop the shadow list of a container that is no longer mounted. */
  forget: (container: H) => void;
  childrenOf: (container: H) => readonly H[];
  takeCounts: () => PatchOpCounts;
}>;

export function createTrackedSurface<H>(surface: MutationSurface<H>): TrackedSurface<H> {
  const shadows = new Map<H, H[]>();
  let counts = zeroCounts();

  function shadowOf(container: H): H[] {
    let list = shadows.get(container);
    if (list === undefined) {
      list = [];
      shadows.set(container, list);
    }
    return list;
  }

  function call<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (e: unknown) {
      throw new TrellisError("TRL_SURFACE_ERROR", `surface.${op} failed: ${describeThrown(e)}`, {
        cause: e,
      });
    }
  }

  function anchorIndex(list: readonly H[], anchor: H | null): number {
    if (anchor === null) return list.length;
    const index = list.indexOf(anchor);
    if (index < 0) {
      throw new TrellisError("TRL_INVALID_STATE", "placement anchor is not a child of its container");
    }
    return index;
  }

  return Object.freeze({
    createElement(tag: string, namespace: string | null): H {
      counts.created++;
      return call("createElement", () => surface.createElement(tag, namespace));
    },
    createText(value: string): H {
      counts.created++;
      return call("createText", () => surface.createText(value));
    },
    setText(handle: H, value: string): void {
      counts.textsSet++;
      call("setText", () => surface.setText(handle, value));
    },
    setAttribute(handle: H, key: string, value: string): void {
      counts.attributesSet++;
      call("setAttribute", () => surface.setAttribute(handle, key, value));
    },
    removeAttribute(handle: H, key: string): void {
      counts.attributesRemoved++;
      call("removeAttribute", () => surface.removeAttribute(handle, key));
    },
    setListener(handle: H, event: string, listener: Listener | null): void {
      counts.listenersSet++;
      call("setListener", () => surface.setListener(handle, event, listener));
    },
    insertBefore(parent: H, handle: H, anchor: H | null): void {
      const list = shadowOf(parent);
      const index = anchorIndex(list, anchor);
      counts.inserted++;
      call("insertChild", () => surface.insertChild(parent, handle, index));
      list.splice(index, 0, handle);
    },
    moveBefore(parent: H, handle: H, anchor: H | null): void {
      const list = shadowOf(parent);
      const from = list.indexOf(handle);
      if (from < 0) {
        throw new TrellisError("TRL_INVALID_STATE", "moved handle is not a child of its container");
      }
      const inPlace = anchor === null ? from === list.length - 1 : list[from + 1] === anchor;
      if (inPlace) return;
      list.splice(from, 1);
      const index = anchorIndex(list, anchor);
      counts.moved++;
      call("moveChild", () => surface.moveChild(parent, handle, index));
      list.splice(index, 0, handle);
    },
    remove(parent: H, handle: H): void {
      const list = shadowOf(parent);
      const index = list.indexOf(handle);
      if (index < 0) {
        throw new TrellisError("TRL_INVALID_STATE", "removed handle is not a child of its container");
      }
      counts.removed++;
      call("removeChild", () => surface.removeChild(parent, handle));
      list.splice(index, 1);
    },
    forget(container: H): void {
      shadows.delete(container);
    },
    childrenOf(container: H): readonly H[] {
      return shadows.get(container) ?? [];
    },
    takeCounts(): PatchOpCounts {
      const out = Object.freeze(counts);
      counts = zeroCounts();
      return out;
    },
  });
}
