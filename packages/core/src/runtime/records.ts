/**
 * packages/core/src/runtime/records.ts — Mount record arena.
 *
 * Why: Each mounted node owns one record describing what it put on the surface.
 * Records point at each other by RecordId only (parent, children, primary,
 * fallback); the arena is the single owner, so unmounting a subtree is a walk
 * that deletes ids and no reference cycles exist between nodes, scopes and
 * surface handles.
 *
 * Record lifecycle:
 *   - Allocated when a node is first built
 *   - Mutated in place while the node is patched (node, children, mode)
 *   - Deleted when the node is unmounted
 */

import { TrellisError } from "../abi.js";
import type {
  ComponentNode,
  ElementNode,
  ListNode,
  SuspenseNode,
  TextNode,
  VNode,
} from "../tree/types.js";
import type { Suspension } from "./suspense.js";
import type { MountedScope } from "./scope.js";
import { type RecordId, createRecordIdAllocator } from "./instance.js";

type RecordBase = {
  readonly id: RecordId;
  readonly parent: RecordId | null;
  readonly depth: number;
};

export type ElementRecord<H> = RecordBase & {
  readonly kind: "element";
  node: ElementNode;
  readonly handle: H;
  /** Resolved namespace (explicit or inherited). */
  readonly namespace: string | null;
  children: RecordId[];
};

export type TextRecord<H> = RecordBase & {
  readonly kind: "text";
  node: TextNode;
  readonly handle: H;
};

export type ListRecord = RecordBase & {
  readonly kind: "list";
  node: ListNode;
  children: RecordId[];
  /** Key of each child, parallel to `children`. */
  keys: (string | undefined)[];
};

export type ComponentRecord = RecordBase & {
  readonly kind: "component";
  node: ComponentNode;
  scope: MountedScope | null;
  child: RecordId | null;
};

export type SuspenseMode = "primary" | "fallback";

export type SuspenseRecord<H> = RecordBase & {
  readonly kind: "suspense";
  node: SuspenseNode;
  mode: SuspenseMode;
  primary: RecordId;
  fallback: RecordId | null;
  /** Detached container holding the primary subtree while in fallback mode. */
  offscreen: H | null;
  readonly pending: Set<Suspension>;
};

export type EmptyRecord = RecordBase & {
  readonly kind: "empty";
};

export type RootRecord<H> = RecordBase & {
  readonly kind: "root";
  readonly container: H;
  child: RecordId | null;
  node: VNode | null;
};

export type MountRecord<H> =
  | ElementRecord<H>
  | TextRecord<H>
  | ListRecord
  | ComponentRecord
  | SuspenseRecord<H>
  | EmptyRecord
  | RootRecord<H>;

export type RecordArena<H> = Readonly<{
  /** Allocate an id and store a record built from it. */
  add: <R extends MountRecord<H>>(build: (id: RecordId) => R) => R;
  get: (id: RecordId) => MountRecord<H> | undefined;
  /** Get a record that must exist; a miss is an engine invariant violation. */
  require: (id: RecordId) => MountRecord<H>;
  has: (id: RecordId) => boolean;
  delete: (id: RecordId) => void;
  size: () => number;
}>;

export function createRecordArena<H>(): RecordArena<H> {
  const records = new Map<RecordId, MountRecord<H>>();
  const ids = createRecordIdAllocator(1);

  return Object.freeze({
    add<R extends MountRecord<H>>(build: (id: RecordId) => R): R {
      const record = build(ids.allocate());
      records.set(record.id, record);
      return record;
    },
    get(id: RecordId): MountRecord<H> | undefined {
      return records.get(id);
    },
    require(id: RecordId): MountRecord<H> {
      const record = records.get(id);
      if (record === undefined) {
        throw new TrellisError("TRL_INVALID_STATE", `mount record ${String(id)} is not live`);
      }
      return record;
    },
    has(id: RecordId): boolean {
      return records.has(id);
    },
    delete(id: RecordId): void {
      records.delete(id);
    },
    size(): number {
      return records.size;
    },
  });
}
