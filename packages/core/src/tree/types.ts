/**
 * packages/core/src/tree/types.ts — Node model.
 *
 * Why: A render produces a fresh, immutable VNode tree. The patcher compares it
 * against the tree retained in the mount records and emits surface mutations.
 * VNodes are never mutated after construction, so two versions can be inspected
 * side by side while diffing.
 *
 * @see docs/guide/node-model.md
 */

import type { Listener } from "../surface.js";
import type { RecordId } from "../runtime/instance.js";
import type { MountedScope, ScopeHost } from "../runtime/scope.js";
import type { Suspension } from "../runtime/suspense.js";

/** Scoped back-reference to the surface handle of a mounted element. */
export type NodeRef<H = unknown> = { current: H | null };

export type ElementNode = Readonly<{
  kind: "element";
  tag: string;
  key: string | undefined;
  /** Explicit namespace; null means "inherit from the parent". */
  namespace: string | null;
  attrs: ReadonlyMap<string, string>;
  listeners: ReadonlyMap<string, Listener>;
  ref: NodeRef | undefined;
  children: readonly VNode[];
}>;

export type TextNode = Readonly<{
  kind: "text";
  text: string;
}>;

export type ListItem = Readonly<{
  key: string | undefined;
  node: VNode;
}>;

export type ListNode = Readonly<{
  kind: "list";
  items: readonly ListItem[];
}>;

/**
 * Component identity as seen by the patcher.
 *
 * The typed definition lives in runtime/component.ts; this erased view only
 * lets the patcher create a scope for a node of the same type.
 */
export interface ComponentType {
  readonly name: string;
  /** Create a scope for `node`, or null when `node` was not built by this type. */
  instantiate(node: ComponentNode, host: ScopeHost, recordId: RecordId): MountedScope | null;
}

export type ComponentNode = Readonly<{
  kind: "component";
  type: ComponentType;
  key: string | undefined;
  /** Immutable property snapshot (for inspection; the typed copy lives in the definition). */
  props: unknown;
}>;

export type SuspenseNode = Readonly<{
  kind: "suspense";
  key: string | undefined;
  primary: VNode;
  fallback: VNode;
}>;

export type EmptyNode = Readonly<{ kind: "empty" }>;

export type VNode = ElementNode | TextNode | ListNode | ComponentNode | SuspenseNode | EmptyNode;

export type VNodeKind = VNode["kind"];

/** Returned from a view to signal that a dependency is not ready yet. */
export type PendingRender = Readonly<{
  kind: "pending";
  suspension: Suspension;
}>;

/**
 * Explicit tri-state render result.
 *   - ready: the view produced a tree
 *   - pending: the view is waiting on a Suspension
 *   - failed: user code threw
 */
export type RenderOutcome =
  | Readonly<{ kind: "ready"; node: VNode }>
  | Readonly<{ kind: "pending"; suspension: Suspension }>
  | Readonly<{ kind: "failed"; error: unknown }>;

/** Key carried by a node for sibling matching, if any. */
export function nodeKey(node: VNode): string | undefined {
  switch (node.kind) {
    case "element":
    case "component":
    case "suspense":
      return node.key;
    default:
      return undefined;
  }
}

export const SVG_NAMESPACE = "http://www.w3.org/2000/svg";
export const MATHML_NAMESPACE = "http://www.w3.org/1998/Math/MathML";

/**
 * Namespace an element is created in: an explicit namespace wins, `svg` and
 * `math` open their own, anything else inherits from the nearest element.
 */
export function resolveNamespace(node: ElementNode, inherited: string | null): string | null {
  if (node.namespace !== null) return node.namespace;
  if (node.tag === "svg") return SVG_NAMESPACE;
  if (node.tag === "math") return MATHML_NAMESPACE;
  return inherited;
}
