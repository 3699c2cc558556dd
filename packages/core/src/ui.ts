/**
 * packages/core/src/ui.ts — Node builder functions.
 *
 * Why: Provides a convenient API for building VNode trees without manually
 * constructing discriminated union objects. Builders freeze what they return;
 * a node is never mutated after construction.
 *
 * Children:
 *   - strings become text nodes
 *   - false/null/undefined become empty nodes, so positions stay stable
 *     when a conditional child toggles
 *   - nested arrays become unkeyed (or fully keyed) list nodes
 *
 * @see docs/guide/node-model.md
 */

import type { ComponentFactory } from "./runtime/component.js";
import type { Listener } from "./surface.js";
import {
  type ElementNode,
  type EmptyNode,
  type ListItem,
  type ListNode,
  type NodeRef,
  type SuspenseNode,
  type TextNode,
  type VNode,
  nodeKey,
} from "./tree/types.js";

export type AttrValue = string | number | boolean | null | undefined;

export type ElementProps = Readonly<{
  key?: string;
  ref?: NodeRef;
  /** Attribute values; `true` renders as "", false/null/undefined are omitted. */
  attrs?: Readonly<Record<string, AttrValue>>;
  /** Event listeners by event name. */
  on?: Readonly<Record<string, Listener>>;
}>;

export type UiChild = VNode | string | false | null | undefined | readonly UiChild[];

const EMPTY: EmptyNode = Object.freeze({ kind: "empty" });

function isVNode(v: VNode | ListItem | string): v is VNode {
  return typeof v !== "string" && "kind" in v;
}

function toNode(child: UiChild): VNode {
  if (child === false || child === null || child === undefined) return EMPTY;
  if (typeof child === "string") return text(child);
  if (isUiChildren(child)) return list(child.map(toNode));
  return child;
}

function isUiChildren(child: VNode | readonly UiChild[]): child is readonly UiChild[] {
  return Array.isArray(child);
}

function attrString(v: AttrValue): string | null {
  if (v === false || v === null || v === undefined) return null;
  if (v === true) return "";
  return String(v);
}

function text(value: string): TextNode {
  return Object.freeze({ kind: "text", text: value });
}

function el(tag: string, props: ElementProps = {}, children: readonly UiChild[] = []): ElementNode {
  const attrs = new Map<string, string>();
  if (props.attrs) {
    for (const [name, value] of Object.entries(props.attrs)) {
      const s = attrString(value);
      if (s !== null) attrs.set(name, s);
    }
  }
  const listeners = new Map<string, Listener>();
  if (props.on) {
    for (const [event, listener] of Object.entries(props.on)) listeners.set(event, listener);
  }
  return Object.freeze({
    kind: "element",
    tag,
    key: props.key,
    namespace: attrs.get("xmlns") ?? null,
    attrs,
    listeners,
    ref: props.ref,
    children: Object.freeze(children.map(toNode)),
  });
}

function keyed(key: string, node: VNode | string): ListItem {
  return Object.freeze({ key, node: typeof node === "string" ? text(node) : node });
}

function list(items: readonly (VNode | ListItem | string)[]): ListNode {
  return Object.freeze({
    kind: "list",
    items: Object.freeze(
      items.map((item): ListItem => {
        if (typeof item === "string") return Object.freeze({ key: undefined, node: text(item) });
        if (isVNode(item)) return Object.freeze({ key: nodeKey(item), node: item });
        return item;
      }),
    ),
  });
}

function suspense(primary: UiChild, fallback: UiChild, key?: string): SuspenseNode {
  return Object.freeze({ kind: "suspense", key, primary: toNode(primary), fallback: toNode(fallback) });
}

function empty(): EmptyNode {
  return EMPTY;
}

function component<P>(definition: ComponentFactory<P>, props: P, key?: string): VNode {
  return definition.node(props, key);
}

/**
 * Node builders.
 *
 * @example
 * ```ts
 * ui.el("ul", {}, [
 *   ui.list(rows.map((r) => ui.el("li", { key: r.id }, [r.label]))),
 * ])
 * ```
 */
export const ui = {
  el,
  text,
  list,
  keyed,
  suspense,
  empty,
  component,
} as const;

/** Create an empty node ref; the patcher fills `current` while the element is mounted. */
export function createRef<H = unknown>(): NodeRef<H> {
  return { current: null };
}
