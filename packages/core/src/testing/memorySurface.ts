/**
 * packages/core/src/testing/memorySurface.ts — In-memory mutation surface.
 *
 * Why: Patcher tests need a target that enforces the MutationSurface contract
 * (no double attach, indices in range, moves only within a parent) and can be
 * compared structurally. Every call is logged so tests can assert exact
 * operation sequences, and `toMarkup` gives a deterministic serialization with
 * attributes sorted by name.
 */

import type { Listener, MutationSurface } from "../surface.js";

export type MemoryElement = {
  readonly kind: "element";
  readonly id: number;
  readonly tag: string;
  readonly namespace: string | null;
  readonly attrs: Map<string, string>;
  readonly listeners: Map<string, Listener>;
  readonly children: MemoryNode[];
  parent: MemoryElement | null;
};

export type MemoryText = {
  readonly kind: "text";
  readonly id: number;
  text: string;
  parent: MemoryElement | null;
};

export type MemoryNode = MemoryElement | MemoryText;

export type MemoryOp =
  | Readonly<{ op: "createElement"; id: number; tag: string; namespace: string | null }>
  | Readonly<{ op: "createText"; id: number; text: string }>
  | Readonly<{ op: "setText"; id: number; text: string }>
  | Readonly<{ op: "setAttribute"; id: number; key: string; value: string }>
  | Readonly<{ op: "removeAttribute"; id: number; key: string }>
  | Readonly<{ op: "setListener"; id: number; event: string; attached: boolean }>
  | Readonly<{ op: "insertChild"; parent: number; id: number; index: number }>
  | Readonly<{ op: "moveChild"; parent: number; id: number; index: number }>
  | Readonly<{ op: "removeChild"; parent: number; id: number }>;

export type MemoryOpName = MemoryOp["op"];

export type MemorySurfaceOptions = Readonly<{
  /** Throw from the surface for matching operations (tests surface failures). */
  failOn?: (op: MemoryOp) => boolean;
}>;

export type MemorySurface = Readonly<{
  surface: MutationSurface<MemoryNode>;
  /** Create a detached container element (not logged). */
  createContainer: (tag?: string) => MemoryElement;
  ops: () => readonly MemoryOp[];
  clearOps: () => void;
  /** Count logged operations by name. */
  count: (op: MemoryOpName) => number;
}>;

function requireElement(node: MemoryNode, op: string): MemoryElement {
  if (node.kind !== "element") throw new Error(`${op}: parent #${String(node.id)} is a text node`);
  return node;
}

export function createMemorySurface(opts: MemorySurfaceOptions = {}): MemorySurface {
  let nextId = 1;
  let log: MemoryOp[] = [];

  function record(op: MemoryOp): void {
    if (opts.failOn?.(op) === true) throw new Error(`memory surface rejected ${op.op}`);
    log.push(op);
  }

  function newElement(tag: string, namespace: string | null): MemoryElement {
    return {
      kind: "element",
      id: nextId++,
      tag,
      namespace,
      attrs: new Map(),
      listeners: new Map(),
      children: [],
      parent: null,
    };
  }

  const surface: MutationSurface<MemoryNode> = {
    createElement(tag: string, namespace: string | null): MemoryNode {
      const node = newElement(tag, namespace);
      record({ op: "createElement", id: node.id, tag, namespace });
      return node;
    },
    createText(value: string): MemoryNode {
      const node: MemoryText = { kind: "text", id: nextId++, text: value, parent: null };
      record({ op: "createText", id: node.id, text: value });
      return node;
    },
    setText(handle: MemoryNode, value: string): void {
      if (handle.kind !== "text") throw new Error(`setText: #${String(handle.id)} is an element`);
      record({ op: "setText", id: handle.id, text: value });
      handle.text = value;
    },
    setAttribute(handle: MemoryNode, key: string, value: string): void {
      const el = requireElement(handle, "setAttribute");
      record({ op: "setAttribute", id: el.id, key, value });
      el.attrs.set(key, value);
    },
    removeAttribute(handle: MemoryNode, key: string): void {
      const el = requireElement(handle, "removeAttribute");
      record({ op: "removeAttribute", id: el.id, key });
      el.attrs.delete(key);
    },
    setListener(handle: MemoryNode, event: string, listener: Listener | null): void {
      const el = requireElement(handle, "setListener");
      record({ op: "setListener", id: el.id, event, attached: listener !== null });
      if (listener === null) el.listeners.delete(event);
      else el.listeners.set(event, listener);
    },
    insertChild(parent: MemoryNode, handle: MemoryNode, index: number): void {
      const p = requireElement(parent, "insertChild");
      if (handle.parent !== null) {
        throw new Error(`insertChild: #${String(handle.id)} is already attached`);
      }
      if (!Number.isInteger(index) || index < 0 || index > p.children.length) {
        throw new Error(`insertChild: index ${String(index)} out of range`);
      }
      record({ op: "insertChild", parent: p.id, id: handle.id, index });
      p.children.splice(index, 0, handle);
      handle.parent = p;
    },
    moveChild(parent: MemoryNode, handle: MemoryNode, index: number): void {
      const p = requireElement(parent, "moveChild");
      const from = p.children.indexOf(handle);
      if (from < 0) throw new Error(`moveChild: #${String(handle.id)} is not a child`);
      if (!Number.isInteger(index) || index < 0 || index > p.children.length - 1) {
        throw new Error(`moveChild: index ${String(index)} out of range`);
      }
      record({ op: "moveChild", parent: p.id, id: handle.id, index });
      p.children.splice(from, 1);
      p.children.splice(index, 0, handle);
    },
    removeChild(parent: MemoryNode, handle: MemoryNode): void {
      const p = requireElement(parent, "removeChild");
      const at = p.children.indexOf(handle);
      if (at < 0) throw new Error(`removeChild: #${String(handle.id)} is not a child`);
      record({ op: "removeChild", parent: p.id, id: handle.id });
      p.children.splice(at, 1);
      handle.parent = null;
    },
  };

  return Object.freeze({
    surface,
    createContainer(tag = "root"): MemoryElement {
      return newElement(tag, null);
    },
    ops(): readonly MemoryOp[] {
      return log;
    },
    clearOps(): void {
      log = [];
    },
    count(op: MemoryOpName): number {
      let n = 0;
      for (const entry of log) if (entry.op === op) n++;
      return n;
    },
  });
}

/**
 * Serialize a memory node. Attributes are sorted by name; listeners are not
 * rendered. Text is emitted verbatim.
 */
export function toMarkup(node: MemoryNode): string {
  if (node.kind === "text") return node.text;
  const attrs = [...node.attrs.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => ` ${k}="${v}"`)
    .join("");
  const inner = node.children.map(toMarkup).join("");
  return `<${node.tag}${attrs}>${inner}</${node.tag}>`;
}

/** Serialize only the children of a container. */
export function childrenMarkup(container: MemoryElement): string {
  return container.children.map(toMarkup).join("");
}
