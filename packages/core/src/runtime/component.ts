/**
 * packages/core/src/runtime/component.ts — Component definitions.
 *
 * Why: A definition is generic over its props, message and state types. The
 * patcher only sees the erased ComponentType; typed props never pass through
 * `unknown`: the definition records them per node when it builds the node and
 * reads them back when a scope for that node is created or updated.
 */

import type { ComponentNode, ComponentType } from "../tree/types.js";
import type { RecordId } from "./instance.js";
import {
  type ComponentSpec,
  ComponentScope,
  type MountedScope,
  type PropsCell,
  type ScopeHost,
} from "./scope.js";

/** Anything that can build a component node from typed props. */
export interface ComponentFactory<P> {
  readonly name: string;
  node(props: P, key?: string): ComponentNode;
}

export class Component<P, M = never, S = undefined> implements ComponentType, ComponentFactory<P> {
  readonly name: string;
  readonly #spec: ComponentSpec<P, M, S>;
  readonly #props = new WeakMap<ComponentNode, PropsCell<P>>();

  constructor(spec: ComponentSpec<P, M, S>) {
    if (spec.name.length === 0) {
      throw new TypeError("defineComponent: name must be a non-empty string");
    }
    this.name = spec.name;
    this.#spec = spec;
    Object.freeze(this);
  }

  node(props: P, key?: string): ComponentNode {
    const node: ComponentNode = Object.freeze({ kind: "component", type: this, key, props });
    this.#props.set(node, Object.freeze({ props }));
    return node;
  }

  instantiate(node: ComponentNode, host: ScopeHost, recordId: RecordId): MountedScope | null {
    const cell = this.#props.get(node);
    if (cell === undefined) return null;
    return new ComponentScope(this.#spec, host, recordId, cell.props, (n) => this.#props.get(n));
  }
}

export function defineComponent<P, M = never, S = undefined>(
  spec: ComponentSpec<P, M, S>,
): Component<P, M, S> {
  return new Component(spec);
}
