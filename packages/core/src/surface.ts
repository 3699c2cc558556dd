/**
 * Mutation surface interface consumed by the patcher.
 *
 * The surface is the external rendering target (a DOM, a terminal buffer, a
 * native view tree). The engine never inspects handles; it only passes back
 * values the surface created. A surface method that throws aborts the patch
 * being applied and the error propagates to the driver.
 *
 * @see docs/guide/surfaces.md
 */

/** Event listener attached to a surface element. Payload shape is surface-defined. */
export type Listener = (event: unknown) => void;

/**
 * Abstract mutation interface.
 *
 * Rules:
 * - `insertChild()` receives a handle that is not attached to any parent.
 * - `moveChild()` receives a handle already attached to `parent`; `index` is
 *   the handle's final position (counted after detaching it).
 * - `removeChild()` detaches only; descendants stay attached to the handle.
 */
export interface MutationSurface<H> {
  /** Create a detached element. `namespace` is null for the default namespace. */
  createElement(tag: string, namespace: string | null): H;
  /** Create a detached text node. */
  createText(value: string): H;
  setText(handle: H, value: string): void;
  setAttribute(handle: H, key: string, value: string): void;
  removeAttribute(handle: H, key: string): void;
  /** Attach, replace, or (with `null`) detach the listener for `event`. */
  setListener(handle: H, event: string, listener: Listener | null): void;
  insertChild(parent: H, handle: H, index: number): void;
  moveChild(parent: H, handle: H, index: number): void;
  removeChild(parent: H, handle: H): void;
}

/** Per-operation call counts collected while patching. */
export type PatchOpCounts = Readonly<{
  created: number;
  inserted: number;
  moved: number;
  removed: number;
  attributesSet: number;
  attributesRemoved: number;
  textsSet: number;
  listenersSet: number;
}>;
