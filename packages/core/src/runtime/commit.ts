/**
 * packages/core/src/runtime/commit.ts — Tree patcher.
 *
 * Why: Applies a new VNode tree against the mounted records with the minimum
 * of surface mutations. It is also the ScopeHost: scopes hand it their ready
 * views and their suspensions, and it owns the suspense boundary transitions
 * because those are placement operations too.
 *
 * Patch rules:
 *   - Same variant (elements: same tag, key and namespace) → patch in place
 *   - Otherwise → unmount old, build new, insert at the same position
 *   - Element children and unkeyed lists match by position
 *   - Keyed lists match by key; only children outside the LIS move
 *   - Component nodes of the same type and key keep their scope
 *
 * Invariants:
 *   - A subtree whose key and type are unchanged is never remounted
 *   - Relative order of matched keyed children unchanged ⇒ zero moveChild calls
 *   - Unmount detaches only top-level nodes; descendants go with their parent
 *
 * @see docs/guide/reconciliation.md
 */

import { TrellisError } from "../abi.js";
import type { Scheduler, SchedulerJob } from "../app/scheduler.js";
import type { Diagnostic, DiagnosticSink } from "../debug/diagnostics.js";
import type { MutationSurface, PatchOpCounts } from "../surface.js";
import {
  type ElementNode,
  type ListNode,
  type SuspenseNode,
  type VNode,
  resolveNamespace,
} from "../tree/types.js";
import type { RecordId } from "./instance.js";
import { hostOf, nextSurfaceAfter, surfaceNodes } from "./placement.js";
import { type NextChild, reconcileChildren, scanKeys } from "./reconcile.js";
import {
  type ComponentRecord,
  type ElementRecord,
  type EmptyRecord,
  type ListRecord,
  type MountRecord,
  type RecordArena,
  type RootRecord,
  type SuspenseRecord,
  type TextRecord,
  createRecordArena,
} from "./records.js";
import type { MountedScope, ScopeHost } from "./scope.js";
import type { Suspension, SuspensionResolution } from "./suspense.js";
import { type TrackedSurface, createTrackedSurface } from "./trackedSurface.js";

export type TreePatcherOptions<H> = Readonly<{
  surface: MutationSurface<H>;
  container: H;
  scheduler: Scheduler;
  /** Tag of the detached element that parks suspended primary subtrees. */
  offscreenTag: string;
  report: DiagnosticSink;
  reportError: (error: unknown) => void;
}>;

function elementChildren(node: ElementNode): readonly NextChild[] {
  return node.children.map((child) => ({ key: undefined, node: child }));
}

export class TreePatcher<H> implements ScopeHost {
  readonly #arena: RecordArena<H> = createRecordArena<H>();
  readonly #surface: TrackedSurface<H>;
  readonly #scheduler: Scheduler;
  readonly #offscreenTag: string;
  readonly #report: DiagnosticSink;
  readonly #reportError: (error: unknown) => void;
  readonly #root: RootRecord<H>;
  /** Unresolved suspensions per suspended component record. */
  readonly #suspended = new Map<RecordId, Set<Suspension>>();
  #transitions = 0;

  constructor(opts: TreePatcherOptions<H>) {
    this.#surface = createTrackedSurface(opts.surface);
    this.#scheduler = opts.scheduler;
    this.#offscreenTag = opts.offscreenTag;
    this.#report = opts.report;
    this.#reportError = opts.reportError;
    this.#root = this.#arena.add<RootRecord<H>>((id) => ({
      kind: "root",
      id,
      parent: null,
      depth: 0,
      container: opts.container,
      child: null,
      node: null,
    }));
  }

  /** Number of primary ⇄ fallback flips since creation. */
  get boundaryTransitions(): number {
    return this.#transitions;
  }

  /** Live mount records, including the root record. */
  get recordCount(): number {
    return this.#arena.size();
  }

  /** Current root node, or null when nothing is mounted. */
  get rootNode(): VNode | null {
    return this.#root.node;
  }

  takeCounts(): PatchOpCounts {
    return this.#surface.takeCounts();
  }

  /** Surface children of `container` as tracked by the patcher. */
  childrenOf(container: H): readonly H[] {
    return this.#surface.childrenOf(container);
  }

  renderRoot(node: VNode): void {
    const root = this.#root;
    root.node = node;
    if (root.child === null) {
      const rec = this.#build(node, root.id, 1, null);
      root.child = rec.id;
      this.#insertRecord(rec.id);
      return;
    }
    this.#patch(root.child, node);
  }

  unmountRoot(): void {
    const root = this.#root;
    if (root.child !== null) {
      this.#unmount(root.child, true);
      root.child = null;
    }
    root.node = null;
  }

  // ---------------------------------------------------------------------------
  // ScopeHost
  // ---------------------------------------------------------------------------

  enqueue(job: SchedulerJob): void {
    this.#scheduler.enqueue(job);
  }

  depthOf(recordId: RecordId): number {
    return this.#arena.get(recordId)?.depth ?? 0;
  }

  report(diagnostic: Diagnostic): void {
    this.#report(diagnostic);
  }

  reportError(error: unknown): void {
    this.#reportError(error);
  }

  commitReady(recordId: RecordId, node: VNode): void {
    const rec = this.#componentRecord(recordId);
    if (rec === null) return;
    if (rec.child === null) {
      const child = this.#build(node, rec.id, rec.depth + 1, this.#inheritedNamespace(rec.id));
      rec.child = child.id;
      this.#insertRecord(child.id);
    } else {
      this.#patch(rec.child, node);
    }

    // A ready view supersedes whatever the scope was waiting on.
    const boundary = this.#boundaryOf(recordId);
    this.#forgetSuspensions(recordId, boundary, null);
    if (boundary !== null && boundary.mode === "fallback" && boundary.pending.size === 0) {
      this.#showPrimary(boundary);
    }
  }

  suspend(recordId: RecordId, suspension: Suspension): void {
    const rec = this.#componentRecord(recordId);
    if (rec === null) return;
    if (suspension.resolved) {
      rec.scope?.invalidate();
      return;
    }

    const boundary = this.#boundaryOf(recordId);
    this.#forgetSuspensions(recordId, boundary, suspension);
    let tokens = this.#suspended.get(recordId);
    if (tokens === undefined) {
      tokens = new Set();
      this.#suspended.set(recordId, tokens);
    }
    if (!tokens.has(suspension)) {
      tokens.add(suspension);
      suspension.subscribe((resolution) => this.#onResolved(recordId, suspension, resolution));
    }

    if (boundary === null) {
      this.#report({
        code: "TRL_SUSPENDED_WITHOUT_BOUNDARY",
        severity: "warn",
        subsystem: "suspense",
        detail: `${rec.node.type.name} suspended with no enclosing suspense boundary; keeping its previous content`,
      });
      return;
    }
    boundary.pending.add(suspension);
    if (boundary.mode === "primary") this.#showFallback(boundary);
  }

  // ---------------------------------------------------------------------------
  // Build
  // ---------------------------------------------------------------------------

  #build(node: VNode, parent: RecordId, depth: number, namespace: string | null): MountRecord<H> {
    const arena = this.#arena;
    const surface = this.#surface;
    switch (node.kind) {
      case "text": {
        const handle = surface.createText(node.text);
        return arena.add<TextRecord<H>>((id) => ({ kind: "text", id, parent, depth, node, handle }));
      }
      case "empty":
        return arena.add<EmptyRecord>((id) => ({ kind: "empty", id, parent, depth }));
      case "element": {
        const ns = resolveNamespace(node, namespace);
        const handle = surface.createElement(node.tag, ns);
        for (const [key, value] of node.attrs) surface.setAttribute(handle, key, value);
        for (const [event, listener] of node.listeners) surface.setListener(handle, event, listener);
        const rec = arena.add<ElementRecord<H>>((id) => ({
          kind: "element",
          id,
          parent,
          depth,
          node,
          handle,
          namespace: ns,
          children: [],
        }));
        for (const childNode of node.children) {
          const child = this.#build(childNode, rec.id, depth + 1, ns);
          rec.children.push(child.id);
          for (const h of surfaceNodes(arena, child.id)) surface.insertBefore(handle, h, null);
        }
        if (node.ref !== undefined) node.ref.current = handle;
        return rec;
      }
      case "list": {
        const scan = scanKeys(node.items);
        if (scan.kind === "malformed") this.#report(scan.diagnostic);
        const rec = arena.add<ListRecord>((id) => ({
          kind: "list",
          id,
          parent,
          depth,
          node,
          children: [],
          keys: [],
        }));
        for (const item of node.items) {
          rec.children.push(this.#build(item.node, rec.id, depth + 1, namespace).id);
          rec.keys.push(item.key);
        }
        return rec;
      }
      case "component": {
        const rec = arena.add<ComponentRecord>((id) => ({
          kind: "component",
          id,
          parent,
          depth,
          node,
          scope: null,
          child: null,
        }));
        let scope: MountedScope | null;
        try {
          scope = node.type.instantiate(node, this, rec.id);
        } catch (e: unknown) {
          arena.delete(rec.id);
          throw e;
        }
        if (scope === null) {
          arena.delete(rec.id);
          throw new TrellisError(
            "TRL_INVALID_PROPS",
            `component node "${node.type.name}" was not built by its definition`,
          );
        }
        rec.scope = scope;
        return rec;
      }
      case "suspense":
        return arena.add<SuspenseRecord<H>>((id) => ({
          kind: "suspense",
          id,
          parent,
          depth,
          node,
          mode: "primary",
          primary: this.#build(node.primary, id, depth + 1, namespace).id,
          fallback: null,
          offscreen: null,
          pending: new Set(),
        }));
    }
  }

  /** Insert the nodes of an already linked record at its position in its host. */
  #insertRecord(id: RecordId): void {
    const host = hostOf(this.#arena, id);
    const anchor = nextSurfaceAfter(this.#arena, id);
    for (const h of surfaceNodes(this.#arena, id)) this.#surface.insertBefore(host, h, anchor);
  }

  // ---------------------------------------------------------------------------
  // Patch
  // ---------------------------------------------------------------------------

  #patch(id: RecordId, next: VNode): void {
    const rec = this.#arena.require(id);
    if (rec.kind !== "root" && rec.kind !== "empty" && rec.node === next) return;

    switch (rec.kind) {
      case "text":
        if (next.kind === "text") {
          if (rec.node.text !== next.text) this.#surface.setText(rec.handle, next.text);
          rec.node = next;
          return;
        }
        break;
      case "empty":
        if (next.kind === "empty") return;
        break;
      case "element":
        if (
          next.kind === "element" &&
          next.tag === rec.node.tag &&
          next.key === rec.node.key &&
          next.namespace === rec.node.namespace
        ) {
          this.#patchElement(rec, next);
          return;
        }
        break;
      case "list":
        if (next.kind === "list") {
          this.#patchList(rec, next);
          return;
        }
        break;
      case "component":
        if (next.kind === "component" && next.type === rec.node.type && next.key === rec.node.key) {
          rec.node = next;
          rec.scope?.receive(next);
          return;
        }
        break;
      case "suspense":
        if (next.kind === "suspense" && next.key === rec.node.key) {
          this.#patchSuspense(rec, next);
          return;
        }
        break;
      case "root":
        throw new TrellisError("TRL_INVALID_STATE", "the root record cannot be patched");
    }
    this.#replace(rec, next);
  }

  #patchElement(rec: ElementRecord<H>, next: ElementNode): void {
    const surface = this.#surface;
    const prev = rec.node;
    const handle = rec.handle;

    for (const [key, value] of next.attrs) {
      if (prev.attrs.get(key) !== value) surface.setAttribute(handle, key, value);
    }
    for (const key of prev.attrs.keys()) {
      if (!next.attrs.has(key)) surface.removeAttribute(handle, key);
    }

    for (const [event, listener] of next.listeners) {
      if (prev.listeners.get(event) !== listener) surface.setListener(handle, event, listener);
    }
    for (const event of prev.listeners.keys()) {
      if (!next.listeners.has(event)) surface.setListener(handle, event, null);
    }

    if (prev.ref !== next.ref) {
      if (prev.ref !== undefined && prev.ref.current === handle) prev.ref.current = null;
      if (next.ref !== undefined) next.ref.current = handle;
    }

    rec.node = next;
    this.#patchPositional(rec, elementChildren(next), rec.namespace);
  }

  #patchList(rec: ListRecord, next: ListNode): void {
    rec.node = next;
    const prev = rec.children.map((recordId, i) => ({ recordId, key: rec.keys[i] }));
    const result = reconcileChildren(prev, next.items);
    if (result.diagnostic !== null) this.#report(result.diagnostic);

    const namespace = this.#inheritedNamespace(rec.id);
    if (result.mode === "positional") {
      this.#patchPositional(rec, next.items, namespace);
      rec.keys = next.items.map((item) => item.key);
      return;
    }

    const arena = this.#arena;
    const surface = this.#surface;

    if (result.unmatched.length > 0) {
      const gone = new Set(result.unmatched);
      for (const id of result.unmatched) this.#unmount(id, true);
      const keptChildren: RecordId[] = [];
      const keptKeys: (string | undefined)[] = [];
      for (let i = 0; i < rec.children.length; i++) {
        const id = rec.children[i];
        if (id === undefined || gone.has(id)) continue;
        keptChildren.push(id);
        keptKeys.push(rec.keys[i]);
      }
      rec.children = keptChildren;
      rec.keys = keptKeys;
    }

    // Patch matched children where they stand; a replace rewrites the slot.
    const slotOf = new Map<RecordId, number>();
    rec.children.forEach((id, i) => slotOf.set(id, i));
    const resolved: (RecordId | null)[] = result.matches.map(() => null);
    result.matches.forEach((match, i) => {
      if (match.recordId === null) return;
      const slot = slotOf.get(match.recordId);
      if (slot === undefined) return;
      this.#patch(match.recordId, match.node);
      resolved[i] = rec.children[slot] ?? null;
    });

    // Place right to left: every child goes before the first node of its successor.
    const host = hostOf(arena, rec.id);
    let anchor = nextSurfaceAfter(arena, rec.id);
    const finalIds: RecordId[] = new Array<RecordId>(result.matches.length);
    for (let i = result.matches.length - 1; i >= 0; i--) {
      const match = result.matches[i];
      if (match === undefined) continue;
      const existing = resolved[i] ?? null;
      let id: RecordId;
      let nodes: H[];
      if (existing === null) {
        id = this.#build(match.node, rec.id, rec.depth + 1, namespace).id;
        nodes = surfaceNodes(arena, id);
        for (const h of nodes) surface.insertBefore(host, h, anchor);
      } else {
        id = existing;
        nodes = surfaceNodes(arena, id);
        if (!match.stable) {
          for (const h of nodes) surface.moveBefore(host, h, anchor);
        }
      }
      finalIds[i] = id;
      const first = nodes[0];
      if (first !== undefined) anchor = first;
    }
    rec.children = finalIds;
    rec.keys = next.items.map((item) => item.key);
  }

  #patchPositional(
    rec: ElementRecord<H> | ListRecord,
    next: readonly NextChild[],
    namespace: string | null,
  ): void {
    const shared = Math.min(rec.children.length, next.length);
    for (let i = 0; i < shared; i++) {
      const id = rec.children[i];
      const child = next[i];
      if (id !== undefined && child !== undefined) this.#patch(id, child.node);
    }

    if (rec.children.length > shared) {
      const surplus = rec.children.slice(shared);
      for (const id of surplus) this.#unmount(id, true);
      rec.children.length = shared;
    }

    for (let i = shared; i < next.length; i++) {
      const child = next[i];
      if (child === undefined) continue;
      const built = this.#build(child.node, rec.id, rec.depth + 1, namespace);
      rec.children.push(built.id);
      this.#insertRecord(built.id);
    }
  }

  #patchSuspense(rec: SuspenseRecord<H>, next: SuspenseNode): void {
    rec.node = next;
    this.#patch(rec.primary, next.primary);
    if (rec.mode === "fallback" && rec.fallback !== null) this.#patch(rec.fallback, next.fallback);
  }

  #replace(rec: MountRecord<H>, next: VNode): void {
    const parentId = rec.parent;
    if (parentId === null) {
      throw new TrellisError("TRL_INVALID_STATE", "the root record cannot be replaced");
    }
    const arena = this.#arena;
    const host = hostOf(arena, rec.id);
    const anchor = nextSurfaceAfter(arena, rec.id);
    const namespace = this.#inheritedNamespace(parentId);

    this.#unmount(rec.id, true);
    const fresh = this.#build(next, parentId, rec.depth, namespace);
    this.#replaceSlot(parentId, rec.id, fresh.id);
    for (const h of surfaceNodes(arena, fresh.id)) this.#surface.insertBefore(host, h, anchor);
  }

  #replaceSlot(parentId: RecordId, oldId: RecordId, newId: RecordId): void {
    const parent = this.#arena.require(parentId);
    switch (parent.kind) {
      case "element":
      case "list": {
        const slot = parent.children.indexOf(oldId);
        if (slot >= 0) parent.children[slot] = newId;
        return;
      }
      case "component":
      case "root":
        parent.child = newId;
        return;
      case "suspense":
        if (parent.primary === oldId) parent.primary = newId;
        else if (parent.fallback === oldId) parent.fallback = newId;
        return;
      default:
        return;
    }
  }

  // ---------------------------------------------------------------------------
  // Unmount
  // ---------------------------------------------------------------------------

  /** Destroy the subtree at `id`; with `detach`, also take its nodes off the surface. */
  #unmount(id: RecordId, detach: boolean): void {
    if (detach) {
      const host = hostOf(this.#arena, id);
      for (const h of surfaceNodes(this.#arena, id)) this.#surface.remove(host, h);
    }
    this.#destroy(id);
  }

  #destroy(id: RecordId): void {
    const rec = this.#arena.get(id);
    if (rec === undefined) return;
    switch (rec.kind) {
      case "element":
        for (const child of rec.children) this.#destroy(child);
        if (rec.node.ref !== undefined && rec.node.ref.current === rec.handle) {
          rec.node.ref.current = null;
        }
        this.#surface.forget(rec.handle);
        break;
      case "list":
        for (const child of rec.children) this.#destroy(child);
        break;
      case "component":
        try {
          rec.scope?.destroy();
        } catch (e: unknown) {
          this.#reportError(e);
        }
        this.#releaseSuspensions(rec.id);
        if (rec.child !== null) this.#destroy(rec.child);
        break;
      case "suspense":
        this.#destroy(rec.primary);
        if (rec.fallback !== null) this.#destroy(rec.fallback);
        if (rec.offscreen !== null) this.#surface.forget(rec.offscreen);
        rec.pending.clear();
        break;
      case "root":
        if (rec.child !== null) this.#destroy(rec.child);
        break;
      case "text":
      case "empty":
        break;
    }
    this.#arena.delete(id);
  }

  // ---------------------------------------------------------------------------
  // Suspense
  // ---------------------------------------------------------------------------

  /** Nearest boundary whose primary subtree contains `id`. */
  #boundaryOf(id: RecordId): SuspenseRecord<H> | null {
    let cur = this.#arena.get(id);
    while (cur !== undefined && cur.parent !== null) {
      const parent = this.#arena.get(cur.parent);
      if (parent === undefined) return null;
      if (parent.kind === "suspense" && parent.primary === cur.id) return parent;
      cur = parent;
    }
    return null;
  }

  #showFallback(boundary: SuspenseRecord<H>): void {
    const arena = this.#arena;
    const surface = this.#surface;
    const host = hostOf(arena, boundary.id);
    const anchor = nextSurfaceAfter(arena, boundary.id);
    let offscreen = boundary.offscreen;
    if (offscreen === null) {
      offscreen = surface.createElement(this.#offscreenTag, null);
      boundary.offscreen = offscreen;
    }

    for (const h of surfaceNodes(arena, boundary.primary)) {
      surface.remove(host, h);
      surface.insertBefore(offscreen, h, null);
    }
    boundary.mode = "fallback";

    const fallback = this.#build(
      boundary.node.fallback,
      boundary.id,
      boundary.depth + 1,
      this.#inheritedNamespace(boundary.id),
    );
    boundary.fallback = fallback.id;
    for (const h of surfaceNodes(arena, fallback.id)) surface.insertBefore(host, h, anchor);
    this.#transitions++;
  }

  #showPrimary(boundary: SuspenseRecord<H>): void {
    const arena = this.#arena;
    const surface = this.#surface;
    const host = hostOf(arena, boundary.id);
    const anchor = nextSurfaceAfter(arena, boundary.id);

    if (boundary.fallback !== null) {
      this.#unmount(boundary.fallback, true);
      boundary.fallback = null;
    }
    boundary.mode = "primary";

    const offscreen = boundary.offscreen;
    for (const h of surfaceNodes(arena, boundary.primary)) {
      if (offscreen !== null) surface.remove(offscreen, h);
      surface.insertBefore(host, h, anchor);
    }
    this.#transitions++;
  }

  #onResolved(recordId: RecordId, suspension: Suspension, resolution: SuspensionResolution): void {
    if (resolution !== "resumed") {
      this.#report({
        code: resolution === "dropped" ? "TRL_SUSPENSION_DROPPED" : "TRL_SUSPENSION_COLLECTED",
        severity: "warn",
        subsystem: "suspense",
        detail:
          resolution === "dropped"
            ? "suspension handle dropped without resume; resuming implicitly"
            : "suspension handle collected while pending; resuming implicitly",
      });
    }

    const tokens = this.#suspended.get(recordId);
    if (tokens === undefined || !tokens.delete(suspension)) {
      this.#report({
        code: "TRL_STALE_RESUME",
        severity: "info",
        subsystem: "suspense",
        detail: "suspension resolved after its scope stopped waiting on it; ignored",
      });
      return;
    }
    if (tokens.size === 0) this.#suspended.delete(recordId);

    this.#boundaryOf(recordId)?.pending.delete(suspension);
    this.#componentRecord(recordId)?.scope?.invalidate();
  }

  /**
   * Drop the scope's earlier suspensions, except `keep`, from the scope and its
   * boundary. Their late resolutions report TRL_STALE_RESUME.
   */
  #forgetSuspensions(recordId: RecordId, boundary: SuspenseRecord<H> | null, keep: Suspension | null): void {
    const tokens = this.#suspended.get(recordId);
    if (tokens === undefined) return;
    for (const token of tokens) {
      if (token === keep) continue;
      tokens.delete(token);
      boundary?.pending.delete(token);
    }
    if (tokens.size === 0) this.#suspended.delete(recordId);
  }

  /** Forget a destroyed scope's suspensions; a boundary left with none settles. */
  #releaseSuspensions(recordId: RecordId): void {
    const tokens = this.#suspended.get(recordId);
    if (tokens === undefined) return;
    this.#suspended.delete(recordId);

    const boundary = this.#boundaryOf(recordId);
    if (boundary === null) return;
    for (const token of tokens) boundary.pending.delete(token);
    if (boundary.mode === "fallback" && boundary.pending.size === 0) {
      this.#scheduler.enqueue(this.#settleJob(boundary.id));
    }
  }

  #settleJob(boundaryId: RecordId): SchedulerJob {
    const arena = this.#arena;
    return {
      jobId: boundaryId,
      depth: () => arena.get(boundaryId)?.depth ?? 0,
      isAlive: () => arena.has(boundaryId),
      run: () => {
        const boundary = arena.get(boundaryId);
        if (boundary?.kind !== "suspense") return;
        if (boundary.mode === "fallback" && boundary.pending.size === 0) this.#showPrimary(boundary);
      },
    };
  }

  // ---------------------------------------------------------------------------
  // Lookups
  // ---------------------------------------------------------------------------

  #componentRecord(id: RecordId): ComponentRecord | null {
    const rec = this.#arena.get(id);
    return rec !== undefined && rec.kind === "component" ? rec : null;
  }

  /** Namespace children of `id` inherit: that of the nearest element ancestor-or-self. */
  #inheritedNamespace(id: RecordId): string | null {
    let cur = this.#arena.get(id);
    while (cur !== undefined) {
      if (cur.kind === "element") return cur.namespace;
      cur = cur.parent === null ? undefined : this.#arena.get(cur.parent);
    }
    return null;
  }
}
