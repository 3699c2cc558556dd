/**
 * packages/core/src/runtime/scope.ts — Component scopes.
 *
 * Why: A scope is the runtime half of a mounted component. It owns the state,
 * an ordered inbox of messages and the phase machine; renders are never run
 * inline but scheduled as one job per scope, so any number of messages sent
 * between two passes cost one render.
 *
 * Phases:
 *   created → rendering → idle → (rendering | destroyed)
 *
 * Invariants:
 *   - create() runs exactly once, when the component node is first mounted
 *   - A render drains the whole inbox, calls update() once per message,
 *     and calls view() at most once
 *   - Every link operation is a no-op after destroy
 *
 * @see docs/guide/components.md
 */

import { TrellisError, describeThrown } from "../abi.js";
import type { SchedulerJob } from "../app/scheduler.js";
import type { Diagnostic } from "../debug/diagnostics.js";
import { structuralEqual } from "../tree/equality.js";
import type { ComponentNode, PendingRender, RenderOutcome, VNode } from "../tree/types.js";
import type { RecordId } from "./instance.js";
import type { Suspension } from "./suspense.js";

/** What the patcher and controller provide to scopes. */
export interface ScopeHost {
  enqueue(job: SchedulerJob): void;
  depthOf(recordId: RecordId): number;
  /** Patch the component's subtree with a ready view. */
  commitReady(recordId: RecordId, node: VNode): void;
  /** Hand a pending view to the suspense controller. */
  suspend(recordId: RecordId, suspension: Suspension): void;
  report(diagnostic: Diagnostic): void;
  /** Errors with no caller to throw to (rejected futures). */
  reportError(error: unknown): void;
}

/** Erased scope view used by the patcher. */
export interface MountedScope {
  readonly name: string;
  readonly alive: boolean;
  /** Swap in the props of a matched node; schedules a render when they changed. */
  receive(node: ComponentNode): void;
  /** Force a render on the next pass (suspension resumed). */
  invalidate(): void;
  destroy(): void;
}

/** Message channel into a scope. All operations are no-ops after destroy. */
export interface ScopeLink<M> {
  readonly alive: boolean;
  sendMessage(msg: M): void;
  /** Append all messages atomically. An empty batch does nothing. */
  sendMessageBatch(msgs: readonly M[]): void;
  callback<T>(f: (value: T) => M): (value: T) => void;
  batchCallback<T>(f: (value: T) => readonly M[]): (value: T) => void;
  /** Send the resolved message; a rejection goes to the root's error handler. */
  sendFuture(future: PromiseLike<M>): void;
}

export type ScopeContext<P, M> = Readonly<{
  readonly props: P;
  link: ScopeLink<M>;
  /** Signal "not ready": return the result from view(). */
  suspend: (suspension: Suspension) => PendingRender;
}>;

export type ComponentSpec<P, M, S> = Readonly<{
  name: string;
  create: (ctx: ScopeContext<P, M>) => S;
  /** Return the next state; returning the same state skips the render. */
  update?: (state: S, msg: M, ctx: ScopeContext<P, M>) => S;
  /** Decide whether new props need a render. Defaults to structural inequality. */
  changed?: (prev: P, next: P) => boolean;
  view: (state: S, ctx: ScopeContext<P, M>) => VNode | PendingRender;
  rendered?: (state: S, ctx: ScopeContext<P, M>, firstRender: boolean) => void;
  destroy?: (state: S, ctx: ScopeContext<P, M>) => void;
}>;

/** Typed props recorded for a node by its definition. */
export type PropsCell<P> = Readonly<{ props: P }>;

export type ScopePhase = "created" | "rendering" | "idle" | "destroyed";

function userCodeThrow(component: string, hook: string, e: unknown): TrellisError {
  return new TrellisError(
    "TRL_USER_CODE_THROW",
    `${component}.${hook} threw: ${describeThrown(e)}`,
    { cause: e },
  );
}

export class ComponentScope<P, M, S> implements MountedScope, SchedulerJob {
  readonly jobId: RecordId;
  readonly name: string;
  readonly link: ScopeLink<M>;

  readonly #spec: ComponentSpec<P, M, S>;
  readonly #host: ScopeHost;
  readonly #readProps: (node: ComponentNode) => PropsCell<P> | undefined;
  readonly #ctx: ScopeContext<P, M>;
  #props: P;
  #state: S;
  #inbox: M[] = [];
  #phase: ScopePhase = "created";
  #forceRender = true;
  #firstRender = true;

  constructor(
    spec: ComponentSpec<P, M, S>,
    host: ScopeHost,
    recordId: RecordId,
    props: P,
    readProps: (node: ComponentNode) => PropsCell<P> | undefined,
  ) {
    this.jobId = recordId;
    this.name = spec.name;
    this.#spec = spec;
    this.#host = host;
    this.#props = props;
    this.#readProps = readProps;
    this.link = this.#createLink();

    const scope = this;
    this.#ctx = Object.freeze({
      get props(): P {
        return scope.#props;
      },
      link: this.link,
      suspend(suspension: Suspension): PendingRender {
        return Object.freeze({ kind: "pending", suspension });
      },
    });

    try {
      this.#state = spec.create(this.#ctx);
    } catch (e: unknown) {
      this.#phase = "destroyed";
      throw userCodeThrow(spec.name, "create", e);
    }
    host.enqueue(this);
  }

  get alive(): boolean {
    return this.#phase !== "destroyed";
  }

  get phase(): ScopePhase {
    return this.#phase;
  }

  get props(): P {
    return this.#props;
  }

  get state(): S {
    return this.#state;
  }

  depth(): number {
    return this.#host.depthOf(this.jobId);
  }

  isAlive(): boolean {
    return this.alive;
  }

  receive(node: ComponentNode): void {
    if (!this.alive) return;
    const cell = this.#readProps(node);
    if (cell === undefined) return;
    const prev = this.#props;
    const next = cell.props;
    this.#props = next;
    const changedFn = this.#spec.changed;
    const changed = changedFn
      ? this.#callUser("changed", () => changedFn(prev, next))
      : !structuralEqual(prev, next);
    if (changed) this.invalidate();
  }

  invalidate(): void {
    if (!this.alive) return;
    this.#forceRender = true;
    this.#host.enqueue(this);
  }

  run(): void {
    if (!this.alive) return;
    this.#phase = "rendering";
    try {
      let needsRender = this.#forceRender;
      this.#forceRender = false;

      const inbox = this.#inbox;
      this.#inbox = [];
      const update = this.#spec.update;
      if (update) {
        for (const msg of inbox) {
          const prev = this.#state;
          const next = this.#callUser("update", () => update(prev, msg, this.#ctx));
          if (!Object.is(prev, next)) {
            this.#state = next;
            needsRender = true;
          }
        }
      }
      if (!needsRender) return;

      const outcome = this.#render();
      switch (outcome.kind) {
        case "ready": {
          this.#host.commitReady(this.jobId, outcome.node);
          const firstRender = this.#firstRender;
          this.#firstRender = false;
          const rendered = this.#spec.rendered;
          if (rendered) this.#callUser("rendered", () => rendered(this.#state, this.#ctx, firstRender));
          return;
        }
        case "pending":
          this.#host.suspend(this.jobId, outcome.suspension);
          return;
        case "failed":
          throw userCodeThrow(this.name, "view", outcome.error);
      }
    } finally {
      if (this.#phase === "rendering") this.#phase = "idle";
    }
  }

  destroy(): void {
    if (!this.alive) return;
    this.#phase = "destroyed";
    this.#inbox = [];
    const destroy = this.#spec.destroy;
    if (destroy) this.#callUser("destroy", () => destroy(this.#state, this.#ctx));
  }

  #render(): RenderOutcome {
    try {
      const out = this.#spec.view(this.#state, this.#ctx);
      if (out.kind === "pending") return { kind: "pending", suspension: out.suspension };
      return { kind: "ready", node: out };
    } catch (e: unknown) {
      return { kind: "failed", error: e };
    }
  }

  #callUser<T>(hook: string, fn: () => T): T {
    try {
      return fn();
    } catch (e: unknown) {
      if (e instanceof TrellisError) throw e;
      throw userCodeThrow(this.name, hook, e);
    }
  }

  #afterDestroy(op: string): void {
    this.#host.report({
      code: "TRL_MESSAGE_AFTER_DESTROY",
      severity: "info",
      subsystem: "scope",
      detail: `${this.name}: ${op} after destroy ignored`,
    });
  }

  #createLink(): ScopeLink<M> {
    const scope = this;
    const sendMessage = (msg: M): void => {
      if (!scope.alive) {
        scope.#afterDestroy("sendMessage");
        return;
      }
      scope.#inbox.push(msg);
      scope.#host.enqueue(scope);
    };
    const sendMessageBatch = (msgs: readonly M[]): void => {
      if (!scope.alive) {
        scope.#afterDestroy("sendMessageBatch");
        return;
      }
      if (msgs.length === 0) return;
      for (const msg of msgs) scope.#inbox.push(msg);
      scope.#host.enqueue(scope);
    };

    return Object.freeze({
      get alive(): boolean {
        return scope.alive;
      },
      sendMessage,
      sendMessageBatch,
      callback<T>(f: (value: T) => M): (value: T) => void {
        return (value: T) => {
          if (!scope.alive) return;
          sendMessage(f(value));
        };
      },
      batchCallback<T>(f: (value: T) => readonly M[]): (value: T) => void {
        return (value: T) => {
          if (!scope.alive) return;
          sendMessageBatch(f(value));
        };
      },
      sendFuture(future: PromiseLike<M>): void {
        void Promise.resolve(future).then(
          (msg) => {
            if (scope.alive) sendMessage(msg);
          },
          (e: unknown) => {
            scope.#host.report({
              code: "TRL_FUTURE_REJECTED",
              severity: "error",
              subsystem: "scope",
              detail: `${scope.name}: future rejected: ${describeThrown(e)}`,
            });
            scope.#host.reportError(e);
          },
        );
      },
    });
  }
}
