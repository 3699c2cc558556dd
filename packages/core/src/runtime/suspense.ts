/**
 * packages/core/src/runtime/suspense.ts — Suspension tokens.
 *
 * Why: A view that cannot render yet returns `ctx.suspend(suspension)`. The
 * token is one-shot: it moves from pending to resolved exactly once, and every
 * subscriber is told how it got there. A repeated "not ready" must use a fresh
 * token, so a stale handle can never resume a boundary twice.
 *
 * Resolution reasons:
 *   - resumed: `handle.resume()`
 *   - dropped: `handle.drop()` (caller error, treated as an implicit resume)
 *   - collected: the handle was garbage-collected while pending (same)
 *
 * @see docs/guide/suspense.md
 */

export type SuspensionResolution = "resumed" | "dropped" | "collected";

export type SuspensionListener = (resolution: SuspensionResolution) => void;

/** Resume capability for a Suspension. */
export type SuspensionHandle = Readonly<{
  resume: () => void;
  /** Give up without a result. Subscribers still get one implicit resume. */
  drop: () => void;
}>;

type SuspensionCore = {
  resolution: SuspensionResolution | null;
  listeners: Set<SuspensionListener>;
};

function settle(core: SuspensionCore, resolution: SuspensionResolution): boolean {
  if (core.resolution !== null) return false;
  core.resolution = resolution;
  const listeners = [...core.listeners];
  core.listeners.clear();
  for (const listener of listeners) listener(resolution);
  return true;
}

const collectedHandles = new FinalizationRegistry<SuspensionCore>((core) => {
  settle(core, "collected");
});

export class Suspension {
  readonly #core: SuspensionCore;

  private constructor(core: SuspensionCore) {
    this.#core = core;
  }

  /** Create a pending token and its resume handle. */
  static create(): [Suspension, SuspensionHandle] {
    const core: SuspensionCore = { resolution: null, listeners: new Set() };
    const handle: SuspensionHandle = Object.freeze({
      resume(): void {
        if (settle(core, "resumed")) collectedHandles.unregister(handle);
      },
      drop(): void {
        if (settle(core, "dropped")) collectedHandles.unregister(handle);
      },
    });
    collectedHandles.register(handle, core, handle);
    return [new Suspension(core), handle];
  }

  /** Suspension resolved when `promise` settles, whether it fulfills or rejects. */
  static fromPromise(promise: PromiseLike<unknown>): Suspension {
    const [suspension, handle] = Suspension.create();
    void Promise.resolve(promise).then(
      () => handle.resume(),
      () => handle.resume(),
    );
    return suspension;
  }

  get resolved(): boolean {
    return this.#core.resolution !== null;
  }

  get resolution(): SuspensionResolution | null {
    return this.#core.resolution;
  }

  /**
   * Register `listener` for the resolution. Returns an unsubscribe function.
   * Subscribing to an already resolved token calls nothing and returns a no-op.
   */
  subscribe(listener: SuspensionListener): () => void {
    const core = this.#core;
    if (core.resolution !== null) return () => {};
    core.listeners.add(listener);
    return () => {
      core.listeners.delete(listener);
    };
  }
}

/** Create a pending Suspension and its handle. */
export function createSuspension(): [Suspension, SuspensionHandle] {
  return Suspension.create();
}
