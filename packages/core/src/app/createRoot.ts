/**
 * packages/core/src/app/createRoot.ts — Root factory.
 *
 * Why: Wires a surface, a container handle, the scheduler and the patcher into
 * one driver-facing object. render() patches the root synchronously and then
 * runs a scheduler pass, so the returned PatchResult covers every scope render
 * the new tree caused.
 *
 * Invariants:
 *   - render()/flush() during a pass throw TRL_REENTRANT_CALL
 *   - Errors from a render()/flush() pass are thrown to the caller
 *   - Errors from an auto-flushed pass go to onError
 *   - render()/flush() after unmount() throw TRL_INVALID_STATE
 *
 * @see docs/guide/lifecycle.md
 */

import { TrellisError, describeThrown } from "../abi.js";
import {
  DEFAULT_DEV_MODE,
  type Diagnostic,
  type DiagnosticSink,
  createConsoleDiagnosticSink,
  createDiagnosticRecorder,
  warnDev,
} from "../debug/diagnostics.js";
import { TreePatcher } from "../runtime/commit.js";
import type { MutationSurface, PatchOpCounts } from "../surface.js";
import type { VNode } from "../tree/types.js";
import { type SchedulerStats, createScheduler } from "./scheduler.js";

export type RootConfig = Readonly<{
  /** Run a pass on a microtask after the first enqueue (default true). */
  autoFlush?: boolean;
  /** Jobs one pass may run before it is treated as an update loop (default 100000). */
  maxJobsPerPass?: number;
  /** Print warn/error diagnostics (default: NODE_ENV !== "production"). */
  devMode?: boolean;
  /** Tag of the offscreen containers created for suspended subtrees. */
  offscreenTag?: string;
  /** Replaces the console sink. */
  onDiagnostic?: DiagnosticSink;
  /** Errors with no caller to throw to (auto-flushed passes, rejected futures). */
  onError?: (error: unknown) => void;
}>;

export type ResolvedRootConfig = Readonly<{
  autoFlush: boolean;
  maxJobsPerPass: number;
  devMode: boolean;
  offscreenTag: string;
  onDiagnostic: DiagnosticSink;
  onError: (error: unknown) => void;
}>;

export const DEFAULT_ROOT_CONFIG = Object.freeze({
  autoFlush: true,
  maxJobsPerPass: 100_000,
  offscreenTag: "trellis-offscreen",
});

export type PatchResult = Readonly<{
  ops: PatchOpCounts;
  diagnostics: readonly Diagnostic[];
}>;

export type RootStats = SchedulerStats &
  Readonly<{
    boundaryTransitions: number;
    /** Live mount records, including the root record. */
    records: number;
  }>;

export interface Root<H> {
  /** Patch the tree to `node` and run a scheduler pass. */
  render(node: VNode): PatchResult;
  /** Run a scheduler pass now. */
  flush(): PatchResult;
  /** Unmount everything and stop scheduling. */
  unmount(): void;
  /** Children of `container` as placed by this root. */
  childrenOf(container: H): readonly H[];
  stats(): RootStats;
}

function invalidProps(detail: string): never {
  throw new TrellisError("TRL_INVALID_PROPS", detail);
}

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidProps(`${name} must be a positive integer`);
  return v;
}

function requireNonEmptyString(name: string, v: string): string {
  if (typeof v !== "string" || v.length === 0) invalidProps(`${name} must be a non-empty string`);
  return v;
}

function defaultOnError(error: unknown): void {
  warnDev(`[trellis][scheduler] unhandled error: ${describeThrown(error)}`);
}

export function resolveRootConfig(config: RootConfig = {}): ResolvedRootConfig {
  const devMode = config.devMode ?? DEFAULT_DEV_MODE;
  if (typeof devMode !== "boolean") invalidProps("devMode must be a boolean");
  const autoFlush = config.autoFlush ?? DEFAULT_ROOT_CONFIG.autoFlush;
  if (typeof autoFlush !== "boolean") invalidProps("autoFlush must be a boolean");
  return Object.freeze({
    autoFlush,
    maxJobsPerPass: requirePositiveInt(
      "maxJobsPerPass",
      config.maxJobsPerPass ?? DEFAULT_ROOT_CONFIG.maxJobsPerPass,
    ),
    devMode,
    offscreenTag: requireNonEmptyString(
      "offscreenTag",
      config.offscreenTag ?? DEFAULT_ROOT_CONFIG.offscreenTag,
    ),
    onDiagnostic: config.onDiagnostic ?? createConsoleDiagnosticSink(devMode),
    onError: config.onError ?? defaultOnError,
  });
}

/**
 * Create a root that renders into `container`.
 *
 * The container is owned by the root: it must be empty and nothing else may
 * insert into it while the root is mounted.
 */
export function createRoot<H>(surface: MutationSurface<H>, container: H, config?: RootConfig): Root<H> {
  const cfg = resolveRootConfig(config);
  const recorder = createDiagnosticRecorder(cfg.onDiagnostic);
  const scheduler = createScheduler({
    autoFlush: cfg.autoFlush,
    maxJobsPerPass: cfg.maxJobsPerPass,
    onError: cfg.onError,
  });
  const patcher = new TreePatcher<H>({
    surface,
    container,
    scheduler,
    offscreenTag: cfg.offscreenTag,
    report: recorder.sink,
    reportError: cfg.onError,
  });

  let inRender = false;
  let unmounted = false;

  function assertUsable(method: string): void {
    if (unmounted) throw new TrellisError("TRL_INVALID_STATE", `${method}: root is unmounted`);
    if (inRender || scheduler.isFlushing()) {
      throw new TrellisError("TRL_REENTRANT_CALL", `${method}: called during a render pass`);
    }
  }

  function runPass(body: () => void): PatchResult {
    patcher.takeCounts();
    recorder.begin();
    try {
      body();
    } catch (e: unknown) {
      recorder.take();
      throw e;
    }
    return Object.freeze({ ops: patcher.takeCounts(), diagnostics: recorder.take() });
  }

  return Object.freeze({
    render(node: VNode): PatchResult {
      assertUsable("render");
      return runPass(() => {
        inRender = true;
        try {
          patcher.renderRoot(node);
        } finally {
          inRender = false;
        }
        scheduler.flush();
      });
    },
    flush(): PatchResult {
      assertUsable("flush");
      return runPass(() => scheduler.flush());
    },
    unmount(): void {
      if (unmounted) return;
      if (inRender || scheduler.isFlushing()) {
        throw new TrellisError("TRL_REENTRANT_CALL", "unmount: called during a render pass");
      }
      unmounted = true;
      scheduler.dispose();
      patcher.unmountRoot();
    },
    childrenOf(h: H): readonly H[] {
      return patcher.childrenOf(h);
    },
    stats(): RootStats {
      return Object.freeze({
        ...scheduler.stats(),
        boundaryTransitions: patcher.boundaryTransitions,
        records: patcher.recordCount,
      });
    },
  });
}
