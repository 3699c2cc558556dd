/**
 * @trellis-ui/core
 *
 * Runtime-agnostic component scheduling and reconciliation core.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 *
 * @see docs/guide/concepts.md
 */

// =============================================================================
// Errors and envelope ABI
// =============================================================================

export {
  TRELLIS_ENVELOPE_MAGIC,
  TRELLIS_ENVELOPE_VERSION_V1,
  TRELLIS_ENVELOPE_HEADER_SIZE,
  ENVELOPE_KIND_CONNECTED,
  ENVELOPE_KIND_DISCONNECTED,
  ENVELOPE_KIND_REQUEST,
  ENVELOPE_KIND_RESPONSE,
  ENVELOPE_KIND_COMPLETE,
  ENVELOPE_KIND_DESTROY,
  type EnvelopeKind,
  TrellisError,
  type TrellisErrorCode,
  describeThrown,
} from "./abi.js";

export { decodeEnvelope, encodeEnvelope } from "./protocol/envelope.js";
export type { Envelope, ParseError, ParseErrorCode, ParseResult } from "./protocol/types.js";

// =============================================================================
// Diagnostics
// =============================================================================

export {
  DEFAULT_DEV_MODE,
  createConsoleDiagnosticSink,
  createDiagnosticRecorder,
  formatDiagnostic,
  warnDev,
} from "./debug/diagnostics.js";
export type {
  Diagnostic,
  DiagnosticCode,
  DiagnosticRecorder,
  DiagnosticSeverity,
  DiagnosticSink,
  DiagnosticSubsystem,
} from "./debug/diagnostics.js";

// =============================================================================
// Node model
// =============================================================================

export { MATHML_NAMESPACE, SVG_NAMESPACE, nodeKey, resolveNamespace } from "./tree/types.js";
export type {
  ComponentNode,
  ComponentType,
  ElementNode,
  EmptyNode,
  ListItem,
  ListNode,
  NodeRef,
  PendingRender,
  RenderOutcome,
  SuspenseNode,
  TextNode,
  VNode,
  VNodeKind,
} from "./tree/types.js";
export { structuralEqual } from "./tree/equality.js";
export { createRef, ui } from "./ui.js";
export type { AttrValue, ElementProps, UiChild } from "./ui.js";

// =============================================================================
// Surface contract
// =============================================================================

export type { Listener, MutationSurface, PatchOpCounts } from "./surface.js";

// =============================================================================
// Components, suspense, reconciliation
// =============================================================================

export { Component, defineComponent } from "./runtime/component.js";
export type { ComponentFactory } from "./runtime/component.js";
export type {
  ComponentSpec,
  MountedScope,
  ScopeContext,
  ScopeLink,
  ScopePhase,
} from "./runtime/scope.js";
export { Suspension, createSuspension } from "./runtime/suspense.js";
export type {
  SuspensionHandle,
  SuspensionListener,
  SuspensionResolution,
} from "./runtime/suspense.js";
export { reconcileChildren, scanKeys } from "./runtime/reconcile.js";
export type {
  ChildMatch,
  NextChild,
  PrevChild,
  ReconcileChildrenResult,
} from "./runtime/reconcile.js";
export { computeLIS } from "./runtime/lis.js";

// =============================================================================
// Roots and scheduling
// =============================================================================

export { DEFAULT_ROOT_CONFIG, createRoot, resolveRootConfig } from "./app/createRoot.js";
export type {
  PatchResult,
  ResolvedRootConfig,
  Root,
  RootConfig,
  RootStats,
} from "./app/createRoot.js";
export { createScheduler } from "./app/scheduler.js";
export type { Scheduler, SchedulerConfig, SchedulerJob, SchedulerStats } from "./app/scheduler.js";

// =============================================================================
// Actors
// =============================================================================

export { ActorDefinition, defineActor, isActorDefinition } from "./actor/definition.js";
export type { ActorCodecs, ActorSpec } from "./actor/definition.js";
export { bytesCodec, jsonCodec, stringCodec } from "./actor/codec.js";
export { createActorRegistry } from "./actor/registry.js";
export type { ActorRegistry, ActorRegistryEntry } from "./actor/registry.js";
export { createActorRuntime } from "./actor/runtime.js";
export type { ActorRuntime, ActorRuntimeConfig } from "./actor/runtime.js";
export { serveActor } from "./actor/serve.js";
export type { ActorServer, ServeOptions } from "./actor/serve.js";
export type {
  Actor,
  ActorInstance,
  ActorLink,
  ActorReach,
  Bridge,
  BridgeCloseReason,
  BridgeOptions,
  BridgePort,
  Dispatcher,
  HandlerId,
  IsolateEndpoint,
  IsolateSpawner,
  IsolatedReach,
  PayloadCodec,
  SpawnRequest,
} from "./actor/types.js";
