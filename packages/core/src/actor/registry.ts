/**
 * packages/core/src/actor/registry.ts — Shared actor instance registry.
 *
 * Why: Context and public actors have one live instance per registry. The
 * registry is an explicit object passed to each runtime (never module state),
 * keyed by definition identity, with a reference count per instance.
 *
 * Instance lifecycle:
 *   - Created by the first acquire() for a definition
 *   - Reused by every later acquire() while it is live
 *   - Forgotten when release() drops the count to zero; the caller tears it down
 */

import type { ActorDefinition } from "./definition.js";
import type { ActorInstance, ActorReach } from "./types.js";

export type ActorRegistryEntry = Readonly<{
  name: string;
  reach: ActorReach;
  refs: number;
}>;

export type ActorRegistry = Readonly<{
  /** Return the live shared instance for `def`, creating it when needed, and count one reference. */
  acquire: <I, O>(def: ActorDefinition<I, O>, create: () => ActorInstance<I, O>) => ActorInstance<I, O>;
  /**
   * Drop one reference to `instance`. Returns true when it was the last one;
   * the instance is then no longer registered.
   */
  release: <I, O>(def: ActorDefinition<I, O>, instance: ActorInstance<I, O>) => boolean;
  refCount: <I, O>(def: ActorDefinition<I, O>) => number;
  size: () => number;
  entries: () => readonly ActorRegistryEntry[];
}>;

type Slot = { name: string; reach: ActorReach; refs: number };

export function createActorRegistry(): ActorRegistry {
  const owner = Object.freeze({});
  const slots = new Map<object, Slot>();

  return Object.freeze({
    acquire<I, O>(def: ActorDefinition<I, O>, create: () => ActorInstance<I, O>): ActorInstance<I, O> {
      const existing = def.sharedIn(owner);
      const slot = slots.get(def);
      if (existing !== undefined && existing.live && slot !== undefined) {
        slot.refs++;
        return existing;
      }
      const instance = create();
      def.shareIn(owner, instance);
      slots.set(def, { name: def.name, reach: def.reach, refs: 1 });
      return instance;
    },
    release<I, O>(def: ActorDefinition<I, O>, instance: ActorInstance<I, O>): boolean {
      const slot = slots.get(def);
      if (slot === undefined || def.sharedIn(owner) !== instance) return false;
      slot.refs--;
      if (slot.refs > 0) return false;
      slots.delete(def);
      def.shareIn(owner, null);
      return true;
    },
    refCount<I, O>(def: ActorDefinition<I, O>): number {
      return slots.get(def)?.refs ?? 0;
    },
    size(): number {
      return slots.size;
    },
    entries(): readonly ActorRegistryEntry[] {
      return [...slots.values()].map((s) => Object.freeze({ name: s.name, reach: s.reach, refs: s.refs }));
    },
  });
}
