/**
 * packages/core/src/actor/definition.ts — Actor definitions.
 *
 * Why: A definition is the identity of an actor type. Shared (context, public)
 * instances are looked up by definition in an explicit registry; the typed
 * instance is kept on the definition itself, per registry, so lookups return
 * it with its input/output types intact.
 */

import { TrellisError, describeThrown } from "../abi.js";
import type { Actor, ActorInstance, ActorLink, ActorReach, PayloadCodec } from "./types.js";

export type ActorSpec<I, O> = Readonly<{
  /** Unique among the definitions a worker module exports. */
  name: string;
  reach: ActorReach;
  create: (link: ActorLink<O>) => Actor<I>;
  /** Required for public/private reach. */
  input?: PayloadCodec<I>;
  /** Required for public/private reach. */
  output?: PayloadCodec<O>;
}>;

export type ActorCodecs<I, O> = Readonly<{ input: PayloadCodec<I>; output: PayloadCodec<O> }>;

export class ActorDefinition<I, O> {
  readonly name: string;
  readonly reach: ActorReach;
  readonly #create: (link: ActorLink<O>) => Actor<I>;
  readonly #codecs: ActorCodecs<I, O> | null;
  readonly #shared = new WeakMap<object, ActorInstance<I, O>>();

  constructor(spec: ActorSpec<I, O>) {
    if (spec.name.length === 0) {
      throw new TrellisError("TRL_INVALID_PROPS", "defineActor: name must be a non-empty string");
    }
    const isolated = spec.reach === "public" || spec.reach === "private";
    if (isolated && (spec.input === undefined || spec.output === undefined)) {
      throw new TrellisError(
        "TRL_INVALID_PROPS",
        `defineActor(${spec.name}): ${spec.reach} reach needs input and output codecs`,
      );
    }
    this.name = spec.name;
    this.reach = spec.reach;
    this.#create = spec.create;
    this.#codecs =
      spec.input !== undefined && spec.output !== undefined
        ? Object.freeze({ input: spec.input, output: spec.output })
        : null;
  }

  get isolated(): boolean {
    return this.reach === "public" || this.reach === "private";
  }

  get shared(): boolean {
    return this.reach === "context" || this.reach === "public";
  }

  create(link: ActorLink<O>): Actor<I> {
    return this.#create(link);
  }

  /** Codecs for crossing an isolate boundary. Throws when the definition has none. */
  codecs(): ActorCodecs<I, O> {
    if (this.#codecs === null) {
      throw new TrellisError("TRL_INVALID_STATE", `actor ${this.name} has no payload codecs`);
    }
    return this.#codecs;
  }

  /** Shared instance registered under `owner`, if any. */
  sharedIn(owner: object): ActorInstance<I, O> | undefined {
    return this.#shared.get(owner);
  }

  /** Register (or, with null, forget) the shared instance under `owner`. */
  shareIn(owner: object, instance: ActorInstance<I, O> | null): void {
    if (instance === null) this.#shared.delete(owner);
    else this.#shared.set(owner, instance);
  }
}

/** Run the definition's factory; a throw becomes TRL_USER_CODE_THROW. */
export function createActor<I, O>(def: ActorDefinition<I, O>, link: ActorLink<O>): Actor<I> {
  try {
    return def.create(link);
  } catch (e: unknown) {
    throw new TrellisError("TRL_USER_CODE_THROW", `actor ${def.name} create threw: ${describeThrown(e)}`, {
      cause: e,
    });
  }
}

export function defineActor<I, O>(spec: ActorSpec<I, O>): ActorDefinition<I, O> {
  return new ActorDefinition(spec);
}

export function isActorDefinition(value: unknown): value is ActorDefinition<unknown, unknown> {
  return value instanceof ActorDefinition;
}
