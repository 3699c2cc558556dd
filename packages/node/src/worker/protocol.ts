/**
 * Worker bootstrap data for actor isolates.
 *
 * Everything after bootstrap travels as envelope bytes; this is the only
 * structured message a worker receives.
 */

import { isActorDefinition } from "@trellis-ui/core";
import type { ActorDefinition } from "@trellis-ui/core";

export type ActorWorkerData = Readonly<{
  /** URL of an ES module that exports the actor definition. */
  moduleUrl: string;
  /** Definition name to serve. */
  name: string;
}>;

export function parseActorWorkerData(v: unknown): ActorWorkerData | null {
  if (typeof v !== "object" || v === null) return null;
  const moduleUrl: unknown = Reflect.get(v, "moduleUrl");
  const name: unknown = Reflect.get(v, "name");
  if (typeof moduleUrl !== "string" || typeof name !== "string") return null;
  if (moduleUrl.length === 0 || name.length === 0) return null;
  return { moduleUrl, name };
}

/** First exported definition named `name`, or null. */
export function findActorDefinition(
  moduleExports: object,
  name: string,
): ActorDefinition<unknown, unknown> | null {
  for (const value of Object.values(moduleExports)) {
    if (isActorDefinition(value) && value.name === name) return value;
  }
  return null;
}
