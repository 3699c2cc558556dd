/** Let queued microtasks (and the microtasks they queue) run. */
export async function flushMicrotasks(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => queueMicrotask(resolve));
  }
}

/** True when the process runs with --expose-gc. */
export function canCollectGarbage(): boolean {
  return typeof Reflect.get(globalThis, "gc") === "function";
}

/**
 * Force full collections until `done()` holds. A macrotask separates rounds so
 * FinalizationRegistry callbacks get to run. Needs --expose-gc.
 */
export async function collectGarbageUntil(done: () => boolean, rounds = 20): Promise<void> {
  const gc: unknown = Reflect.get(globalThis, "gc");
  if (typeof gc !== "function") throw new Error("collectGarbageUntil: run node with --expose-gc");
  for (let i = 0; i < rounds && !done(); i++) {
    gc();
    await new Promise((resolve) => setTimeout(resolve, 0));
  }
}
