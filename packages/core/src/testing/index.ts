export { childrenMarkup, createMemorySurface, toMarkup } from "./memorySurface.js";
export type {
  MemoryElement,
  MemoryNode,
  MemoryOp,
  MemoryOpName,
  MemorySurface,
  MemorySurfaceOptions,
  MemoryText,
} from "./memorySurface.js";

export { createLoopbackSpawner } from "./loopbackIsolate.js";
export type { LoopbackIsolate, LoopbackSpawner } from "./loopbackIsolate.js";
