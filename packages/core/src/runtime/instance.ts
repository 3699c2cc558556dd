/**
 * packages/core/src/runtime/instance.ts — Stable record identifiers.
 *
 * Every mounted node owns exactly one arena record. Parent/child and
 * scope/record back-references are RecordId lookups, never object pointers.
 */

export type RecordId = number;

export type RecordIdAllocator = Readonly<{
  allocate: () => RecordId;
}>;

export function createRecordIdAllocator(start = 1): RecordIdAllocator {
  if (!Number.isSafeInteger(start) || start < 0) {
    throw new RangeError(`createRecordIdAllocator: start must be a non-negative integer`);
  }
  let next = start;
  return Object.freeze({
    allocate(): RecordId {
      const id = next;
      next++;
      return id;
    },
  });
}
