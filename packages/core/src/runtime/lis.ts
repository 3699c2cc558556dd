/**
 * Longest increasing subsequence over previous positions.
 *
 * Children whose previous positions form the LIS are already in the right
 * relative order and never move; only the rest are repositioned.
 *
 * Example:
 *   prev positions of next children: [2, 0, 1, 4, 3]
 *   LIS indices: [1, 2, 4] (values 0, 1, 3) → only indices 0 and 3 move
 *
 * Complexity: O(n log n) time, O(n) space. Entries < 0 (new children) are
 * skipped.
 */
export function computeLIS(arr: readonly number[]): number[] {
  const n = arr.length;
  if (n === 0) return [];

  // tails[k] = index in arr of the smallest tail of an increasing run of length k+1
  const tails: number[] = [];
  const predecessors = new Int32Array(n).fill(-1);

  for (let i = 0; i < n; i++) {
    const val = arr[i] ?? -1;
    if (val < 0) continue;

    let lo = 0;
    let hi = tails.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      const tailIdx = tails[mid] ?? 0;
      if ((arr[tailIdx] ?? -1) < val) lo = mid + 1;
      else hi = mid;
    }

    if (lo > 0) predecessors[i] = tails[lo - 1] ?? -1;
    tails[lo] = i;
  }

  let len = tails.length;
  const lis: number[] = new Array<number>(len);
  let idx = tails[len - 1] ?? -1;
  while (len-- > 0 && idx >= 0) {
    lis[len] = idx;
    idx = predecessors[idx] ?? -1;
  }
  return lis;
}
