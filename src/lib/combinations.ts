/** Non-decreasing tuples of length `size` over [lowest, highest], in lexicographic order. */
export function* combinations(size: number, lowest: number, highest: number): Generator<number[]> {
  if (size < 0 || lowest > highest) return;
  yield* extend([], size, lowest, highest);
}

function* extend(prefix: number[], remaining: number, from: number, highest: number): Generator<number[]> {
  if (remaining === 0) {
    yield prefix;
    return;
  }
  for (let v = from; v <= highest; v++) {
    yield* extend([...prefix, v], remaining - 1, v, highest);
  }
}

/** Number of multisets of `size` values from a range of `highest - lowest + 1` values. */
export function combinationCount(size: number, lowest: number, highest: number): number {
  if (size < 0 || lowest > highest) return 0;
  const kinds = highest - lowest + 1;
  // C(kinds + size - 1, size)
  let result = 1;
  for (let i = 1; i <= size; i++) {
    result = (result * (kinds + i - 1)) / i;
  }
  return Math.round(result);
}
