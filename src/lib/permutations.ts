/**
 * Every distinct ordering of a multiset, each exactly once.
 * The input is sorted first; at each position a value equal to the one just
 * tried there is skipped.
 */
export function* permutations(numbers: readonly number[]): Generator<number[]> {
  yield* distinctOrderings([...numbers].sort((a, b) => a - b));
}

function* distinctOrderings(sorted: number[]): Generator<number[]> {
  if (sorted.length === 0) {
    yield [];
    return;
  }
  for (let i = 0; i < sorted.length; i++) {
    const head = sorted[i];
    if (head === undefined) continue;
    if (i > 0 && sorted[i - 1] === head) continue;
    const rest = [...sorted.slice(0, i), ...sorted.slice(i + 1)];
    for (const tail of distinctOrderings(rest)) {
      yield [head, ...tail];
    }
  }
}
