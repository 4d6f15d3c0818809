/**
 * Lazy Cartesian product in odometer order: the last position varies
 * fastest. Every call starts an independent traversal over `lists`, so a
 * product can be walked any number of times with identical results.
 *
 * An empty factor yields nothing; zero factors yield one empty tuple.
 */
export function cartesianProduct<T>(
  lists: ReadonlyArray<readonly T[]>
): Generator<T[], void, undefined> {
  return walk(lists, 0, []);
}

function* walk<T>(
  lists: ReadonlyArray<readonly T[]>,
  depth: number,
  prefix: T[]
): Generator<T[], void, undefined> {
  const wheel = lists[depth];
  if (wheel === undefined) {
    yield prefix.slice();
    return;
  }
  for (const member of wheel) {
    prefix.push(member);
    yield* walk(lists, depth + 1, prefix);
    prefix.pop();
  }
}

/** Number of tuples {@link cartesianProduct} yields for `lists`. */
export function productSize(lists: ReadonlyArray<readonly unknown[]>): bigint {
  return lists.reduce((total, list) => total * BigInt(list.length), 1n);
}

export function joinCandidate(parts: readonly unknown[]): string {
  return parts.map((part) => String(part)).join('');
}

/** Joined candidate strings for already-resolved member lists. */
export function* candidateStream(
  lists: ReadonlyArray<readonly string[]>
): Generator<string, void, undefined> {
  for (const tuple of cartesianProduct(lists)) {
    yield joinCandidate(tuple);
  }
}
