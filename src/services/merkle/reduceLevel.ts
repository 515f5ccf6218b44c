/**
 * Pairs a level two by two, `(0,1), (2,3), …`, into the level above it. A
 * trailing odd node is paired with itself rather than carried up unchanged.
 */
export function reduceLevel<T>(level: readonly T[], combine: (left: T, right: T) => T): T[] {
  const next: T[] = [];
  for (let i = 0; i < level.length; i += 2) {
    const left = level[i];
    const right = i + 1 < level.length ? level[i + 1] : left;
    next.push(combine(left, right));
  }
  return next;
}
