/**
 * Groups items under the key returned by `keyOf`, keeping the order in
 * which keys were first seen and the input order within each group.
 */
export function groupBy<T, K>(
  items: readonly T[],
  keyOf: (item: T, index: number) => K
): Map<K, T[]> {
  const groups = new Map<K, T[]>();

  items.forEach((item, index) => {
    const key = keyOf(item, index);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  });

  return groups;
}
