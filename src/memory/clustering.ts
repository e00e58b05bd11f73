// ── Near-duplicate grouping ──────────────────────────────

/**
 * Union similar pairs into groups of near-duplicates. Only groups of two or
 * more known ids are returned; members and groups are sorted by id.
 */
export function groupPairs(
  ids: readonly string[],
  pairs: ReadonlyArray<readonly [string, string]>,
): string[][] {
  const parent = new Map<string, string>();
  for (const id of ids) parent.set(id, id);

  const find = (id: string): string => {
    let root = id;
    let next = parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = parent.get(root);
    }
    // path compression
    let node = id;
    while (node !== root) {
      const up = parent.get(node) ?? root;
      parent.set(node, root);
      node = up;
    }
    return root;
  };

  for (const [a, b] of pairs) {
    if (!parent.has(a) || !parent.has(b)) continue;
    const rootA = find(a);
    const rootB = find(b);
    if (rootA === rootB) continue;
    // smaller id becomes the root so output does not depend on pair order
    if (rootA < rootB) parent.set(rootB, rootA);
    else parent.set(rootA, rootB);
  }

  const groups = new Map<string, string[]>();
  for (const id of parent.keys()) {
    const root = find(id);
    const group = groups.get(root) ?? [];
    group.push(id);
    groups.set(root, group);
  }

  return [...groups.values()]
    .filter((group) => group.length > 1)
    .map((group) => group.sort())
    .sort((a, b) => ((a[0] ?? "") < (b[0] ?? "") ? -1 : 1));
}
