/**
 * A parsed configuration document before validation: plain JSON/YAML data
 * keyed by domain (`accounts`, `pipeline`, `eks`, ...).
 */
export type ConfigTree = Record<string, unknown>;

export function isConfigTree(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function cloneTree<T extends ConfigTree>(tree: T): T {
  return structuredClone(tree);
}

/**
 * Recursively merges `patch` into `target` and returns a new tree. Nested
 * objects are merged key by key so siblings already present in `target`
 * survive; any other value in `patch` replaces the one in `target`.
 * Neither argument is modified.
 */
export function deepMerge(target: ConfigTree, patch: ConfigTree): ConfigTree {
  const merged: ConfigTree = { ...target };

  for (const [key, value] of Object.entries(patch)) {
    const current = merged[key];
    merged[key] = isConfigTree(current) && isConfigTree(value) ? deepMerge(current, value) : value;
  }

  return merged;
}

/** Reads `tree.a.b.c` for `path = ["a", "b", "c"]`, or `undefined` when any step is missing. */
export function getPath(tree: ConfigTree, path: readonly string[]): unknown {
  let node: unknown = tree;

  for (const key of path) {
    if (!isConfigTree(node) || !Object.hasOwn(node, key)) return undefined;
    node = node[key];
  }

  return node;
}
