/**
 * Depth measurement for document trees
 *
 * A lone scalar has depth 1; every container adds a level above its
 * children, and an empty container counts as one level.
 */

import type { JsonNode } from "./tree.js";

/**
 * Depth of `node`, counting it as level 1. Stops walking as soon as the
 * depth exceeds `limit` and returns `limit + 1`.
 */
export function measureDepth(node: JsonNode, limit: number = Number.MAX_SAFE_INTEGER): number {
  let deepest = 0;
  const stack: Array<{ node: JsonNode; level: number }> = [{ node, level: 1 }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    if (frame.level > deepest) {
      deepest = frame.level;
      if (deepest > limit) return limit + 1;
    }

    const children =
      frame.node.kind === "array"
        ? frame.node.items
        : frame.node.kind === "object"
          ? frame.node.members.values()
          : [];
    for (const child of children) {
      stack.push({ node: child, level: frame.level + 1 });
    }
  }

  return deepest;
}

/**
 * Deepest level reached when the given values are placed at `level`
 */
export function depthAt(level: number, values: readonly JsonNode[], limit: number): number {
  let deepest = level;
  for (const value of values) {
    const reached = level - 1 + measureDepth(value, limit);
    if (reached > deepest) deepest = reached;
    if (deepest > limit) return deepest;
  }
  return deepest;
}
