/**
 * packages/core/src/runtime/focus.ts — Focus traversal helpers.
 *
 * Why: Pointer presses focus the nearest focusable ancestor-or-self of the hit
 * node; Tab/Shift+Tab cycle through focusable nodes in document order.
 *
 * Focus rules:
 *   - Focusable set: nodes whose description sets `focusable`
 *   - Traversal order: depth-first preorder, left-to-right children
 *   - Tab cycles forward through the list; Shift+Tab cycles backward
 */

import type { NodeTree } from "../tree/nodeTree.js";
import type { NodeId } from "../tree/types.js";

/** Focusable node ids in document order. */
export function computeFocusList(tree: NodeTree): readonly NodeId[] {
  const out: NodeId[] = [];
  for (const id of tree.documentOrder()) {
    if (tree.get(id)?.focusable === true) out.push(id);
  }
  return out;
}

/** Nearest focusable node among `id` and its ancestors. */
export function nearestFocusable(tree: NodeTree, id: NodeId): NodeId | null {
  let cur: NodeId | null = id;
  while (cur !== null) {
    const node = tree.get(cur);
    if (!node) return null;
    if (node.focusable) return cur;
    cur = node.parent;
  }
  return null;
}

/** Focus traversal direction. */
export type FocusMove = "next" | "prev";

/**
 * Compute the next/prev focus ID based on current focus and focus list.
 * Wraps around at list boundaries.
 */
export function computeMovedFocusId(
  focusList: readonly NodeId[],
  focusedId: NodeId | null,
  move: FocusMove,
): NodeId | null {
  const n = focusList.length;
  if (n === 0) return null;

  const first = focusList[0];
  const last = focusList[n - 1];
  if (first === undefined || last === undefined) return null;

  if (focusedId === null) return move === "next" ? first : last;

  const idx = focusList.indexOf(focusedId);
  if (idx < 0) return move === "next" ? first : last;

  const nextIdx = move === "next" ? (idx + 1) % n : (idx - 1 + n) % n;
  return focusList[nextIdx] ?? null;
}
