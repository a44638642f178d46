/**
 * packages/core/src/layout/hitTest.ts — Pointer hit testing.
 *
 * Why: Determines which node is under a given point. Used for hover, press,
 * focus-on-click, wheel routing and selection.
 *
 * Tie-break rule: when several nodes contain the point, the LAST node in
 * depth-first preorder wins. Children therefore beat parents and later
 * siblings beat earlier ones.
 *
 * A node's visual rect is its layout rect translated by every ancestor's
 * scroll offset and intersected with every clipping ancestor's visual rect.
 * Zero-area nodes and nodes whose layout generation is stale never match.
 * The scan is linear in the number of nodes; there is no spatial index.
 */

import type { NodeTree } from "../tree/nodeTree.js";
import { clipsToBounds, type NodeId, type Point, type Rect, type UiNode } from "../tree/types.js";

/** Check if point (x,y) is inside rect (exclusive of right/bottom edges). */
export function contains(rect: Rect, x: number, y: number): boolean {
  return x >= rect.x && x < rect.x + rect.w && y >= rect.y && y < rect.y + rect.h;
}

export function intersectRect(a: Rect, b: Rect): Rect | null {
  const x0 = Math.max(a.x, b.x);
  const y0 = Math.max(a.y, b.y);
  const x1 = Math.min(a.x + a.w, b.x + b.w);
  const y1 = Math.min(a.y + a.h, b.y + b.h);
  if (x1 <= x0 || y1 <= y0) return null;
  return { x: x0, y: y0, w: x1 - x0, h: y1 - y0 };
}

/** Scrolled rect and its visible (clipped) part. `visible` is null when fully clipped. */
export type VisualGeometry = Readonly<{ rect: Rect; visible: Rect | null }>;

type Frame = Readonly<{
  /** Accumulated ancestor scroll. */
  dx: number;
  dy: number;
  /** Accumulated ancestor clip; null = unclipped. */
  clip: Rect | null;
}>;

const ROOT_FRAME: Frame = Object.freeze({ dx: 0, dy: 0, clip: null });

function isCurrent(tree: NodeTree, node: UiNode): boolean {
  return node.layout !== null && node.layoutGeneration === tree.generation;
}

function scrolledRect(node: UiNode, frame: Frame): Rect | null {
  const layout = node.layout;
  if (layout === null) return null;
  const { rect } = layout;
  return { x: rect.x - frame.dx, y: rect.y - frame.dy, w: rect.w, h: rect.h };
}

/** The frame a node's children are placed in. `undefined` means its children are fully clipped. */
function childFrame(node: UiNode, frame: Frame, rect: Rect | null): Frame | undefined {
  let clip = frame.clip;
  if (rect !== null && clipsToBounds(node)) {
    const next = clip === null ? rect : intersectRect(clip, rect);
    if (next === null || next.w <= 0 || next.h <= 0) return undefined;
    clip = next;
  }
  return { dx: frame.dx + node.scroll.x, dy: frame.dy + node.scroll.y, clip };
}

/**
 * Topmost node containing `point`, or null.
 */
export function hitTest(tree: NodeTree, point: Point): NodeId | null {
  const rootId = tree.rootId;
  if (rootId === null) return null;

  let winner: NodeId | null = null;
  const nodeStack: NodeId[] = [rootId];
  const frameStack: Frame[] = [ROOT_FRAME];

  while (nodeStack.length > 0) {
    const id = nodeStack.pop();
    const frame = frameStack.pop();
    if (id === undefined || !frame) continue;
    const node = tree.get(id);
    if (!node) continue;

    // Stale nodes never match; their children may still be current.
    const rect = isCurrent(tree, node) ? scrolledRect(node, frame) : null;
    if (rect !== null && rect.w > 0 && rect.h > 0) {
      const visible = frame.clip === null ? rect : intersectRect(frame.clip, rect);
      if (visible !== null && contains(visible, point.x, point.y)) winner = id;
    }

    const next = childFrame(node, frame, rect);
    if (!next) continue;
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child === undefined) continue;
      nodeStack.push(child);
      frameStack.push(next);
    }
  }

  return winner;
}

/**
 * Scrolled and clipped geometry of one node, as hit testing sees it.
 * Null when the node is unknown or its layout is stale.
 */
export function visualGeometry(tree: NodeTree, id: NodeId): VisualGeometry | null {
  const target = tree.get(id);
  if (!target || !isCurrent(tree, target)) return null;

  let frame = ROOT_FRAME;
  let clippedAway = false;
  for (const ancestorId of tree.ancestors(id).reverse()) {
    const ancestor = tree.require(ancestorId);
    const rect = isCurrent(tree, ancestor) ? scrolledRect(ancestor, frame) : null;
    const next = childFrame(ancestor, frame, rect);
    if (!next) {
      clippedAway = true;
      frame = { dx: frame.dx + ancestor.scroll.x, dy: frame.dy + ancestor.scroll.y, clip: frame.clip };
      continue;
    }
    frame = next;
  }

  const rect = scrolledRect(target, frame);
  if (rect === null) return null;
  if (clippedAway) return { rect, visible: null };
  return { rect, visible: frame.clip === null ? rect : intersectRect(frame.clip, rect) };
}
