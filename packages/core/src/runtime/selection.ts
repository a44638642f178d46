/**
 * packages/core/src/runtime/selection.ts — Text selection across runs.
 *
 * Why: A selection spans text runs in document order. Anchor and cursor are
 * stored as set (anchor = where the gesture started), and normalized only
 * when the selected text is computed, so swapping them never changes the
 * result.
 *
 * Offsets are UTF-16 code unit indices into a run's text.
 */

import type { SelectionMode } from "../events/types.js";
import type { NodeTree } from "../tree/nodeTree.js";
import type { NodeId } from "../tree/types.js";

export type SelectionPoint = Readonly<{ id: NodeId; offset: number }>;

export type SelectionState = Readonly<{
  anchor: SelectionPoint | null;
  cursor: SelectionPoint | null;
}>;

export const EMPTY_SELECTION: SelectionState = Object.freeze({ anchor: null, cursor: null });

export function selectionMode(state: SelectionState): SelectionMode {
  const { anchor, cursor } = state;
  if (anchor === null || cursor === null) return "none";
  return anchor.id === cursor.id && anchor.offset === cursor.offset ? "collapsed" : "range";
}

function clampTo(text: string, offset: number): number {
  return Math.min(Math.max(0, offset), text.length);
}

/**
 * Text between the normalized endpoints: partial runs at both ends, whole runs
 * in between, concatenated without separators. Empty when mode is none.
 */
export function selectedText(tree: NodeTree, state: SelectionState): string {
  const { anchor, cursor } = state;
  if (anchor === null || cursor === null) return "";
  const anchorNode = tree.get(anchor.id);
  const cursorNode = tree.get(cursor.id);
  if (!anchorNode || !cursorNode) return "";

  if (anchor.id === cursor.id) {
    const a = clampTo(anchorNode.text, anchor.offset);
    const c = clampTo(anchorNode.text, cursor.offset);
    return anchorNode.text.slice(Math.min(a, c), Math.max(a, c));
  }

  const [start, end] =
    tree.compareDocumentOrder(anchor.id, cursor.id) < 0 ? [anchor, cursor] : [cursor, anchor];
  const order = tree.documentOrder();
  const from = tree.documentIndex(start.id);
  const to = tree.documentIndex(end.id);
  if (from < 0 || to < 0) return "";

  let out = "";
  for (let i = from; i <= to; i++) {
    const id = order[i];
    const node = id === undefined ? undefined : tree.get(id);
    if (!node || node.kind !== "text") continue;
    if (i === from) out += node.text.slice(clampTo(node.text, start.offset));
    else if (i === to) out += node.text.slice(0, clampTo(node.text, end.offset));
    else out += node.text;
  }
  return out;
}

export class SelectionManager {
  private current: SelectionState = EMPTY_SELECTION;

  constructor(private readonly tree: NodeTree) {}

  get state(): SelectionState {
    return this.current;
  }

  get mode(): SelectionMode {
    return selectionMode(this.current);
  }

  selectedText(): string {
    return selectedText(this.tree, this.current);
  }

  /** Collapse both endpoints onto one point. */
  setCaret(point: SelectionPoint): void {
    this.current = Object.freeze({ anchor: point, cursor: point });
  }

  /** Move the cursor; the anchor stays. A selection with no anchor collapses onto the point. */
  setCursor(point: SelectionPoint): void {
    this.current = Object.freeze({ anchor: this.current.anchor ?? point, cursor: point });
  }

  set(anchor: SelectionPoint, cursor: SelectionPoint): void {
    this.current = Object.freeze({ anchor, cursor });
  }

  /** Select a whole text run. */
  selectAll(id: NodeId): void {
    const node = this.tree.require(id);
    this.set({ id, offset: 0 }, { id, offset: node.text.length });
  }

  clear(): void {
    this.current = EMPTY_SELECTION;
  }

  /**
   * Clear the selection if either endpoint is in `ids`.
   * @returns true when the selection was cleared
   */
  invalidate(ids: ReadonlySet<NodeId>): boolean {
    const { anchor, cursor } = this.current;
    if ((anchor !== null && ids.has(anchor.id)) || (cursor !== null && ids.has(cursor.id))) {
      this.current = EMPTY_SELECTION;
      return true;
    }
    return false;
  }
}
