/**
 * packages/core/src/tree/nodeTree.ts — Arena of retained nodes.
 *
 * Why: Parent/child links would form ownership cycles if nodes referenced each
 * other directly. The tree instead owns every node in one map keyed by id;
 * `children` is an ordered list of ids and `parent` is a lookup-only id.
 * Lookups are O(1); document order is computed on demand and cached until the
 * next structural change.
 *
 * Invariants (maintained by reconciliation, the only structural writer):
 *   - exactly one root when non-empty, acyclic
 *   - every non-root node has exactly one parent, listed in that parent's children
 *   - ids are unique while alive
 */

import { WeftError } from "../errors.js";
import { EMPTY_HANDLERS } from "../events/types.js";
import { EMPTY_STYLE, type NodeId, type NodeKind, type UiNode } from "./types.js";

const EMPTY_ATTRS: ReadonlyMap<string, string> = new Map();

type DocumentOrderCache = Readonly<{
  version: number;
  ids: readonly NodeId[];
  index: ReadonlyMap<NodeId, number>;
}>;

/** Create a detached node record with no geometry. */
export function createNodeRecord(id: NodeId, kind: NodeKind): UiNode {
  return {
    id,
    kind,
    parent: null,
    children: [],
    attrs: EMPTY_ATTRS,
    text: "",
    style: EMPTY_STYLE,
    styleVersion: 0,
    contentVersion: 0,
    focusable: false,
    clipFlag: undefined,
    editable: false,
    handlers: EMPTY_HANDLERS,
    captureHandlers: EMPTY_HANDLERS,
    layout: null,
    layoutGeneration: -1,
    scroll: { x: 0, y: 0 },
    image: { state: "none" },
    editor: null,
  };
}

export class NodeTree {
  private readonly nodes = new Map<NodeId, UiNode>();
  private root: NodeId | null = null;
  private structureVersion = 0;
  private orderCache: DocumentOrderCache | null = null;

  /** Layout generation counter; advanced by the layout adapter on every solve. */
  generation = 0;

  get rootId(): NodeId | null {
    return this.root;
  }

  get size(): number {
    return this.nodes.size;
  }

  has(id: NodeId): boolean {
    return this.nodes.has(id);
  }

  get(id: NodeId): UiNode | undefined {
    return this.nodes.get(id);
  }

  /** Like `get`, but an unknown id is a caller bug. */
  require(id: NodeId): UiNode {
    const node = this.nodes.get(id);
    if (!node) throw new WeftError("WEFT_UNKNOWN_NODE", `unknown node id "${id}"`);
    return node;
  }

  ids(): IterableIterator<NodeId> {
    return this.nodes.keys();
  }

  // ---------------------------------------------------------------------------
  // Structural writes (reconciliation only)
  // ---------------------------------------------------------------------------

  /** @internal */
  insertRecord(node: UiNode): void {
    this.nodes.set(node.id, node);
    this.structureVersion++;
  }

  /** @internal */
  deleteRecord(id: NodeId): void {
    if (this.nodes.delete(id)) this.structureVersion++;
    if (this.root === id) this.root = null;
  }

  /** @internal */
  setRoot(id: NodeId | null): void {
    if (id !== null) {
      const node = this.require(id);
      node.parent = null;
    }
    this.root = id;
    this.structureVersion++;
  }

  /** @internal Replace a node's child list, re-pointing each child's parent. */
  setChildren(parentId: NodeId, children: NodeId[]): void {
    const parent = this.require(parentId);
    parent.children = children;
    for (const childId of children) {
      this.require(childId).parent = parentId;
    }
    this.structureVersion++;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /** Ancestors of `id`, nearest first, excluding `id` itself. */
  ancestors(id: NodeId): NodeId[] {
    const out: NodeId[] = [];
    let cur = this.nodes.get(id)?.parent ?? null;
    while (cur !== null) {
      out.push(cur);
      cur = this.nodes.get(cur)?.parent ?? null;
    }
    return out;
  }

  /** Path from the root down to and including `id`. */
  pathFromRoot(id: NodeId): NodeId[] {
    const path = this.ancestors(id);
    path.reverse();
    path.push(id);
    return path;
  }

  /** True when `ancestor` is `id` or one of its ancestors. */
  isAncestorOrSelf(ancestor: NodeId, id: NodeId): boolean {
    let cur: NodeId | null = id;
    while (cur !== null) {
      if (cur === ancestor) return true;
      cur = this.nodes.get(cur)?.parent ?? null;
    }
    return false;
  }

  /** All node ids in depth-first preorder (document order). */
  documentOrder(): readonly NodeId[] {
    return this.order().ids;
  }

  /** Position of `id` in document order, or -1 when absent. */
  documentIndex(id: NodeId): number {
    return this.order().index.get(id) ?? -1;
  }

  /** Negative when `a` precedes `b` in document order, positive when it follows. */
  compareDocumentOrder(a: NodeId, b: NodeId): number {
    return this.documentIndex(a) - this.documentIndex(b);
  }

  private order(): DocumentOrderCache {
    const cached = this.orderCache;
    if (cached !== null && cached.version === this.structureVersion) return cached;

    const ids: NodeId[] = [];
    const index = new Map<NodeId, number>();
    if (this.root !== null) {
      const stack: NodeId[] = [this.root];
      while (stack.length > 0) {
        const id = stack.pop();
        if (id === undefined) continue;
        const node = this.nodes.get(id);
        if (!node) continue;
        index.set(id, ids.length);
        ids.push(id);
        for (let i = node.children.length - 1; i >= 0; i--) {
          const child = node.children[i];
          if (child !== undefined) stack.push(child);
        }
      }
    }

    const next = Object.freeze({ version: this.structureVersion, ids, index });
    this.orderCache = next;
    return next;
  }
}
