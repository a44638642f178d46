/**
 * packages/core/src/runtime/reconcile.ts — Node tree reconciliation by id.
 *
 * Why: Brings the retained tree in line with a freshly evaluated description
 * while keeping node identity (and with it geometry, focus, press and
 * selection continuity) for every id that survives. Produces the edit list a
 * consumer can replay or inspect.
 *
 * Reconciliation rules:
 *   - Nodes match by id, never by position; a known id at a new position is moved
 *   - A known id whose kind changed is removed and inserted again
 *   - Within one parent, children on the longest increasing run of previous
 *     indices stay put; only the rest are reported as moves
 *   - Handlers are rebound on every pass and never produce edits, so applying
 *     the same description twice yields no edits the second time
 *   - Duplicate ids anywhere in the description are fatal; validation and style
 *     resolution both run before the first mutation, so a rejected description
 *     leaves the previous tree untouched
 */

import type { WeftFatal, WeftResult } from "../errors.js";
import { EMPTY_HANDLERS } from "../events/types.js";
import type { NodeTree } from "../tree/nodeTree.js";
import { createNodeRecord } from "../tree/nodeTree.js";
import type { NodeId, NodeKind, Style, UiNode } from "../tree/types.js";
import type { NodeDescription } from "../ui.js";

/** Style resolver collaborator: a pure function of the class string. */
export type StyleResolver = Readonly<{
  resolve: (classString: string) => Style;
}>;

export type UpdateField = "attrs" | "text" | "focusable" | "clipToBounds" | "editable";

export type TreeEdit =
  | Readonly<{ op: "insert"; id: NodeId; parent: NodeId | null; index: number }>
  | Readonly<{ op: "remove"; id: NodeId }>
  | Readonly<{ op: "move"; id: NodeId; parent: NodeId | null; index: number }>
  | Readonly<{ op: "update"; id: NodeId; fields: readonly UpdateField[] }>;

/** An image node whose `src` was set, changed or cleared (`null`). */
export type SrcChange = Readonly<{ id: NodeId; src: string | null }>;

export type ReconcileOk = Readonly<{
  edits: readonly TreeEdit[];
  /** Every destroyed id, subtrees included, in previous document order. */
  removed: readonly NodeId[];
  inserted: readonly NodeId[];
  /** Nodes whose style was (re)resolved. */
  restyled: readonly NodeId[];
  /** Surviving text runs whose content changed. */
  textChanged: readonly NodeId[];
  srcChanges: readonly SrcChange[];
}>;

export type ReconcileResult = WeftResult<ReconcileOk>;

export type ReconcileDeps = Readonly<{
  styleResolver: StyleResolver;
}>;

const NODE_KINDS: ReadonlySet<NodeKind> = new Set<NodeKind>(["container", "text", "image"]);

type PlacedDescription = Readonly<{
  desc: NodeDescription;
  parent: NodeId | null;
}>;

function invalid(detail: string): WeftFatal {
  return { code: "WEFT_INVALID_DESCRIPTION", detail };
}

/**
 * Validate a description without touching any tree.
 * Returns every node keyed by id, in preorder, or the first violation.
 */
export function validateDescription(
  root: NodeDescription,
): WeftResult<ReadonlyMap<NodeId, PlacedDescription>> {
  const placed = new Map<NodeId, PlacedDescription>();
  const stack: PlacedDescription[] = [{ desc: root, parent: null }];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) continue;
    const { desc, parent } = entry;

    if (typeof desc.id !== "string" || desc.id.length === 0) {
      return { ok: false, fatal: invalid("node id must be a non-empty string") };
    }
    if (!NODE_KINDS.has(desc.kind)) {
      return { ok: false, fatal: invalid(`node "${desc.id}" has unknown kind "${String(desc.kind)}"`) };
    }
    const existing = placed.get(desc.id);
    if (existing !== undefined) {
      return {
        ok: false,
        fatal: {
          code: "WEFT_DUPLICATE_ID",
          detail: `duplicate node id "${desc.id}" (under ${describeParent(existing.parent)} and ${describeParent(parent)})`,
        },
      };
    }
    const children = desc.children ?? [];
    if (desc.kind !== "container" && children.length > 0) {
      return { ok: false, fatal: invalid(`${desc.kind} node "${desc.id}" cannot have children`) };
    }
    placed.set(desc.id, entry);

    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child) stack.push({ desc: child, parent: desc.id });
    }
  }

  return { ok: true, value: placed };
}

function describeParent(parent: NodeId | null): string {
  return parent === null ? "the root" : `"${parent}"`;
}

/**
 * Positions (into `seq`) of one longest strictly increasing subsequence.
 * O(n log n) patience sorting with predecessor links.
 */
export function longestIncreasingRun(seq: readonly number[]): ReadonlySet<number> {
  const tails: number[] = [];
  const prev = new Array<number>(seq.length).fill(-1);

  for (let i = 0; i < seq.length; i++) {
    const v = seq[i] ?? 0;
    let lo = 0;
    let hi = tails.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const t = tails[mid] ?? 0;
      if ((seq[t] ?? 0) < v) lo = mid + 1;
      else hi = mid;
    }
    if (lo > 0) prev[i] = tails[lo - 1] ?? -1;
    tails[lo] = i;
  }

  const keep = new Set<number>();
  let cur = tails.length > 0 ? (tails[tails.length - 1] ?? -1) : -1;
  while (cur >= 0) {
    keep.add(cur);
    cur = prev[cur] ?? -1;
  }
  return keep;
}

function attrsEqual(
  current: ReadonlyMap<string, string>,
  next: Readonly<Record<string, string>> | undefined,
): boolean {
  const entries = next === undefined ? [] : Object.entries(next);
  if (entries.length !== current.size) return false;
  for (const [k, v] of entries) {
    if (current.get(k) !== v) return false;
  }
  return true;
}

function classOf(attrs: Readonly<Record<string, string>> | undefined): string {
  return attrs?.class ?? "";
}

function clampOffset(value: string, offset: number): number {
  return Math.min(Math.max(0, offset), value.length);
}

function seedEditor(node: UiNode): void {
  if (!node.editable) {
    node.editor = null;
    return;
  }
  const value = node.attrs.get("value") ?? "";
  const prev = node.editor;
  node.editor = Object.freeze({
    value,
    cursor: prev === null ? value.length : clampOffset(value, prev.cursor),
    anchor: prev === null ? value.length : clampOffset(value, prev.anchor),
  });
}

/**
 * Reconcile `tree` against `root`.
 *
 * @returns The applied edits and lifecycle lists, or a fatal result with the
 *          tree left exactly as it was.
 */
export function reconcile(tree: NodeTree, root: NodeDescription, deps: ReconcileDeps): ReconcileResult {
  const validated = validateDescription(root);
  if (!validated.ok) return validated;
  const placed = validated.value;

  // --- Plan: removals and style resolution. Nothing below may fail after this block.
  const removedSet = new Set<NodeId>();
  for (const id of tree.ids()) {
    const next = placed.get(id);
    const node = tree.get(id);
    if (next === undefined || (node !== undefined && node.kind !== next.desc.kind)) {
      removedSet.add(id);
    }
  }

  const styles = new Map<NodeId, Style>();
  for (const [id, { desc }] of placed) {
    const existing = removedSet.has(id) ? undefined : tree.get(id);
    const nextClass = classOf(desc.attrs);
    if (existing === undefined || (existing.attrs.get("class") ?? "") !== nextClass) {
      styles.set(id, deps.styleResolver.resolve(nextClass));
    }
  }

  // --- Commit.
  const edits: TreeEdit[] = [];
  const removed: NodeId[] = [];
  const inserted: NodeId[] = [];
  const restyled: NodeId[] = [];
  const textChanged: NodeId[] = [];
  const srcChanges: SrcChange[] = [];

  for (const id of tree.documentOrder()) {
    if (!removedSet.has(id)) continue;
    removed.push(id);
    const parent = tree.get(id)?.parent ?? null;
    if (parent === null || !removedSet.has(parent)) edits.push({ op: "remove", id });
  }
  // Ids in removedSet but unreachable from the root cannot exist; delete by set anyway.
  for (const id of removedSet) tree.deleteRecord(id);

  const insertedSet = new Set<NodeId>();
  for (const [id, { desc }] of placed) {
    if (tree.has(id)) continue;
    tree.insertRecord(createNodeRecord(id, desc.kind));
    insertedSet.add(id);
    inserted.push(id);
  }

  if (tree.rootId !== root.id) {
    edits.push(
      insertedSet.has(root.id)
        ? { op: "insert", id: root.id, parent: null, index: 0 }
        : { op: "move", id: root.id, parent: null, index: 0 },
    );
    tree.setRoot(root.id);
  }

  for (const [id, { desc }] of placed) {
    const node = tree.require(id);
    const isNew = insertedSet.has(id);
    const fields: UpdateField[] = [];
    let valueAttrChanged = false;

    if (!attrsEqual(node.attrs, desc.attrs)) {
      const prevSrc = node.attrs.get("src") ?? null;
      const prevValue = node.attrs.get("value");
      node.attrs = new Map(Object.entries(desc.attrs ?? {}));
      const nextSrc = node.attrs.get("src") ?? null;
      if (node.kind === "image" && prevSrc !== nextSrc) srcChanges.push({ id, src: nextSrc });
      valueAttrChanged = prevValue !== node.attrs.get("value");
      fields.push("attrs");
    }

    const nextText = node.kind === "text" ? (desc.text ?? "") : "";
    if (node.text !== nextText) {
      node.text = nextText;
      node.contentVersion++;
      if (!isNew) textChanged.push(id);
      fields.push("text");
    }

    const nextFocusable = desc.focusable === true;
    if (node.focusable !== nextFocusable) {
      node.focusable = nextFocusable;
      fields.push("focusable");
    }

    if (node.clipFlag !== desc.clipToBounds) {
      node.clipFlag = desc.clipToBounds;
      fields.push("clipToBounds");
    }

    const nextEditable = desc.editable === true;
    if (node.editable !== nextEditable) {
      node.editable = nextEditable;
      fields.push("editable");
    }
    // The `value` attribute seeds the editor; local edits survive unrelated attribute changes.
    if (fields.includes("editable") || (node.editable && valueAttrChanged)) seedEditor(node);

    const style = styles.get(id);
    if (style !== undefined) {
      node.style = style;
      node.styleVersion++;
      restyled.push(id);
    }

    node.handlers = desc.on ?? EMPTY_HANDLERS;
    node.captureHandlers = desc.onCapture ?? EMPTY_HANDLERS;

    if (!isNew && fields.length > 0) edits.push({ op: "update", id, fields });

    if (node.kind === "container") {
      reconcileChildOrder(tree, node, desc, insertedSet, edits);
    }
  }

  return {
    ok: true,
    value: { edits, removed, inserted, restyled, textChanged, srcChanges },
  };
}

function reconcileChildOrder(
  tree: NodeTree,
  node: UiNode,
  desc: NodeDescription,
  insertedSet: ReadonlySet<NodeId>,
  edits: TreeEdit[],
): void {
  const nextChildren = (desc.children ?? []).map((child) => child.id);

  const prevIndex = new Map<NodeId, number>();
  let kept = 0;
  for (const childId of node.children) {
    // Removed ids are gone; an id re-inserted under a new kind is a different node.
    if (!tree.has(childId) || insertedSet.has(childId)) continue;
    prevIndex.set(childId, kept++);
  }

  const candidates: number[] = [];
  const candidatePositions: number[] = [];
  for (let i = 0; i < nextChildren.length; i++) {
    const childId = nextChildren[i];
    if (childId === undefined) continue;
    const p = prevIndex.get(childId);
    if (p === undefined) continue;
    candidates.push(p);
    candidatePositions.push(i);
  }
  const keepRun = longestIncreasingRun(candidates);
  const stay = new Set<number>();
  for (const k of keepRun) {
    const pos = candidatePositions[k];
    if (pos !== undefined) stay.add(pos);
  }

  for (let i = 0; i < nextChildren.length; i++) {
    const childId = nextChildren[i];
    if (childId === undefined || stay.has(i)) continue;
    edits.push(
      insertedSet.has(childId)
        ? { op: "insert", id: childId, parent: node.id, index: i }
        : { op: "move", id: childId, parent: node.id, index: i },
    );
  }

  const unchanged =
    nextChildren.length === node.children.length &&
    nextChildren.every((childId, i) => node.children[i] === childId && !insertedSet.has(childId));
  if (!unchanged) tree.setChildren(node.id, nextChildren);
}
