/**
 * packages/core/src/layout/layoutAdapter.ts — Mirror the node tree into a layout engine.
 *
 * Why: The engine keeps its own node graph. The adapter owns one handle per
 * node and, on each solve, pushes only what changed since the previous solve:
 * constraints of restyled nodes, child lists that differ, dirty marks on
 * measured leaves whose text, font or intrinsic size changed. Geometry read
 * back is converted to root-relative border boxes and stamped with a new
 * generation.
 *
 * Readback rules:
 *   - a non-finite coordinate, or a non-finite/negative size, is clamped to 0
 *     and warned about once per node
 *   - content size: text = measured at the node's width, image = intrinsic
 *     size (0×0 until decoded), container = furthest child extent plus end
 *     padding and border
 *   - scroll offsets are re-clamped against the new content size
 */

import type { DevLogger } from "../logging/devWarnings.js";
import type { NodeTree } from "../tree/nodeTree.js";
import type { FontMetrics, NodeId, Rect, Size, UiNode } from "../tree/types.js";
import { deriveConstraints, resolveEdges } from "./constraints.js";
import type { EngineBox, LayoutEngine, MeasureFn, TextMeasurer } from "./types.js";

type HandleEntry<H> = {
  readonly node: UiNode;
  readonly handle: H;
  styleVersion: number;
  /** Last measured-leaf key; changes trigger markDirty. */
  measureKey: string;
  font: FontMetrics;
  /** Child handles last pushed to the engine. */
  linked: readonly H[];
};

export type LayoutPassResult = Readonly<{
  generation: number;
  /** Nodes whose rect or content size changed, in document order. */
  changed: readonly NodeId[];
}>;

export type LayoutAdapterOptions = Readonly<{
  measurer: TextMeasurer;
  defaultFont: FontMetrics;
  logger: DevLogger;
}>;

function sameHandles<H>(a: readonly H[], b: readonly H[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function rectEquals(a: Rect, b: Rect): boolean {
  return a.x === b.x && a.y === b.y && a.w === b.w && a.h === b.h;
}

function sizeEquals(a: Size, b: Size): boolean {
  return a.w === b.w && a.h === b.h;
}

/** Clamp a node's scroll offsets into `[0, max(0, content - visible)]`. */
export function clampScroll(node: UiNode): void {
  const layout = node.layout;
  if (layout === null) {
    node.scroll.x = 0;
    node.scroll.y = 0;
    return;
  }
  const maxX = Math.max(0, layout.contentSize.w - layout.rect.w);
  const maxY = Math.max(0, layout.contentSize.h - layout.rect.h);
  node.scroll.x = Math.min(Math.max(0, node.scroll.x), maxX);
  node.scroll.y = Math.min(Math.max(0, node.scroll.y), maxY);
}

export class LayoutAdapter<H> {
  private readonly entries = new Map<NodeId, HandleEntry<H>>();

  constructor(
    private readonly engine: LayoutEngine<H>,
    private readonly opts: LayoutAdapterOptions,
  ) {}

  /** Number of live engine handles. */
  get handleCount(): number {
    return this.entries.size;
  }

  /** Engine handle for a node, if one exists. */
  handleOf(id: NodeId): H | undefined {
    return this.entries.get(id)?.handle;
  }

  /** Font metrics a text run is measured with, resolved at the last solve. */
  fontOf(id: NodeId): FontMetrics {
    return this.entries.get(id)?.font ?? this.opts.defaultFont;
  }

  /** Synchronize, solve once, read back. */
  compute(tree: NodeTree, available: Size): LayoutPassResult {
    this.sweep(tree);
    const rootId = tree.rootId;
    if (rootId === null) {
      tree.generation++;
      return { generation: tree.generation, changed: [] };
    }

    const order = tree.documentOrder();
    this.sync(tree, order);

    const rootEntry = this.entries.get(rootId);
    if (rootEntry) this.engine.computeLayout(rootEntry.handle, available);

    tree.generation++;
    return this.readBack(tree, order, tree.generation);
  }

  /** Release every handle. */
  dispose(): void {
    for (const entry of this.entries.values()) {
      if (entry.linked.length > 0) this.engine.setChildren(entry.handle, []);
    }
    for (const entry of this.entries.values()) this.engine.releaseNode(entry.handle);
    this.entries.clear();
  }

  // ---------------------------------------------------------------------------
  // Synchronization
  // ---------------------------------------------------------------------------

  /**
   * Release handles of destroyed nodes (and of ids re-created under a new kind).
   * A surviving parent that still links a dead handle is unlinked first and
   * re-linked by `sync` in the same pass.
   */
  private sweep(tree: NodeTree): void {
    const dead: HandleEntry<H>[] = [];
    for (const [id, entry] of this.entries) {
      if (tree.get(id) !== entry.node) dead.push(entry);
    }
    if (dead.length === 0) return;

    const deadHandles = new Set<H>(dead.map((entry) => entry.handle));
    for (const entry of this.entries.values()) {
      if (deadHandles.has(entry.handle)) continue;
      if (entry.linked.some((handle) => deadHandles.has(handle))) {
        this.engine.setChildren(entry.handle, []);
        entry.linked = [];
      }
    }
    for (const entry of dead) {
      if (entry.linked.length > 0) this.engine.setChildren(entry.handle, []);
    }
    for (const entry of dead) {
      this.entries.delete(entry.node.id);
      this.engine.releaseNode(entry.handle);
      this.opts.logger.forget(`layout:${entry.node.id}:`);
    }
  }

  private sync(tree: NodeTree, order: readonly NodeId[]): void {
    for (const id of order) {
      const node = tree.require(id);
      let entry = this.entries.get(id);
      if (!entry) {
        entry = {
          node,
          handle: this.engine.createNode(id),
          styleVersion: -1,
          measureKey: "",
          font: this.opts.defaultFont,
          linked: [],
        };
        this.entries.set(id, entry);
        if (node.kind !== "container") this.engine.setMeasure(entry.handle, this.measureFor(entry));
      }

      if (entry.styleVersion !== node.styleVersion) {
        this.engine.setConstraints(entry.handle, deriveConstraints(node.style));
        entry.styleVersion = node.styleVersion;
      }

      const parentFont = node.parent === null ? undefined : this.entries.get(node.parent)?.font;
      entry.font = node.style.font ?? parentFont ?? this.opts.defaultFont;

      if (node.kind !== "container") {
        const key =
          node.kind === "text"
            ? `${node.contentVersion}:${entry.font.charWidth}:${entry.font.lineHeight}`
            : `${node.contentVersion}`;
        if (entry.measureKey !== "" && entry.measureKey !== key) this.engine.markDirty(entry.handle);
        entry.measureKey = key;
      }
    }

    // Children exist only after the preorder pass above.
    for (const id of order) {
      const entry = this.entries.get(id);
      if (!entry || entry.node.kind !== "container") continue;
      const handles: H[] = [];
      for (const childId of entry.node.children) {
        const child = this.entries.get(childId);
        if (child) handles.push(child.handle);
      }
      if (sameHandles(entry.linked, handles)) continue;
      this.engine.setChildren(entry.handle, handles);
      entry.linked = handles;
    }
  }

  private measureFor(entry: HandleEntry<H>): MeasureFn {
    const { node } = entry;
    if (node.kind === "text") {
      return (maxWidth) => this.opts.measurer.measure(node.text, entry.font, maxWidth);
    }
    return () => {
      const image = node.image;
      return image.state === "ready" ? { w: image.width, h: image.height } : { w: 0, h: 0 };
    };
  }

  // ---------------------------------------------------------------------------
  // Readback
  // ---------------------------------------------------------------------------

  private sanitize(id: NodeId, box: EngineBox): EngineBox {
    const bad: string[] = [];
    const coord = (name: string, v: number): number => {
      if (Number.isFinite(v)) return v;
      bad.push(`${name}=${String(v)}`);
      return 0;
    };
    const extent = (name: string, v: number): number => {
      if (Number.isFinite(v) && v >= 0) return v;
      bad.push(`${name}=${String(v)}`);
      return 0;
    };
    const clean = {
      left: coord("left", box.left),
      top: coord("top", box.top),
      width: extent("width", box.width),
      height: extent("height", box.height),
    };
    if (bad.length > 0) {
      this.opts.logger.warnOnce(
        "layout",
        `layout:${id}:box`,
        `engine returned an invalid box for node "${id}" (${bad.join(", ")}); clamped to 0`,
      );
    }
    return clean;
  }

  private readBack(tree: NodeTree, order: readonly NodeId[], generation: number): LayoutPassResult {
    const rects = new Map<NodeId, Rect>();
    for (const id of order) {
      const entry = this.entries.get(id);
      if (!entry) continue;
      const box = this.sanitize(id, this.engine.readLayout(entry.handle));
      const parentId = entry.node.parent;
      const parentRect = parentId === null ? undefined : rects.get(parentId);
      rects.set(id, {
        x: (parentRect?.x ?? 0) + box.left,
        y: (parentRect?.y ?? 0) + box.top,
        w: box.width,
        h: box.height,
      });
    }

    // Children before parents for content size.
    const contentSizes = new Map<NodeId, Size>();
    for (let i = order.length - 1; i >= 0; i--) {
      const id = order[i];
      if (id === undefined) continue;
      const node = tree.require(id);
      const rect = rects.get(id);
      if (!rect) continue;
      contentSizes.set(id, this.contentSizeOf(node, rect, rects));
    }

    const changed: NodeId[] = [];
    for (const id of order) {
      const node = tree.require(id);
      const rect = rects.get(id);
      const contentSize = contentSizes.get(id);
      if (!rect || !contentSize) continue;
      const prev = node.layout;
      node.layout = Object.freeze({ rect, contentSize, generation });
      node.layoutGeneration = generation;
      clampScroll(node);
      if (prev === null || !rectEquals(prev.rect, rect) || !sizeEquals(prev.contentSize, contentSize)) {
        changed.push(id);
      }
    }

    return { generation, changed };
  }

  private contentSizeOf(node: UiNode, rect: Rect, rects: ReadonlyMap<NodeId, Rect>): Size {
    if (node.kind === "text") {
      return this.opts.measurer.measure(node.text, this.fontOf(node.id), rect.w);
    }
    if (node.kind === "image") {
      const image = node.image;
      return image.state === "ready" ? { w: image.width, h: image.height } : { w: 0, h: 0 };
    }

    let w = 0;
    let h = 0;
    for (const childId of node.children) {
      const child = rects.get(childId);
      if (!child) continue;
      w = Math.max(w, child.x + child.w - rect.x);
      h = Math.max(h, child.y + child.h - rect.y);
    }
    if (node.children.length === 0) return { w: 0, h: 0 };
    const padding = resolveEdges(node.style.padding);
    const border = resolveEdges(node.style.border);
    return { w: w + padding.right + border.right, h: h + padding.bottom + border.bottom };
  }
}
