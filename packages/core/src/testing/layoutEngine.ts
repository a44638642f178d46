/**
 * packages/core/src/testing/layoutEngine.ts — In-process fixed-rect layout engine.
 *
 * Why: Core tests need exact, hand-computable geometry without a flexbox
 * solver. This engine places every node at its `left`/`top` insets relative to
 * its parent and sizes it from `width`/`height`:
 *   - number: that many px
 *   - percent: of the parent's width/height
 *   - auto: the measured size for measured leaves, the available size for the
 *     root, 0 for other containers
 *
 * It also records every call so tests can assert what the adapter pushed.
 */

import type { EngineBox, LayoutConstraints, LayoutEngine, MeasureFn } from "../layout/types.js";
import { deriveConstraints } from "../layout/constraints.js";
import { EMPTY_STYLE, type NodeId, type Size, type SizeValue } from "../tree/types.js";

export type FixedNode = {
  readonly id: NodeId;
  constraints: LayoutConstraints;
  measure: MeasureFn | null;
  children: FixedNode[];
  parent: FixedNode | null;
  box: EngineBox;
  released: boolean;
};

export type FixedLayoutEngine = LayoutEngine<FixedNode> &
  Readonly<{
    /** Ids passed to `createNode`, in call order. */
    created: NodeId[];
    /** Ids passed to `releaseNode`, in call order. */
    released: NodeId[];
    /** Ids passed to `markDirty`, in call order. */
    dirtied: NodeId[];
    /** Ids passed to `setConstraints`, in call order. */
    constrained: NodeId[];
    /** Number of `computeLayout` calls. */
    readonly solves: number;
    /** Replace what `readLayout` returns for a node (e.g. to simulate a NaN box). */
    overrideBox: (id: NodeId, box: Partial<EngineBox>) => void;
  }>;

function resolveSize(value: SizeValue, parentSize: number): number | undefined {
  if (typeof value === "number") return value;
  if (value === "auto") return undefined;
  return (parentSize * Number.parseFloat(value)) / 100;
}

function detach(node: FixedNode): void {
  const parent = node.parent;
  if (parent === null) return;
  parent.children = parent.children.filter((c) => c !== node);
  node.parent = null;
}

export function createFixedLayoutEngine(): FixedLayoutEngine {
  const created: NodeId[] = [];
  const released: NodeId[] = [];
  const dirtied: NodeId[] = [];
  const constrained: NodeId[] = [];
  const overrides = new Map<NodeId, Partial<EngineBox>>();
  let solves = 0;

  function place(node: FixedNode, parent: Size, isRoot: boolean): void {
    const c = node.constraints;
    let w = resolveSize(c.width, parent.w);
    let h = resolveSize(c.height, parent.h);
    if (w === undefined || h === undefined) {
      if (node.measure !== null) {
        const measured = node.measure(w);
        w = w ?? measured.w;
        h = h ?? measured.h;
      } else if (isRoot) {
        w = w ?? parent.w;
        h = h ?? parent.h;
      }
    }
    node.box = {
      left: isRoot ? 0 : (c.insets.left ?? 0),
      top: isRoot ? 0 : (c.insets.top ?? 0),
      width: w ?? 0,
      height: h ?? 0,
    };
    for (const child of node.children) {
      place(child, { w: node.box.width, h: node.box.height }, false);
    }
  }

  return {
    created,
    released,
    dirtied,
    constrained,
    get solves(): number {
      return solves;
    },

    overrideBox(id: NodeId, box: Partial<EngineBox>): void {
      overrides.set(id, box);
    },

    createNode(id: NodeId): FixedNode {
      created.push(id);
      return {
        id,
        constraints: deriveConstraints(EMPTY_STYLE),
        measure: null,
        children: [],
        parent: null,
        box: { left: 0, top: 0, width: 0, height: 0 },
        released: false,
      };
    },

    setConstraints(handle: FixedNode, constraints: LayoutConstraints): void {
      constrained.push(handle.id);
      handle.constraints = constraints;
    },

    setMeasure(handle: FixedNode, measure: MeasureFn | null): void {
      handle.measure = measure;
    },

    markDirty(handle: FixedNode): void {
      dirtied.push(handle.id);
    },

    setChildren(handle: FixedNode, children: readonly FixedNode[]): void {
      for (const child of handle.children) child.parent = null;
      handle.children = [];
      for (const child of children) {
        if (child.released) throw new Error(`setChildren: node "${child.id}" was released`);
        detach(child);
        child.parent = handle;
        handle.children.push(child);
      }
    },

    releaseNode(handle: FixedNode): void {
      if (handle.released) throw new Error(`releaseNode: node "${handle.id}" released twice`);
      detach(handle);
      for (const child of handle.children) child.parent = null;
      handle.children = [];
      handle.released = true;
      released.push(handle.id);
    },

    computeLayout(root: FixedNode, available: Size): void {
      solves++;
      place(root, available, true);
    },

    readLayout(handle: FixedNode): EngineBox {
      const override = overrides.get(handle.id);
      return override === undefined ? handle.box : { ...handle.box, ...override };
    },
  };
}
