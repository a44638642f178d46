/**
 * packages/core/src/layout/types.ts — Layout engine boundary types.
 *
 * Why: The constraint solver is an external collaborator. The adapter talks to
 * it only through `LayoutEngine<H>`, with fully specified constraints and
 * parent-relative boxes, so any flexbox solver can sit behind it.
 */

import type { FontMetrics, NodeId, Point, Size, SizeValue } from "../tree/types.js";

/** Four resolved edge widths. */
export type Edges = Readonly<{ top: number; right: number; bottom: number; left: number }>;

export const ZERO_EDGES: Edges = Object.freeze({ top: 0, right: 0, bottom: 0, left: 0 });

/** Constraints pushed to the engine. Every field is set; defaults come from `deriveConstraints`. */
export type LayoutConstraints = Readonly<{
  display: "flex" | "none";
  position: "relative" | "absolute";
  insets: Readonly<{
    top: number | undefined;
    right: number | undefined;
    bottom: number | undefined;
    left: number | undefined;
  }>;
  width: SizeValue;
  height: SizeValue;
  minWidth: number | undefined;
  maxWidth: number | undefined;
  minHeight: number | undefined;
  maxHeight: number | undefined;
  flexDirection: "row" | "column" | "row-reverse" | "column-reverse";
  flexWrap: "nowrap" | "wrap";
  flexGrow: number;
  flexShrink: number;
  flexBasis: SizeValue;
  justifyContent: "start" | "center" | "end" | "space-between" | "space-around" | "space-evenly";
  alignItems: "start" | "center" | "end" | "stretch";
  alignSelf: "auto" | "start" | "center" | "end" | "stretch";
  gap: number;
  margin: Edges;
  padding: Edges;
  border: Edges;
  overflow: "visible" | "hidden" | "scroll";
}>;

/** Parent-relative box as read back from the engine. May contain garbage (NaN) from a buggy solver. */
export type EngineBox = Readonly<{ left: number; top: number; width: number; height: number }>;

/**
 * Intrinsic size of a measured leaf. `maxWidth` is undefined when the width is
 * unconstrained.
 */
export type MeasureFn = (maxWidth: number | undefined) => Size;

/**
 * External constraint solver.
 *
 * Handles are opaque to the adapter. `setChildren` replaces the whole child
 * list; `releaseNode` is called once per handle, after it has been detached.
 */
export interface LayoutEngine<H> {
  createNode(id: NodeId): H;
  setConstraints(handle: H, constraints: LayoutConstraints): void;
  setMeasure(handle: H, measure: MeasureFn | null): void;
  markDirty(handle: H): void;
  setChildren(handle: H, children: readonly H[]): void;
  releaseNode(handle: H): void;
  computeLayout(root: H, available: Size): void;
  readLayout(handle: H): EngineBox;
}

/** Text measurement collaborator. Pure in text, font and width. */
export interface TextMeasurer {
  measure(text: string, font: FontMetrics, maxWidth: number | undefined): Size;
  /** Nearest UTF-16 offset to a point local to the run's box. */
  offsetAt(text: string, font: FontMetrics, maxWidth: number | undefined, point: Point): number;
}
