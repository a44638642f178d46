/**
 * packages/core/src/layout/constraints.ts — Style → engine constraints.
 *
 * Why: Resolved styles are sparse; the engine gets a fully specified record so
 * a style that drops a field resets it instead of leaving the engine's
 * previous value in place.
 */

import type { EdgeValues, Style } from "../tree/types.js";
import { type Edges, type LayoutConstraints, ZERO_EDGES } from "./types.js";

export function resolveEdges(v: EdgeValues | undefined): Edges {
  if (v === undefined) return ZERO_EDGES;
  if (typeof v === "number") return Object.freeze({ top: v, right: v, bottom: v, left: v });
  return Object.freeze({
    top: v.top ?? 0,
    right: v.right ?? 0,
    bottom: v.bottom ?? 0,
    left: v.left ?? 0,
  });
}

export function deriveConstraints(style: Style): LayoutConstraints {
  return Object.freeze({
    display: style.display ?? "flex",
    position: style.position ?? "relative",
    insets: Object.freeze({
      top: style.top,
      right: style.right,
      bottom: style.bottom,
      left: style.left,
    }),
    width: style.width ?? "auto",
    height: style.height ?? "auto",
    minWidth: style.minWidth,
    maxWidth: style.maxWidth,
    minHeight: style.minHeight,
    maxHeight: style.maxHeight,
    flexDirection: style.flexDirection ?? "column",
    flexWrap: style.flexWrap ?? "nowrap",
    flexGrow: style.flexGrow ?? 0,
    flexShrink: style.flexShrink ?? 0,
    flexBasis: style.flexBasis ?? "auto",
    justifyContent: style.justifyContent ?? "start",
    alignItems: style.alignItems ?? "stretch",
    alignSelf: style.alignSelf ?? "auto",
    gap: style.gap ?? 0,
    margin: resolveEdges(style.margin),
    padding: resolveEdges(style.padding),
    border: resolveEdges(style.border),
    overflow: style.overflow ?? "visible",
  });
}
