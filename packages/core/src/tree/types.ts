/**
 * packages/core/src/tree/types.ts — Node tree type definitions.
 *
 * Why: Defines the retained node record and the geometric primitives shared by
 * reconciliation, the layout adapter, hit-testing and input routing. All
 * coordinates are logical pixels in a space whose origin is the root's
 * top-left corner.
 */

import type { HandlerMap } from "../events/types.js";

/** Stable node identity, assigned by the description layer. */
export type NodeId = string;

/** The three node kinds. Only containers have children. */
export type NodeKind = "container" | "text" | "image";

export type Point = Readonly<{ x: number; y: number }>;

/** Rectangle with position (x,y) and dimensions (w,h). */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

export type Size = Readonly<{ w: number; h: number }>;

/** Monospace font metrics: fixed advance per character, fixed line height. */
export type FontMetrics = Readonly<{ charWidth: number; lineHeight: number }>;

export type SizeValue = number | `${number}%` | "auto";

/** A uniform edge value, or per-side values (missing sides are 0). */
export type EdgeValues =
  | number
  | Readonly<{ top?: number; right?: number; bottom?: number; left?: number }>;

/**
 * Resolved style, as produced by the style resolver collaborator from a class
 * string. Only the fields the layout adapter and input routing read are typed;
 * the resolver owns everything else.
 */
export type Style = Readonly<{
  display?: "flex" | "none";
  position?: "relative" | "absolute";
  top?: number;
  right?: number;
  bottom?: number;
  left?: number;
  width?: SizeValue;
  height?: SizeValue;
  minWidth?: number;
  maxWidth?: number;
  minHeight?: number;
  maxHeight?: number;
  flexDirection?: "row" | "column" | "row-reverse" | "column-reverse";
  flexWrap?: "nowrap" | "wrap";
  flexGrow?: number;
  flexShrink?: number;
  flexBasis?: SizeValue;
  justifyContent?: "start" | "center" | "end" | "space-between" | "space-around" | "space-evenly";
  alignItems?: "start" | "center" | "end" | "stretch";
  alignSelf?: "auto" | "start" | "center" | "end" | "stretch";
  gap?: number;
  margin?: EdgeValues;
  padding?: EdgeValues;
  border?: EdgeValues;
  overflow?: "visible" | "hidden" | "scroll";
  /** Width of the pointer-draggable scrollbars of a scroll container; 0 or absent means none. */
  scrollbarWidth?: number;
  font?: FontMetrics;
}>;

export const EMPTY_STYLE: Style = Object.freeze({});

/** Geometry written by the layout adapter. `rect` ignores ancestor scroll offsets. */
export type NodeLayout = Readonly<{
  rect: Rect;
  contentSize: Size;
  generation: number;
}>;

/** Decode status of an image node's `src`. */
export type ImageState =
  | Readonly<{ state: "none" }>
  | Readonly<{ state: "loading"; src: string }>
  | Readonly<{ state: "ready"; src: string; width: number; height: number }>
  | Readonly<{ state: "error"; src: string; message: string }>;

/** Caret and selection of an editable node. `anchor === cursor` means no selection. */
export type EditorState = Readonly<{
  value: string;
  cursor: number;
  anchor: number;
}>;

/**
 * Retained node record.
 *
 * Mutable fields are written only by their owners: structure, attributes and
 * style by reconciliation; `layout`, `layoutGeneration` and `scroll` by the
 * layout adapter and wheel routing; `editor` by input editing; `image` by the
 * image request tracker.
 */
export type UiNode = {
  readonly id: NodeId;
  readonly kind: NodeKind;
  parent: NodeId | null;
  children: NodeId[];
  attrs: ReadonlyMap<string, string>;
  /** Stored content of a text run; empty for other kinds. */
  text: string;
  style: Style;
  /** Bumped whenever `style` is replaced. */
  styleVersion: number;
  /** Bumped whenever a measured leaf's intrinsic content changes (text, decoded image). */
  contentVersion: number;
  focusable: boolean;
  /** Explicit description flag; `undefined` defers to the style's overflow. */
  clipFlag: boolean | undefined;
  editable: boolean;
  handlers: HandlerMap;
  captureHandlers: HandlerMap;
  layout: NodeLayout | null;
  layoutGeneration: number;
  scroll: { x: number; y: number };
  image: ImageState;
  editor: EditorState | null;
};

/** Whether a node clips its descendants to its border box. */
export function clipsToBounds(node: Pick<UiNode, "clipFlag" | "style">): boolean {
  if (node.clipFlag !== undefined) return node.clipFlag;
  return node.style.overflow === "hidden" || node.style.overflow === "scroll";
}
