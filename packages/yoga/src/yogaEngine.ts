/**
 * packages/yoga/src/yogaEngine.ts — LayoutEngine backed by yoga-layout.
 *
 * Why: @weft/core only knows the `LayoutEngine` boundary. This module maps
 * fully specified constraints onto Yoga node setters, adapts measure callbacks
 * to Yoga's (width, mode) protocol, and keeps Yoga's single-owner rule: a
 * child is detached from its previous parent before it is inserted elsewhere.
 */

import type {
  EngineBox,
  LayoutConstraints,
  LayoutEngine,
  MeasureFn,
  NodeId,
  Size,
} from "@weft/core";
import Yoga, {
  Align,
  Direction,
  Display,
  Edge,
  FlexDirection,
  Gutter,
  Justify,
  MeasureMode,
  Overflow,
  PositionType,
  Wrap,
  type Config as YogaConfig,
  type MeasureFunction,
  type Node as YogaNode,
} from "yoga-layout";

export type YogaLayoutEngineOptions = Readonly<{
  /**
   * Physical pixels per layout unit; computed boxes are rounded to this grid.
   * Default 1 (whole logical pixels). 0 disables rounding.
   */
  pointScaleFactor?: number;
}>;

/** Yoga node plus the id it was created for (for diagnostics). */
export type YogaHandle = Readonly<{ id: NodeId; node: YogaNode }>;

const FLEX_DIRECTION: Readonly<Record<LayoutConstraints["flexDirection"], FlexDirection>> = {
  row: FlexDirection.Row,
  column: FlexDirection.Column,
  "row-reverse": FlexDirection.RowReverse,
  "column-reverse": FlexDirection.ColumnReverse,
};

const JUSTIFY: Readonly<Record<LayoutConstraints["justifyContent"], Justify>> = {
  start: Justify.FlexStart,
  center: Justify.Center,
  end: Justify.FlexEnd,
  "space-between": Justify.SpaceBetween,
  "space-around": Justify.SpaceAround,
  "space-evenly": Justify.SpaceEvenly,
};

const ALIGN: Readonly<Record<LayoutConstraints["alignSelf"], Align>> = {
  auto: Align.Auto,
  start: Align.FlexStart,
  center: Align.Center,
  end: Align.FlexEnd,
  stretch: Align.Stretch,
};

const OVERFLOW: Readonly<Record<LayoutConstraints["overflow"], Overflow>> = {
  visible: Overflow.Visible,
  hidden: Overflow.Hidden,
  scroll: Overflow.Scroll,
};

function applyConstraints(node: YogaNode, c: LayoutConstraints): void {
  node.setDisplay(c.display === "none" ? Display.None : Display.Flex);
  node.setPositionType(c.position === "absolute" ? PositionType.Absolute : PositionType.Relative);
  node.setPosition(Edge.Top, c.insets.top);
  node.setPosition(Edge.Right, c.insets.right);
  node.setPosition(Edge.Bottom, c.insets.bottom);
  node.setPosition(Edge.Left, c.insets.left);

  node.setWidth(c.width);
  node.setHeight(c.height);
  node.setMinWidth(c.minWidth);
  node.setMaxWidth(c.maxWidth);
  node.setMinHeight(c.minHeight);
  node.setMaxHeight(c.maxHeight);

  node.setFlexDirection(FLEX_DIRECTION[c.flexDirection]);
  node.setFlexWrap(c.flexWrap === "wrap" ? Wrap.Wrap : Wrap.NoWrap);
  node.setFlexGrow(c.flexGrow);
  node.setFlexShrink(c.flexShrink);
  node.setFlexBasis(c.flexBasis);
  node.setJustifyContent(JUSTIFY[c.justifyContent]);
  node.setAlignItems(ALIGN[c.alignItems]);
  node.setAlignSelf(ALIGN[c.alignSelf]);
  node.setGap(Gutter.All, c.gap);

  node.setMargin(Edge.Top, c.margin.top);
  node.setMargin(Edge.Right, c.margin.right);
  node.setMargin(Edge.Bottom, c.margin.bottom);
  node.setMargin(Edge.Left, c.margin.left);
  node.setPadding(Edge.Top, c.padding.top);
  node.setPadding(Edge.Right, c.padding.right);
  node.setPadding(Edge.Bottom, c.padding.bottom);
  node.setPadding(Edge.Left, c.padding.left);
  node.setBorder(Edge.Top, c.border.top);
  node.setBorder(Edge.Right, c.border.right);
  node.setBorder(Edge.Bottom, c.border.bottom);
  node.setBorder(Edge.Left, c.border.left);

  node.setOverflow(OVERFLOW[c.overflow]);
}

function constrain(measured: number, available: number, mode: MeasureMode): number {
  if (mode === MeasureMode.Exactly) return available;
  if (mode === MeasureMode.AtMost) return Math.min(measured, available);
  return measured;
}

/** Adapt a core measure callback to Yoga's protocol. */
export function toYogaMeasure(measure: MeasureFn): MeasureFunction {
  return (width, widthMode, height, heightMode) => {
    const maxWidth = widthMode === MeasureMode.Undefined ? undefined : width;
    const size = measure(maxWidth);
    return {
      width: constrain(size.w, width, widthMode),
      height: constrain(size.h, height, heightMode),
    };
  };
}

function detach(node: YogaNode): void {
  const parent = node.getParent();
  if (parent !== null) parent.removeChild(node);
}

export function createYogaLayoutEngine(opts: YogaLayoutEngineOptions = {}): LayoutEngine<YogaHandle> {
  const config: YogaConfig = Yoga.Config.create();
  config.setPointScaleFactor(opts.pointScaleFactor ?? 1);

  return {
    createNode(id: NodeId): YogaHandle {
      return Object.freeze({ id, node: Yoga.Node.create(config) });
    },

    setConstraints(handle: YogaHandle, constraints: LayoutConstraints): void {
      applyConstraints(handle.node, constraints);
    },

    setMeasure(handle: YogaHandle, measure: MeasureFn | null): void {
      if (measure === null) handle.node.unsetMeasureFunc();
      else handle.node.setMeasureFunc(toYogaMeasure(measure));
    },

    markDirty(handle: YogaHandle): void {
      handle.node.markDirty();
    },

    setChildren(handle: YogaHandle, children: readonly YogaHandle[]): void {
      const { node } = handle;
      while (node.getChildCount() > 0) node.removeChild(node.getChild(0));
      children.forEach((child, index) => {
        detach(child.node);
        node.insertChild(child.node, index);
      });
    },

    releaseNode(handle: YogaHandle): void {
      detach(handle.node);
      handle.node.free();
    },

    computeLayout(root: YogaHandle, available: Size): void {
      root.node.calculateLayout(available.w, available.h, Direction.LTR);
    },

    readLayout(handle: YogaHandle): EngineBox {
      const { left, top, width, height } = handle.node.getComputedLayout();
      return { left, top, width, height };
    },
  };
}
