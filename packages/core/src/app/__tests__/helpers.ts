import type { StyleResolver } from "../../runtime/reconcile.js";
import { createFixedLayoutEngine } from "../../testing/layoutEngine.js";
import type { ManualImageLoader } from "../../testing/imageLoader.js";
import type { Style } from "../../tree/types.js";
import { createUi } from "../createUi.js";

/**
 * Style from a compact class string: `l=10 t=20 w=50 h=30 sb=8` plus the
 * bare words `scroll` and `clip` for overflow.
 */
export function classStyle(cls: string): Style {
  let left: number | undefined;
  let top: number | undefined;
  let width: number | undefined;
  let height: number | undefined;
  let scrollbarWidth: number | undefined;
  let overflow: Style["overflow"];
  for (const token of cls.split(/\s+/)) {
    if (token === "scroll") overflow = "scroll";
    else if (token === "clip") overflow = "hidden";
    const [key, raw] = token.split("=");
    if (raw === undefined) continue;
    const value = Number(raw);
    if (key === "l") left = value;
    else if (key === "t") top = value;
    else if (key === "w") width = value;
    else if (key === "h") height = value;
    else if (key === "sb") scrollbarWidth = value;
  }
  return { left, top, width, height, overflow, scrollbarWidth };
}

export const classStyleResolver: StyleResolver = Object.freeze({ resolve: classStyle });

export const VIEWPORT = Object.freeze({ w: 200, h: 200 });

/** A UI instance on the fixed engine with a 10×20 default font and captured warnings. */
export function createTestUi(imageLoader?: ManualImageLoader) {
  const warnings: string[] = [];
  const engine = createFixedLayoutEngine();
  const ui = createUi({
    layoutEngine: engine,
    styleResolver: classStyleResolver,
    ...(imageLoader !== undefined ? { imageLoader } : {}),
    config: { defaultFont: { charWidth: 10, lineHeight: 20 }, warn: (m) => warnings.push(m) },
  });
  return { ui, engine, warnings };
}
