import type { RawInput } from "../../events/types.js";

export type WheelInput = Extract<RawInput, { kind: "wheel" }>;

export type WheelRoutingCtx = Readonly<{
  scrollX: number;
  scrollY: number;
  contentWidth: number;
  contentHeight: number;
  viewportWidth: number;
  viewportHeight: number;
  /** Pixels per line for line-mode deltas. */
  lineSize: number;
}>;

export type WheelRoutingResult = Readonly<{
  nextScrollX?: number;
  nextScrollY?: number;
}>;

/** Scroll deltas in pixels. Shift turns a vertical line scroll into a horizontal one. */
export function wheelDeltaPixels(event: WheelInput, lineSize: number): Readonly<{ dx: number; dy: number }> {
  if (event.deltaMode !== "line") return { dx: event.deltaX, dy: event.deltaY };
  const dx = event.deltaX * lineSize;
  const dy = event.deltaY * lineSize;
  return event.modifiers?.shift === true ? { dx: dy, dy: dx } : { dx, dy };
}

export function routeWheel(event: WheelInput, ctx: WheelRoutingCtx): WheelRoutingResult {
  const { dx, dy } = wheelDeltaPixels(event, ctx.lineSize);
  if (!Number.isFinite(dx) || !Number.isFinite(dy)) return Object.freeze({});

  const maxScrollY = Math.max(0, ctx.contentHeight - ctx.viewportHeight);
  const maxScrollX = Math.max(0, ctx.contentWidth - ctx.viewportWidth);

  const nextScrollY = Math.max(0, Math.min(maxScrollY, ctx.scrollY + dy));
  const nextScrollX = Math.max(0, Math.min(maxScrollX, ctx.scrollX + dx));

  const changed = nextScrollY !== ctx.scrollY || nextScrollX !== ctx.scrollX;
  if (!changed) return Object.freeze({});

  return Object.freeze({ nextScrollX, nextScrollY });
}
