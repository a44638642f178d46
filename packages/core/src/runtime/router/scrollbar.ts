/**
 * packages/core/src/runtime/router/scrollbar.ts — Scrollbar track and thumb geometry.
 *
 * Why: A scroll container with a non-zero scrollbar width gets pointer regions
 * along its right (vertical) and bottom (horizontal) edges, one per axis whose
 * content overflows. A press on the track jumps so the thumb centres on the
 * pointer; dragging the thumb scrolls in proportion to the thumb's travel.
 */

import { contains } from "../../layout/hitTest.js";
import type { Point, Rect } from "../../tree/types.js";
import type { ScrollAxis } from "../interaction.js";

export type ScrollbarCtx = Readonly<{
  /** On-screen border box of the scroll container. */
  rect: Rect;
  contentWidth: number;
  contentHeight: number;
  scrollX: number;
  scrollY: number;
  barWidth: number;
}>;

export type Scrollbar = Readonly<{
  axis: ScrollAxis;
  track: Rect;
  thumb: Rect;
  maxScroll: number;
}>;

export type ScrollbarHit = Readonly<{ bar: Scrollbar; onThumb: boolean }>;

function clamp(v: number, lo: number, hi: number): number {
  return Math.min(Math.max(v, lo), hi);
}

function trackLength(bar: Scrollbar): number {
  return bar.axis === "y" ? bar.track.h : bar.track.w;
}

function thumbLength(bar: Scrollbar): number {
  return bar.axis === "y" ? bar.thumb.h : bar.thumb.w;
}

/** Vertical bar first, then horizontal. Axes that do not overflow get none. */
export function computeScrollbars(ctx: ScrollbarCtx): readonly Scrollbar[] {
  const { rect: r, barWidth: bw } = ctx;
  if (!Number.isFinite(bw) || bw <= 0) return [];

  const maxX = Math.max(0, ctx.contentWidth - r.w);
  const maxY = Math.max(0, ctx.contentHeight - r.h);
  const both = maxX > 0 && maxY > 0;
  const bars: Scrollbar[] = [];

  if (maxY > 0) {
    const track = { x: r.x + r.w - bw, y: r.y, w: bw, h: Math.max(0, r.h - (both ? bw : 0)) };
    const len = (track.h * r.h) / ctx.contentHeight;
    const offset = (clamp(ctx.scrollY, 0, maxY) / maxY) * (track.h - len);
    bars.push({ axis: "y", track, thumb: { x: track.x, y: track.y + offset, w: bw, h: len }, maxScroll: maxY });
  }
  if (maxX > 0) {
    const track = { x: r.x, y: r.y + r.h - bw, w: Math.max(0, r.w - (both ? bw : 0)), h: bw };
    const len = (track.w * r.w) / ctx.contentWidth;
    const offset = (clamp(ctx.scrollX, 0, maxX) / maxX) * (track.w - len);
    bars.push({ axis: "x", track, thumb: { x: track.x + offset, y: track.y, w: len, h: bw }, maxScroll: maxX });
  }
  return bars;
}

export function scrollbarAt(bars: readonly Scrollbar[], p: Point): ScrollbarHit | null {
  for (const bar of bars) {
    if (!contains(bar.track, p.x, p.y)) continue;
    return { bar, onThumb: contains(bar.thumb, p.x, p.y) };
  }
  return null;
}

/** Scroll offset that centres the thumb on a track press at `p`. */
export function scrollForTrackPress(bar: Scrollbar, p: Point): number {
  const travel = trackLength(bar) - thumbLength(bar);
  if (travel <= 0) return 0;
  const along = bar.axis === "y" ? p.y - bar.track.y : p.x - bar.track.x;
  return clamp(((along - thumbLength(bar) / 2) / travel) * bar.maxScroll, 0, bar.maxScroll);
}

/** Scroll offset after the grabbed thumb moved `delta` px along its axis. */
export function scrollForThumbDrag(bar: Scrollbar, current: number, delta: number): number {
  const travel = trackLength(bar) - thumbLength(bar);
  if (travel <= 0 || !Number.isFinite(delta)) return current;
  return clamp(current + (delta * bar.maxScroll) / travel, 0, bar.maxScroll);
}
