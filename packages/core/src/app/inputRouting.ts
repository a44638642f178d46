/**
 * packages/core/src/app/inputRouting.ts — Raw input → interaction transitions and semantic events.
 *
 * Why: Keeps the focus/hover/press/drag state machine in one place. Each raw
 * input updates the interaction state first and then fires the semantic events
 * that follow from the transition, so handlers always observe the new state.
 *
 * Pointer rules:
 *   - down: press the hit node; focus its nearest focusable ancestor-or-self
 *     (blur on the old holder first); a press on a text run collapses the
 *     selection there and starts a selection gesture
 *   - move: hover + mousemove; once the pointer has left the drag-threshold
 *     circle around the press origin, extend the selection (selection gesture)
 *     or fire drag on the pressed node
 *   - up: click on the pressed node only if the threshold was never exceeded
 *     and the release is over the pressed node or one of its descendants
 *   - scrollbars take the pointer first: a press on a track jumps, a press on
 *     a thumb grabs it until release; neither presses, focuses nor clicks
 */

import type { ResolvedUiConfig } from "../config.js";
import type { DispatchOutcome } from "../events/dispatch.js";
import {
  type EventKind,
  type EventPayloadMap,
  type KeyPayload,
  type Modifiers,
  NO_MODIFIERS,
  type RawInput,
} from "../events/types.js";
import { contains, hitTest, visualGeometry } from "../layout/hitTest.js";
import type { TextMeasurer } from "../layout/types.js";
import { computeFocusList, computeMovedFocusId, nearestFocusable } from "../runtime/focus.js";
import { applyEditorInput, type EditorInput } from "../runtime/inputEditor.js";
import { type InteractionState, type ScrollbarGrab, withState } from "../runtime/interaction.js";
import {
  type Scrollbar,
  type ScrollbarHit,
  computeScrollbars,
  scrollForThumbDrag,
  scrollForTrackPress,
  scrollbarAt,
} from "../runtime/router/scrollbar.js";
import { routeWheel } from "../runtime/router/wheel.js";
import type { SelectionManager, SelectionPoint } from "../runtime/selection.js";
import type { NodeTree } from "../tree/nodeTree.js";
import type { FontMetrics, NodeId, Point, Rect } from "../tree/types.js";

export type InputRouterContext = Readonly<{
  tree: NodeTree;
  config: ResolvedUiConfig;
  measurer: TextMeasurer;
  selection: SelectionManager;
  fontOf: (id: NodeId) => FontMetrics;
  getState: () => InteractionState;
  setState: (next: InteractionState) => void;
  emit: <K extends EventKind>(kind: K, target: NodeId, payload: EventPayloadMap[K]) => DispatchOutcome;
}>;

export type InputRouter = Readonly<{
  route: (input: RawInput) => void;
  /** Move focus, firing blur on the old holder and then focus on the new one. */
  changeFocus: (next: NodeId | null) => void;
  /** Fire `select` if the selected text differs from `before`. */
  notifySelection: (before: string, previousAnchor: NodeId | null) => void;
}>;

function resolveModifiers(mods: Partial<Modifiers> | undefined): Modifiers {
  if (mods === undefined) return NO_MODIFIERS;
  return Object.freeze({
    shift: mods.shift === true,
    ctrl: mods.ctrl === true,
    alt: mods.alt === true,
    meta: mods.meta === true,
  });
}

function distanceToRect(rect: Rect, p: Point): number {
  const dx = Math.max(rect.x - p.x, 0, p.x - (rect.x + rect.w));
  const dy = Math.max(rect.y - p.y, 0, p.y - (rect.y + rect.h));
  return Math.hypot(dx, dy);
}

export function createInputRouter(ctx: InputRouterContext): InputRouter {
  const { tree, config, selection } = ctx;

  function changeFocus(next: NodeId | null): void {
    const prev = ctx.getState().focused;
    if (prev === next) return;
    ctx.setState(withState(ctx.getState(), { focused: next }));
    if (prev !== null && tree.has(prev)) ctx.emit("blur", prev, {});
    if (next !== null) ctx.emit("focus", next, {});
  }

  function notifySelection(before: string, previousAnchor: NodeId | null): void {
    const after = selection.selectedText();
    if (after === before) return;
    const target = selection.state.anchor?.id ?? previousAnchor;
    if (target === null || !tree.has(target)) return;
    ctx.emit("select", target, { text: after, mode: selection.mode });
  }

  /** Text position under `p`: the hit run, else the run nearest to `p`. */
  function textPointAt(p: Point, hit: NodeId | null): SelectionPoint | null {
    let best: NodeId | null = null;
    let bestRect: Rect | null = null;

    const hitNode = hit === null ? undefined : tree.get(hit);
    if (hitNode?.kind === "text") {
      const geometry = visualGeometry(tree, hitNode.id);
      if (geometry) {
        best = hitNode.id;
        bestRect = geometry.rect;
      }
    }

    if (best === null) {
      let bestDistance = Number.POSITIVE_INFINITY;
      for (const id of tree.documentOrder()) {
        const node = tree.get(id);
        if (!node || node.kind !== "text") continue;
        const geometry = visualGeometry(tree, id);
        if (!geometry || geometry.visible === null) continue;
        const d = distanceToRect(geometry.visible, p);
        if (d < bestDistance) {
          bestDistance = d;
          best = id;
          bestRect = geometry.rect;
        }
      }
    }

    if (best === null || bestRect === null) return null;
    const node = tree.require(best);
    const offset = ctx.measurer.offsetAt(node.text, ctx.fontOf(best), bestRect.w, {
      x: p.x - bestRect.x,
      y: p.y - bestRect.y,
    });
    return { id: best, offset };
  }

  function scrollbarsOf(id: NodeId): readonly Scrollbar[] {
    const node = tree.get(id);
    if (!node || node.style.overflow !== "scroll" || node.layout === null) return [];
    const geometry = visualGeometry(tree, id);
    if (!geometry || geometry.visible === null) return [];
    return computeScrollbars({
      rect: geometry.rect,
      contentWidth: node.layout.contentSize.w,
      contentHeight: node.layout.contentSize.h,
      scrollX: node.scroll.x,
      scrollY: node.scroll.y,
      barWidth: node.style.scrollbarWidth ?? 0,
    });
  }

  /** The innermost scroll container, at or above `hit`, whose visible scrollbar is under `p`. */
  function scrollbarUnder(p: Point, hit: NodeId): (ScrollbarHit & { id: NodeId }) | null {
    let cur: NodeId | null = hit;
    while (cur !== null) {
      const geometry = visualGeometry(tree, cur);
      if (geometry?.visible && contains(geometry.visible, p.x, p.y)) {
        const found = scrollbarAt(scrollbarsOf(cur), p);
        if (found !== null) return { ...found, id: cur };
      }
      cur = tree.get(cur)?.parent ?? null;
    }
    return null;
  }

  function dragScrollbar(grab: ScrollbarGrab, p: Point): void {
    const node = tree.get(grab.id);
    const bar = scrollbarsOf(grab.id).find((b) => b.axis === grab.axis);
    if (!node || bar === undefined) {
      ctx.setState(withState(ctx.getState(), { scrollbar: null }));
      return;
    }
    const pos = grab.axis === "y" ? p.y : p.x;
    node.scroll[grab.axis] = scrollForThumbDrag(bar, node.scroll[grab.axis], pos - grab.last);
    ctx.setState(withState(ctx.getState(), { scrollbar: { ...grab, last: pos } }));
  }

  function onPointerMove(p: Point): void {
    const grab = ctx.getState().scrollbar;
    if (grab !== null) dragScrollbar(grab, p);

    const hit = hitTest(tree, p);
    ctx.setState(withState(ctx.getState(), { hovered: hit }));
    if (hit !== null) ctx.emit("mousemove", hit, { position: p });

    const pressed = ctx.getState().pressed;
    if (pressed === null || !tree.has(pressed.id)) return;

    let exceeded = pressed.thresholdExceeded;
    if (!exceeded) {
      const travelled = Math.hypot(p.x - pressed.origin.x, p.y - pressed.origin.y);
      if (travelled <= config.dragThreshold) return;
      exceeded = true;
      ctx.setState(withState(ctx.getState(), { pressed: { ...pressed, thresholdExceeded: true } }));
    }

    if (pressed.selecting) {
      const point = textPointAt(p, hit);
      if (point === null) return;
      const before = selection.selectedText();
      const previousAnchor = selection.state.anchor?.id ?? null;
      selection.setCursor(point);
      notifySelection(before, previousAnchor);
      return;
    }

    const dragging = ctx.getState().dragging;
    const last = dragging?.id === pressed.id ? dragging.last : pressed.origin;
    ctx.setState(
      withState(ctx.getState(), { dragging: { id: pressed.id, start: pressed.origin, last: p } }),
    );
    ctx.emit("drag", pressed.id, {
      position: p,
      start: pressed.origin,
      delta: { x: p.x - last.x, y: p.y - last.y },
    });
  }

  function onPointerDown(p: Point): void {
    const hit = hitTest(tree, p);
    if (hit === null) {
      ctx.setState(
        withState(ctx.getState(), { hovered: null, pressed: null, dragging: null, scrollbar: null }),
      );
      return;
    }

    const bar = scrollbarUnder(p, hit);
    if (bar !== null) {
      const { axis } = bar.bar;
      let scrollbar: ScrollbarGrab | null = null;
      if (bar.onThumb) {
        scrollbar = { id: bar.id, axis, last: axis === "y" ? p.y : p.x };
      } else {
        tree.require(bar.id).scroll[axis] = scrollForTrackPress(bar.bar, p);
      }
      ctx.setState(withState(ctx.getState(), { hovered: hit, pressed: null, dragging: null, scrollbar }));
      return;
    }

    const hitNode = tree.require(hit);
    const selecting = hitNode.kind === "text";
    ctx.setState(
      withState(ctx.getState(), {
        hovered: hit,
        pressed: { id: hit, origin: p, thresholdExceeded: false, selecting },
        dragging: null,
      }),
    );

    const focusTarget = nearestFocusable(tree, hit);
    if (focusTarget !== null) changeFocus(focusTarget);

    if (selecting) {
      const point = textPointAt(p, hit);
      if (point === null) return;
      const before = selection.selectedText();
      const previousAnchor = selection.state.anchor?.id ?? null;
      selection.setCaret(point);
      notifySelection(before, previousAnchor);
    }
  }

  function onPointerUp(p: Point): void {
    const { pressed } = ctx.getState();
    ctx.setState(withState(ctx.getState(), { pressed: null, dragging: null, scrollbar: null }));
    if (pressed === null || pressed.thresholdExceeded || !tree.has(pressed.id)) return;

    const hit = hitTest(tree, p);
    if (hit !== null && tree.isAncestorOrSelf(pressed.id, hit)) {
      ctx.emit("click", pressed.id, { position: p });
    }
  }

  /** Apply an edit to the focused editable node; `input` fires first and may reject it. */
  function applyEdit(id: NodeId, input: EditorInput): void {
    const node = tree.get(id);
    if (!node || !node.editable || node.editor === null) return;
    const edit = applyEditorInput(node.editor, input);
    if (edit === null) return;

    if (edit.valueChanged) {
      const outcome = ctx.emit("input", id, { value: edit.next.value, cursor: edit.next.cursor });
      if (outcome.defaultPrevented) return;
    }
    // The node may have been destroyed and re-created under a new kind by a handler.
    if (tree.get(id) === node) node.editor = edit.next;
  }

  function onKeyDown(input: Extract<RawInput, { kind: "keyDown" }>): void {
    const modifiers = resolveModifiers(input.modifiers);
    const payload: KeyPayload = { key: input.key, text: input.text ?? null, modifiers };
    const focused = ctx.getState().focused;

    let defaultPrevented = false;
    if (focused !== null && tree.has(focused)) {
      applyEdit(focused, { kind: "key", key: input.key, text: payload.text, modifiers });
      defaultPrevented = ctx.emit("keydown", focused, payload).defaultPrevented;
    }

    if (input.key === "Tab" && !defaultPrevented) {
      const next = computeMovedFocusId(
        computeFocusList(tree),
        ctx.getState().focused,
        modifiers.shift ? "prev" : "next",
      );
      if (next !== null) changeFocus(next);
    }
  }

  function onKeyUp(input: Extract<RawInput, { kind: "keyUp" }>): void {
    const focused = ctx.getState().focused;
    if (focused === null || !tree.has(focused)) return;
    ctx.emit("keyup", focused, {
      key: input.key,
      text: null,
      modifiers: resolveModifiers(input.modifiers),
    });
  }

  function onWheel(input: Extract<RawInput, { kind: "wheel" }>): void {
    const hit = hitTest(tree, input);
    if (hit === null) return;

    let cur: NodeId | null = hit;
    while (cur !== null) {
      const node = tree.get(cur);
      if (!node) return;
      if (node.style.overflow === "scroll" && node.layout !== null) {
        const { rect, contentSize } = node.layout;
        const result = routeWheel(input, {
          scrollX: node.scroll.x,
          scrollY: node.scroll.y,
          contentWidth: contentSize.w,
          contentHeight: contentSize.h,
          viewportWidth: rect.w,
          viewportHeight: rect.h,
          lineSize: config.wheelLineSize,
        });
        if (result.nextScrollX !== undefined) node.scroll.x = result.nextScrollX;
        if (result.nextScrollY !== undefined) node.scroll.y = result.nextScrollY;
        return;
      }
      cur = node.parent;
    }
  }

  function route(input: RawInput): void {
    switch (input.kind) {
      case "pointerMove":
        onPointerMove({ x: input.x, y: input.y });
        return;
      case "pointerDown":
        if ((input.button ?? "primary") !== "primary") return;
        onPointerDown({ x: input.x, y: input.y });
        return;
      case "pointerUp":
        if ((input.button ?? "primary") !== "primary") return;
        onPointerUp({ x: input.x, y: input.y });
        return;
      case "keyDown":
        onKeyDown(input);
        return;
      case "keyUp":
        onKeyUp(input);
        return;
      case "text": {
        const focused = ctx.getState().focused;
        if (focused !== null) applyEdit(focused, { kind: "text", text: input.text });
        return;
      }
      case "wheel":
        onWheel(input);
        return;
      case "blur":
        ctx.setState(withState(ctx.getState(), { pressed: null, dragging: null, scrollbar: null }));
        changeFocus(null);
        return;
    }
  }

  return Object.freeze({ route, changeFocus, notifySelection });
}
