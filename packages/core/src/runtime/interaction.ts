/**
 * packages/core/src/runtime/interaction.ts — Focus/hover/press/drag state.
 *
 * Why: One immutable record per UI instance, replaced on every transition, so
 * a handler that captured the state sees a consistent snapshot.
 *
 * A grabbed scrollbar thumb owns the pointer until release: while `scrollbar`
 * is set there is no press, so no click, drag or selection can start.
 *
 * Focus changes requested while an event is being dispatched are held in
 * `pendingFocus` and applied when the dispatch ends.
 */

import type { NodeId, Point } from "../tree/types.js";

export type PressState = Readonly<{
  id: NodeId;
  origin: Point;
  /** The pointer left the drag-threshold circle at least once since the press. */
  thresholdExceeded: boolean;
  /** The press started on a text run and drives the selection cursor. */
  selecting: boolean;
}>;

export type DragState = Readonly<{
  id: NodeId;
  start: Point;
  last: Point;
}>;

export type ScrollAxis = "x" | "y";

export type ScrollbarGrab = Readonly<{
  id: NodeId;
  axis: ScrollAxis;
  /** Pointer position along `axis` at the previous move. */
  last: number;
}>;

export type InteractionState = Readonly<{
  focused: NodeId | null;
  hovered: NodeId | null;
  pressed: PressState | null;
  dragging: DragState | null;
  scrollbar: ScrollbarGrab | null;
  /**
   * `undefined` means "no pending change".
   * `null` means "explicitly clear focus".
   */
  pendingFocus?: NodeId | null;
}>;

export function createInteractionState(): InteractionState {
  return Object.freeze({ focused: null, hovered: null, pressed: null, dragging: null, scrollbar: null });
}

export function withState(
  state: InteractionState,
  patch: Partial<InteractionState>,
): InteractionState {
  return Object.freeze({ ...state, ...patch });
}

/** Request a focus change to be applied at the end of the current dispatch. */
export function requestPendingFocusChange(
  state: InteractionState,
  next: NodeId | null,
): InteractionState {
  return Object.freeze({ ...state, pendingFocus: next });
}

/** Split off the pending focus change, if any. */
export function takePendingFocusChange(
  state: InteractionState,
): Readonly<{ state: InteractionState; pending: NodeId | null | undefined }> {
  const pending = state.pendingFocus;
  if (pending === undefined) return { state, pending };
  const { focused, hovered, pressed, dragging, scrollbar } = state;
  return { state: Object.freeze({ focused, hovered, pressed, dragging, scrollbar }), pending };
}

/**
 * Reset every slot that refers to a destroyed node. No events are produced.
 */
export function releaseNodes(
  state: InteractionState,
  isAlive: (id: NodeId) => boolean,
): InteractionState {
  const focused = state.focused !== null && !isAlive(state.focused) ? null : state.focused;
  const hovered = state.hovered !== null && !isAlive(state.hovered) ? null : state.hovered;
  const pressed = state.pressed !== null && !isAlive(state.pressed.id) ? null : state.pressed;
  const dragging = state.dragging !== null && !isAlive(state.dragging.id) ? null : state.dragging;
  const scrollbar = state.scrollbar !== null && !isAlive(state.scrollbar.id) ? null : state.scrollbar;
  const pendingFocus =
    state.pendingFocus !== undefined && state.pendingFocus !== null && !isAlive(state.pendingFocus)
      ? undefined
      : state.pendingFocus;

  if (
    focused === state.focused &&
    hovered === state.hovered &&
    pressed === state.pressed &&
    dragging === state.dragging &&
    scrollbar === state.scrollbar &&
    pendingFocus === state.pendingFocus
  ) {
    return state;
  }
  const next: InteractionState = { focused, hovered, pressed, dragging, scrollbar };
  return Object.freeze(pendingFocus === undefined ? next : { ...next, pendingFocus });
}
