/**
 * packages/core/src/events/types.ts — Raw input and semantic event types.
 *
 * Why: Raw input is what the platform layer feeds in (pointer, keyboard, text,
 * wheel, window blur). Semantic events are what node handlers receive. The two
 * vocabularies are kept apart so routing is the only place that maps one onto
 * the other.
 */

import type { NodeId, Point, Rect, Size } from "../tree/types.js";

// =============================================================================
// Raw input
// =============================================================================

export type Modifiers = Readonly<{
  shift: boolean;
  ctrl: boolean;
  alt: boolean;
  meta: boolean;
}>;

export const NO_MODIFIERS: Modifiers = Object.freeze({
  shift: false,
  ctrl: false,
  alt: false,
  meta: false,
});

export type PointerButton = "primary" | "secondary" | "middle";

export type RawInput =
  | Readonly<{ kind: "pointerMove"; x: number; y: number }>
  | Readonly<{ kind: "pointerDown"; x: number; y: number; button?: PointerButton }>
  | Readonly<{ kind: "pointerUp"; x: number; y: number; button?: PointerButton }>
  | Readonly<{
      kind: "keyDown";
      /** Key name, DOM-style: "a", "Enter", "Backspace", "ArrowLeft", "Tab". */
      key: string;
      /** Text the key produces, if any. */
      text?: string;
      modifiers?: Partial<Modifiers>;
    }>
  | Readonly<{ kind: "keyUp"; key: string; modifiers?: Partial<Modifiers> }>
  | Readonly<{ kind: "text"; text: string }>
  | Readonly<{
      kind: "wheel";
      x: number;
      y: number;
      deltaX: number;
      deltaY: number;
      deltaMode?: "pixel" | "line";
      modifiers?: Partial<Modifiers>;
    }>
  | Readonly<{ kind: "blur" }>;

export type RawInputKind = RawInput["kind"];

// =============================================================================
// Semantic events
// =============================================================================

/** Exactly the semantic event kinds a node can register handlers for. */
export type EventKind =
  | "focus"
  | "blur"
  | "drag"
  | "input"
  | "keydown"
  | "keyup"
  | "click"
  | "mousemove"
  | "layout"
  | "select";

export const EVENT_KINDS: readonly EventKind[] = Object.freeze([
  "focus",
  "blur",
  "drag",
  "input",
  "keydown",
  "keyup",
  "click",
  "mousemove",
  "layout",
  "select",
]);

export type SelectionMode = "none" | "collapsed" | "range";

type EmptyPayload = Readonly<Record<string, never>>;

export type KeyPayload = Readonly<{
  key: string;
  text: string | null;
  modifiers: Modifiers;
}>;

export type EventPayloadMap = {
  focus: EmptyPayload;
  blur: EmptyPayload;
  drag: Readonly<{ position: Point; start: Point; delta: Point }>;
  input: Readonly<{ value: string; cursor: number }>;
  keydown: KeyPayload;
  keyup: KeyPayload;
  click: Readonly<{ position: Point }>;
  mousemove: Readonly<{ position: Point }>;
  layout: Readonly<{ rect: Rect; contentSize: Size; generation: number }>;
  select: Readonly<{ text: string; mode: SelectionMode }>;
};

export type EventPhase = "capture" | "target" | "bubble";

export interface UiEvent<K extends EventKind = EventKind> {
  readonly kind: K;
  readonly target: NodeId;
  readonly currentTarget: NodeId;
  readonly phase: EventPhase;
  readonly payload: EventPayloadMap[K];
  readonly defaultPrevented: boolean;
  /** Stop delivery to handlers after the current one. */
  stopPropagation(): void;
  /** Cancel the default action that follows the event (input commit, Tab focus move). */
  preventDefault(): void;
}

export type EventHandler<K extends EventKind> = (event: UiEvent<K>) => void;

/** Per-node mapping from event kind to a registered callback. */
export type HandlerMap = { readonly [K in EventKind]?: EventHandler<K> };

export const EMPTY_HANDLERS: HandlerMap = Object.freeze({});

/** focus, blur and layout are delivered to their target only. */
export function eventBubbles(kind: EventKind): boolean {
  return kind !== "focus" && kind !== "blur" && kind !== "layout";
}
