/**
 * packages/core/src/events/dispatch.ts — Semantic event propagation.
 *
 * Why: One routine delivers every semantic event so ordering is identical for
 * all kinds: capture handlers root→target, the target's own handlers, then
 * bubble handlers target→root (bubbling kinds only).
 *
 * A throwing handler never aborts delivery; the error goes to the caller's
 * sink and propagation continues with the next handler.
 */

import type { NodeTree } from "../tree/nodeTree.js";
import type { NodeId } from "../tree/types.js";
import {
  type EventKind,
  type EventPayloadMap,
  type EventPhase,
  type HandlerMap,
  type UiEvent,
  eventBubbles,
} from "./types.js";

export type HandlerErrorSink = (error: unknown, kind: EventKind, currentTarget: NodeId) => void;

export type DispatchOutcome = Readonly<{
  defaultPrevented: boolean;
  /** Number of handlers invoked. */
  delivered: number;
}>;

class SemanticEvent<K extends EventKind> implements UiEvent<K> {
  currentTarget: NodeId;
  phase: EventPhase = "capture";
  defaultPrevented = false;
  stopped = false;

  constructor(
    readonly kind: K,
    readonly target: NodeId,
    readonly payload: EventPayloadMap[K],
  ) {
    this.currentTarget = target;
  }

  stopPropagation(): void {
    this.stopped = true;
  }

  preventDefault(): void {
    this.defaultPrevented = true;
  }
}

/**
 * Deliver one event to `target` and its ancestors.
 * Unknown targets deliver nothing.
 */
export function dispatchEvent<K extends EventKind>(
  tree: NodeTree,
  kind: K,
  target: NodeId,
  payload: EventPayloadMap[K],
  onError: HandlerErrorSink,
): DispatchOutcome {
  if (!tree.has(target)) return { defaultPrevented: false, delivered: 0 };

  const path = tree.pathFromRoot(target);
  const event = new SemanticEvent(kind, target, payload);
  let delivered = 0;

  const invoke = (id: NodeId, handlers: HandlerMap, phase: EventPhase): boolean => {
    const handler = handlers[kind];
    if (!handler) return false;
    event.currentTarget = id;
    event.phase = phase;
    delivered++;
    try {
      handler(event);
    } catch (error: unknown) {
      onError(error, kind, id);
    }
    return event.stopped;
  };

  // Capture: root → parent of target.
  for (let i = 0; i < path.length - 1; i++) {
    const id = path[i];
    const node = id === undefined ? undefined : tree.get(id);
    if (node && invoke(node.id, node.captureHandlers, "capture")) {
      return { defaultPrevented: event.defaultPrevented, delivered };
    }
  }

  const targetNode = tree.get(target);
  if (targetNode) {
    if (invoke(target, targetNode.captureHandlers, "target")) {
      return { defaultPrevented: event.defaultPrevented, delivered };
    }
    if (invoke(target, targetNode.handlers, "target")) {
      return { defaultPrevented: event.defaultPrevented, delivered };
    }
  }

  if (eventBubbles(kind)) {
    for (let i = path.length - 2; i >= 0; i--) {
      const id = path[i];
      const node = id === undefined ? undefined : tree.get(id);
      if (node && invoke(node.id, node.handlers, "bubble")) break;
    }
  }

  return { defaultPrevented: event.defaultPrevented, delivered };
}
