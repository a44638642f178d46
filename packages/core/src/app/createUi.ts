/**
 * packages/core/src/app/createUi.ts — UI instance factory.
 *
 * Why: Wires the node tree, reconciliation, the layout adapter, image requests,
 * input routing and the dispatcher into one instance with a single logical
 * thread of control.
 *
 * Responsibilities:
 *   - reconcile descriptions (deferred while a dispatch is running)
 *   - run frames: drain image results, solve layout, fire `layout` events
 *   - route raw input and deliver semantic events
 *   - programmatic focus (deferred while a dispatch is running)
 *
 * Invariants:
 *   - handlers never observe a tree mutated mid-dispatch
 *   - a throwing handler never stops the remaining delivery; the first error
 *     is re-thrown as WEFT_USER_CODE_THROW once the operation completes
 *   - every method throws WEFT_DISPOSED after dispose()
 */

import { type ResolvedUiConfig, type UiConfig, resolveUiConfig } from "../config.js";
import { WeftError, throwFatal } from "../errors.js";
import { type DispatchOutcome, dispatchEvent } from "../events/dispatch.js";
import type { EventKind, EventPayloadMap, RawInput } from "../events/types.js";
import { ImageRequestTracker } from "../image/requestTracker.js";
import type { ImageLoader } from "../image/types.js";
import { hitTest, visualGeometry } from "../layout/hitTest.js";
import { LayoutAdapter, type LayoutPassResult } from "../layout/layoutAdapter.js";
import { monospaceTextMeasurer } from "../layout/textMeasure.js";
import type { LayoutEngine, TextMeasurer } from "../layout/types.js";
import { createDevLogger } from "../logging/devWarnings.js";
import {
  type InteractionState,
  createInteractionState,
  releaseNodes,
  requestPendingFocusChange,
  takePendingFocusChange,
} from "../runtime/interaction.js";
import {
  type ReconcileOk,
  type StyleResolver,
  reconcile as reconcileTree,
  validateDescription,
} from "../runtime/reconcile.js";
import { SelectionManager, type SelectionState } from "../runtime/selection.js";
import { NodeTree } from "../tree/nodeTree.js";
import { EMPTY_STYLE, type NodeId, type Point, type Rect, type Size, type UiNode } from "../tree/types.js";
import type { NodeDescription } from "../ui.js";
import { createInputRouter } from "./inputRouting.js";

export type UiOptions<H> = Readonly<{
  layoutEngine: LayoutEngine<H>;
  /** Default: every class string resolves to an empty style. */
  styleResolver?: StyleResolver;
  /** Default: monospace measurement with the configured font metrics. */
  textMeasurer?: TextMeasurer;
  /** Default: none; image nodes stay at 0×0. */
  imageLoader?: ImageLoader;
  config?: UiConfig;
}>;

export interface UiInstance {
  readonly config: ResolvedUiConfig;
  /** Retained tree. Read-only for callers; reconciliation is its only writer. */
  readonly tree: NodeTree;
  readonly interaction: InteractionState;
  readonly selection: SelectionState;

  /**
   * Reconcile the tree against `description`.
   * Throws WEFT_DUPLICATE_ID / WEFT_INVALID_DESCRIPTION, leaving the tree untouched.
   * Inside an event handler the description is validated now and applied after
   * the dispatch; the call then returns null.
   */
  reconcile(description: NodeDescription): ReconcileOk | null;
  /** Drain image results, solve layout, fire `layout` events. */
  frame(available: Size): LayoutPassResult;
  /** Solve layout only. */
  computeLayout(available: Size): LayoutPassResult;
  /** Apply queued image results. Returns the nodes whose intrinsic size changed. */
  drainImages(): readonly NodeId[];
  dispatch(input: RawInput): void;

  hitTest(point: Point): NodeId | null;
  /** Scrolled and clipped rect used by hit testing; null when stale, unknown or clipped away. */
  visualRect(id: NodeId): Rect | null;
  getNode(id: NodeId): UiNode | undefined;

  focus(id: NodeId): void;
  blur(): void;

  selectedText(): string;
  selectAll(id: NodeId): void;
  clearSelection(): void;

  dispose(): void;
}

const DEFAULT_STYLE_RESOLVER: StyleResolver = Object.freeze({ resolve: () => EMPTY_STYLE });

/** Settle rounds (deferred description + deferred focus) before giving up. */
const MAX_SETTLE_ROUNDS = 64;

type CapturedError = Readonly<{ error: unknown; kind: EventKind; id: NodeId }>;

function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}

export function createUi<H>(opts: UiOptions<H>): UiInstance {
  const config = resolveUiConfig(opts.config);
  const logger = createDevLogger({ devMode: config.devMode, warn: config.warn });
  const styleResolver = opts.styleResolver ?? DEFAULT_STYLE_RESOLVER;
  const measurer = opts.textMeasurer ?? monospaceTextMeasurer;

  const tree = new NodeTree();
  const adapter = new LayoutAdapter(opts.layoutEngine, {
    measurer,
    defaultFont: config.defaultFont,
    logger,
  });
  const images =
    opts.imageLoader === undefined ? null : new ImageRequestTracker(opts.imageLoader, logger);
  const selection = new SelectionManager(tree);

  let state = createInteractionState();
  let dispatchDepth = 0;
  let pendingDescription: NodeDescription | null = null;
  let firstError: CapturedError | null = null;
  let disposed = false;

  function assertLive(method: string): void {
    if (disposed) throw new WeftError("WEFT_DISPOSED", `${method}: instance is disposed`);
  }

  function onHandlerError(error: unknown, kind: EventKind, id: NodeId): void {
    if (firstError === null) {
      firstError = { error, kind, id };
      return;
    }
    logger.warn("dispatch", `${kind} handler on "${id}" threw: ${describeThrown(error)}`);
  }

  function emit<K extends EventKind>(kind: K, target: NodeId, payload: EventPayloadMap[K]): DispatchOutcome {
    return dispatchEvent(tree, kind, target, payload, onHandlerError);
  }

  const router = createInputRouter({
    tree,
    config,
    measurer,
    selection,
    fontOf: (id) => adapter.fontOf(id),
    getState: () => state,
    setState: (next) => {
      state = next;
    },
    emit,
  });

  function applyDescription(description: NodeDescription): ReconcileOk {
    const result = reconcileTree(tree, description, { styleResolver });
    if (!result.ok) throwFatal(result.fatal);
    const applied = result.value;

    const removed = new Set(applied.removed);
    if (removed.size > 0) {
      for (const id of removed) images?.cancel(id);
      state = releaseNodes(state, (id) => !removed.has(id));
    }

    const invalidated = new Set([...applied.removed, ...applied.textChanged]);
    if (invalidated.size > 0) selection.invalidate(invalidated);

    if (images !== null) {
      for (const change of applied.srcChanges) {
        images.setSource(tree.require(change.id), change.src);
      }
    }
    return applied;
  }

  /** Apply deferred work queued by handlers, until none is left. Runs inside the outermost scope. */
  function settle(): void {
    for (let round = 0; round < MAX_SETTLE_ROUNDS; round++) {
      const description = pendingDescription;
      if (description !== null) {
        pendingDescription = null;
        applyDescription(description);
      }

      const taken = takePendingFocusChange(state);
      state = taken.state;
      const pending = taken.pending;
      if (pending === undefined) {
        if (pendingDescription === null) return;
        continue;
      }
      if (pending !== null && !tree.has(pending)) {
        logger.warn("dispatch", `focus request for unknown node "${pending}" dropped`);
        continue;
      }
      router.changeFocus(pending);
    }
    logger.warn("dispatch", "deferred updates did not settle; remaining work dropped");
    pendingDescription = null;
    state = takePendingFocusChange(state).state;
  }

  function rethrowHandlerError(): void {
    const captured = firstError;
    firstError = null;
    if (captured === null) return;
    throw new WeftError(
      "WEFT_USER_CODE_THROW",
      `${captured.kind} handler on "${captured.id}" threw: ${describeThrown(captured.error)}`,
      { cause: captured.error },
    );
  }

  /**
   * Run `fn` as a dispatch scope. The outermost scope applies deferred work
   * before closing and then re-throws the first handler error.
   */
  function runDispatch<T>(fn: () => T): T {
    const outermost = dispatchDepth === 0;
    dispatchDepth++;
    let out: T;
    try {
      out = fn();
      if (outermost) settle();
    } finally {
      dispatchDepth--;
    }
    if (outermost) rethrowHandlerError();
    return out;
  }

  function computeLayout(available: Size): LayoutPassResult {
    return adapter.compute(tree, available);
  }

  function drainImages(): readonly NodeId[] {
    return images === null ? [] : images.drain(tree);
  }

  const ui: UiInstance = {
    config,
    tree,

    get interaction(): InteractionState {
      return state;
    },

    get selection(): SelectionState {
      return selection.state;
    },

    reconcile(description: NodeDescription): ReconcileOk | null {
      assertLive("reconcile");
      if (dispatchDepth > 0) {
        const validated = validateDescription(description);
        if (!validated.ok) throwFatal(validated.fatal);
        pendingDescription = description;
        return null;
      }
      return applyDescription(description);
    },

    frame(available: Size): LayoutPassResult {
      assertLive("frame");
      drainImages();
      const pass = computeLayout(available);
      if (pass.changed.length > 0) {
        runDispatch(() => {
          for (const id of pass.changed) {
            const layout = tree.get(id)?.layout;
            if (!layout) continue;
            emit("layout", id, {
              rect: layout.rect,
              contentSize: layout.contentSize,
              generation: layout.generation,
            });
          }
        });
      }
      return pass;
    },

    computeLayout(available: Size): LayoutPassResult {
      assertLive("computeLayout");
      return computeLayout(available);
    },

    drainImages(): readonly NodeId[] {
      assertLive("drainImages");
      return drainImages();
    },

    dispatch(input: RawInput): void {
      assertLive("dispatch");
      runDispatch(() => router.route(input));
    },

    hitTest(point: Point): NodeId | null {
      return hitTest(tree, point);
    },

    visualRect(id: NodeId): Rect | null {
      return visualGeometry(tree, id)?.visible ?? null;
    },

    getNode(id: NodeId): UiNode | undefined {
      return tree.get(id);
    },

    focus(id: NodeId): void {
      assertLive("focus");
      if (dispatchDepth > 0) {
        state = requestPendingFocusChange(state, id);
        return;
      }
      tree.require(id);
      runDispatch(() => router.changeFocus(id));
    },

    blur(): void {
      assertLive("blur");
      if (dispatchDepth > 0) {
        state = requestPendingFocusChange(state, null);
        return;
      }
      runDispatch(() => router.changeFocus(null));
    },

    selectedText(): string {
      return selection.selectedText();
    },

    selectAll(id: NodeId): void {
      assertLive("selectAll");
      const before = selection.selectedText();
      const previousAnchor = selection.state.anchor?.id ?? null;
      selection.selectAll(id);
      runDispatch(() => router.notifySelection(before, previousAnchor));
    },

    clearSelection(): void {
      assertLive("clearSelection");
      const before = selection.selectedText();
      const previousAnchor = selection.state.anchor?.id ?? null;
      selection.clear();
      runDispatch(() => router.notifySelection(before, previousAnchor));
    },

    dispose(): void {
      if (disposed) return;
      disposed = true;
      pendingDescription = null;
      images?.dispose();
      adapter.dispose();
    },
  };

  return ui;
}
