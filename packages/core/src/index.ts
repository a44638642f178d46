/**
 * @weft/core
 *
 * Runtime-agnostic core for Weft: retained node tree, reconciliation by id,
 * layout adapter, hit testing, interaction state machine, text selection and
 * event dispatch.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors, config, logging
// =============================================================================

export {
  WeftError,
  throwFatal,
  type WeftErrorCode,
  type WeftFatal,
  type WeftResult,
} from "./errors.js";

export {
  DEFAULT_UI_CONFIG,
  resolveUiConfig,
  type ResolvedUiConfig,
  type UiConfig,
} from "./config.js";

export {
  createDevLogger,
  type DevLogger,
  type WarnArea,
  type WarnSink,
} from "./logging/devWarnings.js";

// =============================================================================
// Tree and descriptions
// =============================================================================

export {
  EMPTY_STYLE,
  clipsToBounds,
  type EdgeValues,
  type EditorState,
  type FontMetrics,
  type ImageState,
  type NodeId,
  type NodeKind,
  type NodeLayout,
  type Point,
  type Rect,
  type Size,
  type SizeValue,
  type Style,
  type UiNode,
} from "./tree/types.js";

export { NodeTree, createNodeRecord } from "./tree/nodeTree.js";

export { ui, type NodeDescription, type NodeProps } from "./ui.js";

export {
  longestIncreasingRun,
  reconcile,
  validateDescription,
  type ReconcileDeps,
  type ReconcileOk,
  type ReconcileResult,
  type SrcChange,
  type StyleResolver,
  type TreeEdit,
  type UpdateField,
} from "./runtime/reconcile.js";

// =============================================================================
// Layout
// =============================================================================

export {
  ZERO_EDGES,
  type Edges,
  type EngineBox,
  type LayoutConstraints,
  type LayoutEngine,
  type MeasureFn,
  type TextMeasurer,
} from "./layout/types.js";

export { deriveConstraints, resolveEdges } from "./layout/constraints.js";

export {
  LayoutAdapter,
  clampScroll,
  type LayoutAdapterOptions,
  type LayoutPassResult,
} from "./layout/layoutAdapter.js";

export { monospaceTextMeasurer, wrapText, type TextLine } from "./layout/textMeasure.js";

export {
  contains,
  hitTest,
  intersectRect,
  visualGeometry,
  type VisualGeometry,
} from "./layout/hitTest.js";

// =============================================================================
// Images
// =============================================================================

export type {
  ImageLoadResult,
  ImageLoader,
  ImageRequestHandle,
  ImageSettle,
  ImageSize,
} from "./image/types.js";

export { ImageRequestTracker } from "./image/requestTracker.js";

// =============================================================================
// Events and interaction
// =============================================================================

export {
  EMPTY_HANDLERS,
  EVENT_KINDS,
  NO_MODIFIERS,
  eventBubbles,
  type EventHandler,
  type EventKind,
  type EventPayloadMap,
  type EventPhase,
  type HandlerMap,
  type KeyPayload,
  type Modifiers,
  type PointerButton,
  type RawInput,
  type RawInputKind,
  type SelectionMode,
  type UiEvent,
} from "./events/types.js";

export {
  dispatchEvent,
  type DispatchOutcome,
  type HandlerErrorSink,
} from "./events/dispatch.js";

export {
  computeFocusList,
  computeMovedFocusId,
  nearestFocusable,
  type FocusMove,
} from "./runtime/focus.js";

export {
  createInteractionState,
  type DragState,
  type InteractionState,
  type PressState,
  type ScrollAxis,
  type ScrollbarGrab,
} from "./runtime/interaction.js";

export {
  computeScrollbars,
  scrollForThumbDrag,
  scrollForTrackPress,
  scrollbarAt,
  type Scrollbar,
  type ScrollbarCtx,
  type ScrollbarHit,
} from "./runtime/router/scrollbar.js";

export {
  EMPTY_SELECTION,
  SelectionManager,
  selectedText,
  selectionMode,
  type SelectionPoint,
  type SelectionState,
} from "./runtime/selection.js";

export {
  applyEditorInput,
  normalizeCursor,
  type EditorInput,
  type EditorResult,
} from "./runtime/inputEditor.js";

// =============================================================================
// Instance
// =============================================================================

export { createUi, type UiInstance, type UiOptions } from "./app/createUi.js";
