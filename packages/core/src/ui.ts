/**
 * packages/core/src/ui.ts — Node description builders.
 *
 * Why: Descriptions are plain frozen objects so the description layer (a macro
 * language, JSX, or hand-written calls) stays an external collaborator. These
 * helpers are the typed way to build them by hand.
 *
 * @example
 * ```ts
 * ui.container("root", { attrs: { class: "col" } }, [
 *   ui.text("greeting", "Hello"),
 *   ui.image("logo", "assets/logo.png"),
 * ]);
 * ```
 */

import type { HandlerMap } from "./events/types.js";
import type { NodeId, NodeKind } from "./tree/types.js";

/** Declarative description of one node and its subtree. */
export type NodeDescription = Readonly<{
  id: NodeId;
  kind: NodeKind;
  /** Opaque attributes. `class` goes to the style resolver, `src` to the image loader. */
  attrs?: Readonly<Record<string, string>>;
  /** Content of a text run. */
  text?: string;
  focusable?: boolean;
  /** Clip descendants to this node's bounds. Defaults to the style's overflow. */
  clipToBounds?: boolean;
  /** Input-capable: receives caret editing and `input` events while focused. */
  editable?: boolean;
  /** Target/bubble phase handlers. */
  on?: HandlerMap;
  /** Capture phase handlers. */
  onCapture?: HandlerMap;
  children?: readonly NodeDescription[];
}>;

export type NodeProps = Omit<NodeDescription, "id" | "kind" | "text" | "children">;

function makeDescription(
  id: NodeId,
  kind: NodeKind,
  props: NodeProps | undefined,
  extra: Readonly<{ text?: string; children?: readonly NodeDescription[] }>,
): NodeDescription {
  return Object.freeze({ ...props, ...extra, id, kind });
}

export const ui = {
  container(
    id: NodeId,
    props?: NodeProps,
    children: readonly NodeDescription[] = [],
  ): NodeDescription {
    return makeDescription(id, "container", props, { children: Object.freeze([...children]) });
  },

  text(id: NodeId, text: string, props?: NodeProps): NodeDescription {
    return makeDescription(id, "text", props, { text });
  },

  image(id: NodeId, src: string, props?: NodeProps): NodeDescription {
    return makeDescription(id, "image", { ...props, attrs: { ...props?.attrs, src } }, {});
  },
} as const;
