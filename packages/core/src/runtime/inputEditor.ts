/**
 * packages/core/src/runtime/inputEditor.ts — Editable node text editing.
 *
 * Why: Applies caret movement, insertion and deletion to the value of a
 * focused editable node. Pure: takes the current editor state and one input,
 * returns the next state. Caret positions always sit on grapheme cluster
 * boundaries (via `Intl.Segmenter`), so a caret never splits a surrogate pair
 * or a combining sequence.
 *
 * Editing operations:
 *   - ArrowLeft/ArrowRight: move by grapheme cluster (Ctrl/Alt: by word)
 *   - Home/End: move to start/end
 *   - Shift + movement: extend the selection
 *   - Ctrl/Cmd+A: select all
 *   - Backspace/Delete: delete the selection, or one cluster before/after the caret
 *   - a key carrying text, or a text event: replace the selection / insert at the caret
 */

import type { Modifiers } from "../events/types.js";
import type { EditorState } from "../tree/types.js";

export type EditorInput =
  | Readonly<{ kind: "key"; key: string; text: string | null; modifiers: Modifiers }>
  | Readonly<{ kind: "text"; text: string }>;

export type EditorResult = Readonly<{
  next: EditorState;
  valueChanged: boolean;
}>;

const GRAPHEMES = new Intl.Segmenter(undefined, { granularity: "grapheme" });

const WORD_CLUSTER_RE = /[\p{L}\p{N}_]/u;

/** Cluster boundaries of `value`, including 0 and `value.length`. */
function boundaries(value: string): number[] {
  const out: number[] = [];
  for (const seg of GRAPHEMES.segment(value)) out.push(seg.index);
  out.push(value.length);
  return out;
}

function prevBoundary(value: string, cursor: number): number {
  let last = 0;
  for (const b of boundaries(value)) {
    if (b >= cursor) return last;
    last = b;
  }
  return last;
}

function nextBoundary(value: string, cursor: number): number {
  for (const b of boundaries(value)) {
    if (b > cursor) return b;
  }
  return value.length;
}

function isWordAt(value: string, start: number, end: number): boolean {
  return WORD_CLUSTER_RE.test(value.slice(start, end));
}

function nextWordBoundary(value: string, cursor: number): number {
  let off = cursor;
  // Skip separators, then the word.
  while (off < value.length) {
    const end = nextBoundary(value, off);
    if (isWordAt(value, off, end)) break;
    off = end;
  }
  while (off < value.length) {
    const end = nextBoundary(value, off);
    if (!isWordAt(value, off, end)) break;
    off = end;
  }
  return off;
}

function prevWordBoundary(value: string, cursor: number): number {
  let off = cursor;
  while (off > 0) {
    const start = prevBoundary(value, off);
    if (isWordAt(value, start, off)) break;
    off = start;
  }
  while (off > 0) {
    const start = prevBoundary(value, off);
    if (!isWordAt(value, start, off)) break;
    off = start;
  }
  return off;
}

/**
 * Clamp to `[0, value.length]` and snap back to the previous cluster boundary.
 */
export function normalizeCursor(value: string, cursor: number): number {
  const c = Number.isFinite(cursor) ? Math.min(Math.max(0, Math.trunc(cursor)), value.length) : 0;
  if (c === 0 || c === value.length) return c;
  let last = 0;
  for (const b of boundaries(value)) {
    if (b === c) return c;
    if (b > c) return last;
    last = b;
  }
  return value.length;
}

function stripLineBreaks(s: string): string {
  return s.replace(/[\r\n]/g, "");
}

function state(value: string, cursor: number, anchor: number = cursor): EditorState {
  return Object.freeze({ value, cursor, anchor });
}

function replaceRange(value: string, start: number, end: number, inserted: string): EditorResult {
  const nextValue = value.slice(0, start) + inserted + value.slice(end);
  const cursor = start + inserted.length;
  return { next: state(nextValue, cursor), valueChanged: nextValue !== value };
}

function moveResult(value: string, moved: number, anchor: number | null): EditorResult {
  return { next: state(value, moved, anchor ?? moved), valueChanged: false };
}

/**
 * Apply one input to an editor.
 *
 * @returns The next state, or null when the input is not an editing input
 *          (Enter, Tab, function keys, shortcuts other than select-all).
 */
export function applyEditorInput(current: EditorState, input: EditorInput): EditorResult | null {
  const value = current.value;
  const cursor = normalizeCursor(value, current.cursor);
  const anchor = normalizeCursor(value, current.anchor);
  const selMin = Math.min(cursor, anchor);
  const selMax = Math.max(cursor, anchor);
  const hasSelection = selMin !== selMax;

  if (input.kind === "text") {
    const text = stripLineBreaks(input.text);
    if (text.length === 0) return null;
    return replaceRange(value, selMin, selMax, text);
  }

  const { key, modifiers } = input;
  const command = modifiers.ctrl || modifiers.meta;

  if (command && !modifiers.shift && (key === "a" || key === "A")) {
    return moveResult(value, value.length, 0);
  }

  if (key === "ArrowLeft" || key === "ArrowRight" || key === "Home" || key === "End") {
    const byWord = modifiers.ctrl || modifiers.alt;
    if (!modifiers.shift && hasSelection && (key === "ArrowLeft" || key === "ArrowRight")) {
      return moveResult(value, key === "ArrowLeft" ? selMin : selMax, null);
    }
    let moved: number;
    if (key === "ArrowLeft") moved = byWord ? prevWordBoundary(value, cursor) : prevBoundary(value, cursor);
    else if (key === "ArrowRight") moved = byWord ? nextWordBoundary(value, cursor) : nextBoundary(value, cursor);
    else if (key === "Home") moved = 0;
    else moved = value.length;
    return moveResult(value, moved, modifiers.shift ? anchor : null);
  }

  if (key === "Backspace") {
    if (hasSelection) return replaceRange(value, selMin, selMax, "");
    if (cursor === 0) return { next: state(value, 0), valueChanged: false };
    return replaceRange(value, prevBoundary(value, cursor), cursor, "");
  }

  if (key === "Delete") {
    if (hasSelection) return replaceRange(value, selMin, selMax, "");
    if (cursor === value.length) return { next: state(value, cursor), valueChanged: false };
    return replaceRange(value, cursor, nextBoundary(value, cursor), "");
  }

  if (command || input.text === null) return null;
  const text = stripLineBreaks(input.text);
  if (text.length === 0 || text === "\t") return null;
  return replaceRange(value, selMin, selMax, text);
}
