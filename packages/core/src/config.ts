/**
 * packages/core/src/config.ts — UI instance configuration.
 *
 * Why: Centralizes the tunables of the interaction layer (drag threshold, wheel
 * line size, default font metrics) and the dev-warning sink. User overrides are
 * validated once at creation; the resolved object is frozen.
 */

import { WeftError } from "./errors.js";
import type { WarnSink } from "./logging/devWarnings.js";
import type { FontMetrics } from "./tree/types.js";

/** User-provided configuration. Every field is optional. */
export type UiConfig = Readonly<{
  /** Pointer travel (px) from the press origin before a press becomes a drag/selection. */
  dragThreshold?: number;
  /** Pixels scrolled per wheel line when the platform reports line deltas. */
  wheelLineSize?: number;
  /** Font metrics for text runs with no font in their own or ancestors' style. */
  defaultFont?: FontMetrics;
  /** Emit `[weft][...]` warnings. Default: true. */
  devMode?: boolean;
  /** Warning sink. Default: console.warn. */
  warn?: WarnSink;
}>;

/** Resolved configuration with defaults applied. */
export type ResolvedUiConfig = Readonly<{
  dragThreshold: number;
  wheelLineSize: number;
  defaultFont: FontMetrics;
  devMode: boolean;
  warn: WarnSink;
}>;

const defaultWarn: WarnSink = (message) => {
  console.warn(message);
};

/** Default configuration values. */
export const DEFAULT_UI_CONFIG: ResolvedUiConfig = Object.freeze({
  dragThreshold: 3,
  wheelLineSize: 30,
  defaultFont: Object.freeze({ charWidth: 8, lineHeight: 16 }),
  devMode: true,
  warn: defaultWarn,
});

function invalidConfig(detail: string): never {
  throw new WeftError("WEFT_INVALID_CONFIG", detail);
}

function requireNonNegative(name: string, v: number): number {
  if (!Number.isFinite(v) || v < 0) invalidConfig(`${name} must be a finite non-negative number`);
  return v;
}

function requirePositive(name: string, v: number): number {
  if (!Number.isFinite(v) || v <= 0) invalidConfig(`${name} must be a finite positive number`);
  return v;
}

function resolveFont(font: FontMetrics | undefined): FontMetrics {
  if (font === undefined) return DEFAULT_UI_CONFIG.defaultFont;
  return Object.freeze({
    charWidth: requirePositive("defaultFont.charWidth", font.charWidth),
    lineHeight: requirePositive("defaultFont.lineHeight", font.lineHeight),
  });
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveUiConfig(config: UiConfig | undefined): ResolvedUiConfig {
  if (!config) return DEFAULT_UI_CONFIG;
  const dragThreshold =
    config.dragThreshold === undefined
      ? DEFAULT_UI_CONFIG.dragThreshold
      : requireNonNegative("dragThreshold", config.dragThreshold);
  const wheelLineSize =
    config.wheelLineSize === undefined
      ? DEFAULT_UI_CONFIG.wheelLineSize
      : requirePositive("wheelLineSize", config.wheelLineSize);
  const defaultFont = resolveFont(config.defaultFont);
  const devMode = config.devMode === undefined ? DEFAULT_UI_CONFIG.devMode : config.devMode;
  if (config.warn !== undefined && typeof config.warn !== "function") {
    invalidConfig("warn must be a function");
  }
  const warn = config.warn ?? DEFAULT_UI_CONFIG.warn;

  return Object.freeze({
    dragThreshold,
    wheelLineSize,
    defaultFont,
    devMode,
    warn,
  });
}
