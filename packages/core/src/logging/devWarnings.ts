/**
 * packages/core/src/logging/devWarnings.ts — Development-mode warnings.
 *
 * Why: Recoverable problems (a NaN box read back from the layout engine, an
 * image that failed to decode, a handler that threw) must not stop the frame,
 * but should still be visible while developing. Warnings go through an injected
 * sink, are prefixed with their area, and are emitted at most once per key.
 */

export type WarnSink = (message: string) => void;

/** Areas a warning can belong to; used as the message prefix. */
export type WarnArea = "layout" | "image" | "dispatch";

export type DevLogger = Readonly<{
  /** Emit `detail` once for `key`; later calls with the same key are dropped. */
  warnOnce: (area: WarnArea, key: string, detail: string) => void;
  /** Emit `detail` unconditionally (still gated on dev mode). */
  warn: (area: WarnArea, detail: string) => void;
  /** Forget deduplication keys with the given prefix (e.g. when a node is destroyed). */
  forget: (keyPrefix: string) => void;
}>;

type DevLoggerOptions = Readonly<{
  devMode: boolean;
  warn: WarnSink;
}>;

function formatWarning(area: WarnArea, detail: string): string {
  return `[weft][${area}] ${detail}`;
}

export function createDevLogger(opts: DevLoggerOptions): DevLogger {
  const warned = new Set<string>();

  return Object.freeze({
    warnOnce(area: WarnArea, key: string, detail: string): void {
      if (!opts.devMode) return;
      if (warned.has(key)) return;
      warned.add(key);
      opts.warn(formatWarning(area, detail));
    },
    warn(area: WarnArea, detail: string): void {
      if (!opts.devMode) return;
      opts.warn(formatWarning(area, detail));
    },
    forget(keyPrefix: string): void {
      for (const key of [...warned]) {
        if (key.startsWith(keyPrefix)) warned.delete(key);
      }
    },
  });
}
