/**
 * packages/core/src/image/types.ts — Image loader boundary.
 *
 * Why: Decoding is the only asynchronous work in the core. A loader gets the
 * `src` attribute verbatim and settles once, from any callback context; the
 * result is queued and applied at the start of the next frame.
 */

export type ImageSize = Readonly<{ width: number; height: number }>;

export type ImageLoadResult =
  | Readonly<{ ok: true; value: ImageSize }>
  | Readonly<{ ok: false; error: unknown }>;

export type ImageSettle = (result: ImageLoadResult) => void;

export type ImageRequestHandle = Readonly<{
  /** Stop caring about the result. Settling after cancel is allowed and ignored. */
  cancel: () => void;
}>;

export interface ImageLoader {
  request(src: string, settle: ImageSettle): ImageRequestHandle;
}
