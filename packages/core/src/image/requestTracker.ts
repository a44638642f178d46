/**
 * packages/core/src/image/requestTracker.ts — In-flight image requests.
 *
 * Why: Loader callbacks may fire at any time, including after the node was
 * destroyed or its `src` replaced. Each request gets a ticket; settled results
 * only go onto a queue, and `drain` applies the ones whose ticket is still
 * current. Everything else is dropped.
 */

import type { DevLogger } from "../logging/devWarnings.js";
import type { NodeTree } from "../tree/nodeTree.js";
import type { NodeId, UiNode } from "../tree/types.js";
import type { ImageLoadResult, ImageLoader, ImageRequestHandle } from "./types.js";

type InFlight = {
  readonly ticket: number;
  readonly src: string;
  handle: ImageRequestHandle | null;
};

type Settled = Readonly<{
  id: NodeId;
  ticket: number;
  result: ImageLoadResult;
}>;

function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export class ImageRequestTracker {
  private readonly inFlight = new Map<NodeId, InFlight>();
  private queue: Settled[] = [];
  private nextTicket = 1;
  private disposed = false;

  constructor(
    private readonly loader: ImageLoader,
    private readonly logger: DevLogger,
  ) {}

  /** Number of requests that have not settled yet. */
  get pendingCount(): number {
    return this.inFlight.size;
  }

  /** Start (or restart) loading for an image node. `src === null` only cancels. */
  setSource(node: UiNode, src: string | null): void {
    this.cancel(node.id);
    if (node.image.state === "ready") node.contentVersion++;
    if (src === null || this.disposed) {
      node.image = { state: "none" };
      return;
    }

    node.image = { state: "loading", src };
    const entry: InFlight = { ticket: this.nextTicket++, src, handle: null };
    this.inFlight.set(node.id, entry);

    const { id } = node;
    const { ticket } = entry;
    entry.handle = this.loader.request(src, (result) => {
      if (this.disposed) return;
      this.queue.push({ id, ticket, result });
    });
  }

  /** Forget a node's request. Called when its `src` changes or it is destroyed. */
  cancel(id: NodeId): void {
    const entry = this.inFlight.get(id);
    if (!entry) return;
    this.inFlight.delete(id);
    entry.handle?.cancel();
  }

  /**
   * Apply queued results to live nodes.
   * @returns ids whose intrinsic size changed, in settle order
   */
  drain(tree: NodeTree): NodeId[] {
    if (this.queue.length === 0) return [];
    const queued = this.queue;
    this.queue = [];

    const changed: NodeId[] = [];
    for (const settled of queued) {
      const entry = this.inFlight.get(settled.id);
      if (!entry || entry.ticket !== settled.ticket) continue;
      const node = tree.get(settled.id);
      if (!node) continue;
      this.inFlight.delete(settled.id);

      const { result } = settled;
      if (result.ok) {
        node.image = {
          state: "ready",
          src: entry.src,
          width: Math.max(0, result.value.width),
          height: Math.max(0, result.value.height),
        };
        node.contentVersion++;
        changed.push(node.id);
      } else {
        const message = describeError(result.error);
        node.image = { state: "error", src: entry.src, message };
        this.logger.warn("image", `failed to load "${entry.src}" for node "${node.id}": ${message}`);
      }
    }
    return changed;
  }

  dispose(): void {
    this.disposed = true;
    for (const entry of this.inFlight.values()) entry.handle?.cancel();
    this.inFlight.clear();
    this.queue = [];
  }
}
