import { MemoryPlatform } from "../../testing/index.js";
import type { MemoryNode, MemorySubscription } from "../../testing/index.js";
import type { TreeItemStream } from "../../tree/items.js";
import { emptyStream } from "../../tree/items.js";
import { treeItems } from "../../tree/vdom.js";
import type { VNode } from "../../tree/vdom.js";
import { applyPatches } from "../apply.js";
import type { ApplyOptions } from "../apply.js";
import { diff } from "../diff.js";
import type { DiffOptions } from "../diff.js";
import type { PatchSequence } from "../patch.js";
import { LiveNodeStorage } from "../storage.js";

export type Storage<M> = LiveNodeStorage<M, MemoryNode, MemorySubscription>;

/** A mounted tree plus everything needed to reconcile it again. */
export class Harness<M> {
  readonly platform = new MemoryPlatform();
  readonly container = this.platform.createContainer();
  readonly dispatched: M[] = [];
  storage: Storage<M> = new LiveNodeStorage();
  current: TreeItemStream<M> = emptyStream<M>();

  constructor(private readonly opts: DiffOptions & ApplyOptions = {}) {}

  diffTo(next: VNode<M> | readonly VNode<M>[]): PatchSequence<M, MemoryNode, MemorySubscription> {
    return diff(this.current, treeItems(next), this.storage, this.opts);
  }

  /** Diff against the current tree and apply. Returns the applied sequence. */
  render(next: VNode<M> | readonly VNode<M>[]): PatchSequence<M, MemoryNode, MemorySubscription> {
    const stream = treeItems(next);
    const sequence = diff(this.current, stream, this.storage, this.opts);
    const result = applyPatches(
      sequence,
      { platform: this.platform, container: this.container },
      (message: M) => {
        this.dispatched.push(message);
      },
      this.opts,
    );
    this.storage = result.storage;
    this.current = stream;
    return sequence;
  }
}
