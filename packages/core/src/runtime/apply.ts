/**
 * packages/core/src/runtime/apply.ts — Patch application.
 *
 * Why: Patches are interpreted against a scope stack whose bottom frame is
 * the mount container. Created nodes are not inserted immediately: each frame
 * queues them and inserts the queue right before the next retained sibling,
 * or at the end when the frame is popped. That keeps created nodes in
 * document order between retained siblings without any sibling lookups.
 *
 * Moved keyed nodes join the same queue, and inserting them again detaches
 * them from their old position.
 *
 * Old handles are consumed from the sequence's ledger with `take`; every
 * stored handle is pushed to a fresh ledger in new-stream order.
 */

import { SprigError, describeThrown, isSprigError } from "../errors.js";
import type { Platform, PlatformEvent } from "../platform.js";
import type { EventHandlerSpec, NestedComponent } from "../tree/items.js";
import type { Patch, PatchSequence } from "./patch.js";
import { LiveNodeStorage } from "./storage.js";
import type { StoredHandle } from "./storage.js";

/** Attributes written after every other patch of an application. */
export const DEFAULT_DEFERRED_ATTRIBUTES: readonly string[] = Object.freeze([
  "autofocus",
  "checked",
  "disabled",
  "draggable",
  "hidden",
  "selected",
  "spellcheck",
  "value",
]);

const DEFAULT_DEFERRED_SET: ReadonlySet<string> = new Set(DEFAULT_DEFERRED_ATTRIBUTES);

export type ApplyTarget<N, S> = Readonly<{
  platform: Platform<N, S>;
  /**
   * Mount container. `null` collects top-level nodes without inserting them;
   * the caller reads them back from the new ledger.
   */
  container: N | null;
  /** Top-level nodes are inserted before this node; `null` appends. */
  anchor?: N | null;
}>;

export type ApplyOptions = Readonly<{
  deferredAttributes?: ReadonlySet<string>;
}>;

export type ApplyResult<M, N, S> = Readonly<{
  storage: LiveNodeStorage<M, N, S>;
}>;

type Frame<M, N> =
  | { kind: "root"; node: N | null; anchor: N | null; pending: N[]; written: Set<string> }
  | { kind: "element"; node: N; pending: N[]; written: Set<string> }
  | { kind: "text"; node: N }
  | { kind: "component"; component: NestedComponent<M, N> };

type ContainerFrame<M, N> = Extract<Frame<M, N>, { kind: "root" | "element" }>;

type DeferredWrite<N> = Readonly<{ element: N; name: string; value: string }>;

type ComponentDelivery<M, N> = Readonly<{ component: NestedComponent<M, N>; message: M }>;

export function resolveHandler<M>(
  handler: EventHandlerSpec<M>,
  event: PlatformEvent,
  readInputValue: (event: PlatformEvent) => string,
): M | undefined {
  switch (handler.kind) {
    case "message":
      return handler.message;
    case "event":
      return handler.convert(event);
    case "messageEvent":
      return handler.convert(handler.message, event);
    case "inputValue":
      return handler.convert(readInputValue(event));
  }
}

class PatchApplier<M, N, S> {
  private readonly stack: Frame<M, N>[];
  private readonly storage = new LiveNodeStorage<M, N, S>();
  private readonly deferred: DeferredWrite<N>[] = [];
  private readonly deliveries: ComponentDelivery<M, N>[] = [];

  constructor(
    private readonly old: LiveNodeStorage<M, N, S>,
    private readonly platform: Platform<N, S>,
    private readonly dispatch: (message: M) => void,
    private readonly deferredNames: ReadonlySet<string>,
    container: N | null,
    anchor: N | null,
  ) {
    this.stack = [{ kind: "root", node: container, anchor, pending: [], written: new Set() }];
  }

  run(patches: readonly Patch<M>[]): LiveNodeStorage<M, N, S> {
    for (const patch of patches) this.step(patch);

    const root = this.stack[0];
    if (this.stack.length !== 1 || root === undefined || root.kind !== "root") {
      throw new SprigError(
        "SPRIG_UNBALANCED_STREAM",
        `patch sequence left ${String(this.stack.length - 1)} scope(s) open`,
      );
    }
    this.flushPending(root, root.anchor);

    const untaken = this.old.untakenSlots();
    if (untaken.length > 0) {
      throw new SprigError(
        "SPRIG_STORAGE_MISALIGNED",
        `patch sequence left storage slot(s) ${untaken.join(",")} untaken`,
      );
    }

    for (const write of this.deferred) {
      this.host("setAttribute", () =>
        this.platform.setAttribute(write.element, write.name, write.value),
      );
    }
    for (const delivery of this.deliveries) delivery.component.dispatch(delivery.message);
    return this.storage;
  }

  private step(patch: Patch<M>): void {
    switch (patch.kind) {
      case "createElement": {
        const parent = this.containerTop("createElement");
        const name = patch.name;
        const node = this.host("createElement", () => this.platform.createElement(name));
        parent.pending.push(node);
        this.record({ kind: "element", node });
        this.stack.push({ kind: "element", node, pending: [], written: new Set() });
        return;
      }
      case "createText": {
        const parent = this.containerTop("createText");
        const content = patch.content;
        const node = this.host("createText", () => this.platform.createText(content));
        parent.pending.push(node);
        this.record({ kind: "text", node });
        this.stack.push({ kind: "text", node });
        return;
      }
      case "createComponent": {
        const parent = this.containerTop("createComponent");
        const component = this.construct(patch);
        parent.pending.push(...component.listNodes());
        this.record({ kind: "component", component });
        this.stack.push({ kind: "component", component });
        this.deliveries.push({ component, message: patch.message });
        return;
      }
      case "retainElement": {
        const handle = this.old.take(patch.slot, "element");
        this.placeRetained(handle.node);
        this.record(handle);
        this.stack.push({ kind: "element", node: handle.node, pending: [], written: new Set() });
        return;
      }
      case "retainText":
      case "replaceText": {
        const handle = this.old.take(patch.slot, "text");
        if (patch.kind === "replaceText") {
          const content = patch.content;
          this.host("setText", () => this.platform.setText(handle.node, content));
        }
        this.placeRetained(handle.node);
        this.record(handle);
        this.stack.push({ kind: "text", node: handle.node });
        return;
      }
      case "retainComponent":
      case "updateComponent": {
        const handle = this.old.take(patch.slot, "component");
        const first = handle.component.listNodes()[0];
        if (first !== undefined) this.placeRetained(first);
        else this.containerTop(patch.kind);
        if (patch.kind === "updateComponent") {
          this.deliveries.push({ component: handle.component, message: patch.message });
        }
        this.record(handle);
        this.stack.push({ kind: "component", component: handle.component });
        return;
      }
      case "moveElement": {
        // Queued like a created node: it lands before the next retained sibling.
        const handle = this.old.take(patch.slot, "element");
        this.containerTop(patch.kind).pending.push(handle.node);
        this.record(handle);
        this.stack.push({ kind: "element", node: handle.node, pending: [], written: new Set() });
        return;
      }
      case "moveComponent":
      case "moveUpdateComponent": {
        const handle = this.old.take(patch.slot, "component");
        this.containerTop(patch.kind).pending.push(...handle.component.listNodes());
        if (patch.kind === "moveUpdateComponent") {
          this.deliveries.push({ component: handle.component, message: patch.message });
        }
        this.record(handle);
        this.stack.push({ kind: "component", component: handle.component });
        return;
      }
      case "remove":
        this.removeSpan(patch.slot, patch.through);
        return;
      case "setAttribute": {
        const frame = this.elementTop(patch.kind);
        const { name, value } = patch;
        frame.written.add(name);
        if (this.deferredNames.has(name)) {
          this.deferred.push({ element: frame.node, name, value });
          return;
        }
        this.host("setAttribute", () => this.platform.setAttribute(frame.node, name, value));
        return;
      }
      case "removeAttribute": {
        const frame = this.elementTop(patch.kind);
        const name = patch.name;
        // Reordered attributes: a name already written for this element stays.
        if (frame.written.has(name)) return;
        this.host("removeAttribute", () => this.platform.removeAttribute(frame.node, name));
        return;
      }
      case "setRawMarkup": {
        const frame = this.elementTop(patch.kind);
        const markup = patch.markup;
        this.host("setRawMarkup", () => this.platform.setRawMarkup(frame.node, markup));
        return;
      }
      case "clearRawMarkup": {
        const frame = this.elementTop(patch.kind);
        this.host("clearChildren", () => this.platform.clearChildren(frame.node));
        return;
      }
      case "addListener": {
        const frame = this.elementTop(patch.kind);
        const { trigger, handler } = patch;
        const platform = this.platform;
        const dispatch = this.dispatch;
        const subscription = this.host("listen", () =>
          platform.listen(frame.node, trigger, (event) => {
            const message = resolveHandler(handler, event, (e) => platform.inputValueOf(e));
            if (message !== undefined) dispatch(message);
          }),
        );
        this.record({ kind: "listener", element: frame.node, trigger, subscription });
        return;
      }
      case "retainListener": {
        this.elementTop(patch.kind);
        this.record(this.old.take(patch.slot, "listener"));
        return;
      }
      case "removeListener": {
        this.elementTop(patch.kind);
        const handle = this.old.take(patch.slot, "listener");
        this.host("unlisten", () =>
          this.platform.unlisten(handle.element, handle.trigger, handle.subscription),
        );
        return;
      }
      case "exit":
        this.pop();
        return;
    }
  }

  private construct(patch: Extract<Patch<M>, { kind: "createComponent" }>): NestedComponent<M, N> {
    try {
      return patch.construct({ dispatch: this.dispatch, platform: this.platform });
    } catch (e: unknown) {
      if (isSprigError(e)) throw e;
      throw new SprigError(
        "SPRIG_USER_CODE_THROW",
        `component constructor threw: ${describeThrown(e)}`,
      );
    }
  }

  private removeSpan(slot: number, through: number): void {
    this.containerTop("remove");
    const [root, ...inner] = this.old.takeSpan(slot, through);
    if (root === undefined) {
      throw new SprigError("SPRIG_STORAGE_MISALIGNED", `empty removal span at slot ${String(slot)}`);
    }
    for (const handle of inner) this.release(handle);
    switch (root.kind) {
      case "element":
      case "text":
        this.host("remove", () => this.platform.remove(root.node));
        return;
      case "component":
        root.component.detach();
        return;
      case "listener":
        throw new SprigError(
          "SPRIG_STORAGE_MISALIGNED",
          `removal span at slot ${String(slot)} starts with a listener`,
        );
    }
  }

  /** Release what a removed sub-tree still holds outside the live tree. */
  private release(handle: StoredHandle<M, N, S>): void {
    switch (handle.kind) {
      case "listener": {
        const { element, trigger, subscription } = handle;
        this.host("unlisten", () => this.platform.unlisten(element, trigger, subscription));
        return;
      }
      case "component":
        handle.component.detach();
        return;
      case "element":
      case "text":
        return;
    }
  }

  private pop(): void {
    if (this.stack.length <= 1) {
      throw new SprigError("SPRIG_SCOPE_UNDERFLOW", "exit with no open scope");
    }
    const frame = this.stack.pop();
    if (frame !== undefined && frame.kind === "element") this.flushPending(frame, null);
  }

  private placeRetained(node: N): void {
    const parent = this.containerTop("retain");
    this.flushPending(parent, node);
  }

  private flushPending(frame: ContainerFrame<M, N>, before: N | null): void {
    if (frame.pending.length === 0) return;
    const parent = frame.node;
    const nodes = frame.pending.splice(0);
    // Collect mode: the caller inserts the nodes itself.
    if (parent === null) return;
    for (const node of nodes) {
      this.host("insertBefore", () => this.platform.insertBefore(parent, node, before));
    }
  }

  private record(handle: StoredHandle<M, N, S>): void {
    this.storage.push(handle, this.stack.length - 1);
  }

  private top(): Frame<M, N> {
    const frame = this.stack[this.stack.length - 1];
    if (frame === undefined) {
      throw new SprigError("SPRIG_SCOPE_UNDERFLOW", "scope stack is empty");
    }
    return frame;
  }

  private containerTop(op: string): ContainerFrame<M, N> {
    const frame = this.top();
    if (frame.kind !== "root" && frame.kind !== "element") {
      throw new SprigError("SPRIG_NOT_AN_ELEMENT", `${op} inside a ${frame.kind} scope`);
    }
    return frame;
  }

  private elementTop(op: string): Extract<Frame<M, N>, { kind: "element" }> {
    const frame = this.top();
    if (frame.kind !== "element") {
      throw new SprigError("SPRIG_NOT_AN_ELEMENT", `${op} applied to a ${frame.kind} scope`);
    }
    return frame;
  }

  private host<T>(op: string, call: () => T): T {
    try {
      return call();
    } catch (e: unknown) {
      if (isSprigError(e)) throw e;
      throw new SprigError("SPRIG_PLATFORM_ERROR", `platform ${op} failed: ${describeThrown(e)}`);
    }
  }
}

/**
 * Apply `sequence` to the live tree under `target.container` and return the
 * ledger for the next diff. The old ledger is consumed.
 */
export function applyPatches<M, N, S>(
  sequence: PatchSequence<M, N, S>,
  target: ApplyTarget<N, S>,
  dispatch: (message: M) => void,
  options: ApplyOptions = {},
): ApplyResult<M, N, S> {
  const applier = new PatchApplier<M, N, S>(
    sequence.storage,
    target.platform,
    dispatch,
    options.deferredAttributes ?? DEFAULT_DEFERRED_SET,
    target.container,
    target.anchor ?? null,
  );
  return { storage: applier.run(sequence.patches) };
}
