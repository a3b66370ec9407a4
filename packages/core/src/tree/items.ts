/**
 * packages/core/src/tree/items.ts — Tree item stream data model.
 *
 * Why: The diff never sees a tree. It sees the linear sequence of items a
 * depth-first, pre-order walk of a tree description emits. Keeping this form
 * flat lets the old stream, the new stream and the storage ledger advance
 * together with plain cursors.
 *
 * Stream invariants:
 *   - element, text and component items open a scope closed by exactly one exit
 *   - attribute and event items directly follow the node they annotate
 *     (attributes first, then events) and never get an exit
 *   - rawMarkup follows the annotations of its element and has no exit
 *   - key directly precedes the element or component it names; it has no exit
 *     and no storage slot, and is unique among its siblings
 */

import type { Platform, PlatformEvent } from "../platform.js";

/** Handler spec attached to an event item. */
export type EventHandlerSpec<M> =
  | Readonly<{ kind: "message"; message: M }>
  | Readonly<{ kind: "event"; convert: (event: PlatformEvent) => M | undefined }>
  | Readonly<{
      kind: "messageEvent";
      message: M;
      convert: (message: M, event: PlatformEvent) => M | undefined;
    }>
  | Readonly<{ kind: "inputValue"; convert: (value: string) => M | undefined }>;

/** Context handed to a component constructor when the parent creates it. */
export type ComponentHostContext<M, N, S> = Readonly<{
  /** Dispatch into the parent application. */
  dispatch: (message: M) => void;
  platform: Platform<N, S>;
}>;

/**
 * Capability surface of a nested component. The parent stores this handle in
 * its ledger and never inspects the component's own tree.
 */
export interface NestedComponent<M, N> {
  dispatch(message: M): void;
  detach(): void;
  /** Current top-level live nodes, in order. */
  listNodes(): readonly N[];
}

/** Generic over the host so one definition can mount on any platform. */
export type ComponentConstructor<M> = <N, S>(
  context: ComponentHostContext<M, N, S>,
) => NestedComponent<M, N>;

export type TreeItem<M> =
  | Readonly<{ kind: "element"; name: string }>
  | Readonly<{ kind: "text"; content: string }>
  | Readonly<{ kind: "rawMarkup"; markup: string }>
  | Readonly<{ kind: "attribute"; name: string; value: string }>
  | Readonly<{ kind: "event"; trigger: string; handler: EventHandlerSpec<M> }>
  | Readonly<{ kind: "component"; message: M; construct: ComponentConstructor<M> }>
  /** Identity among siblings for the element or component that follows. */
  | Readonly<{ kind: "key"; key: string }>
  | Readonly<{ kind: "exit" }>;

/** Finite, restartable, lazily produced item sequence. */
export type TreeItemStream<M> = Iterable<TreeItem<M>>;

export type TreeItemKind = TreeItem<unknown>["kind"];

export type OpeningItem<M> = Extract<TreeItem<M>, { kind: "element" | "text" | "component" }>;

const EXIT_ITEM = Object.freeze({ kind: "exit" as const });

export function exitItem(): Readonly<{ kind: "exit" }> {
  return EXIT_ITEM;
}

/** True for items that open a scope closed by an exit. */
export function opensScope<M>(item: TreeItem<M>): item is OpeningItem<M> {
  return item.kind === "element" || item.kind === "text" || item.kind === "component";
}

/** True for items that own a storage slot in the live-node ledger. */
export function hasStorage<M>(item: TreeItem<M>): boolean {
  return (
    item.kind === "element" ||
    item.kind === "text" ||
    item.kind === "event" ||
    item.kind === "component"
  );
}

/** A stream with no items. */
export function emptyStream<M>(): TreeItemStream<M> {
  return [];
}
