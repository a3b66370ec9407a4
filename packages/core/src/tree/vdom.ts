/**
 * packages/core/src/tree/vdom.ts — Plain-data tree descriptions.
 *
 * Why: Models render into a small immutable description; `treeItems` walks it
 * into the item stream the diff consumes. The walk is a generator so the
 * stream stays lazy, and every iteration restarts from the root.
 */

import type {
  ComponentConstructor,
  EventHandlerSpec,
  TreeItem,
  TreeItemStream,
} from "./items.js";
import { exitItem } from "./items.js";
import type { PlatformEvent } from "../platform.js";

export type VAttribute = readonly [name: string, value: string];
export type VListener<M> = readonly [trigger: string, handler: EventHandlerSpec<M>];

export type VElement<M> = Readonly<{
  kind: "element";
  name: string;
  key: string | null;
  attrs: readonly VAttribute[];
  on: readonly VListener<M>[];
  rawMarkup: string | null;
  children: readonly VNode<M>[];
}>;

export type VText = Readonly<{ kind: "text"; content: string }>;

export type VComponent<M> = Readonly<{
  kind: "component";
  key: string | null;
  message: M;
  construct: ComponentConstructor<M>;
}>;

export type VNode<M> = VElement<M> | VText | VComponent<M>;

export type VProps<M> = Readonly<{
  /** Attributes, in emission order. A record keeps its key insertion order. */
  attrs?: Readonly<Record<string, string>> | readonly VAttribute[];
  on?: readonly VListener<M>[];
  /** Markup that replaces the element's children. Children are ignored when set. */
  rawMarkup?: string;
  /** Matches the element to the old sibling with the same key, wherever it moved. */
  key?: string;
}>;

export type VChild<M> = VNode<M> | string;

const NO_ATTRS: readonly VAttribute[] = Object.freeze([]);

type AttrsInput = NonNullable<VProps<unknown>["attrs"]>;

function isAttributeList(attrs: AttrsInput): attrs is readonly VAttribute[] {
  return Array.isArray(attrs);
}

function normalizeAttrs(attrs: AttrsInput | undefined): readonly VAttribute[] {
  if (attrs === undefined) return NO_ATTRS;
  if (isAttributeList(attrs)) return attrs;
  return Object.entries(attrs);
}

function normalizeChild<M>(child: VChild<M>): VNode<M> {
  return typeof child === "string" ? text(child) : child;
}

export function el<M>(
  name: string,
  props: VProps<M> = {},
  children: readonly VChild<M>[] = [],
): VElement<M> {
  return {
    kind: "element",
    name,
    key: props.key ?? null,
    attrs: normalizeAttrs(props.attrs),
    on: props.on ?? [],
    rawMarkup: props.rawMarkup ?? null,
    children: children.map((child) => normalizeChild(child)),
  };
}

export function text(content: string): VText {
  return { kind: "text", content };
}

export function component<M>(
  message: M,
  construct: ComponentConstructor<M>,
  key: string | null = null,
): VComponent<M> {
  return { kind: "component", key, message, construct };
}

// ---------------------------------------------------------------------------
// Handler specs
// ---------------------------------------------------------------------------

export function onMessage<M>(message: M): EventHandlerSpec<M> {
  return { kind: "message", message };
}

export function onEvent<M>(convert: (event: PlatformEvent) => M | undefined): EventHandlerSpec<M> {
  return { kind: "event", convert };
}

export function onMessageEvent<M>(
  message: M,
  convert: (message: M, event: PlatformEvent) => M | undefined,
): EventHandlerSpec<M> {
  return { kind: "messageEvent", message, convert };
}

export function onInput<M>(convert: (value: string) => M | undefined): EventHandlerSpec<M> {
  return { kind: "inputValue", convert };
}

// ---------------------------------------------------------------------------
// Walk
// ---------------------------------------------------------------------------

function* walk<M>(node: VNode<M>): Generator<TreeItem<M>, void, undefined> {
  switch (node.kind) {
    case "text":
      yield { kind: "text", content: node.content };
      break;
    case "component":
      if (node.key !== null) yield { kind: "key", key: node.key };
      yield { kind: "component", message: node.message, construct: node.construct };
      break;
    case "element":
      if (node.key !== null) yield { kind: "key", key: node.key };
      yield { kind: "element", name: node.name };
      for (const [name, value] of node.attrs) yield { kind: "attribute", name, value };
      for (const [trigger, handler] of node.on) yield { kind: "event", trigger, handler };
      if (node.rawMarkup !== null) {
        yield { kind: "rawMarkup", markup: node.rawMarkup };
      } else {
        for (const child of node.children) yield* walk(child);
      }
      break;
  }
  yield exitItem();
}

function isNodeList<M>(root: VNode<M> | readonly VNode<M>[]): root is readonly VNode<M>[] {
  return Array.isArray(root);
}

/**
 * Item stream for one node or a top-level node list.
 * The returned iterable is restartable: each iteration walks from the start.
 */
export function treeItems<M>(root: VNode<M> | readonly VNode<M>[]): TreeItemStream<M> {
  const roots = isNodeList(root) ? root : [root];
  return {
    *[Symbol.iterator]() {
      for (const node of roots) yield* walk(node);
    },
  };
}
