/**
 * packages/core/src/runtime/diff.ts — Stream diff.
 *
 * Why: Reconciliation compares the previous and next item streams position by
 * position. Identity is the tag name at a structural position, or the key
 * among keyed siblings: a node whose name, text kind or component constructor
 * still matches is retained, and anything else is removed and re-created with
 * its whole sub-tree.
 *
 * Three cursors advance together: the old stream, the new stream and the old
 * storage ledger (as a slot counter on the old cursor). Unkeyed nodes only
 * look ahead to skip a whole unmatched sub-tree. Keyed siblings are matched by
 * key wherever they sit in their parent; a keyed node found further ahead in
 * the old stream is moved, and skipped when the old cursor reaches it. Both
 * streams are read into arrays so those siblings can be found.
 *
 * Annotations follow their node as attributes, then events, then raw markup.
 * When the two sides hold different annotation kinds, the item whose kind the
 * other side has already moved past is removed (old) or added (new) alone,
 * so an unchanged listener survives attributes being added or dropped.
 */

import { SprigError } from "../errors.js";
import type { OpeningItem, TreeItem, TreeItemStream } from "../tree/items.js";
import { hasStorage, opensScope } from "../tree/items.js";
import { deepEqualUnknown, handlerSpecsEqual } from "./equality.js";
import type { Patch } from "./patch.js";
import { PatchSequence } from "./patch.js";
import type { LiveNodeStorage, StoredKind } from "./storage.js";

/** The part of the old ledger the diff reads: slot kinds, never handles. */
type SlotKinds = Readonly<{
  size: number;
  kindAt(slot: number): StoredKind | "taken";
}>;

/** Attributes re-set on every diff even when unchanged. */
export const DEFAULT_VOLATILE_ATTRIBUTES: readonly string[] = Object.freeze([
  "checked",
  "selected",
  "value",
]);

export type DiffOptions = Readonly<{
  /**
   * Attribute names re-asserted on every diff, so that state the user changed
   * directly on the live node (a checkbox click) is brought back in line.
   */
  volatileAttributes?: ReadonlySet<string>;
}>;

const DEFAULT_VOLATILE_SET: ReadonlySet<string> = new Set(DEFAULT_VOLATILE_ATTRIBUTES);

function storedKindOf<M>(item: TreeItem<M>): StoredKind | null {
  switch (item.kind) {
    case "element":
      return "element";
    case "text":
      return "text";
    case "event":
      return "listener";
    case "component":
      return "component";
    default:
      return null;
  }
}

/** One side's items, with the storage slot of each position and sibling keys. */
class ItemList<M> {
  private readonly items: TreeItem<M>[] = [];
  private readonly slots: number[] = [];
  private readonly slotCount: number;
  private readonly keysByParent = new Map<number, ReadonlyMap<string, number>>();

  constructor(stream: TreeItemStream<M>) {
    let slot = 0;
    for (const item of stream) {
      this.items.push(item);
      this.slots.push(slot);
      if (hasStorage(item)) slot++;
    }
    this.slotCount = slot;
  }

  at(index: number): TreeItem<M> | undefined {
    return this.items[index];
  }

  /** Slot of the item at `index`; the end of the list maps to the slot count. */
  slotOf(index: number): number {
    return this.slots[index] ?? this.slotCount;
  }

  /**
   * Index of the key item for every keyed child of the node opened at
   * `parent` (-1 for the top level). The first of duplicate keys wins.
   */
  siblingKeys(parent: number): ReadonlyMap<string, number> {
    const cached = this.keysByParent.get(parent);
    if (cached !== undefined) return cached;
    const keys = new Map<string, number>();
    let depth = 0;
    for (let i = parent + 1; i < this.items.length; i++) {
      const item = this.items[i];
      if (item === undefined) break;
      if (item.kind === "exit") {
        if (depth === 0) break;
        depth--;
      } else if (opensScope(item)) {
        depth++;
      } else if (item.kind === "key" && depth === 0 && !keys.has(item.key)) {
        keys.set(item.key, i);
      }
    }
    this.keysByParent.set(parent, keys);
    return keys;
  }
}

class ItemCursor<M> {
  private pos: number;
  /** Indexes of the scopes opened and not yet exited. */
  private readonly parents: number[] = [];

  constructor(
    private readonly list: ItemList<M>,
    private readonly side: "old" | "new",
    private readonly storage: SlotKinds | null,
    start = 0,
  ) {
    this.pos = start;
    this.verify();
  }

  get current(): TreeItem<M> | undefined {
    return this.list.at(this.pos);
  }

  get index(): number {
    return this.pos;
  }

  /** Number of scopes opened and not yet exited. */
  get depth(): number {
    return this.parents.length;
  }

  /** Storage slot of the current item (old side only). */
  get slot(): number {
    return this.list.slotOf(this.pos);
  }

  itemAt(index: number): TreeItem<M> | undefined {
    return this.list.at(index);
  }

  /** Keys of the siblings at the current position. */
  siblingKeys(): ReadonlyMap<string, number> {
    return this.list.siblingKeys(this.parents[this.parents.length - 1] ?? -1);
  }

  /** A cursor over the same items, starting at `index` with no open scopes. */
  fork(index: number): ItemCursor<M> {
    return new ItemCursor(this.list, this.side, this.storage, index);
  }

  advance(): void {
    const item = this.current;
    if (item === undefined) {
      throw new SprigError("SPRIG_UNBALANCED_STREAM", `${this.side} stream advanced past its end`);
    }
    if (opensScope(item)) {
      this.parents.push(this.pos);
    } else if (item.kind === "exit") {
      if (this.parents.pop() === undefined) {
        throw new SprigError(
          "SPRIG_UNBALANCED_STREAM",
          `${this.side} stream exits a scope it never opened`,
        );
      }
    }
    this.pos++;
    if (item.kind === "key") {
      const target = this.current;
      if (target?.kind !== "element" && target?.kind !== "component") {
        throw new SprigError(
          "SPRIG_UNBALANCED_STREAM",
          `${this.side} stream has key "${item.key}" before ${target?.kind ?? "the end"}`,
        );
      }
    }
    this.verify();
  }

  /** Verify the end of the stream closed every scope and, on the old side, every slot. */
  finish(): void {
    if (this.parents.length !== 0) {
      throw new SprigError(
        "SPRIG_UNBALANCED_STREAM",
        `${this.side} stream ended with ${String(this.parents.length)} open scope(s)`,
      );
    }
    if (this.storage !== null && this.slot !== this.storage.size) {
      throw new SprigError(
        "SPRIG_STORAGE_MISALIGNED",
        `old stream used ${String(this.slot)} slot(s), storage holds ${String(this.storage.size)}`,
      );
    }
  }

  private verify(): void {
    const item = this.current;
    if (this.storage === null || item === undefined) return;
    const expected = storedKindOf(item);
    if (expected === null) return;
    const actual = this.storage.kindAt(this.slot);
    if (actual !== expected) {
      throw new SprigError(
        "SPRIG_STORAGE_MISALIGNED",
        `storage slot ${String(this.slot)} holds ${actual}, old stream has ${item.kind}`,
      );
    }
  }
}

/** Items that start a sibling: a node, or the key in front of one. */
function startsNode<M>(item: TreeItem<M>): boolean {
  return opensScope(item) || item.kind === "key";
}

function sameIdentity<M>(a: TreeItem<M>, b: TreeItem<M>): boolean {
  if (a.kind === "element" && b.kind === "element") return a.name === b.name;
  if (a.kind === "component" && b.kind === "component") return a.construct === b.construct;
  return false;
}

class Differ<M> {
  readonly out: Patch<M>[] = [];
  /** Old key items whose nodes were already moved to an earlier position. */
  private readonly moved = new Set<number>();

  constructor(
    private old: ItemCursor<M>,
    private readonly next: ItemCursor<M>,
    private readonly volatile: ReadonlySet<string>,
  ) {}

  run(): void {
    while (this.old.current !== undefined || this.next.current !== undefined) this.step();
    this.old.finish();
    this.next.finish();
  }

  private step(): void {
    const old = this.old;
    const next = this.next;
    const o = old.current;
    const n = next.current;

    // Annotations come in a fixed order; an item whose kind the other side
    // has already passed is old-only or new-only.
    const oRank = annotationRank(o);
    const nRank = annotationRank(n);
    if (o !== undefined && oRank < nRank) {
      this.dropAnnotation(o);
      return;
    }
    if (n !== undefined && nRank < oRank) {
      // Markup replaces children: old children go first.
      if (n.kind === "rawMarkup" && o !== undefined && startsNode(o)) {
        this.removeSubtree();
        return;
      }
      const patch = creationPatch(n);
      if (patch !== null) this.out.push(patch);
      next.advance();
      return;
    }

    if (o?.kind === "attribute" && n?.kind === "attribute") {
      if (o.name !== n.name) {
        this.out.push({ kind: "removeAttribute", name: o.name });
        this.out.push({ kind: "setAttribute", name: n.name, value: n.value });
      } else if (o.value !== n.value || this.volatile.has(n.name)) {
        this.out.push({ kind: "setAttribute", name: n.name, value: n.value });
      }
      old.advance();
      next.advance();
      return;
    }

    if (o?.kind === "event" && n?.kind === "event") {
      if (o.trigger !== n.trigger || !handlerSpecsEqual(o.handler, n.handler)) {
        this.out.push({ kind: "removeListener", slot: old.slot });
        this.out.push({ kind: "addListener", trigger: n.trigger, handler: n.handler });
      } else {
        this.out.push({ kind: "retainListener", slot: old.slot });
      }
      old.advance();
      next.advance();
      return;
    }

    if (o?.kind === "rawMarkup" && n?.kind === "rawMarkup") {
      if (o.markup !== n.markup) this.out.push({ kind: "setRawMarkup", markup: n.markup });
      old.advance();
      next.advance();
      return;
    }

    if (o?.kind === "exit" && n?.kind === "exit") {
      this.out.push({ kind: "exit" });
      old.advance();
      next.advance();
      return;
    }

    if (o?.kind === "key" || n?.kind === "key") {
      this.matchKeyed(o, n);
      return;
    }

    if (n !== undefined && opensScope(n) && (o === undefined || o.kind === "exit")) {
      this.addSubtree();
      return;
    }
    if (o !== undefined && opensScope(o) && (n === undefined || n.kind === "exit")) {
      this.removeSubtree();
      return;
    }

    if (o !== undefined && n !== undefined && opensScope(o) && opensScope(n)) {
      this.matchNodes(o, n, false);
      return;
    }

    // An exit on one side against the end of the other.
    throw new SprigError(
      "SPRIG_UNBALANCED_STREAM",
      `unbalanced streams: old=${o?.kind ?? "end"} new=${n?.kind ?? "end"}`,
    );
  }

  /**
   * Sibling position where at least one side is keyed. Keyed and unkeyed
   * nodes never pair with each other.
   */
  private matchKeyed(o: TreeItem<M> | undefined, n: TreeItem<M> | undefined): void {
    const oldKey = o?.kind === "key" ? o.key : null;
    const newKey = n?.kind === "key" ? n.key : null;

    if (oldKey !== null && this.moved.has(this.old.index)) {
      this.skipMoved();
      return;
    }

    // The old sibling can pair with nothing left in the new list.
    const stale =
      o !== undefined && o.kind !== "exit" && (oldKey === null || !this.wantedAhead(oldKey));

    if (newKey !== null) {
      if (oldKey === newKey) {
        // Same key in place: the nodes behind the keys pair up as usual.
        this.old.advance();
        this.next.advance();
        return;
      }
      if (stale) {
        this.removeSubtree();
        return;
      }
      const from = this.findMovable(newKey);
      if (from !== null) this.moveKeyed(from);
      else this.addSubtree();
      return;
    }

    // An old keyed node against an unkeyed node, an exit or the end.
    if (!stale && n !== undefined && n.kind !== "exit") {
      this.addSubtree();
      return;
    }
    this.removeSubtree();
  }

  /** Index of the old key item `key` further ahead among the old siblings, if it can move here. */
  private findMovable(key: string): number | null {
    const at = this.old.siblingKeys().get(key);
    if (at === undefined || at <= this.old.index || this.moved.has(at)) return null;
    const from = this.old.itemAt(at + 1);
    const to = this.next.itemAt(this.next.index + 1);
    if (from === undefined || to === undefined || !sameIdentity(from, to)) return null;
    return at;
  }

  /** True when a later new sibling carries `key`. */
  private wantedAhead(key: string): boolean {
    const at = this.next.siblingKeys().get(key);
    return at !== undefined && at > this.next.index;
  }

  /** Diff the old keyed sub-tree at `keyIndex` against the new one at the cursor. */
  private moveKeyed(keyIndex: number): void {
    const outer = this.old;
    const moving = outer.fork(keyIndex + 1);
    this.next.advance();
    const o = moving.current;
    const n = this.next.current;
    if (o === undefined || n === undefined || !opensScope(o) || !opensScope(n)) {
      throw new SprigError("SPRIG_UNBALANCED_STREAM", "key is not followed by a node");
    }
    this.old = moving;
    this.matchNodes(o, n, true);
    while (moving.depth > 0) this.step();
    this.old = outer;
    this.moved.add(keyIndex);
  }

  /** Step the old cursor over a keyed sub-tree that was already moved. */
  private skipMoved(): void {
    const old = this.old;
    old.advance();
    const base = old.depth;
    do {
      old.advance();
    } while (old.depth > base);
  }

  private dropAnnotation(o: TreeItem<M>): void {
    switch (o.kind) {
      case "attribute":
        this.out.push({ kind: "removeAttribute", name: o.name });
        break;
      case "event":
        this.out.push({ kind: "removeListener", slot: this.old.slot });
        break;
      case "rawMarkup":
        this.out.push({ kind: "clearRawMarkup" });
        break;
      default:
        throw new SprigError("SPRIG_UNBALANCED_STREAM", `${o.kind} is not an annotation`);
    }
    this.old.advance();
  }

  private matchNodes(o: OpeningItem<M>, n: OpeningItem<M>, moved: boolean): void {
    const slot = this.old.slot;
    if (o.kind === "element" && n.kind === "element" && o.name === n.name) {
      this.out.push(moved ? { kind: "moveElement", slot } : { kind: "retainElement", slot });
    } else if (o.kind === "text" && n.kind === "text") {
      this.out.push(
        o.content === n.content
          ? { kind: "retainText", slot }
          : { kind: "replaceText", slot, content: n.content },
      );
    } else if (o.kind === "component" && n.kind === "component" && o.construct === n.construct) {
      const message = n.message;
      if (deepEqualUnknown(o.message, message)) {
        this.out.push(moved ? { kind: "moveComponent", slot } : { kind: "retainComponent", slot });
      } else {
        this.out.push(
          moved
            ? { kind: "moveUpdateComponent", slot, message }
            : { kind: "updateComponent", slot, message },
        );
      }
    } else {
      this.removeSubtree();
      this.addSubtree();
      return;
    }
    this.old.advance();
    this.next.advance();
  }

  /** Emit creation patches for the whole sub-tree (and its key) at the new cursor. */
  private addSubtree(): void {
    const next = this.next;
    if (next.current?.kind === "key") next.advance();
    const base = next.depth;
    do {
      const item = next.current;
      if (item === undefined) {
        throw new SprigError("SPRIG_UNBALANCED_STREAM", "new stream ended inside a scope");
      }
      const patch = creationPatch(item);
      if (patch !== null) this.out.push(patch);
      next.advance();
    } while (next.depth > base);
  }

  /** Emit one `remove` covering the whole sub-tree (and its key) at the old cursor. */
  private removeSubtree(): void {
    const old = this.old;
    if (old.current?.kind === "key") old.advance();
    const base = old.depth;
    const slot = old.slot;
    do {
      if (old.current === undefined) {
        throw new SprigError("SPRIG_UNBALANCED_STREAM", "old stream ended inside a scope");
      }
      old.advance();
    } while (old.depth > base);
    this.out.push({ kind: "remove", slot, through: old.slot - 1 });
  }
}

/** Position of an item kind within one node's annotations; nodes and exits sort last. */
function annotationRank<M>(item: TreeItem<M> | undefined): number {
  switch (item?.kind) {
    case "attribute":
      return 0;
    case "event":
      return 1;
    case "rawMarkup":
      return 2;
    default:
      return 3;
  }
}

function creationPatch<M>(item: TreeItem<M>): Patch<M> | null {
  switch (item.kind) {
    case "element":
      return { kind: "createElement", name: item.name };
    case "text":
      return { kind: "createText", content: item.content };
    case "component":
      return { kind: "createComponent", message: item.message, construct: item.construct };
    case "attribute":
      return { kind: "setAttribute", name: item.name, value: item.value };
    case "event":
      return { kind: "addListener", trigger: item.trigger, handler: item.handler };
    case "rawMarkup":
      return { kind: "setRawMarkup", markup: item.markup };
    case "exit":
      return { kind: "exit" };
    case "key":
      return null;
  }
}

/**
 * Compute the patch sequence that turns the live tree recorded in `storage`
 * (rendered from `old`) into the tree described by `next`.
 */
export function diff<M, N, S>(
  old: TreeItemStream<M>,
  next: TreeItemStream<M>,
  storage: LiveNodeStorage<M, N, S>,
  options: DiffOptions = {},
): PatchSequence<M, N, S> {
  const differ = new Differ<M>(
    new ItemCursor(new ItemList(old), "old", storage),
    new ItemCursor(new ItemList(next), "new", null),
    options.volatileAttributes ?? DEFAULT_VOLATILE_SET,
  );
  differ.run();
  return new PatchSequence(differ.out, storage);
}
