/**
 * packages/core/src/runtime/storage.ts — Live-node storage ledger.
 *
 * Why: The ledger correlates each storage-bearing item of the last rendered
 * stream (element, text, event, component) with the live handle it produced,
 * by position. The next diff addresses old handles by slot index; the next
 * apply consumes each slot exactly once with `take`.
 */

import { SprigError } from "../errors.js";
import type { NestedComponent } from "../tree/items.js";

export type ListenerHandle<N, S> = Readonly<{
  kind: "listener";
  /** Element the subscription is attached to. */
  element: N;
  trigger: string;
  subscription: S;
}>;

export type StoredHandle<M, N, S> =
  | Readonly<{ kind: "element"; node: N }>
  | Readonly<{ kind: "text"; node: N }>
  | ListenerHandle<N, S>
  | Readonly<{ kind: "component"; component: NestedComponent<M, N> }>;

export type StoredKind = StoredHandle<unknown, unknown, unknown>["kind"];

type Slot<M, N, S> = {
  handle: StoredHandle<M, N, S> | null;
  readonly depth: number;
};

export class LiveNodeStorage<M, N, S> {
  private readonly slots: Slot<M, N, S>[] = [];

  get size(): number {
    return this.slots.length;
  }

  push(handle: StoredHandle<M, N, S>, depth: number): number {
    this.slots.push({ handle, depth });
    return this.slots.length - 1;
  }

  /** Kind of the handle at `slot`, or "taken". Out-of-range slots are a misalignment. */
  kindAt(slot: number): StoredKind | "taken" {
    const entry = this.slotAt(slot);
    return entry.handle === null ? "taken" : entry.handle.kind;
  }

  /** Consume the handle at `slot`. */
  take<K extends StoredKind>(
    slot: number,
    expected: K,
  ): Extract<StoredHandle<M, N, S>, { kind: K }> {
    const entry = this.slotAt(slot);
    const handle = entry.handle;
    if (handle === null) {
      throw new SprigError("SPRIG_SLOT_TAKEN", `storage slot ${String(slot)} was already taken`);
    }
    if (!isKind(handle, expected)) {
      throw new SprigError(
        "SPRIG_STORAGE_MISALIGNED",
        `storage slot ${String(slot)} holds ${handle.kind}, expected ${expected}`,
      );
    }
    entry.handle = null;
    return handle;
  }

  /** Consume every slot in `from..through` regardless of kind. */
  takeSpan(from: number, through: number): StoredHandle<M, N, S>[] {
    const out: StoredHandle<M, N, S>[] = [];
    for (let slot = from; slot <= through; slot++) {
      const entry = this.slotAt(slot);
      if (entry.handle === null) {
        throw new SprigError("SPRIG_SLOT_TAKEN", `storage slot ${String(slot)} was already taken`);
      }
      out.push(entry.handle);
      entry.handle = null;
    }
    return out;
  }

  untakenSlots(): number[] {
    const out: number[] = [];
    for (let i = 0; i < this.slots.length; i++) {
      if (this.slots[i]?.handle !== null) out.push(i);
    }
    return out;
  }

  /** Top-level live nodes in order. Components contribute their own node lists. */
  topLevelNodes(): N[] {
    const out: N[] = [];
    for (const entry of this.slots) {
      const handle = entry.handle;
      if (entry.depth !== 0 || handle === null) continue;
      switch (handle.kind) {
        case "element":
        case "text":
          out.push(handle.node);
          break;
        case "component":
          out.push(...handle.component.listNodes());
          break;
        case "listener":
          break;
      }
    }
    return out;
  }

  private slotAt(slot: number): Slot<M, N, S> {
    const entry = this.slots[slot];
    if (entry === undefined) {
      throw new SprigError(
        "SPRIG_STORAGE_MISALIGNED",
        `storage slot ${String(slot)} is out of range (size=${String(this.slots.length)})`,
      );
    }
    return entry;
  }
}

function isKind<M, N, S, K extends StoredKind>(
  handle: StoredHandle<M, N, S>,
  kind: K,
): handle is Extract<StoredHandle<M, N, S>, { kind: K }> {
  return handle.kind === kind;
}
