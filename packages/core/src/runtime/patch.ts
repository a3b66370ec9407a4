/**
 * packages/core/src/runtime/patch.ts — Patch instructions and patch sequences.
 *
 * Why: The diff produces a flat list of instructions that `applyPatches`
 * interprets against a scope stack. Slots refer to the old storage ledger the
 * sequence was computed against, so the sequence carries that ledger along.
 */

import type { ComponentConstructor, EventHandlerSpec } from "../tree/items.js";
import type { LiveNodeStorage } from "./storage.js";

export type Patch<M> =
  | Readonly<{ kind: "createElement"; name: string }>
  | Readonly<{ kind: "createText"; content: string }>
  | Readonly<{ kind: "createComponent"; message: M; construct: ComponentConstructor<M> }>
  | Readonly<{ kind: "retainElement"; slot: number }>
  | Readonly<{ kind: "retainText"; slot: number }>
  | Readonly<{ kind: "replaceText"; slot: number; content: string }>
  | Readonly<{ kind: "retainComponent"; slot: number }>
  | Readonly<{ kind: "updateComponent"; slot: number; message: M }>
  /** Keyed nodes taken from another position among their siblings. */
  | Readonly<{ kind: "moveElement"; slot: number }>
  | Readonly<{ kind: "moveComponent"; slot: number }>
  | Readonly<{ kind: "moveUpdateComponent"; slot: number; message: M }>
  /** Destroys the sub-tree rooted at `slot`; its slots span `slot..through`. */
  | Readonly<{ kind: "remove"; slot: number; through: number }>
  | Readonly<{ kind: "setAttribute"; name: string; value: string }>
  | Readonly<{ kind: "removeAttribute"; name: string }>
  | Readonly<{ kind: "setRawMarkup"; markup: string }>
  | Readonly<{ kind: "clearRawMarkup" }>
  | Readonly<{ kind: "addListener"; trigger: string; handler: EventHandlerSpec<M> }>
  | Readonly<{ kind: "retainListener"; slot: number }>
  | Readonly<{ kind: "removeListener"; slot: number }>
  | Readonly<{ kind: "exit" }>;

export type PatchKind = Patch<unknown>["kind"];

export class PatchSequence<M, N, S> {
  constructor(
    readonly patches: readonly Patch<M>[],
    readonly storage: LiveNodeStorage<M, N, S>,
  ) {}

  get length(): number {
    return this.patches.length;
  }

  /** True when applying the sequence would only move handles into a new ledger. */
  isNoop(): boolean {
    for (const patch of this.patches) {
      switch (patch.kind) {
        case "retainElement":
        case "retainText":
        case "retainComponent":
        case "retainListener":
        case "exit":
          continue;
        default:
          return false;
      }
    }
    return true;
  }
}

export function describePatch<M>(patch: Patch<M>): string {
  switch (patch.kind) {
    case "createElement":
      return `createElement ${patch.name}`;
    case "createText":
      return `createText ${JSON.stringify(patch.content)}`;
    case "createComponent":
      return "createComponent";
    case "retainElement":
    case "retainText":
    case "retainComponent":
    case "retainListener":
    case "removeListener":
    case "moveElement":
    case "moveComponent":
      return `${patch.kind} #${String(patch.slot)}`;
    case "replaceText":
      return `replaceText #${String(patch.slot)} ${JSON.stringify(patch.content)}`;
    case "updateComponent":
    case "moveUpdateComponent":
      return `${patch.kind} #${String(patch.slot)}`;
    case "remove":
      return patch.through === patch.slot
        ? `remove #${String(patch.slot)}`
        : `remove #${String(patch.slot)}..${String(patch.through)}`;
    case "setAttribute":
      return `setAttribute ${patch.name}=${JSON.stringify(patch.value)}`;
    case "removeAttribute":
      return `removeAttribute ${patch.name}`;
    case "setRawMarkup":
      return `setRawMarkup ${JSON.stringify(patch.markup)}`;
    case "clearRawMarkup":
      return "clearRawMarkup";
    case "addListener":
      return `addListener ${patch.trigger}`;
    case "exit":
      return "exit";
  }
}

export function formatPatches<M>(patches: Iterable<Patch<M>>): string[] {
  const out: string[] = [];
  for (const patch of patches) out.push(describePatch(patch));
  return out;
}
