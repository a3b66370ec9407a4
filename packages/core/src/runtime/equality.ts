/**
 * packages/core/src/runtime/equality.ts — Structural equality for messages and handlers.
 *
 * Why: Messages are plain data built fresh on every render, so the diff compares
 * them structurally. Conversion functions are compared by identity: two closures
 * with the same source are still different handlers.
 */

import type { EventHandlerSpec } from "../tree/items.js";

export function deepEqualUnknown(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a !== typeof b) return false;
  if (typeof a !== "object" || a === null || b === null || typeof b !== "object") return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!deepEqualUnknown(a[i], b[i])) return false;
    }
    return true;
  }

  if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) return false;

  const aEntries = Object.entries(a);
  const bEntries = new Map<string, unknown>(Object.entries(b));
  if (aEntries.length !== bEntries.size) return false;

  for (const [key, value] of aEntries) {
    if (!bEntries.has(key)) return false;
    if (!deepEqualUnknown(value, bEntries.get(key))) return false;
  }
  return true;
}

export function handlerSpecsEqual<M>(a: EventHandlerSpec<M>, b: EventHandlerSpec<M>): boolean {
  if (a === b) return true;
  switch (a.kind) {
    case "message":
      return b.kind === "message" && deepEqualUnknown(a.message, b.message);
    case "event":
      return b.kind === "event" && a.convert === b.convert;
    case "messageEvent":
      return (
        b.kind === "messageEvent" &&
        a.convert === b.convert &&
        deepEqualUnknown(a.message, b.message)
      );
    case "inputValue":
      return b.kind === "inputValue" && a.convert === b.convert;
  }
}
