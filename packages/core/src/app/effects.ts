import type { EffectLists } from "./types.js";

const NONE: EffectLists<never> = Object.freeze({ immediate: [], postRender: [] });

export function noEffects<C>(): EffectLists<C> {
  return NONE;
}

export function effects<C>(
  lists: Readonly<{ immediate?: readonly C[]; postRender?: readonly C[] }>,
): EffectLists<C> {
  return { immediate: lists.immediate ?? [], postRender: lists.postRender ?? [] };
}
