/**
 * packages/core/src/platform.ts — Host platform contract.
 *
 * Why: The reconciler never touches a concrete UI toolkit. Everything that
 * mutates the live tree, subscribes to events or schedules frames goes through
 * this interface, so the same diff/patch pipeline can drive a browser DOM, a
 * headless DOM, or the in-memory host used by tests.
 *
 * Type parameters:
 *   - N: live node handle (elements and text nodes share one handle type)
 *   - S: event subscription handle returned by `listen`
 */

/** Opaque event payload delivered by the host. Handlers narrow it themselves. */
export type PlatformEvent = unknown;

/** Token identifying a pending frame callback. */
export type FrameToken = number;

export interface FrameScheduler {
  /** Register a callback to run before the next paint. */
  requestFrame(callback: () => void): FrameToken;
  /** Cancel a callback registered with `requestFrame`. Unknown tokens are ignored. */
  cancelFrame(token: FrameToken): void;
}

export interface Platform<N, S> extends FrameScheduler {
  createElement(name: string): N;
  createText(content: string): N;
  setText(node: N, content: string): void;

  /** Insert `child` under `parent` before `ref`, or at the end when `ref` is null. */
  insertBefore(parent: N, child: N, ref: N | null): void;
  /** Detach `node` from its live parent. */
  remove(node: N): void;
  parentOf(node: N): N | null;
  nextSiblingOf(node: N): N | null;

  setAttribute(element: N, name: string, value: string): void;
  removeAttribute(element: N, name: string): void;
  /** Replace the children of `element` with parsed markup. */
  setRawMarkup(element: N, markup: string): void;
  /** Remove every child of `element`. */
  clearChildren(element: N): void;

  listen(element: N, trigger: string, callback: (event: PlatformEvent) => void): S;
  unlisten(element: N, trigger: string, subscription: S): void;
  /** String value of the event target (input, textarea, select), or "". */
  inputValueOf(event: PlatformEvent): string;
}
