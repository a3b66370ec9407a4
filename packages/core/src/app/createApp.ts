/**
 * packages/core/src/app/createApp.ts — Dispatcher and render scheduler.
 *
 * Why: Messages are processed strictly in arrival order on one logical
 * thread. A dispatch that arrives while an update or render is running only
 * enqueues; the active call drains the queue. Every update requests a render,
 * but at most one frame registration is outstanding: later updates append
 * their post-render effects to it.
 *
 * Frame flow:
 *   1. render the model into a new item stream
 *   2. diff against the previous stream and ledger
 *   3. apply (skipped for no-op sequences when configured)
 *   4. run the accumulated post-render effects
 *   5. drain messages that arrived meanwhile
 */

import { SprigError, describeThrown, isSprigError } from "../errors.js";
import type { SprigErrorCode } from "../errors.js";
import type { FrameToken, Platform } from "../platform.js";
import type { TreeItemStream } from "../tree/items.js";
import { emptyStream } from "../tree/items.js";
import { applyPatches } from "../runtime/apply.js";
import type { ApplyTarget } from "../runtime/apply.js";
import { diff } from "../runtime/diff.js";
import { LiveNodeStorage } from "../runtime/storage.js";
import { warnDev } from "../runtime/warnDev.js";
import { resolveAppConfig } from "./config.js";
import { AppStateMachine } from "./stateMachine.js";
import type {
  App,
  AttachOptions,
  CommandFn,
  Dispatch,
  EffectLists,
  ModelPort,
  ProcessEffect,
  ResolvedAppConfig,
} from "./types.js";

export { resolveAppConfig } from "./config.js";

/** Where an app's top-level nodes live. */
export type MountSite<N> =
  | Readonly<{ kind: "container"; container: N }>
  /**
   * Nodes go wherever a parent placed them; the first render only collects
   * them. An empty text node leads them and marks the position.
   */
  | Readonly<{ kind: "floating" }>;

/** App plus the ledger view a parent needs to place a nested app's nodes. */
export interface AppRuntime<M, N> extends App<M, N> {
  topLevelNodes(): readonly N[];
}

export type AppRuntimeOptions<M, C, N, S> = Readonly<{
  site: MountSite<N>;
  model: ModelPort<M, C>;
  platform: Platform<N, S>;
  config: ResolvedAppConfig;
  processEffect: ProcessEffect<M, C>;
}>;

export function isCommandFn<M>(command: unknown): command is CommandFn<M> {
  return typeof command === "function";
}

/** Run function commands; warn about anything else. */
export function defaultProcessEffect<M, C>(command: C, dispatch: Dispatch<M>): void {
  if (isCommandFn<M>(command)) {
    command(dispatch);
    return;
  }
  warnDev(`[sprig][app] no effect processor for command: ${describeCommand(command)}`);
}

function describeCommand(command: unknown): string {
  if (typeof command === "object" && command !== null) {
    try {
      return JSON.stringify(command);
    } catch (e: unknown) {
      return `<unserializable: ${describeThrown(e)}>`;
    }
  }
  return String(command);
}

export function createAppRuntime<M, C, N, S>(
  opts: AppRuntimeOptions<M, C, N, S>,
): AppRuntime<M, N> {
  const { site, model, platform, config, processEffect } = opts;
  const sm = new AppStateMachine();
  const queue: M[] = [];

  let previous: TreeItemStream<M> = emptyStream<M>();
  let storage = new LiveNodeStorage<M, N, S>();
  let frameToken: FrameToken | null = null;
  let pendingPostRender: C[] = [];
  // Floating apps keep an empty text node ahead of their own nodes, so that
  // their position in the parent survives renders that produce no nodes.
  const marker: N | null = site.kind === "floating" ? createMarker() : null;

  function throwCode(code: SprigErrorCode, detail: string): never {
    throw new SprigError(code, detail);
  }

  function callUser<T>(what: string, fn: () => T): T {
    try {
      return fn();
    } catch (e: unknown) {
      if (isSprigError(e)) throw e;
      throw new SprigError("SPRIG_USER_CODE_THROW", `${what} threw: ${describeThrown(e)}`);
    }
  }

  function doFatal(e: unknown): never {
    const error = isSprigError(e)
      ? e
      : new SprigError("SPRIG_USER_CODE_THROW", describeThrown(e));
    if (sm.terminal) throw error;

    sm.toFaulted();
    queue.length = 0;
    pendingPostRender = [];
    cancelFrame();

    const onFatal = config.onFatal;
    if (onFatal !== null) {
      try {
        onFatal(error);
      } catch (inner: unknown) {
        warnDev(`[sprig][app] onFatal threw: ${describeThrown(inner)}`);
      }
    }
    throw error;
  }

  function createMarker(): N {
    try {
      return platform.createText("");
    } catch (e: unknown) {
      throw new SprigError(
        "SPRIG_PLATFORM_ERROR",
        `platform createText failed: ${describeThrown(e)}`,
      );
    }
  }

  function topLevelNodes(): readonly N[] {
    const nodes = storage.topLevelNodes();
    return marker === null ? nodes : [marker, ...nodes];
  }

  function cancelFrame(): void {
    if (frameToken === null) return;
    const token = frameToken;
    frameToken = null;
    platform.cancelFrame(token);
  }

  function mountTarget(): ApplyTarget<N, S> {
    if (site.kind === "container") {
      return { platform, container: site.container, anchor: null };
    }
    const container = marker === null ? null : platform.parentOf(marker);
    // Not placed yet: the parent inserts what this render collects.
    if (container === null) return { platform, container: null, anchor: null };
    const nodes = topLevelNodes();
    const last = nodes[nodes.length - 1] ?? marker;
    return { platform, container, anchor: last === null ? null : platform.nextSiblingOf(last) };
  }

  function reconcile(next: TreeItemStream<M>): void {
    const sequence = diff(previous, next, storage, {
      volatileAttributes: config.volatileAttributes,
    });
    if (config.skipNoopPatches && sequence.isNoop()) {
      // Same shape and handles: the old ledger still lines up with `next`.
      previous = next;
      return;
    }
    const target = mountTarget();
    storage = applyPatches(sequence, target, dispatch, {
      deferredAttributes: config.deferredAttributes,
    }).storage;
    previous = next;
  }

  function runEffect(command: C): void {
    callUser("effect", () => processEffect(command, dispatch));
  }

  function schedulePostRender(effects: readonly C[]): void {
    if (frameToken !== null) {
      pendingPostRender.push(...effects);
      return;
    }
    pendingPostRender = [...effects];
    frameToken = platform.requestFrame(onFrame);
  }

  function drain(): void {
    while (queue.length > 0 && !sm.terminal) {
      sm.toUpdating();
      const message = queue.shift();
      if (message === undefined) break;
      const effects: EffectLists<C> = callUser("update", () => model.update(message));
      schedulePostRender(effects.postRender);
      for (const command of effects.immediate) runEffect(command);
    }
    if (!sm.terminal) sm.toSettled(frameToken !== null);
  }

  function onFrame(): void {
    frameToken = null;
    if (sm.terminal) return;
    try {
      sm.toRendering();
      const effects = pendingPostRender;
      pendingPostRender = [];
      reconcile(callUser("render", () => model.render()));
      for (const command of effects) runEffect(command);
      drain();
    } catch (e: unknown) {
      doFatal(e);
    }
  }

  function dispatch(message: M): void {
    const st = sm.state;
    if (st === "Detached") {
      warnDev("[sprig][app] dispatch after detach is ignored");
      return;
    }
    if (st === "Faulted") throwCode("SPRIG_INVALID_STATE", "dispatch: app is Faulted");
    queue.push(message);
    if (sm.busy) return;
    try {
      drain();
    } catch (e: unknown) {
      doFatal(e);
    }
  }

  function detach(): void {
    if (sm.terminal) return;
    cancelFrame();
    queue.length = 0;
    pendingPostRender = [];
    try {
      reconcile(emptyStream<M>());
      if (marker !== null && platform.parentOf(marker) !== null) platform.remove(marker);
    } catch (e: unknown) {
      doFatal(e);
    }
    sm.toDetached();
  }

  // Initial render: diff against nothing.
  try {
    reconcile(callUser("render", () => model.render()));
  } catch (e: unknown) {
    doFatal(e);
  }

  return {
    get state() {
      return sm.state;
    },
    get container() {
      if (site.kind === "container") return site.container;
      return marker === null ? null : platform.parentOf(marker);
    },
    dispatch,
    detach,
    topLevelNodes,
  };
}

/**
 * Render `model` into `container` and start dispatching.
 * The first tree is rendered synchronously.
 */
export function attach<M, C, N, S>(
  container: N,
  model: ModelPort<M, C>,
  options: AttachOptions<M, C, N, S>,
): App<M, N> {
  const runtime = createAppRuntime<M, C, N, S>({
    site: { kind: "container", container },
    model,
    platform: options.platform,
    config: resolveAppConfig(options.config),
    processEffect: options.processEffect ?? defaultProcessEffect,
  });
  return {
    get state() {
      return runtime.state;
    },
    get container() {
      return runtime.container;
    },
    dispatch: runtime.dispatch,
    detach: runtime.detach,
  };
}
