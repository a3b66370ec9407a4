/**
 * @sprig-ui/dom
 *
 * DOM host for @sprig-ui/core: a `Platform` over a `Document`, plus a helper
 * that mounts an app into an element of that document.
 */

import { attach } from "@sprig-ui/core";
import type { App, AppConfig, ModelPort, ProcessEffect } from "@sprig-ui/core";
import { createDomPlatform } from "./domPlatform.js";
import type { DomPlatformOptions, DomSubscription } from "./domPlatform.js";

export {
  createDomPlatform,
  createFrameScheduler,
  inputValueOf,
  isElement,
  parseBooleanAttribute,
} from "./domPlatform.js";
export type { DomPlatform, DomPlatformOptions, DomSubscription } from "./domPlatform.js";

export type MountOptions<M, C> = Readonly<
  DomPlatformOptions & {
    config?: AppConfig;
    processEffect?: ProcessEffect<M, C>;
  }
>;

/**
 * Render `model` into `container` using the container's own document.
 * Existing children of `container` stay in place before the app's nodes.
 */
export function mount<M, C>(
  container: Element,
  model: ModelPort<M, C>,
  opts: MountOptions<M, C> = {},
): App<M, Node> {
  const platform = createDomPlatform(container.ownerDocument, { scheduler: opts.scheduler });
  return attach<M, C, Node, DomSubscription>(container, model, {
    platform,
    config: opts.config,
    processEffect: opts.processEffect,
  });
}
