/**
 * @sprig-ui/core
 *
 * Platform-neutral reconciliation engine: item streams, the live-node ledger,
 * diff, patch application, and the message dispatcher.
 * This package MUST NOT use Node-specific APIs; hosts implement `Platform`.
 */

// =============================================================================
// Errors
// =============================================================================

export { SprigError, describeThrown, isSprigError } from "./errors.js";
export type { SprigErrorCode } from "./errors.js";

// =============================================================================
// Platform contract
// =============================================================================

export type { FrameScheduler, FrameToken, Platform, PlatformEvent } from "./platform.js";

// =============================================================================
// Tree items and descriptions
// =============================================================================

export { emptyStream, exitItem, hasStorage, opensScope } from "./tree/items.js";
export type {
  ComponentConstructor,
  ComponentHostContext,
  EventHandlerSpec,
  NestedComponent,
  OpeningItem,
  TreeItem,
  TreeItemKind,
  TreeItemStream,
} from "./tree/items.js";

export {
  component,
  el,
  onEvent,
  onInput,
  onMessage,
  onMessageEvent,
  text,
  treeItems,
} from "./tree/vdom.js";
export type {
  VAttribute,
  VChild,
  VComponent,
  VElement,
  VListener,
  VNode,
  VProps,
  VText,
} from "./tree/vdom.js";

// =============================================================================
// Reconciliation
// =============================================================================

export { LiveNodeStorage } from "./runtime/storage.js";
export type { ListenerHandle, StoredHandle, StoredKind } from "./runtime/storage.js";

export { PatchSequence, describePatch, formatPatches } from "./runtime/patch.js";
export type { Patch, PatchKind } from "./runtime/patch.js";

export { DEFAULT_VOLATILE_ATTRIBUTES, diff } from "./runtime/diff.js";
export type { DiffOptions } from "./runtime/diff.js";

export { DEFAULT_DEFERRED_ATTRIBUTES, applyPatches, resolveHandler } from "./runtime/apply.js";
export type { ApplyOptions, ApplyResult, ApplyTarget } from "./runtime/apply.js";

export { deepEqualUnknown, handlerSpecsEqual } from "./runtime/equality.js";
export { warnDev } from "./runtime/warnDev.js";

// =============================================================================
// App
// =============================================================================

export { attach, defaultProcessEffect, isCommandFn, resolveAppConfig } from "./app/createApp.js";
export { defineComponent } from "./app/component.js";
export type { ComponentDefinition } from "./app/component.js";
export type { AppState } from "./app/stateMachine.js";
export type {
  App,
  AppConfig,
  AttachOptions,
  CommandFn,
  Dispatch,
  EffectLists,
  ModelPort,
  ProcessEffect,
  ResolvedAppConfig,
} from "./app/types.js";
export { effects, noEffects } from "./app/effects.js";
