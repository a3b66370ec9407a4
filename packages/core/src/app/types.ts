import type { SprigError } from "../errors.js";
import type { Platform } from "../platform.js";
import type { TreeItemStream } from "../tree/items.js";
import type { AppState } from "./stateMachine.js";

export type Dispatch<M> = (message: M) => void;

/** Commands produced by one update: run now, or after the next render. */
export type EffectLists<C> = Readonly<{
  immediate: readonly C[];
  postRender: readonly C[];
}>;

/** The application's own logic, consumed by the dispatcher. */
export interface ModelPort<M, C> {
  update(message: M): EffectLists<C>;
  /** Stream describing the tree for the current model state. */
  render(): TreeItemStream<M>;
}

export type ProcessEffect<M, C> = (command: C, dispatch: Dispatch<M>) => void;

/** A command in its simplest form: a function of the app's dispatch. */
export type CommandFn<M> = (dispatch: Dispatch<M>) => void;

export type AppConfig = Readonly<{
  /** Attribute names re-set on every render even when unchanged. */
  volatileAttributes?: readonly string[];
  /** Attribute names written after every other patch of a render. */
  deferredAttributes?: readonly string[];
  /** Skip patch application when a render changes nothing. Default true. */
  skipNoopPatches?: boolean;
  onFatal?: (error: SprigError) => void;
}>;

export type ResolvedAppConfig = Readonly<{
  volatileAttributes: ReadonlySet<string>;
  deferredAttributes: ReadonlySet<string>;
  skipNoopPatches: boolean;
  onFatal: ((error: SprigError) => void) | null;
}>;

export type AttachOptions<M, C, N, S> = Readonly<{
  platform: Platform<N, S>;
  config?: AppConfig;
  /** Defaults to calling function commands with the app's dispatch. */
  processEffect?: ProcessEffect<M, C>;
}>;

export interface App<M, N> {
  readonly state: AppState;
  /** Mount container, or null for a component that has not been placed. */
  readonly container: N | null;
  dispatch(message: M): void;
  detach(): void;
}
