/**
 * packages/core/src/app/component.ts — Nested components.
 *
 * Why: A component is an isolated app with its own model, queue and ledger.
 * The parent stores only its handle (dispatch, detach, listNodes) and never
 * sees its tree. Messages cross the boundary in one direction each:
 *   - parent messages enter through `map`
 *   - component commands leave through `unmap`
 */

import type {
  ComponentConstructor,
  ComponentHostContext,
  NestedComponent,
} from "../tree/items.js";
import { resolveAppConfig } from "./config.js";
import { createAppRuntime, defaultProcessEffect } from "./createApp.js";
import type { AppConfig, ModelPort, ProcessEffect } from "./types.js";

export type ComponentDefinition<P, M, C> = Readonly<{
  /** Fresh model for each mounted instance. */
  model: () => ModelPort<M, C>;
  /** Parent message to component message; `undefined` drops it. */
  map: (message: P) => M | undefined;
  /** Component command to parent message; `undefined` keeps it local. */
  unmap: (command: C) => P | undefined;
  /** Handles commands that `unmap` keeps local. */
  processEffect?: ProcessEffect<M, C>;
  config?: AppConfig;
}>;

export function defineComponent<P, M, C>(
  definition: ComponentDefinition<P, M, C>,
): ComponentConstructor<P> {
  const config = resolveAppConfig(definition.config);
  const local: ProcessEffect<M, C> = definition.processEffect ?? defaultProcessEffect;

  return <N, S>(context: ComponentHostContext<P, N, S>): NestedComponent<P, N> => {
    const processEffect: ProcessEffect<M, C> = (command, dispatch) => {
      const parentMessage = definition.unmap(command);
      if (parentMessage !== undefined) {
        context.dispatch(parentMessage);
        return;
      }
      local(command, dispatch);
    };

    const runtime = createAppRuntime<M, C, N, S>({
      site: { kind: "floating" },
      model: definition.model(),
      platform: context.platform,
      config,
      processEffect,
    });

    return {
      dispatch(message) {
        const mapped = definition.map(message);
        if (mapped !== undefined) runtime.dispatch(mapped);
      },
      detach() {
        runtime.detach();
      },
      listNodes() {
        return runtime.topLevelNodes();
      },
    };
  };
}
