/**
 * packages/core/src/app/stateMachine.ts — Dispatcher lifecycle states.
 *
 * Why: The dispatcher's reentrancy guard is its state. A dispatch arriving
 * while the app is Updating or Rendering only enqueues; the active call drains.
 *
 *   Idle ──dispatch──▶ Updating ──▶ RenderScheduled ──frame──▶ Rendering
 *     ▲                   │  ▲                                    │
 *     └───────────────────┘  └────── queued messages ─────────────┘
 *
 * Detached and Faulted are terminal.
 */

import { SprigError } from "../errors.js";

export type AppState =
  | "Idle"
  | "Updating"
  | "RenderScheduled"
  | "Rendering"
  | "Detached"
  | "Faulted";

export class AppStateMachine {
  private current: AppState = "Idle";

  get state(): AppState {
    return this.current;
  }

  /** An update or render is running; dispatches only enqueue. */
  get busy(): boolean {
    return this.current === "Updating" || this.current === "Rendering";
  }

  get terminal(): boolean {
    return this.current === "Detached" || this.current === "Faulted";
  }

  toUpdating(): void {
    this.assertLive("toUpdating");
    this.current = "Updating";
  }

  toRendering(): void {
    if (this.current !== "RenderScheduled") this.invalid("toRendering");
    this.current = "Rendering";
  }

  /** Work finished; the next state depends on whether a frame is outstanding. */
  toSettled(renderPending: boolean): void {
    this.assertLive("toSettled");
    this.current = renderPending ? "RenderScheduled" : "Idle";
  }

  toDetached(): void {
    this.assertLive("toDetached");
    this.current = "Detached";
  }

  toFaulted(): void {
    if (this.current === "Detached") this.invalid("toFaulted");
    this.current = "Faulted";
  }

  private assertLive(method: string): void {
    if (this.terminal) this.invalid(method);
  }

  private invalid(method: string): never {
    throw new SprigError("SPRIG_INVALID_STATE", `${method}: app is ${this.current}`);
  }
}
