/**
 * Request Scope
 *
 * Per-request identity plus a queue of deferred actions. Actions are queued
 * as soon as the resource they release exists (or may exist) and run,
 * in order, when the scope is drained after the response has been sent or
 * the connection has closed.
 */

import { randomUUID } from "crypto";
import { errorMessage } from "../errors.js";

type DeferredAction = () => Promise<unknown>;

export class RequestScope {
  private readonly actions: { label: string; run: DeferredAction }[] = [];
  private drained: Promise<void> | null = null;

  constructor(public readonly requestId: string = randomUUID()) {}

  get pendingCount(): number {
    return this.drained ? 0 : this.actions.length;
  }

  /** True once a drain has started */
  get isDrained(): boolean {
    return this.drained !== null;
  }

  /**
   * Queue an action to run when the scope is drained
   */
  defer(label: string, run: DeferredAction): void {
    if (this.drained) {
      throw new Error(`Request scope ${this.requestId} is already drained`);
    }
    this.actions.push({ label, run });
  }

  /**
   * Run every deferred action. Safe to call more than once: later calls wait
   * for the first drain. A failing action is logged and does not stop the
   * remaining ones.
   */
  drain(): Promise<void> {
    if (!this.drained) {
      this.drained = this.runAll();
    }
    return this.drained;
  }

  /**
   * Run the deferred actions a second time if the scope was drained while
   * the request was still working (the client went away mid-request), so
   * files written after the first drain are released too.
   *
   * @returns whether the scope had already been drained
   */
  async redrain(): Promise<boolean> {
    if (!this.drained) return false;
    await this.drained;
    await this.runAll();
    return true;
  }

  private async runAll(): Promise<void> {
    for (const action of this.actions) {
      try {
        await action.run();
      } catch (err) {
        console.error(
          `[Request ${this.requestId}] Deferred ${action.label} failed: ${errorMessage(err)}`,
        );
      }
    }
  }
}
