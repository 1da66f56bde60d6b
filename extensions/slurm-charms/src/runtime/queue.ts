import { createLogger, type Logger } from "../logger.js";
import type { Outcome } from "../types.js";

export type EventHandler<E> = (event: E) => Promise<Outcome>;

export type CycleReport = {
  handled: number;
  deferred: number;
};

function eventName(event: unknown): string {
  if (event && typeof event === "object" && "kind" in event) {
    return String(event.kind);
  }
  return String(event);
}

/**
 * Work queue with defer-for-redelivery. Each cycle handles fresh events in
 * arrival order, then redelivers events deferred in earlier cycles in their
 * original order. An event deferred during a cycle waits for the next one.
 */
export class EventQueue<E> {
  private readonly handler: EventHandler<E>;
  private readonly logger: Logger;
  private pending: E[] = [];
  private deferred: E[] = [];

  constructor(params: { handler: EventHandler<E>; logger?: Logger }) {
    this.handler = params.handler;
    this.logger = params.logger ?? createLogger("event-queue");
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  get deferredCount(): number {
    return this.deferred.length;
  }

  push(event: E): void {
    this.pending.push(event);
  }

  /** Dispatch now, nested inside whatever handler is running. */
  async emit(event: E): Promise<Outcome> {
    const outcome = await this.handler(event);
    if (outcome === "deferred") {
      this.logger.debug(`deferring ${eventName(event)}`);
      this.deferred.push(event);
    }
    return outcome;
  }

  /**
   * If a handler throws, events the cycle has not reached go back to the
   * head of their queues before the error propagates.
   */
  async runCycle(): Promise<CycleReport> {
    const fresh = this.pending.splice(0);
    const redelivered = this.deferred.splice(0);
    let handled = 0;

    for (const [index, event] of [...fresh, ...redelivered].entries()) {
      let outcome: Outcome;
      try {
        outcome = await this.emit(event);
      } catch (error) {
        const rest = index + 1;
        this.pending = [...fresh.slice(rest), ...this.pending];
        this.deferred = [...redelivered.slice(Math.max(0, rest - fresh.length)), ...this.deferred];
        throw error;
      }
      if (outcome === "handled") {
        handled++;
      }
    }

    return { handled, deferred: this.deferred.length };
  }

  /** Run cycles until nothing is pending and a cycle makes no progress. */
  async settle(maxCycles = 10): Promise<CycleReport> {
    let last: CycleReport = { handled: 0, deferred: this.deferred.length };
    for (let cycle = 0; cycle < maxCycles; cycle++) {
      const hadFresh = this.pending.length > 0;
      last = await this.runCycle();
      const stalled = !hadFresh && last.handled === 0;
      if (this.pending.length === 0 && (last.deferred === 0 || stalled)) {
        break;
      }
    }
    return last;
  }
}
