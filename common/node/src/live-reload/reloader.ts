/**
 * Reload signal.
 *
 * State machine: waiting → notified → waiting. Long-poll requests park in
 * `waiting` and are released together when the host calls reload() after a
 * rebuild completes.
 */

import { EventEmitter, once } from "node:events";
import { resolveLogger, type Logger, type LoggerFactory } from "../logger.js";

const SERVICE_NAME = "strata-common:reloader";

export type ReloaderState = "waiting" | "notified";

export class Reloader {
  private readonly emitter = new EventEmitter();
  private currentState: ReloaderState = "waiting";
  private reloads = 0;
  private readonly log: Logger;

  constructor(params: { loggerFactory?: LoggerFactory } = {}) {
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
    // One listener per parked long-poll request.
    this.emitter.setMaxListeners(0);
  }

  get state(): ReloaderState {
    return this.currentState;
  }

  /** Number of reload signals fired so far. */
  get generation(): number {
    return this.reloads;
  }

  /** Number of requests currently parked. */
  get waiting(): number {
    return this.emitter.listenerCount("reload");
  }

  /** Releases every parked waiter, then returns to `waiting`. */
  reload(): void {
    this.currentState = "notified";
    this.reloads++;
    this.log.info?.({ waiters: this.waiting, generation: this.reloads }, `${SERVICE_NAME}:reload - Reload signalled`);
    try {
      this.emitter.emit("reload");
    } finally {
      this.currentState = "waiting";
    }
  }

  /**
   * Resolves on the next reload signal. Rejects with an AbortError when
   * `signal` aborts first; the listener is removed either way.
   */
  async waitForReload(signal?: AbortSignal): Promise<void> {
    await once(this.emitter, "reload", { signal });
  }
}
