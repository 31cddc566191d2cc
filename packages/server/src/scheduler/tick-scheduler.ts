import { type Clock, defaultClock, type TimerPayload, toTimerPayload } from "@countdown/core";
import type { BroadcastResult, ConnectionRegistry } from "../registry/connection-registry.js";
import { persistSnapshot } from "../store/persist.js";
import type { SnapshotStore } from "../store/snapshot-store.js";
import { toPersistedSnapshot } from "../timer/snapshot.js";
import type { TimerStateMachine } from "../timer/timer-state-machine.js";
import { createEmitter, type Emitter } from "../utils/emitter.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const DEFAULT_TICK_INTERVAL_MS = 1_000;
export const DEFAULT_ERROR_BACKOFF_MS = 1_000;

export interface TickSchedulerDeps {
  readonly timer: TimerStateMachine;
  readonly store: SnapshotStore;
  readonly registry: ConnectionRegistry;
}

export interface TickSchedulerConfig {
  /** Sleep between iterations (default: 1000) */
  readonly intervalMs?: number;
  /** Sleep after an iteration throws (default: 1000) */
  readonly errorBackoffMs?: number;
  readonly clock?: Clock;
}

type TickSchedulerEvents = {
  tick: [payload: TimerPayload, result: BroadcastResult];
};

// ---------------------------------------------------------------------------
// TickScheduler
// ---------------------------------------------------------------------------

/**
 * Background loop that advances a running timer and pushes its state.
 *
 * Each iteration ticks and persists the timer when it is running, then
 * broadcasts the current state whether or not it is running, then sleeps
 * a fixed interval. Drift is not corrected; the timer's own elapsed-time
 * arithmetic absorbs it.
 */
export class TickScheduler {
  private readonly deps: TickSchedulerDeps;
  private readonly intervalMs: number;
  private readonly errorBackoffMs: number;
  private readonly clock: Clock;
  private readonly events: Emitter<TickSchedulerEvents> = createEmitter();
  private abortController: AbortController | undefined;
  private loop: Promise<void> | undefined;
  private _iterations = 0;

  constructor(deps: TickSchedulerDeps, config: TickSchedulerConfig = {}) {
    this.deps = deps;
    this.intervalMs = config.intervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.errorBackoffMs = config.errorBackoffMs ?? DEFAULT_ERROR_BACKOFF_MS;
    this.clock = config.clock ?? defaultClock;
  }

  /** Begin looping. The first iteration runs immediately. Idempotent. */
  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.abortController = controller;
    this.loop = this.run(controller.signal);
  }

  /**
   * Cancel the pending sleep and wait for the in-flight iteration to finish.
   */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.abortController?.abort(new DOMException("Scheduler stopped", "AbortError"));
    await loop;
    this.abortController = undefined;
    this.loop = undefined;
  }

  /**
   * One iteration body. Exposed so callers can drive the scheduler by hand.
   */
  async step(): Promise<BroadcastResult> {
    const { timer, store, registry } = this.deps;

    if (timer.running) {
      const { snapshot } = timer.tick(this.clock.now());
      await persistSnapshot(store, toPersistedSnapshot(snapshot));
    }

    const payload = toTimerPayload(timer.snapshot());
    const result = registry.broadcast(payload);
    this._iterations++;
    this.events.emit("tick", payload, result);
    return result;
  }

  /** Subscribe to completed iterations. Returns a disposer. */
  onTick(handler: (payload: TimerPayload, result: BroadcastResult) => void): () => void {
    return this.events.on("tick", handler);
  }

  get isRunning(): boolean {
    return this.loop !== undefined;
  }

  /** Completed iterations since construction. */
  get iterations(): number {
    return this._iterations;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let delay = this.intervalMs;
      try {
        await this.step();
      } catch (error) {
        console.error("[countdown-scheduler] Tick iteration failed:", error);
        delay = this.errorBackoffMs;
      }

      if (signal.aborted) break;
      try {
        await this.clock.sleep(delay, signal);
      } catch {
        // Sleep aborted: stop() was called
        break;
      }
    }
  }
}
