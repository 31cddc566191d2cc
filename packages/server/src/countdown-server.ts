import * as http from "node:http";
import { type Clock, defaultClock, toTimerPayload } from "@countdown/core";
import { type CountdownServerConfig, type CountdownServerConfigInput, resolveConfig } from "./config.js";
import { createControlHandler } from "./control/control-api.js";
import { PushServer, type WsServerFactory } from "./push/push-server.js";
import { ConnectionRegistry } from "./registry/connection-registry.js";
import { TickScheduler } from "./scheduler/tick-scheduler.js";
import { FileSnapshotStore } from "./store/file-snapshot-store.js";
import type { SnapshotStore } from "./store/snapshot-store.js";
import { freshTimerState, recoverTimerState } from "./timer/snapshot.js";
import { TimerStateMachine } from "./timer/timer-state-machine.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CountdownServerDeps {
  /** Snapshot backend (default: FileSnapshotStore at `config.stateFile`) */
  readonly store?: SnapshotStore;
  readonly clock?: Clock;
  readonly registry?: ConnectionRegistry;
  readonly wsFactory?: WsServerFactory;
}

// ---------------------------------------------------------------------------
// CountdownServer
// ---------------------------------------------------------------------------

/**
 * Top-level orchestrator for the countdown service.
 *
 * Wires all subsystems together:
 * - TimerStateMachine (authoritative state, one per server)
 * - SnapshotStore (persistence and startup recovery)
 * - ConnectionRegistry + PushServer (WebSocket subscribers)
 * - TickScheduler (background countdown and broadcast)
 * - Control handler (HTTP endpoints on the same server)
 */
export class CountdownServer {
  readonly config: CountdownServerConfig;
  readonly timer: TimerStateMachine;
  readonly store: SnapshotStore;
  readonly registry: ConnectionRegistry;
  readonly scheduler: TickScheduler;
  private readonly clock: Clock;
  private readonly push: PushServer;
  private readonly server: http.Server;
  private started = false;

  constructor(config: CountdownServerConfigInput = {}, deps: CountdownServerDeps = {}) {
    this.config = resolveConfig(config);
    this.clock = deps.clock ?? defaultClock;
    this.store = deps.store ?? new FileSnapshotStore(this.config.stateFile);
    this.timer = new TimerStateMachine(freshTimerState(this.clock.now()), this.clock);
    this.registry = deps.registry ??
      new ConnectionRegistry({ maxBufferedBytes: this.config.maxBufferedBytes });

    this.scheduler = new TickScheduler(
      { timer: this.timer, store: this.store, registry: this.registry },
      {
        intervalMs: this.config.tickIntervalMs,
        errorBackoffMs: this.config.errorBackoffMs,
        clock: this.clock,
      },
    );

    this.push = new PushServer(
      this.registry,
      () => toTimerPayload(this.timer.snapshot()),
      { path: this.config.pushPath, maxConnections: this.config.maxConnections },
      deps.wsFactory,
    );

    const handle = createControlHandler({ timer: this.timer, store: this.store });
    this.server = http.createServer((req, res) => {
      handle(req, res).catch((error: unknown) => {
        console.error("[countdown-server] Unhandled request error:", error);
        if (!res.writableEnded) {
          res.statusCode = 500;
          res.end();
        }
      });
    });
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Recover state, listen, accept subscribers, then start ticking.
   * Rejects if the port cannot be bound.
   */
  async start(): Promise<void> {
    if (this.started) return;
    await this.recover();
    await this.listen();
    await this.push.attach(this.server);
    this.scheduler.start();
    this.started = true;
    console.info(`[countdown-server] Listening on http://${this.config.hostname}:${this.port}`);
  }

  /**
   * Stop ticking, close subscribers with 1001, then let in-flight
   * control calls finish before the HTTP server closes.
   */
  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    await this.scheduler.stop();
    await this.push.stop();
    await new Promise<void>((resolve, reject) => {
      this.server.close((err?: Error) => {
        if (err) reject(err);
        else resolve();
      });
      this.server.closeIdleConnections();
    });
    console.info("[countdown-server] Stopped");
  }

  /** Bound port once started, configured port before. */
  get port(): number {
    const address = this.server.address();
    return typeof address === "object" && address !== null ? address.port : this.config.port;
  }

  get isStarted(): boolean {
    return this.started;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private async recover(): Promise<void> {
    const result = await this.store.load();
    const now = this.clock.now();

    if (!result.success) {
      console.warn(
        `[countdown-server] Ignoring stored timer state, starting fresh: ${result.error.message}`,
      );
      this.timer.restore(freshTimerState(now));
      return;
    }

    this.timer.restore(result.value ? recoverTimerState(result.value, now) : freshTimerState(now));
  }

  private listen(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(error);
      };
      this.server.once("error", onError);
      this.server.listen(this.config.port, this.config.hostname, () => {
        this.server.off("error", onError);
        resolve();
      });
    });
  }
}
