import type * as http from "node:http";
import type { TimerPayload } from "@countdown/core";
import type { ConnectionRegistry, PushConnection } from "../registry/connection-registry.js";
import { createEmitter, type Emitter } from "../utils/emitter.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PushServerConfig {
  /** Upgrade path on the HTTP server (default: "/ws") */
  readonly path?: string;
  /** Max concurrent subscribers. 0 = unlimited (default). */
  readonly maxConnections?: number;
}

export interface WebSocketLike extends PushConnection {
  on(event: string, handler: (...args: unknown[]) => void): void;
}

export interface WebSocketServerLike {
  on(event: string, handler: (...args: unknown[]) => void): void;
  close(cb?: (err?: Error) => void): void;
}

/**
 * Factory for creating the WebSocket server attached to `server`.
 * Injectable for testing.
 */
export type WsServerFactory = (options: { server: http.Server; path: string }) => WebSocketServerLike;

type PushServerEvents = {
  connect: [socket: WebSocketLike];
  disconnect: [socket: WebSocketLike, code: number, reason: string];
};

export const DEFAULT_PUSH_PATH = "/ws";

// ---------------------------------------------------------------------------
// PushServer
// ---------------------------------------------------------------------------

/**
 * WebSocket transport for the push channel.
 *
 * Accepts upgrades on the shared HTTP server, registers each socket with the
 * registry (which sends it the current state) and unregisters it on close or
 * error. Messages from clients are ignored.
 */
export class PushServer {
  private wss: WebSocketServerLike | undefined;
  private readonly registry: ConnectionRegistry;
  private readonly snapshot: () => TimerPayload;
  private readonly config: PushServerConfig;
  private readonly factory: WsServerFactory | undefined;
  private readonly events: Emitter<PushServerEvents> = createEmitter();

  constructor(
    registry: ConnectionRegistry,
    snapshot: () => TimerPayload,
    config: PushServerConfig = {},
    factory?: WsServerFactory,
  ) {
    this.registry = registry;
    this.snapshot = snapshot;
    this.config = config;
    this.factory = factory;
  }

  /**
   * Attach to an HTTP server and start accepting subscribers.
   */
  async attach(server: http.Server): Promise<void> {
    if (this.wss) return;
    const path = this.config.path ?? DEFAULT_PUSH_PATH;

    if (this.factory) {
      this.wss = this.factory({ server, path });
    } else {
      const { WebSocketServer } = await import("ws");
      this.wss = new WebSocketServer({ server, path });
    }

    this.wss.on("connection", (socket: unknown) => {
      if (isWebSocketLike(socket)) {
        this.handleConnection(socket);
      }
    });
    this.wss.on("error", (error: unknown) => {
      console.warn("[countdown-push] WebSocket server error:", error);
    });
  }

  /**
   * Close every subscriber with 1001 and stop accepting new ones.
   */
  async stop(): Promise<void> {
    const wss = this.wss;
    if (!wss) return;

    for (const socket of this.registry.list()) {
      socket.close(1001, "Server shutting down");
    }
    this.registry.clear();

    return new Promise<void>((resolve, reject) => {
      wss.close((err) => {
        this.wss = undefined;
        this.events.clear();
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /** Subscribe to accepted connections. Returns a disposer. */
  onConnect(handler: (socket: WebSocketLike) => void): () => void {
    return this.events.on("connect", handler);
  }

  /** Subscribe to closed connections. Returns a disposer. */
  onDisconnect(handler: (socket: WebSocketLike, code: number, reason: string) => void): () => void {
    return this.events.on("disconnect", handler);
  }

  get connectionCount(): number {
    return this.registry.size;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private handleConnection(socket: WebSocketLike): void {
    const maxConns = this.config.maxConnections ?? 0;
    if (maxConns > 0 && this.registry.size >= maxConns) {
      socket.close(1013, "Maximum connections reached");
      return;
    }

    socket.on("close", (code: unknown, reason: unknown) => {
      this.registry.unregister(socket);
      this.events.emit("disconnect", socket, Number(code) || 1000, String(reason ?? ""));
    });
    socket.on("error", (error: unknown) => {
      if (this.registry.unregister(socket)) {
        console.warn("[countdown-push] Connection error:", error);
      }
    });

    if (this.registry.register(socket, this.snapshot())) {
      this.events.emit("connect", socket);
    }
  }
}

function isWebSocketLike(value: unknown): value is WebSocketLike {
  return (
    typeof value === "object" &&
    value !== null &&
    "send" in value &&
    typeof value.send === "function" &&
    "close" in value &&
    typeof value.close === "function" &&
    "on" in value &&
    typeof value.on === "function" &&
    "readyState" in value &&
    typeof value.readyState === "number" &&
    "bufferedAmount" in value &&
    typeof value.bufferedAmount === "number"
  );
}
