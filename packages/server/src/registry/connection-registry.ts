import type { TimerPayload } from "@countdown/core";
import { ExternalError, getErrorMessage } from "@countdown/errors";
import { createEmitter, type Emitter } from "../utils/emitter.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** WebSocket readyState for an open connection. */
export const OPEN = 1;

/** Bytes a subscriber may leave unread before it is dropped. */
export const DEFAULT_MAX_BUFFERED_BYTES = 64 * 1024;

/** Close code sent to a subscriber dropped for not reading. */
export const SLOW_CONSUMER_CLOSE_CODE = 1008;

/**
 * The slice of a WebSocket the registry needs. `ws` sockets satisfy it.
 */
export interface PushConnection {
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  readonly readyState: number;
  /** Bytes queued by `send` but not yet written to the socket. */
  readonly bufferedAmount: number;
}

export interface ConnectionRegistryConfig {
  /** Drop a subscriber whose unsent backlog exceeds this many bytes. */
  readonly maxBufferedBytes?: number;
}

export interface BroadcastResult {
  readonly delivered: number;
  readonly dropped: number;
}

type ConnectionRegistryEvents = {
  "connection.dropped": [connection: PushConnection, error: ExternalError];
};

// ---------------------------------------------------------------------------
// ConnectionRegistry
// ---------------------------------------------------------------------------

/**
 * Live set of push subscribers and the fan-out over it.
 *
 * The set is replaced on every write, so a broadcast walks the membership
 * as it was when the broadcast began. Any connection that fails a send, or
 * has stopped reading, is removed; the rest still receive the payload.
 */
export class ConnectionRegistry {
  private connections: ReadonlySet<PushConnection> = new Set();
  private readonly events: Emitter<ConnectionRegistryEvents> = createEmitter();
  private readonly maxBufferedBytes: number;

  constructor(config: ConnectionRegistryConfig = {}) {
    this.maxBufferedBytes = config.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;
  }

  /**
   * Add a connection and send it `initial` straight away.
   * Returns false (and keeps nothing) if that first send fails.
   */
  register(connection: PushConnection, initial: TimerPayload): boolean {
    if (this.connections.has(connection)) return true;
    this.connections = new Set([...this.connections, connection]);

    const failure = this.deliver(connection, JSON.stringify(initial));
    if (failure) {
      this.drop(connection, failure);
      return false;
    }
    return true;
  }

  /** Idempotent. */
  unregister(connection: PushConnection): boolean {
    if (!this.connections.has(connection)) return false;
    const next = new Set(this.connections);
    next.delete(connection);
    this.connections = next;
    return true;
  }

  /**
   * Send `payload` to every registered connection.
   * Failed connections are removed once the pass is complete.
   */
  broadcast(payload: TimerPayload): BroadcastResult {
    const message = JSON.stringify(payload);
    const snapshot = this.connections;
    const failed: [PushConnection, ExternalError][] = [];
    let delivered = 0;

    for (const connection of snapshot) {
      const failure = this.deliver(connection, message);
      if (failure) {
        failed.push([connection, failure]);
      } else {
        delivered++;
      }
    }

    for (const [connection, error] of failed) {
      this.drop(connection, error);
    }

    return { delivered, dropped: failed.length };
  }

  has(connection: PushConnection): boolean {
    return this.connections.has(connection);
  }

  get size(): number {
    return this.connections.size;
  }

  /** Current members, in registration order. */
  list(): readonly PushConnection[] {
    return [...this.connections];
  }

  clear(): void {
    this.connections = new Set();
  }

  /**
   * Subscribe to connections removed after a failed send. Returns a disposer.
   */
  onDropped(handler: (connection: PushConnection, error: ExternalError) => void): () => void {
    return this.events.on("connection.dropped", handler);
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  /** Returns the failure, or undefined if the send was handed off. */
  private deliver(connection: PushConnection, message: string): ExternalError | undefined {
    if (connection.readyState !== OPEN) {
      return new ExternalError({
        code: "PUSH_SEND_FAILED",
        message: `Connection is not open (readyState ${connection.readyState})`,
      });
    }
    if (connection.bufferedAmount > this.maxBufferedBytes) {
      connection.close(SLOW_CONSUMER_CLOSE_CODE, "Subscriber too slow");
      return new ExternalError({
        code: "PUSH_SEND_FAILED",
        message: `Subscriber is not reading (${connection.bufferedAmount} bytes buffered)`,
      });
    }
    try {
      // Write errors surface asynchronously through the callback.
      connection.send(message, (err) => {
        if (err && this.connections.has(connection)) {
          this.drop(connection, sendFailed(err));
        }
      });
      return undefined;
    } catch (error) {
      return sendFailed(error);
    }
  }

  private drop(connection: PushConnection, error: ExternalError): void {
    if (!this.unregister(connection)) return;
    console.warn(`[countdown-registry] Dropping connection: ${error.message}`);
    this.events.emit("connection.dropped", connection, error);
  }
}

function sendFailed(error: unknown): ExternalError {
  return new ExternalError({
    code: "PUSH_SEND_FAILED",
    message: `Send failed: ${getErrorMessage(error)}`,
    cause: error instanceof Error ? error : undefined,
  });
}
