/**
 * Shared test helpers for @countdown/server tests.
 *
 * Mock WebSocket objects, a mock WebSocket server and small HTTP helpers.
 */

import * as http from "node:http";
import type { TimerPayload } from "@countdown/core";
import { type Mock, vi } from "vitest";
import type { WebSocketLike, WebSocketServerLike, WsServerFactory } from "../push/push-server.js";

// ---------------------------------------------------------------------------
// Mock WebSocket
// ---------------------------------------------------------------------------

export interface MockWs extends WebSocketLike {
  readyState: number;
  bufferedAmount: number;
  send: Mock<(data: string, cb?: (err?: Error) => void) => void>;
  close: Mock<(code?: number, reason?: string) => void>;
  handlers: Map<string, ((...args: unknown[]) => void)[]>;
  /** Every payload passed to `send`, parsed. */
  received: () => TimerPayload[];
  /** Fire a socket event at the registered handlers. */
  emit: (event: string, ...args: unknown[]) => void;
}

export function createMockWs(): MockWs {
  const handlers = new Map<string, ((...args: unknown[]) => void)[]>();
  const send = vi.fn<(data: string, cb?: (err?: Error) => void) => void>();
  return {
    handlers,
    readyState: 1, // OPEN
    bufferedAmount: 0,
    send,
    close: vi.fn<(code?: number, reason?: string) => void>(),
    on(event: string, handler: (...args: unknown[]) => void) {
      const existing = handlers.get(event) ?? [];
      handlers.set(event, [...existing, handler]);
    },
    received(): TimerPayload[] {
      return send.mock.calls.map((call) => parsePayload(call[0]));
    },
    emit(event: string, ...args: unknown[]) {
      for (const h of handlers.get(event) ?? []) {
        h(...args);
      }
    },
  };
}

function parsePayload(raw: string): TimerPayload {
  const value: unknown = JSON.parse(raw);
  if (
    typeof value === "object" &&
    value !== null &&
    "seconds" in value &&
    typeof value.seconds === "number" &&
    "running" in value &&
    typeof value.running === "boolean"
  ) {
    return { seconds: value.seconds, running: value.running };
  }
  throw new Error(`Not a timer payload: ${raw}`);
}

// ---------------------------------------------------------------------------
// Mock WebSocket Server
// ---------------------------------------------------------------------------

export interface MockWss extends WebSocketServerLike {
  handlers: Map<string, ((...args: unknown[]) => void)[]>;
  closed: boolean;
  /** Simulate a client connecting and return its socket. */
  connect: () => MockWs;
}

export function createMockWss(): MockWss {
  const handlers = new Map<string, ((...args: unknown[]) => void)[]>();
  const wss: MockWss = {
    handlers,
    closed: false,
    on(event: string, handler: (...args: unknown[]) => void) {
      const existing = handlers.get(event) ?? [];
      handlers.set(event, [...existing, handler]);
    },
    close(cb?: (err?: Error) => void) {
      wss.closed = true;
      cb?.();
    },
    connect(): MockWs {
      const ws = createMockWs();
      for (const h of handlers.get("connection") ?? []) {
        h(ws, { headers: { host: "localhost" } });
      }
      return ws;
    },
  };
  return wss;
}

export function createMockFactory(wss: WebSocketServerLike): Mock<WsServerFactory> {
  return vi.fn<WsServerFactory>().mockReturnValue(wss);
}

// ---------------------------------------------------------------------------
// HTTP
// ---------------------------------------------------------------------------

export interface HttpResult {
  readonly status: number;
  readonly headers: http.IncomingHttpHeaders;
  readonly body: unknown;
}

/**
 * Issue a request against 127.0.0.1 and parse the JSON body.
 */
export function request(port: number, method: string, path: string): Promise<HttpResult> {
  return new Promise((resolve, reject) => {
    const req = http.request({ hostname: "127.0.0.1", port, path, method }, (res) => {
      let text = "";
      res.setEncoding("utf8");
      res.on("data", (chunk: string) => {
        text += chunk;
      });
      res.on("end", () => {
        resolve({
          status: res.statusCode ?? 0,
          headers: res.headers,
          body: text === "" ? undefined : JSON.parse(text),
        });
      });
      res.on("error", reject);
    });
    req.on("error", reject);
    req.end();
  });
}

/**
 * Listen on an ephemeral port with `handler` and return the port and a closer.
 */
export async function listen(
  handler: (req: http.IncomingMessage, res: http.ServerResponse) => Promise<void>,
): Promise<{ port: number; close: () => Promise<void> }> {
  const server = http.createServer((req, res) => {
    handler(req, res).catch((error: unknown) => {
      res.statusCode = 599;
      res.end(String(error));
    });
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : 0;
  return {
    port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err?: Error) => (err ? reject(err) : resolve()));
        server.closeIdleConnections();
      }),
  };
}
