import * as http from "node:http";
import type { TimerPayload } from "@countdown/core";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { PushServer } from "../push/push-server.js";
import { ConnectionRegistry } from "../registry/connection-registry.js";
import { createMockFactory, createMockWss, type MockWss } from "./helpers.js";

describe("PushServer", () => {
  let registry: ConnectionRegistry;
  let wss: MockWss;
  let state: TimerPayload;
  const httpServer = http.createServer();

  function createServer(maxConnections = 0): PushServer {
    return new PushServer(registry, () => state, { maxConnections }, createMockFactory(wss));
  }

  beforeEach(() => {
    registry = new ConnectionRegistry();
    wss = createMockWss();
    state = { seconds: 12, running: true };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("attaches to the HTTP server on the default path", async () => {
    const factory = createMockFactory(wss);
    const server = new PushServer(registry, () => state, {}, factory);
    await server.attach(httpServer);

    expect(factory).toHaveBeenCalledWith({ server: httpServer, path: "/ws" });
    await server.stop();
  });

  it("registers a new subscriber and sends it the current state", async () => {
    const server = createServer();
    await server.attach(httpServer);
    const onConnect = vi.fn();
    server.onConnect(onConnect);

    const ws = wss.connect();

    expect(ws.received()).toEqual([{ seconds: 12, running: true }]);
    expect(registry.has(ws)).toBe(true);
    expect(server.connectionCount).toBe(1);
    expect(onConnect).toHaveBeenCalledWith(ws);
    await server.stop();
  });

  it("unregisters a subscriber when it closes", async () => {
    const server = createServer();
    await server.attach(httpServer);
    const onDisconnect = vi.fn();
    server.onDisconnect(onDisconnect);
    const ws = wss.connect();

    ws.emit("close", 1000, "bye");

    expect(registry.has(ws)).toBe(false);
    expect(onDisconnect).toHaveBeenCalledWith(ws, 1000, "bye");
    await server.stop();
  });

  it("unregisters a subscriber on a transport error", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const server = createServer();
    await server.attach(httpServer);
    const ws = wss.connect();

    ws.emit("error", new Error("ECONNRESET"));

    expect(registry.size).toBe(0);
    expect(warn).toHaveBeenCalledOnce();
    await server.stop();
  });

  it("ignores messages from subscribers", async () => {
    const server = createServer();
    await server.attach(httpServer);
    const ws = wss.connect();

    ws.emit("message", "hello");

    expect(ws.send).toHaveBeenCalledTimes(1);
    expect(registry.has(ws)).toBe(true);
    await server.stop();
  });

  it("closes connections beyond maxConnections with 1013", async () => {
    const server = createServer(1);
    await server.attach(httpServer);
    wss.connect();

    const extra = wss.connect();

    expect(extra.close).toHaveBeenCalledWith(1013, "Maximum connections reached");
    expect(extra.send).not.toHaveBeenCalled();
    expect(registry.size).toBe(1);
    await server.stop();
  });

  it("closes every subscriber with 1001 on stop", async () => {
    const server = createServer();
    await server.attach(httpServer);
    const a = wss.connect();
    const b = wss.connect();

    await server.stop();

    expect(a.close).toHaveBeenCalledWith(1001, "Server shutting down");
    expect(b.close).toHaveBeenCalledWith(1001, "Server shutting down");
    expect(registry.size).toBe(0);
    expect(wss.closed).toBe(true);
  });

  it("ignores connection events that are not sockets", async () => {
    const server = createServer();
    await server.attach(httpServer);

    for (const h of wss.handlers.get("connection") ?? []) {
      h({ not: "a socket" });
    }

    expect(registry.size).toBe(0);
    await server.stop();
  });
});
