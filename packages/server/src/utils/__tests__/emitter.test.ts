import { afterEach, describe, expect, it, vi } from "vitest";
import { createEmitter } from "../emitter.js";

type TimerEvents = {
  tick: [seconds: number, running: boolean];
  dropped: [reason: string];
  stopped: [];
};

describe("createEmitter", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("on / emit", () => {
    it("passes every argument to the handler", () => {
      const emitter = createEmitter<TimerEvents>();
      const handler = vi.fn();
      emitter.on("tick", handler);
      emitter.emit("tick", 9, true);
      expect(handler).toHaveBeenCalledWith(9, true);
    });

    it("supports zero-arg events", () => {
      const emitter = createEmitter<TimerEvents>();
      const handler = vi.fn();
      emitter.on("stopped", handler);
      emitter.emit("stopped");
      expect(handler).toHaveBeenCalledOnce();
    });

    it("calls handlers in registration order and only for their event", () => {
      const emitter = createEmitter<TimerEvents>();
      const order: string[] = [];
      emitter.on("tick", () => order.push("a"));
      emitter.on("tick", () => order.push("b"));
      emitter.on("dropped", () => order.push("dropped"));
      emitter.emit("tick", 1, true);
      expect(order).toEqual(["a", "b"]);
    });
  });

  describe("disposer", () => {
    it("removes only its own handler and is idempotent", () => {
      const emitter = createEmitter<TimerEvents>();
      const h1 = vi.fn();
      const h2 = vi.fn();
      const dispose = emitter.on("dropped", h1);
      emitter.on("dropped", h2);
      dispose();
      dispose();
      emitter.emit("dropped", "closed");
      expect(h1).not.toHaveBeenCalled();
      expect(h2).toHaveBeenCalledWith("closed");
      expect(emitter.count("dropped")).toBe(1);
    });
  });

  describe("error isolation", () => {
    it("logs a throwing handler and keeps calling the rest", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const emitter = createEmitter<TimerEvents>();
      const boom = new Error("boom");
      const after = vi.fn();
      emitter.on("tick", () => {
        throw boom;
      });
      emitter.on("tick", after);

      expect(() => emitter.emit("tick", 3, false)).not.toThrow();
      expect(after).toHaveBeenCalledWith(3, false);
      expect(warn).toHaveBeenCalledWith("[emitter] Handler for 'tick' threw:", boom);
    });
  });

  describe("snapshot semantics", () => {
    it("does not call a handler registered during the current emit", () => {
      const emitter = createEmitter<TimerEvents>();
      const late = vi.fn();
      emitter.on("tick", () => {
        emitter.on("tick", late);
      });
      emitter.emit("tick", 5, true);
      expect(late).not.toHaveBeenCalled();
      expect(emitter.count("tick")).toBe(2);
    });
  });

  describe("clear", () => {
    it("removes handlers for one event", () => {
      const emitter = createEmitter<TimerEvents>();
      const tick = vi.fn();
      const dropped = vi.fn();
      emitter.on("tick", tick);
      emitter.on("dropped", dropped);
      emitter.clear("tick");
      emitter.emit("tick", 1, true);
      emitter.emit("dropped", "x");
      expect(tick).not.toHaveBeenCalled();
      expect(dropped).toHaveBeenCalledOnce();
    });

    it("removes every handler when no event is given", () => {
      const emitter = createEmitter<TimerEvents>();
      emitter.on("tick", vi.fn());
      emitter.on("dropped", vi.fn());
      emitter.clear();
      expect(emitter.count("tick")).toBe(0);
      expect(emitter.count("dropped")).toBe(0);
    });
  });
});
