import { ValidationError } from "@countdown/errors";
import { describe, expect, it } from "vitest";
import { parseArgs } from "../cli-args.js";
import { loadConfigFromEnv, resolveConfig } from "../config.js";

describe("resolveConfig", () => {
  it("applies defaults", () => {
    expect(resolveConfig()).toEqual({
      port: 8000,
      hostname: "0.0.0.0",
      stateFile: "timer_state.json",
      tickIntervalMs: 1_000,
      errorBackoffMs: 1_000,
      maxConnections: 0,
      maxBufferedBytes: 65_536,
      pushPath: "/ws",
    });
  });

  it("throws CONFIG_INVALID naming every bad field", () => {
    try {
      resolveConfig({ port: 70_000, tickIntervalMs: 0 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.code).toBe("CONFIG_INVALID");
        expect(error.issues.map((i) => i.field)).toEqual(["port", "tickIntervalMs"]);
      }
    }
  });

  it("rejects a push path without a leading slash", () => {
    expect(() => resolveConfig({ pushPath: "ws" })).toThrow(ValidationError);
  });
});

describe("loadConfigFromEnv", () => {
  it("reads COUNTDOWN_* variables", () => {
    const config = loadConfigFromEnv({
      COUNTDOWN_PORT: "9000",
      COUNTDOWN_HOST: "127.0.0.1",
      COUNTDOWN_STATE_FILE: "/var/lib/countdown/state.json",
      COUNTDOWN_TICK_INTERVAL_MS: "250",
      COUNTDOWN_ERROR_BACKOFF_MS: "2000",
      COUNTDOWN_MAX_CONNECTIONS: "50",
      COUNTDOWN_MAX_BUFFERED_BYTES: "4096",
    });

    expect(config).toEqual({
      port: 9000,
      hostname: "127.0.0.1",
      stateFile: "/var/lib/countdown/state.json",
      tickIntervalMs: 250,
      errorBackoffMs: 2_000,
      maxConnections: 50,
      maxBufferedBytes: 4_096,
      pushPath: "/ws",
    });
  });

  it("treats empty variables as unset", () => {
    expect(loadConfigFromEnv({ COUNTDOWN_PORT: "  " }).port).toBe(8000);
  });

  it("lets overrides win over the environment", () => {
    const config = loadConfigFromEnv(
      { COUNTDOWN_PORT: "9000", COUNTDOWN_STATE_FILE: "env.json" },
      { port: 7000 },
    );
    expect(config.port).toBe(7000);
    expect(config.stateFile).toBe("env.json");
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfigFromEnv({ COUNTDOWN_PORT: "eighty" })).toThrow(
      /Invalid countdown server config: port:/,
    );
  });
});

describe("parseArgs", () => {
  it("maps flags onto config overrides", () => {
    const args = parseArgs([
      "node",
      "countdown-server",
      "--port",
      "9001",
      "--host",
      "127.0.0.1",
      "--state-file",
      "state.json",
    ]);

    expect(args).toEqual({
      help: false,
      overrides: { port: 9001, hostname: "127.0.0.1", stateFile: "state.json" },
    });
  });

  it("returns no overrides without flags", () => {
    expect(parseArgs(["node", "countdown-server"])).toEqual({ help: false, overrides: {} });
  });

  it("recognises --help", () => {
    expect(parseArgs(["node", "countdown-server", "--help"]).help).toBe(true);
  });

  it("leaves a bad port for the config schema to reject", () => {
    const { overrides } = parseArgs(["node", "countdown-server", "--port", "abc"]);
    expect(() => loadConfigFromEnv({}, overrides)).toThrow(ValidationError);
  });
});
