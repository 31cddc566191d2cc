/**
 * Countdown server configuration
 */

import { toValidationIssues, ValidationError } from "@countdown/errors";
import { z } from "zod";

export const CountdownServerConfigSchema = z.object({
  /** Port to listen on (default: 8000). 0 picks a free port. */
  port: z.number().int().min(0).max(65_535).default(8000),

  /** Hostname to bind to (default: "0.0.0.0") */
  hostname: z.string().min(1).default("0.0.0.0"),

  /** Snapshot file, overwritten on every state change (default: "timer_state.json") */
  stateFile: z.string().min(1).default("timer_state.json"),

  /** Sleep between scheduler iterations in milliseconds (default: 1 second) */
  tickIntervalMs: z.number().int().positive().default(1_000),

  /** Sleep after a failed scheduler iteration in milliseconds (default: 1 second) */
  errorBackoffMs: z.number().int().positive().default(1_000),

  /** Maximum concurrent push subscribers (default: 0 = unlimited) */
  maxConnections: z.number().int().nonnegative().default(0),

  /** Unsent bytes a subscriber may accumulate before it is dropped (default: 64 KiB) */
  maxBufferedBytes: z.number().int().positive().default(64 * 1024),

  /** WebSocket upgrade path (default: "/ws") */
  pushPath: z.string().startsWith("/").default("/ws"),
});

export type CountdownServerConfig = z.infer<typeof CountdownServerConfigSchema>;
export type CountdownServerConfigInput = z.input<typeof CountdownServerConfigSchema>;

/**
 * Apply defaults and validate. Throws ValidationError (CONFIG_INVALID)
 * naming every bad field.
 */
export function resolveConfig(input: unknown = {}): CountdownServerConfig {
  const result = CountdownServerConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = toValidationIssues(result.error, "config");
    throw new ValidationError({
      code: "CONFIG_INVALID",
      message: `Invalid countdown server config: ${result.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ")}`,
      issues,
    });
  }
  return result.data;
}

const ENV_KEYS = {
  port: "COUNTDOWN_PORT",
  hostname: "COUNTDOWN_HOST",
  stateFile: "COUNTDOWN_STATE_FILE",
  tickIntervalMs: "COUNTDOWN_TICK_INTERVAL_MS",
  errorBackoffMs: "COUNTDOWN_ERROR_BACKOFF_MS",
  maxConnections: "COUNTDOWN_MAX_CONNECTIONS",
  maxBufferedBytes: "COUNTDOWN_MAX_BUFFERED_BYTES",
} as const;

const NUMERIC_KEYS: ReadonlySet<string> = new Set([
  "port",
  "tickIntervalMs",
  "errorBackoffMs",
  "maxConnections",
  "maxBufferedBytes",
]);

/**
 * Read COUNTDOWN_* variables, then apply `overrides` (e.g. CLI flags) on top.
 * Empty variables count as unset.
 */
export function loadConfigFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
  overrides: CountdownServerConfigInput = {},
): CountdownServerConfig {
  const raw: Record<string, string | number> = {};
  for (const [key, name] of Object.entries(ENV_KEYS)) {
    const value = env[name]?.trim();
    if (value === undefined || value === "") continue;
    raw[key] = NUMERIC_KEYS.has(key) ? Number(value) : value;
  }
  return resolveConfig({ ...raw, ...stripUndefined(overrides) });
}

function stripUndefined(input: CountdownServerConfigInput): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}
