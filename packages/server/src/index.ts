/**
 * @countdown/server
 *
 * Shared countdown timer: HTTP control endpoints, WebSocket push channel,
 * background tick loop and snapshot persistence.
 */

export const PACKAGE_NAME = "@countdown/server" as const;

export { type CliArgs, HELP_TEXT, parseArgs } from "./cli-args.js";
export {
  type CountdownServerConfig,
  type CountdownServerConfigInput,
  CountdownServerConfigSchema,
  loadConfigFromEnv,
  resolveConfig,
} from "./config.js";
export * from "./control/index.js";
export { CountdownServer, type CountdownServerDeps } from "./countdown-server.js";
export * from "./push/index.js";
export * from "./registry/index.js";
export * from "./scheduler/index.js";
export * from "./store/index.js";
export * from "./timer/index.js";
export { createEmitter, type Emitter, type EventMap } from "./utils/emitter.js";
