export {
  type BroadcastResult,
  ConnectionRegistry,
  type ConnectionRegistryConfig,
  DEFAULT_MAX_BUFFERED_BYTES,
  OPEN,
  type PushConnection,
  SLOW_CONSUMER_CLOSE_CODE,
} from "./connection-registry.js";
