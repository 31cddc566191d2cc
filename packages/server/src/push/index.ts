export {
  DEFAULT_PUSH_PATH,
  PushServer,
  type PushServerConfig,
  type WebSocketLike,
  type WebSocketServerLike,
  type WsServerFactory,
} from "./push-server.js";
