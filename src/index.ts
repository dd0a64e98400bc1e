export { TradeStationClient } from './client/tradestation-client.js';
export { RequestDispatcher, parseStreamLine } from './client/request-dispatcher.js';
export type { DispatchOptions } from './client/request-dispatcher.js';
export {
  classifyStreamMessage,
  consumeStream,
  defaultStreamHandlers,
  dispatchStreamMessage,
} from './client/stream-handlers.js';
export type { StreamHandlers } from './client/stream-handlers.js';
export { AuthManager } from './auth/auth-manager.js';
export { InMemoryTokenStore } from './auth/token-store.js';
export { CallbackServer } from './auth/callback-server.js';
export { buildOrderPayload, buildGroupOrderPayload, buildReplaceOrderPayload } from './orders/order.js';
export { resolveClientConfig, loadConfigFile } from './config/loader.js';
export { SdkError, ConfigurationError, AuthenticationError, RequestError } from './errors/index.js';
export type * from './types/index.js';
