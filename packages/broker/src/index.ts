export * from './types/index.js';
export {
  resolveProviderConfig,
  isReasoningModel,
  loadBrokerSettings,
  type BrokerSettings,
} from './config/config.js';
export { ConversationStore, type ConversationStoreOptions, type Release } from './conversation/store.js';
export { createLogger, parseLogLevel, silentLogger, type Logger, type LogLevel, type LogContext } from './logging/logger.js';
export { createAdapter, type AdapterFactory } from './providers/factory.js';
export { Router, type RouterOptions } from './router/router.js';
export { getToolDefinitions, toAnthropicTools, toNativeTools } from './tools/registry.js';
export { decodeLine, decodeRequest, encodeEvent } from './transport/protocol.js';
export { runTransportLoop, type TransportLoopOptions } from './transport/loop.js';
