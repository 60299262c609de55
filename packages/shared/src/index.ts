export { logger, type Logger } from './logger.js';
export { getTracer, withSpan } from './tracing.js';
export { CircuitBreaker, type CircuitBreakerOptions, type CircuitState } from './circuit-breaker.js';
export * from './errors.js';
export { isRecord } from './guards.js';
export * from './tool-types.js';
export * from './chat-types.js';
export {
  loadAppConfig,
  loadToolsConfig,
  parseToolsConfig,
  formatIssues,
  BackendDefinitionSchema,
  ToolsFileSchema,
  DEFAULT_SYSTEM_PROMPT,
  DEFAULT_GREETING,
  type AppConfig,
  type LlmConfig,
  type LlmProvider,
  type BackendDefinition,
  type BackendTransport,
  type LocalBackendDefinition,
  type SubprocessBackendDefinition,
  type SocketBackendDefinition,
  type SocketProtocol,
} from './config.js';
