export { createCompletionService, createCompletionServiceFromConfig, isAbortError } from './service.js';
export { parseToolArguments, toolCallFromText } from './arguments.js';
export type { ProviderAdapter, AdapterStreamOptions } from './types.js';
