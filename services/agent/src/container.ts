/**
 * Explicit wiring of the agent's long-lived parts. One container per process;
 * tests build their own with fakes in place of the completion service or the
 * backend factory.
 */

import {
  logger,
  loadToolsConfig,
  type AppConfig,
  type BackendDefinition,
  type CompletionService,
} from '@toolweave/shared';
import { createBackend, type BackendDeps } from './backends/factory.js';
import type { ToolBackend } from './backends/types.js';
import { createCompletionServiceFromConfig } from './completion/index.js';
import { createOrchestrator, type Orchestrator } from './orchestrator.js';
import { resolveToolkit } from './toolkits/index.js';
import { ToolDispatcher } from './tool-dispatcher.js';
import { ToolRegistry } from './tool-registry.js';

const log = logger.child({ module: 'container' });

export interface Container {
  config: AppConfig;
  registry: ToolRegistry;
  completion: CompletionService;
  orchestrator: Orchestrator;
  /** Re-reads the tools file */
  loadDefinitions: () => Promise<BackendDefinition[]>;
  shutdown: () => Promise<void>;
}

export interface ContainerOverrides {
  definitions?: BackendDefinition[];
  completion?: CompletionService;
  createBackend?: (definition: BackendDefinition) => ToolBackend;
  backendDeps?: Partial<BackendDeps>;
}

export async function createContainer(config: AppConfig, overrides: ContainerOverrides = {}): Promise<Container> {
  const loadDefinitions = () => loadToolsConfig(config.toolsConfigPath);
  const definitions = overrides.definitions ?? (await loadDefinitions());

  const backendDeps: BackendDeps = { resolveToolkit, ...overrides.backendDeps };
  const dispatcher = new ToolDispatcher({ maxOutputChars: config.maxToolOutputChars });
  const registry = new ToolRegistry(definitions, {
    createBackend: overrides.createBackend ?? ((d) => createBackend(d, backendDeps)),
    dispatcher,
    defaultTimeoutMs: config.toolCallTimeoutMs,
  });

  await registry.initializeAll();

  const completion = overrides.completion ?? (await createCompletionServiceFromConfig(config.llm));
  const orchestrator = createOrchestrator({
    registry,
    completion,
    config: {
      systemPrompt: config.systemPrompt,
      maxIterations: config.maxIterations,
      maxConversationTurns: config.maxConversationTurns,
      escalationHint: config.escalationHint,
      greeting: config.greeting,
    },
  });

  log.info(
    { provider: completion.provider, tools: registry.listTools().length, backends: definitions.length },
    'container ready',
  );

  return {
    config,
    registry,
    completion,
    orchestrator,
    loadDefinitions,
    shutdown: () => registry.closeAll(),
  };
}
