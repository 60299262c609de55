/**
 * Toolkit resolution for `local` backends.
 *
 * `builtin:<name>` picks one of the toolkits shipped here; anything else is
 * imported as a module whose default export is a LocalToolkit.
 */

import { isAbsolute, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import {
  ConfigError,
  LocalToolkitSchema,
  formatIssues,
  isRecord,
  type LocalBackendDefinition,
  type LocalToolkit,
} from '@toolweave/shared';
import { calculatorToolkit } from './calculator.js';
import { echoToolkit } from './echo.js';
import { createFaqToolkit, loadFaqEntries } from './faq.js';
import { createRetrieverToolkit, loadKnowledgeBase } from './retriever.js';

export const BUILTIN_PREFIX = 'builtin:';

const DataOptionsSchema = z.object({ dataPath: z.string().optional() }).passthrough();

type ToolkitFactory = (options: Record<string, unknown>) => Promise<LocalToolkit>;

export const BUILTIN_TOOLKITS = new Map<string, ToolkitFactory>([
  ['calculator', async () => calculatorToolkit],
  ['echo', async () => echoToolkit],
  [
    'faq',
    async (options) => createFaqToolkit(await loadFaqEntries(DataOptionsSchema.parse(options).dataPath)),
  ],
  [
    'retriever',
    async (options) => createRetrieverToolkit(await loadKnowledgeBase(DataOptionsSchema.parse(options).dataPath)),
  ],
]);

function toImportSpecifier(module: string): string {
  if (module.startsWith('.') || isAbsolute(module)) {
    return pathToFileURL(resolve(module)).href;
  }
  return module;
}

export async function resolveToolkit(definition: LocalBackendDefinition): Promise<LocalToolkit> {
  const { module } = definition;

  if (module.startsWith(BUILTIN_PREFIX)) {
    const name = module.slice(BUILTIN_PREFIX.length);
    const factory = BUILTIN_TOOLKITS.get(name);
    if (!factory) {
      throw new ConfigError(
        `Unknown built-in toolkit '${name}'. Available: ${[...BUILTIN_TOOLKITS.keys()].join(', ')}`,
      );
    }
    return factory(definition.options ?? {});
  }

  const loaded: unknown = await import(toImportSpecifier(module));
  const candidate = isRecord(loaded) && 'default' in loaded ? loaded.default : loaded;
  const parsed = LocalToolkitSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(
      `Module '${module}' does not default-export a valid toolkit: ${formatIssues(parsed.error)}`,
    );
  }
  return parsed.data;
}
