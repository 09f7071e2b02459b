/**
 * Wiring of the configured cache, provider, service and templates for one
 * CLI invocation.
 */

import { openPokemonCache } from "../core/cache/impl/SqlitePokemonCache.js";
import type { IPokemonCache } from "../core/cache/interfaces/IPokemonCache.js";
import { createPoGoApiProvider } from "../core/provider/impl/PoGoApiProvider.js";
import { createPokemonService, type PokemonService, type SourcePrompt } from "../core/service/pokemon-service.js";
import { createTemplateManager, type TemplateManager } from "../core/templates/template-manager.js";
import { loadConfig } from "../utils/config.js";
import type { AppConfig } from "../utils/validation.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli-context");

export interface AppContext {
  config: AppConfig;
  cache: IPokemonCache;
  service: PokemonService;
  templates: TemplateManager;
  close(): void;
}

export interface AppContextOptions {
  prompt?: SourcePrompt;
}

export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config = loadConfig();
  logger.debug({ databasePath: config.databasePath, apiBaseUrl: config.apiBaseUrl }, "Configuration loaded");

  const cache = openPokemonCache({ dbPath: config.databasePath });
  const service = createPokemonService({
    cache,
    providerFactory: () =>
      createPoGoApiProvider({ baseUrl: config.apiBaseUrl, timeoutMs: config.requestTimeoutMs }),
    prompt: options.prompt,
  });
  const templates = createTemplateManager({ templatesDir: config.templatesDir });

  return {
    config,
    cache,
    service,
    templates,
    close: () => cache.close(),
  };
}

/**
 * Runs `fn` with a fresh context and always closes the cache afterwards.
 */
export async function withAppContext<T>(
  options: AppContextOptions,
  fn: (ctx: AppContext) => Promise<T>
): Promise<T> {
  const ctx = createAppContext(options);
  try {
    return await fn(ctx);
  } finally {
    ctx.close();
  }
}
