import { QueryCompiler } from './compiler/QueryCompiler.js';
import type { AppConfig } from './config/app.js';
import { createModelProvider } from './llm/createModelProvider.js';
import type { ModelProvider } from './llm/ModelProvider.js';
import { PromptManager } from './llm/PromptManager.js';
import { SchemaRegistry } from './schema/SchemaRegistry.js';
import { ElasticsearchIndexClient } from './search/ElasticsearchIndexClient.js';
import type { SearchIndexClient } from './search/SearchIndexClient.js';
import { StockSearchService } from './search/StockSearchService.js';
import { configureLogger, logger } from './utils/logger.js';

export interface StockSearchComponents {
  registry: SchemaRegistry;
  provider: ModelProvider;
  compiler: QueryCompiler;
  index: SearchIndexClient;
  service: StockSearchService;
}

/** Stand-ins for the external collaborators, used by tests and offline tools */
export interface StockSearchOverrides {
  provider?: ModelProvider;
  index?: SearchIndexClient;
}

/**
 * Wire the stock search from a loaded configuration: logger, schema registry,
 * model provider, compiler, index client.
 *
 * @throws SchemaDefinitionError if the schema definition is malformed
 * @throws Error if a prompt file is missing
 */
export function createStockSearch(
  config: AppConfig,
  overrides: StockSearchOverrides = {}
): StockSearchComponents {
  configureLogger(config.debug);

  const registry = SchemaRegistry.load(config.compiler.schemaPath);
  const provider = overrides.provider ?? createModelProvider(config.provider);
  const compiler = new QueryCompiler({
    registry,
    prompts: new PromptManager(config.compiler.promptsDir),
    provider,
    config: config.compiler,
  });
  const index = overrides.index ?? ElasticsearchIndexClient.fromConfig(config.search, registry);

  logger.info('Stock search ready', {
    schemaVersion: registry.version,
    fields: registry.describe().size,
    provider: provider.name,
    model: provider.model,
    index: config.search.index,
  });

  return { registry, provider, compiler, index, service: new StockSearchService(compiler, index) };
}
