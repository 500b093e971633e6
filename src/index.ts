export { loadAppConfig, type AppConfig } from './config/app.js';
export { createStockSearch, type StockSearchComponents, type StockSearchOverrides } from './bootstrap.js';
export { SchemaRegistry, SchemaDefinitionError } from './schema/SchemaRegistry.js';
export type { AttributeDescriptor, AttributeKind } from './schema/types.js';
export type {
  BoolClause,
  MatchPredicate,
  Predicate,
  RangePredicate,
  StructuredQuery,
  TermPredicate,
} from './query/types.js';
export { QueryValidator } from './query/QueryValidator.js';
export { pruneQuery } from './query/pruneQuery.js';
export { QueryCompiler, EMPTY_INPUT_ANSWER, matchAllFallback } from './compiler/QueryCompiler.js';
export { InterpretError } from './compiler/InterpretError.js';
export type { CompilerFailureKind, TransformOutcome, TransformResult } from './compiler/types.js';
export { ProviderError, type ModelProvider } from './llm/ModelProvider.js';
export { createModelProvider } from './llm/createModelProvider.js';
export { ElasticsearchIndexClient } from './search/ElasticsearchIndexClient.js';
export { SearchIndexError, type SearchHit, type SearchIndexClient } from './search/SearchIndexClient.js';
export { StockSearchService, type StockSearchOutcome } from './search/StockSearchService.js';
export { configureLogger, logger } from './utils/logger.js';
