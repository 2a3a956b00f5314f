/**
 * Retrieval core exports
 *
 * @module services/retrieval
 */

export * from './types.js';
export { DEFAULT_SOURCE_TABLES, SourceRegistry } from './source-registry.js';
export { DEFAULT_LIMITS, classifyQuery, type ClassifyOptions } from './query-intent.js';
export {
  TRUNCATION_MARKER,
  characterLength,
  truncateRow,
  truncateRows,
  truncateText,
} from './truncation.js';
export {
  SearchCoordinator,
  normalizeTitle,
  type SearchCoordinatorOptions,
} from './search-coordinator.js';
export {
  generateSuggestions,
  inferSourceTable,
  renderExtractInstruction,
  type SuggestionInput,
} from './suggestions.js';
export {
  ContentSearch,
  DEFAULT_SEARCH_LIMIT,
  DEFAULT_SNIPPET_LENGTH,
  buildSnippet,
  splitTerms,
} from './content-search.js';
export {
  buildExtraction,
  deriveSafeName,
  renderExtractionFile,
  writeExtraction,
  type WrittenExtraction,
} from './content-extractor.js';
export { RetrievalService, type RetrievalOptions } from './service.js';
