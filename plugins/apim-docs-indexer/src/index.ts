export { createPipelineFromConfig, Pipeline } from './pipeline';
export type { PipelineDeps, PipelineStages, RunMode, RunSummary } from './pipeline';
export { loadSettings, parseSettings } from './config/config';
export type { Settings } from './config/config';
export { createLogger } from './services/logger';
export { Observability } from './services/Observability';
export { ConfigError, ErrorHandler, ExtractionError, StageError } from './services/ErrorHandler';
export type { BatchResult, Failure, Result } from './services/ErrorHandler';
export { renderMarkdown, parseSpecification } from './renderer/MarkdownRenderer';
export { WikiFuser } from './services/WikiFuser';
export { AzureSearchClient } from './services/AzureSearchClient';
export { AzureApiManagementProvider } from './services/ApiManagementClient';
export { buildIndexSchema } from './indexers/indexSchema';
export type { ApiManagementProvider } from './types/ApiManagement';
export type { SearchDocument, SearchIndexWriter } from './types/Search';
