// Main export
export { Pipeline } from "./pipeline";
export type {
  PipelineDependencies,
  PipelineRunOptions,
  PipelineOutcome,
  PipelineStats,
  PipelineState,
  FailedStage,
} from "./pipeline";
export { PIPELINE_TRANSITIONS, canTransition, isTerminal } from "./pipeline";

// Types
export type {
  Chunk,
  EntityCategory,
  EntityLists,
  PartialResult,
  ConsolidatedResult,
  RawEntities,
  ExtractionPrimitive,
  ConsolidationPrimitive,
  ContentLoader,
  CompletionOptions,
  CompletionResult,
  TokenUsage,
  ToolCall,
  ToolDefinition,
  ChatMessage,
  ChatOptions,
  ChatResult,
  ProviderName,
  ProviderConfig,
} from "./types";

// Configuration
export {
  DEFAULT_PIPELINE_CONFIG,
  DEFAULT_MAX_CONTENT_LENGTH,
  resolvePipelineConfig,
  validatePipelineConfig,
  validateChunkParameters,
  validateConcurrency,
  loadConfigFromEnv,
} from "./config";
export type {
  ChunkingStrategy,
  PipelineConfig,
  ResolvedPipelineConfig,
  EnvConfig,
} from "./config";

// Errors
export {
  DocsieveError,
  LoadError,
  ConfigurationError,
  ExtractionError,
  ConsolidationError,
  MalformedOutputError,
  ProviderError,
  ToolError,
} from "./errors";

// Chunking
export {
  FixedChunker,
  RecursiveChunker,
  splitText,
  splitTextRecursive,
  createChunker,
  DEFAULT_SEPARATORS,
} from "./chunking";
export type { Chunker } from "./chunking";

// Worker pool
export { WorkerPool, Semaphore } from "./pool";
export type { WorkerPoolConfig, WorkerPoolRunOptions } from "./pool";

// Merging
export {
  mergeUnion,
  mergeConsolidate,
  dedupeEntities,
  normalizeEntityKey,
} from "./merge";

// Providers
export {
  BaseProvider,
  createProvider,
  OpenAIProvider,
  AnthropicProvider,
  OllamaProvider,
} from "./providers";
export type { BaseProviderConfig } from "./providers";

// Extraction
export {
  LLMExtractor,
  LLMConsolidator,
  parseEntityResponse,
  parseConsolidationResponse,
  CATEGORY_ALIASES,
} from "./extraction";
export type { LLMExtractorConfig, LLMConsolidatorConfig } from "./extraction";

// Agent
export { AgentExtractor, FetchContentTool, ToolRegistry } from "./agent";
export type {
  AgentExtractorConfig,
  ToolCapability,
  ToolExecutor,
} from "./agent";

// Loaders
export { HtmlLoader, FileLoader, htmlToText } from "./loaders";
export type { HtmlLoaderConfig, FileLoaderConfig } from "./loaders";

// Sinks
export { BaseSink, JSONFileSink, InMemorySink } from "./sinks";
export type { JSONFileSinkConfig, OutputDocument } from "./sinks";

// Events
export { PipelineEventEmitter } from "./events";
export type { PipelineEvents, ExtractionProgress } from "./events";

// Logging
export { ConsoleLogger, NullLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";
