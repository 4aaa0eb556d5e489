// ============================================================================
// Fragments & Results
// ============================================================================

/**
 * A bounded slice of the source text.
 * Offsets are string indices into the original text (end exclusive).
 */
export interface Chunk {
  readonly index: number;
  readonly text: string;
  readonly startOffset: number;
  readonly endOffset: number;
}

/**
 * The three entity categories extracted from every fragment
 */
export type EntityCategory = "companies" | "persons" | "events";

export interface EntityLists {
  /** Companies, organizations or institutions */
  companies: string[];
  /** Full names of people */
  persons: string[];
  /** Events, resolutions, agreements or other relevant facts */
  events: string[];
}

/**
 * Output of the extraction primitive for a single chunk.
 * Exactly one is produced per chunk, failed or not.
 */
export interface PartialResult {
  /** Index of the originating chunk, used only for ordering */
  readonly chunkIndex: number;
  readonly companies: readonly string[];
  readonly persons: readonly string[];
  readonly events: readonly string[];
  /** True when extraction for this chunk raised */
  readonly failed: boolean;
}

/**
 * Final, deduplicated result of a pipeline run
 */
export interface ConsolidatedResult {
  /** Short summary, only present when the consolidation pass succeeded */
  summary?: string;
  companies: string[];
  persons: string[];
  events: string[];
}

/**
 * Input of the consolidation primitive: the union of unique raw entities
 */
export interface RawEntities {
  rawCompanies: string[];
  rawPersons: string[];
  rawEvents: string[];
}

// ============================================================================
// Primitives & Collaborators
// ============================================================================

/**
 * Turns fragment text into entity lists, or rejects.
 */
export interface ExtractionPrimitive {
  extract(fragment: string): Promise<EntityLists>;
}

/**
 * Cleans, deduplicates and summarizes the union of raw entities.
 */
export interface ConsolidationPrimitive {
  consolidate(raw: RawEntities): Promise<EntityLists & { summary: string }>;
}

/**
 * Supplies the raw text of a document (URL, path, ...)
 */
export interface ContentLoader {
  load(source: string, signal?: AbortSignal): Promise<string>;
}

// ============================================================================
// LLM Provider Types
// ============================================================================

/**
 * Options for LLM completion
 */
export interface CompletionOptions {
  /** System prompt */
  systemPrompt: string;
  /** User prompt */
  userPrompt: string;
  /** Maximum tokens in response */
  maxTokens?: number;
  /** Temperature (0-1, lower = more deterministic) */
  temperature?: number;
  /** Force JSON output mode */
  jsonMode?: boolean;
}

/**
 * Token usage reported by a provider
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

/**
 * Result from LLM completion
 */
export interface CompletionResult {
  /** The generated content */
  content: string;
  usage: TokenUsage;
}

/**
 * A tool invocation requested by the model
 */
export interface ToolCall {
  /** Provider-assigned id, echoed back with the tool result */
  id?: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * JSON-schema description of a tool offered to the model
 */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: {
    type: "object";
    properties: Record<string, { type: string; description?: string }>;
    required?: string[];
  };
}

export type ChatMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string; toolCalls?: ToolCall[] }
  | { role: "tool"; name: string; content: string; toolCallId?: string };

export interface ChatOptions {
  messages: ChatMessage[];
  tools?: ToolDefinition[];
  maxTokens?: number;
  temperature?: number;
  jsonMode?: boolean;
}

export interface ChatResult {
  content: string;
  /** Empty when the model produced a final answer */
  toolCalls: ToolCall[];
  usage: TokenUsage;
}

/**
 * Supported LLM providers
 */
export type ProviderName = "openai" | "anthropic" | "ollama";

/**
 * LLM provider configuration
 */
export interface ProviderConfig {
  /** Provider name */
  provider: ProviderName;
  /** API key (not needed for a local Ollama server) */
  apiKey?: string;
  /** Model to use (each provider has its own default) */
  model?: string;
  /** Base URL override (for proxies or self-hosted) */
  baseUrl?: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}
