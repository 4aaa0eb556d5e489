import { ConfigurationError } from "./errors";
import type { ProviderConfig, ProviderName } from "./types";

export type ChunkingStrategy = "fixed" | "recursive";

export interface PipelineConfig {
  /** Maximum characters per chunk (default: 2000) */
  chunkSize?: number;
  /** Characters shared by consecutive chunks (default: 100) */
  chunkOverlap?: number;
  /** Maximum extraction calls in flight (default: 4) */
  concurrency?: number;
  /** Chunking strategy (default: "fixed") */
  chunking?: ChunkingStrategy;
  /** Run the consolidation pass when a consolidator is available (default: true) */
  consolidate?: boolean;
  /** Enable debug logging */
  debug?: boolean;
}

export type ResolvedPipelineConfig = Required<PipelineConfig>;

export const DEFAULT_PIPELINE_CONFIG: ResolvedPipelineConfig = {
  chunkSize: 2000,
  chunkOverlap: 100,
  concurrency: 4,
  chunking: "fixed",
  consolidate: true,
  debug: false,
};

/** Loaders truncate documents beyond this many characters */
export const DEFAULT_MAX_CONTENT_LENGTH = 50000;

const CHUNKING_STRATEGIES: readonly ChunkingStrategy[] = ["fixed", "recursive"];
const PROVIDER_NAMES: readonly ProviderName[] = ["openai", "anthropic", "ollama"];

/**
 * Apply defaults. Does not validate, so a bad value can still
 * fail the run at the chunking stage.
 */
export function resolvePipelineConfig(
  config: PipelineConfig = {}
): ResolvedPipelineConfig {
  return {
    chunkSize: config.chunkSize ?? DEFAULT_PIPELINE_CONFIG.chunkSize,
    chunkOverlap: config.chunkOverlap ?? DEFAULT_PIPELINE_CONFIG.chunkOverlap,
    concurrency: config.concurrency ?? DEFAULT_PIPELINE_CONFIG.concurrency,
    chunking: config.chunking ?? DEFAULT_PIPELINE_CONFIG.chunking,
    consolidate: config.consolidate ?? DEFAULT_PIPELINE_CONFIG.consolidate,
    debug: config.debug ?? DEFAULT_PIPELINE_CONFIG.debug,
  };
}

export function validateChunkParameters(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(
      `chunkSize must be a positive integer, got ${chunkSize}`
    );
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError(
      `chunkOverlap must be a non-negative integer, got ${overlap}`
    );
  }
  if (overlap >= chunkSize) {
    throw new ConfigurationError(
      `chunkOverlap (${overlap}) must be smaller than chunkSize (${chunkSize})`
    );
  }
}

export function validateConcurrency(concurrency: number): void {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError(
      `concurrency must be an integer >= 1, got ${concurrency}`
    );
  }
}

export function validatePipelineConfig(config: ResolvedPipelineConfig): void {
  validateChunkParameters(config.chunkSize, config.chunkOverlap);
  validateConcurrency(config.concurrency);
  if (!CHUNKING_STRATEGIES.includes(config.chunking)) {
    throw new ConfigurationError(
      `Unknown chunking strategy: ${String(config.chunking)}. Available: ${CHUNKING_STRATEGIES.join(", ")}`
    );
  }
}

// ============================================================================
// Environment
// ============================================================================

export interface EnvConfig {
  pipeline: PipelineConfig;
  provider?: ProviderConfig;
  maxContentLength?: number;
  outputPath?: string;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) return undefined;
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigurationError(`${key} must be an integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

function readBoolean(env: Env, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return undefined;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigurationError(`${key} must be a boolean, got "${raw}"`);
}

export function isChunkingStrategy(value: string): value is ChunkingStrategy {
  return CHUNKING_STRATEGIES.some((s) => s === value);
}

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((p) => p === value);
}

/**
 * Read DOCSIEVE_* variables. Unset variables stay undefined so
 * callers can layer CLI flags and defaults on top.
 */
export function loadConfigFromEnv(env: Env = process.env): EnvConfig {
  const rawChunking = env.DOCSIEVE_CHUNKING?.trim();
  let chunking: ChunkingStrategy | undefined;
  if (rawChunking) {
    if (!isChunkingStrategy(rawChunking)) {
      throw new ConfigurationError(
        `DOCSIEVE_CHUNKING must be one of ${CHUNKING_STRATEGIES.join(", ")}, got "${rawChunking}"`
      );
    }
    chunking = rawChunking;
  }

  const pipeline: PipelineConfig = {
    chunkSize: readInt(env, "DOCSIEVE_CHUNK_SIZE"),
    chunkOverlap: readInt(env, "DOCSIEVE_CHUNK_OVERLAP"),
    concurrency: readInt(env, "DOCSIEVE_CONCURRENCY"),
    chunking,
    consolidate: readBoolean(env, "DOCSIEVE_CONSOLIDATE"),
    debug: readBoolean(env, "DOCSIEVE_DEBUG"),
  };

  let provider: ProviderConfig | undefined;
  const providerName = env.DOCSIEVE_PROVIDER?.trim();
  if (providerName) {
    if (!isProviderName(providerName)) {
      throw new ConfigurationError(
        `Unknown provider: ${providerName}. Available: ${PROVIDER_NAMES.join(", ")}`
      );
    }
    provider = {
      provider: providerName,
      apiKey: env.DOCSIEVE_API_KEY || undefined,
      model: env.DOCSIEVE_MODEL || undefined,
      baseUrl: env.DOCSIEVE_BASE_URL || undefined,
      timeoutMs: readInt(env, "DOCSIEVE_TIMEOUT_MS"),
    };
  }

  return {
    pipeline,
    provider,
    maxContentLength: readInt(env, "DOCSIEVE_MAX_CONTENT_LENGTH"),
    outputPath: env.DOCSIEVE_OUTPUT || undefined,
  };
}
