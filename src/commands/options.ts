import { InvalidArgumentError } from "commander";
import type { EnvConfig } from "../config";
import { isProviderName, isChunkingStrategy } from "../config";
import type { ProviderConfig } from "../types";
import { ConfigurationError } from "../errors";

export const DEFAULT_OUTPUT_PATH = "data.json";

export interface ProviderOptions {
  provider?: string;
  model?: string;
}

export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return Number.parseInt(value, 10);
}

export function parseChunking(value: string): "fixed" | "recursive" {
  if (!isChunkingStrategy(value)) {
    throw new InvalidArgumentError(`Expected "fixed" or "recursive", got ${value}`);
  }
  return value;
}

/**
 * Flags win over DOCSIEVE_* variables; a local Ollama server is the
 * fallback when neither names a provider.
 */
export function resolveProviderConfig(
  options: ProviderOptions,
  env: EnvConfig
): ProviderConfig {
  const name = options.provider ?? env.provider?.provider ?? "ollama";
  if (!isProviderName(name)) {
    throw new ConfigurationError(
      `Unknown provider: ${name}. Available: openai, anthropic, ollama`
    );
  }
  return {
    provider: name,
    apiKey: env.provider?.apiKey,
    model: options.model ?? env.provider?.model,
    baseUrl: env.provider?.baseUrl,
    timeoutMs: env.provider?.timeoutMs,
  };
}

/**
 * Run `fn` with a signal that aborts on the first Ctrl+C
 */
export async function withInterrupt<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  onInterrupt: () => void
): Promise<T> {
  const controller = new AbortController();
  const handler = () => {
    onInterrupt();
    controller.abort();
  };
  process.once("SIGINT", handler);
  try {
    return await fn(controller.signal);
  } finally {
    process.removeListener("SIGINT", handler);
  }
}
