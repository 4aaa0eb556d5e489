import { BaseProvider, type BaseProviderConfig } from "./BaseProvider";
import { OpenAIProvider } from "./OpenAIProvider";
import { AnthropicProvider } from "./AnthropicProvider";
import { OllamaProvider } from "./OllamaProvider";
import type { ProviderConfig, ProviderName } from "../types";
import { ConfigurationError } from "../errors";

export { BaseProvider, OpenAIProvider, AnthropicProvider, OllamaProvider };
export type { BaseProviderConfig };

/**
 * Provider registry for creating providers by name
 */
const providerRegistry: Record<
  ProviderName,
  new (config: BaseProviderConfig) => BaseProvider
> = {
  openai: OpenAIProvider,
  anthropic: AnthropicProvider,
  ollama: OllamaProvider,
};

/**
 * Create a provider instance from configuration
 */
export function createProvider(config: ProviderConfig): BaseProvider {
  const ProviderClass = providerRegistry[config.provider];
  if (!ProviderClass) {
    throw new ConfigurationError(
      `Unknown provider: ${config.provider}. Available: ${Object.keys(
        providerRegistry
      ).join(", ")}`
    );
  }

  return new ProviderClass({
    apiKey: config.apiKey,
    model: config.model,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
  });
}
