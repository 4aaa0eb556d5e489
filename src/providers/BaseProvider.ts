import type {
  ChatOptions,
  ChatResult,
  CompletionOptions,
  CompletionResult,
} from "../types";
import { ConfigurationError, ProviderError } from "../errors";

export interface BaseProviderConfig {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 120000) */
  timeoutMs?: number;
}

/**
 * Abstract base class for LLM providers.
 * All provider implementations must extend this class.
 *
 * Requests are attempted once; the timeout is the only bound on a call.
 */
export abstract class BaseProvider {
  protected apiKey: string;
  protected model: string;
  protected baseUrl?: string;
  protected timeoutMs: number;

  constructor(config: BaseProviderConfig) {
    if (!config.apiKey && this.requiresApiKey()) {
      throw new ConfigurationError(`API key is required for ${this.getName()}`);
    }
    this.apiKey = config.apiKey ?? "";
    this.model = config.model || this.getDefaultModel();
    this.baseUrl = config.baseUrl;
    this.timeoutMs = config.timeoutMs ?? 120000;
  }

  /**
   * Get the default model for this provider
   */
  abstract getDefaultModel(): string;

  /**
   * Get the provider name
   */
  abstract getName(): string;

  /**
   * Generate a completion from the LLM
   */
  abstract complete(options: CompletionOptions): Promise<CompletionResult>;

  /**
   * Whether {@link chat} accepts tool definitions
   */
  supportsTools(): boolean {
    return false;
  }

  /**
   * Multi-turn chat with optional tool calling
   */
  async chat(_options: ChatOptions): Promise<ChatResult> {
    throw new ProviderError(
      `${this.getName()} does not support tool calling`,
      this.getName()
    );
  }

  getModel(): string {
    return this.model;
  }

  protected requiresApiKey(): boolean {
    return true;
  }

  /**
   * POST a JSON body, aborting after `timeoutMs`. Non-2xx responses
   * become ProviderError with the API's error message when it has one.
   */
  protected async postJson<T>(url: string, body: unknown, headers: Record<string, string> = {}): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...headers },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new ProviderError(
          `Request timeout after ${this.timeoutMs}ms`,
          this.getName()
        );
      }
      throw new ProviderError("Request failed", this.getName(), undefined, error);
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      const errorData = (await response
        .json()
        .catch(() => ({ error: { message: response.statusText } }))) as {
        error?: { message?: string } | string;
      };
      const message =
        typeof errorData.error === "string"
          ? errorData.error
          : errorData.error?.message || response.statusText;
      throw new ProviderError(
        `${this.getName()} API error: ${message}`,
        this.getName(),
        response.status
      );
    }

    return (await response.json()) as T;
  }
}
