import type Anthropic from "@anthropic-ai/sdk";
import { BaseProvider, type BaseProviderConfig } from "./BaseProvider";
import type { CompletionOptions, CompletionResult } from "../types";
import { ProviderError } from "../errors";

function statusOf(error: unknown): number | undefined {
  if (error instanceof Error && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

/**
 * Anthropic provider using the official @anthropic-ai/sdk package.
 * Completion only; tool calling goes through the OpenAI or Ollama providers.
 */
export class AnthropicProvider extends BaseProvider {
  private client: Anthropic | null = null;

  constructor(config: BaseProviderConfig) {
    super(config);
  }

  /**
   * Load the SDK lazily so it is only needed when this provider is used
   */
  private async getClient(): Promise<Anthropic> {
    if (this.client) return this.client;

    let AnthropicClient: typeof Anthropic;
    try {
      ({ default: AnthropicClient } = await import("@anthropic-ai/sdk"));
    } catch (error) {
      throw new ProviderError(
        "Anthropic SDK not installed. Run: npm install @anthropic-ai/sdk",
        this.getName(),
        undefined,
        error
      );
    }

    this.client = new AnthropicClient({
      apiKey: this.apiKey,
      timeout: this.timeoutMs,
      maxRetries: 0,
      ...(this.baseUrl ? { baseURL: this.baseUrl } : {}),
    });
    return this.client;
  }

  getDefaultModel(): string {
    return "claude-3-haiku-20240307";
  }

  getName(): string {
    return "anthropic";
  }

  async complete(options: CompletionOptions): Promise<CompletionResult> {
    const {
      systemPrompt,
      userPrompt,
      maxTokens = 1000,
      temperature = 0,
    } = options;

    const client = await this.getClient();

    let message: Anthropic.Message;
    try {
      message = await client.messages.create({
        model: this.model,
        max_tokens: maxTokens,
        temperature,
        system: systemPrompt,
        messages: [{ role: "user", content: userPrompt }],
      });
    } catch (error) {
      throw new ProviderError(
        "anthropic API error",
        this.getName(),
        statusOf(error),
        error
      );
    }

    const content = message.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");

    return {
      content,
      usage: {
        inputTokens: message.usage.input_tokens,
        outputTokens: message.usage.output_tokens,
      },
    };
  }
}
