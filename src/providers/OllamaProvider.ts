import { BaseProvider, type BaseProviderConfig } from "./BaseProvider";
import type {
  ChatMessage,
  ChatOptions,
  ChatResult,
  CompletionOptions,
  CompletionResult,
  ToolCall,
} from "../types";
import { ToolError } from "../errors";

interface OllamaToolCall {
  function: { name: string; arguments?: Record<string, unknown> | string };
}

interface OllamaResponse {
  message?: { content?: string; tool_calls?: OllamaToolCall[] };
  prompt_eval_count?: number;
  eval_count?: number;
}

function toOllamaMessage(message: ChatMessage) {
  switch (message.role) {
    case "assistant":
      return {
        role: "assistant",
        content: message.content,
        ...(message.toolCalls &&
          message.toolCalls.length > 0 && {
            tool_calls: message.toolCalls.map((call) => ({
              function: { name: call.name, arguments: call.arguments },
            })),
          }),
      };
    case "tool":
      return { role: "tool", name: message.name, content: message.content };
    default:
      return { role: message.role, content: message.content };
  }
}

function toToolCall(call: OllamaToolCall): ToolCall {
  const { name, arguments: raw } = call.function;
  if (typeof raw !== "string") {
    return { name, arguments: raw ?? {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw || "{}");
  } catch (error) {
    throw new ToolError(`Arguments for ${name} are not valid JSON`, name, error);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ToolError(`Arguments for ${name} must be a JSON object`, name);
  }
  return { name, arguments: { ...parsed } };
}

/**
 * Ollama provider talking to a local (or remote) Ollama server over fetch.
 * No API key is needed for a local server.
 */
export class OllamaProvider extends BaseProvider {
  private endpoint: string;

  constructor(config: BaseProviderConfig = {}) {
    super(config);
    this.endpoint = (this.baseUrl || "http://localhost:11434").replace(/\/+$/, "");
  }

  getDefaultModel(): string {
    return "gpt-oss:latest";
  }

  getName(): string {
    return "ollama";
  }

  supportsTools(): boolean {
    return true;
  }

  protected requiresApiKey(): boolean {
    return false;
  }

  async complete(options: CompletionOptions): Promise<CompletionResult> {
    const { systemPrompt, userPrompt, ...rest } = options;
    const result = await this.chat({
      ...rest,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userPrompt },
      ],
    });
    return { content: result.content, usage: result.usage };
  }

  async chat(options: ChatOptions): Promise<ChatResult> {
    const {
      messages,
      tools,
      maxTokens = 1000,
      temperature = 0,
      jsonMode = true,
    } = options;

    const data = await this.postJson<OllamaResponse>(
      `${this.endpoint}/api/chat`,
      {
        model: this.model,
        messages: messages.map(toOllamaMessage),
        stream: false,
        options: { temperature, num_predict: maxTokens },
        ...(tools &&
          tools.length > 0 && {
            tools: tools.map((tool) => ({ type: "function", function: tool })),
          }),
        ...(jsonMode && { format: "json" }),
      },
      this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}
    );

    return {
      content: data.message?.content || "",
      toolCalls: (data.message?.tool_calls ?? []).map(toToolCall),
      usage: {
        inputTokens: data.prompt_eval_count || 0,
        outputTokens: data.eval_count || 0,
      },
    };
  }
}
