import { BaseProvider, type BaseProviderConfig } from "./BaseProvider";
import type {
  ChatMessage,
  ChatOptions,
  ChatResult,
  CompletionOptions,
  CompletionResult,
  ToolCall,
  ToolDefinition,
} from "../types";
import { ToolError } from "../errors";

interface OpenAIToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

type OpenAIMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string; tool_calls?: OpenAIToolCall[] }
  | { role: "tool"; content: string; tool_call_id: string };

interface OpenAIResponse {
  choices: Array<{
    message?: { content?: string | null; tool_calls?: OpenAIToolCall[] };
  }>;
  usage?: { prompt_tokens?: number; completion_tokens?: number };
}

/**
 * Decode tool-call arguments, which the API sends as a JSON string
 */
function parseArguments(name: string, raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw || "{}");
  } catch (error) {
    throw new ToolError(`Arguments for ${name} are not valid JSON`, name, error);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ToolError(`Arguments for ${name} must be a JSON object`, name);
  }
  return { ...parsed };
}

function toOpenAIMessage(message: ChatMessage): OpenAIMessage {
  switch (message.role) {
    case "assistant":
      return {
        role: "assistant",
        content: message.content,
        ...(message.toolCalls &&
          message.toolCalls.length > 0 && {
          tool_calls: message.toolCalls.map((call, i) => ({
            id: call.id ?? `call_${i}`,
            type: "function" as const,
            function: {
              name: call.name,
              arguments: JSON.stringify(call.arguments),
            },
          })),
        }),
      };
    case "tool":
      return {
        role: "tool",
        content: message.content,
        tool_call_id: message.toolCallId ?? message.name,
      };
    default:
      return { role: message.role, content: message.content };
  }
}

function toOpenAITool(tool: ToolDefinition) {
  return {
    type: "function" as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

/**
 * OpenAI provider using native fetch (no SDK required).
 * Works with any OpenAI-compatible chat-completions endpoint.
 */
export class OpenAIProvider extends BaseProvider {
  private endpoint: string;

  constructor(config: BaseProviderConfig) {
    super(config);
    this.endpoint = this.baseUrl || "https://api.openai.com/v1";
  }

  getDefaultModel(): string {
    return "gpt-4o-mini";
  }

  getName(): string {
    return "openai";
  }

  supportsTools(): boolean {
    return true;
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

    const data = await this.postJson<OpenAIResponse>(
      `${this.endpoint}/chat/completions`,
      {
        model: this.model,
        messages: messages.map(toOpenAIMessage),
        max_tokens: maxTokens,
        temperature,
        ...(tools && tools.length > 0 && { tools: tools.map(toOpenAITool) }),
        ...(jsonMode && { response_format: { type: "json_object" } }),
      },
      { Authorization: `Bearer ${this.apiKey}` }
    );

    const message = data.choices[0]?.message;
    const toolCalls: ToolCall[] = (message?.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: parseArguments(call.function.name, call.function.arguments),
    }));

    return {
      content: message?.content || "",
      toolCalls,
      usage: {
        inputTokens: data.usage?.prompt_tokens || 0,
        outputTokens: data.usage?.completion_tokens || 0,
      },
    };
  }
}
