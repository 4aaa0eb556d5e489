import type { ChatMessage, ChatResult, EntityLists } from "../types";
import type { BaseProvider } from "../providers/BaseProvider";
import type { PipelineEventEmitter } from "../events";
import type { ToolRegistry } from "./tools";
import { ConfigurationError, ToolError } from "../errors";
import { defaultLogger, type Logger } from "../logger";
import { AGENT_SYSTEM_PROMPT, buildAgentPrompt } from "../extraction/prompts";
import { parseEntityResponse } from "../extraction/parser";

export interface AgentExtractorConfig {
  /** Maximum rounds of tool execution (default: 5) */
  maxIterations?: number;
  /** Maximum tokens in each response (default: 2000) */
  maxTokens?: number;
  logger?: Logger;
  events?: PipelineEventEmitter;
}

/**
 * Extracts entities from a URL by letting the model fetch the page
 * through registered tools.
 *
 * Each round executes every tool call of the last response in order and
 * sends the results back. After `maxIterations` rounds the last response
 * is parsed as-is.
 */
export class AgentExtractor {
  private provider: BaseProvider;
  private registry: ToolRegistry;
  private maxIterations: number;
  private maxTokens: number;
  private logger: Logger;
  private events?: PipelineEventEmitter;

  constructor(
    provider: BaseProvider,
    registry: ToolRegistry,
    config: AgentExtractorConfig = {}
  ) {
    if (!provider.supportsTools()) {
      throw new ConfigurationError(
        `Provider ${provider.getName()} does not support tool calling`
      );
    }
    const maxIterations = config.maxIterations ?? 5;
    if (!Number.isInteger(maxIterations) || maxIterations < 0) {
      throw new ConfigurationError(
        `maxIterations must be a non-negative integer, got ${maxIterations}`
      );
    }
    this.provider = provider;
    this.registry = registry;
    this.maxIterations = maxIterations;
    this.maxTokens = config.maxTokens ?? 2000;
    this.logger = config.logger ?? defaultLogger();
    this.events = config.events;
  }

  async extract(url: string, signal?: AbortSignal): Promise<EntityLists> {
    const messages: ChatMessage[] = [
      { role: "system", content: AGENT_SYSTEM_PROMPT },
      { role: "user", content: buildAgentPrompt(url) },
    ];

    let response = await this.send(messages);
    let iteration = 0;

    while (response.toolCalls.length > 0 && iteration < this.maxIterations) {
      iteration++;
      this.logger.debug(`[AgentExtractor] Iteration ${iteration}`, {
        toolCalls: response.toolCalls.map((call) => call.name),
      });
      messages.push({
        role: "assistant",
        content: response.content,
        toolCalls: response.toolCalls,
      });

      for (const call of response.toolCalls) {
        const tool = this.registry.get(call.name);
        if (!tool) {
          throw new ToolError(`Tool "${call.name}" is not registered`, call.name);
        }
        this.events?.emit("tool:call", { tool: call.name, iteration });
        const output = await tool.execute(call.arguments, signal);
        this.logger.debug(
          `[AgentExtractor] ${call.name} returned ${output.length} characters`
        );
        messages.push({
          role: "tool",
          name: call.name,
          content: output,
          toolCallId: call.id,
        });
      }

      response = await this.send(messages);
    }

    if (response.toolCalls.length > 0) {
      this.logger.warn(
        `[AgentExtractor] Stopped after ${this.maxIterations} tool iterations`
      );
    }

    return parseEntityResponse(response.content);
  }

  private send(messages: ChatMessage[]): Promise<ChatResult> {
    return this.provider.chat({
      messages,
      tools: this.registry.definitions(),
      maxTokens: this.maxTokens,
      temperature: 0,
      jsonMode: true,
    });
  }
}
