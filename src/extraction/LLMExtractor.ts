import type { EntityLists, ExtractionPrimitive } from "../types";
import type { BaseProvider } from "../providers/BaseProvider";
import { defaultLogger, type Logger } from "../logger";
import { EXTRACTION_SYSTEM_PROMPT, buildExtractionPrompt } from "./prompts";
import { parseEntityResponse } from "./parser";

export interface LLMExtractorConfig {
  /** Maximum tokens in each response (default: 1000) */
  maxTokens?: number;
  /** Sampling temperature (default: 0) */
  temperature?: number;
  logger?: Logger;
}

/**
 * Extraction primitive backed by an LLM provider.
 * Rejects with MalformedOutputError when the response is not usable JSON;
 * the worker pool turns that into a failed chunk.
 */
export class LLMExtractor implements ExtractionPrimitive {
  private provider: BaseProvider;
  private maxTokens: number;
  private temperature: number;
  private logger: Logger;

  constructor(provider: BaseProvider, config: LLMExtractorConfig = {}) {
    this.provider = provider;
    this.maxTokens = config.maxTokens ?? 1000;
    this.temperature = config.temperature ?? 0;
    this.logger = config.logger ?? defaultLogger();
  }

  async extract(fragment: string): Promise<EntityLists> {
    const completion = await this.provider.complete({
      systemPrompt: EXTRACTION_SYSTEM_PROMPT,
      userPrompt: buildExtractionPrompt(fragment),
      maxTokens: this.maxTokens,
      temperature: this.temperature,
      jsonMode: true,
    });

    this.logger.debug(`[LLMExtractor] LLM response:`, {
      content: completion.content,
      usage: completion.usage,
    });

    return parseEntityResponse(completion.content);
  }
}
