import type { ConsolidationPrimitive, EntityLists, RawEntities } from "../types";
import type { BaseProvider } from "../providers/BaseProvider";
import { defaultLogger, type Logger } from "../logger";
import {
  CONSOLIDATION_SYSTEM_PROMPT,
  buildConsolidationPrompt,
} from "./prompts";
import { parseConsolidationResponse } from "./parser";

export interface LLMConsolidatorConfig {
  /** Maximum tokens in the response (default: 2000) */
  maxTokens?: number;
  logger?: Logger;
}

/**
 * Consolidation primitive backed by an LLM provider: merges near-duplicate
 * entities, normalizes names and writes a short summary.
 */
export class LLMConsolidator implements ConsolidationPrimitive {
  private provider: BaseProvider;
  private maxTokens: number;
  private logger: Logger;

  constructor(provider: BaseProvider, config: LLMConsolidatorConfig = {}) {
    this.provider = provider;
    this.maxTokens = config.maxTokens ?? 2000;
    this.logger = config.logger ?? defaultLogger();
  }

  async consolidate(
    raw: RawEntities
  ): Promise<EntityLists & { summary: string }> {
    const completion = await this.provider.complete({
      systemPrompt: CONSOLIDATION_SYSTEM_PROMPT,
      userPrompt: buildConsolidationPrompt(raw),
      maxTokens: this.maxTokens,
      temperature: 0,
      jsonMode: true,
    });

    this.logger.debug(`[LLMConsolidator] LLM response:`, {
      content: completion.content,
    });

    return parseConsolidationResponse(completion.content);
  }
}
