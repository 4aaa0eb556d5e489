export { LLMExtractor } from "./LLMExtractor";
export type { LLMExtractorConfig } from "./LLMExtractor";
export { LLMConsolidator } from "./LLMConsolidator";
export type { LLMConsolidatorConfig } from "./LLMConsolidator";
export {
  CATEGORY_ALIASES,
  coerceList,
  decodeJson,
  parseEntityPayload,
  parseEntityResponse,
  parseConsolidationResponse,
  validateConsolidationResult,
} from "./parser";
export {
  EXTRACTION_SYSTEM_PROMPT,
  CONSOLIDATION_SYSTEM_PROMPT,
  AGENT_SYSTEM_PROMPT,
  buildExtractionPrompt,
  buildConsolidationPrompt,
  buildAgentPrompt,
} from "./prompts";
