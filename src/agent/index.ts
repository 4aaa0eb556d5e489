export { AgentExtractor } from "./AgentExtractor";
export type { AgentExtractorConfig } from "./AgentExtractor";
export { FetchContentTool, ToolRegistry, FETCH_URL_CONTENT } from "./tools";
export type { ToolCapability, ToolExecutor } from "./tools";
