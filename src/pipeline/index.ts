export { Pipeline } from "./Pipeline";
export type {
  PipelineDependencies,
  PipelineRunOptions,
  PipelineOutcome,
  PipelineStats,
} from "./Pipeline";
export {
  PIPELINE_TRANSITIONS,
  canTransition,
  isTerminal,
} from "./state";
export type { PipelineState, FailedStage } from "./state";
