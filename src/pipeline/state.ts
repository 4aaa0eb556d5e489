export type PipelineState =
  | "idle"
  | "loading"
  | "chunking"
  | "extracting"
  | "consolidating"
  | "done"
  | "failed";

/** Stages from which a run can fail */
export type FailedStage = "loading" | "chunking";

/**
 * Allowed transitions. `done` and `failed` are terminal for a run;
 * starting a new run resets to `idle`.
 */
export const PIPELINE_TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  idle: ["loading"],
  loading: ["chunking", "failed"],
  chunking: ["extracting", "failed"],
  extracting: ["consolidating"],
  consolidating: ["done"],
  done: [],
  failed: [],
};

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  return PIPELINE_TRANSITIONS[from].includes(to);
}

export function isTerminal(state: PipelineState): boolean {
  return state === "done" || state === "failed";
}
