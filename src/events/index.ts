import type { ConsolidatedResult } from "../types";
import type { ConsolidationError, ExtractionError } from "../errors";
import type { PipelineState, FailedStage } from "../pipeline/state";

/**
 * Progress of a worker pool run.
 * `completed` only ever grows, whatever order chunks finish in.
 */
export interface ExtractionProgress {
  chunkIndex: number;
  completed: number;
  total: number;
  failed: boolean;
}

/**
 * Event types for a pipeline run
 */
export interface PipelineEvents {
  "state:change": { runId: string; from: PipelineState; to: PipelineState };
  "chunk:complete": ExtractionProgress;
  "chunk:failed": { chunkIndex: number; error: ExtractionError };
  "consolidation:fallback": { error: ConsolidationError };
  "tool:call": { tool: string; iteration: number };
  "pipeline:done": { runId: string; result: ConsolidatedResult };
  "pipeline:failed": { runId: string; stage: FailedStage; error: Error };
  error: { error: Error; context?: string };
}

type EventHandler<T> = (data: T) => void;

/**
 * Type-safe event emitter for pipeline events.
 */
export class PipelineEventEmitter {
  private handlers: Map<keyof PipelineEvents, Set<EventHandler<unknown>>> =
    new Map();

  /**
   * Subscribe to an event
   */
  on<K extends keyof PipelineEvents>(
    event: K,
    handler: EventHandler<PipelineEvents[K]>
  ): () => void {
    let handlers = this.handlers.get(event);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(event, handlers);
    }
    handlers.add(handler as EventHandler<unknown>);

    // Return unsubscribe function
    return () => {
      handlers?.delete(handler as EventHandler<unknown>);
    };
  }

  /**
   * Subscribe to an event once
   */
  once<K extends keyof PipelineEvents>(
    event: K,
    handler: EventHandler<PipelineEvents[K]>
  ): () => void {
    const wrappedHandler = (data: PipelineEvents[K]) => {
      unsubscribe();
      handler(data);
    };
    const unsubscribe = this.on(event, wrappedHandler);
    return unsubscribe;
  }

  /**
   * Emit an event. A throwing handler is reported as an `error` event
   * and does not stop the remaining handlers.
   */
  emit<K extends keyof PipelineEvents>(event: K, data: PipelineEvents[K]): void {
    const handlers = this.handlers.get(event);
    if (!handlers) return;

    for (const handler of [...handlers]) {
      try {
        handler(data);
      } catch (error) {
        // Avoid infinite loop
        if (event !== "error") {
          this.emit("error", {
            error: error instanceof Error ? error : new Error(String(error)),
            context: `Handler for ${event} threw an error`,
          });
        }
      }
    }
  }

  /**
   * Remove all handlers for an event
   */
  off<K extends keyof PipelineEvents>(event: K): void {
    this.handlers.delete(event);
  }

  removeAllListeners(): void {
    this.handlers.clear();
  }

  listenerCount<K extends keyof PipelineEvents>(event: K): number {
    return this.handlers.get(event)?.size ?? 0;
  }
}
