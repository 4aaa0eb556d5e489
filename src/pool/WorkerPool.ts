import type { Chunk, ExtractionPrimitive, PartialResult } from "../types";
import { ExtractionError } from "../errors";
import { validateConcurrency } from "../config";
import { defaultLogger, type Logger } from "../logger";
import type { PipelineEventEmitter, ExtractionProgress } from "../events";
import { Semaphore } from "./Semaphore";

export interface WorkerPoolConfig {
  /** Maximum extraction calls in flight (>= 1) */
  concurrency: number;
  logger?: Logger;
  events?: PipelineEventEmitter;
}

export interface WorkerPoolRunOptions {
  /**
   * Stops admitting new chunks once aborted. Calls already in flight are
   * drained and kept; chunks never admitted come back as failed.
   */
  signal?: AbortSignal;
  onProgress?: (progress: ExtractionProgress) => void;
}

function failedResult(chunkIndex: number): PartialResult {
  return { chunkIndex, companies: [], persons: [], events: [], failed: true };
}

/**
 * Runs an extraction primitive over every chunk with bounded concurrency.
 *
 * The output holds one PartialResult per chunk in chunk order, never in
 * completion order. A failing chunk is converted to an empty, `failed`
 * result and never aborts its siblings. Each chunk is attempted once.
 */
export class WorkerPool {
  private concurrency: number;
  private logger: Logger;
  private events?: PipelineEventEmitter;

  constructor(config: WorkerPoolConfig) {
    validateConcurrency(config.concurrency);
    this.concurrency = config.concurrency;
    this.logger = config.logger ?? defaultLogger();
    this.events = config.events;
  }

  async run(
    chunks: readonly Chunk[],
    extractor: ExtractionPrimitive,
    options: WorkerPoolRunOptions = {}
  ): Promise<PartialResult[]> {
    if (chunks.length === 0) return [];

    const { signal, onProgress } = options;
    const semaphore = new Semaphore(this.concurrency);
    const results: PartialResult[] = new Array(chunks.length);
    const total = chunks.length;
    let completed = 0;

    this.logger.debug(
      `[WorkerPool] Extracting ${total} chunks (concurrency ${this.concurrency})`
    );

    const settle = (position: number, result: PartialResult): void => {
      results[position] = result;
      completed++;
      const progress: ExtractionProgress = {
        chunkIndex: result.chunkIndex,
        completed,
        total,
        failed: result.failed,
      };
      try {
        onProgress?.(progress);
      } catch (error) {
        this.logger.warn("[WorkerPool] Progress callback threw", { error });
      }
      this.events?.emit("chunk:complete", progress);
    };

    await Promise.all(
      chunks.map((chunk, position) =>
        semaphore.run(async () => {
          if (signal?.aborted) {
            this.logger.debug(
              `[WorkerPool] Run cancelled, skipping chunk ${chunk.index}`
            );
            settle(position, failedResult(chunk.index));
            return;
          }
          settle(position, await this.extractChunk(chunk, extractor));
        })
      )
    );

    const failed = results.filter((r) => r.failed).length;
    this.logger.debug(
      `[WorkerPool] Finished: ${total - failed} succeeded, ${failed} failed`
    );

    return results;
  }

  /**
   * Extract one chunk, converting any failure into a failed result
   */
  private async extractChunk(
    chunk: Chunk,
    extractor: ExtractionPrimitive
  ): Promise<PartialResult> {
    this.logger.debug(
      `[WorkerPool] Processing chunk ${chunk.index} (${chunk.text.length} characters)`
    );

    try {
      const lists = await extractor.extract(chunk.text);
      return {
        chunkIndex: chunk.index,
        companies: [...lists.companies],
        persons: [...lists.persons],
        events: [...lists.events],
        failed: false,
      };
    } catch (cause) {
      const error = new ExtractionError(chunk.index, cause);
      this.logger.warn(`[WorkerPool] ${error.message}`, {
        chunkIndex: chunk.index,
      });
      this.events?.emit("chunk:failed", { chunkIndex: chunk.index, error });
      return failedResult(chunk.index);
    }
  }
}
