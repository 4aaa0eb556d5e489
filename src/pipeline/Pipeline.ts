import { v4 as uuidv4 } from "uuid";
import type {
  Chunk,
  ConsolidatedResult,
  ConsolidationPrimitive,
  ContentLoader,
  ExtractionPrimitive,
} from "../types";
import {
  resolvePipelineConfig,
  validatePipelineConfig,
  type PipelineConfig,
  type ResolvedPipelineConfig,
} from "../config";
import { LoadError, toError } from "../errors";
import { defaultLogger, type Logger } from "../logger";
import { PipelineEventEmitter } from "../events";
import { createChunker } from "../chunking";
import { WorkerPool } from "../pool";
import { mergeConsolidate, mergeUnion } from "../merge";
import {
  canTransition,
  isTerminal,
  type FailedStage,
  type PipelineState,
} from "./state";

export interface PipelineDependencies {
  /** Supplies document text for {@link Pipeline.run} */
  loader?: ContentLoader;
  extractor: ExtractionPrimitive;
  /** Optional second pass; without it the union merge is final */
  consolidator?: ConsolidationPrimitive;
  config?: PipelineConfig;
  logger?: Logger;
  events?: PipelineEventEmitter;
}

export interface PipelineRunOptions {
  /** Stops admitting new chunks; in-flight extractions are drained */
  signal?: AbortSignal;
}

export interface PipelineStats {
  chunks: number;
  failedChunks: number;
  /** True when the consolidation pass produced the result */
  consolidated: boolean;
  durationMs: number;
}

export type PipelineOutcome =
  | {
      status: "done";
      runId: string;
      result: ConsolidatedResult;
      stats: PipelineStats;
    }
  | {
      status: "failed";
      runId: string;
      stage: FailedStage;
      error: { name: string; message: string };
      cause: Error;
    };

/**
 * Drives a document through load → chunk → extract → consolidate.
 *
 * Only a missing document or an invalid configuration fails a run. Failed
 * chunks and a failed consolidation pass degrade the result instead.
 *
 * @example
 * ```typescript
 * const pipeline = new Pipeline({
 *   loader: new HtmlLoader(),
 *   extractor: new LLMExtractor(provider),
 *   consolidator: new LLMConsolidator(provider),
 *   config: { chunkSize: 2000, chunkOverlap: 100, concurrency: 4 },
 * });
 *
 * const outcome = await pipeline.run("https://example.com/report.html");
 * if (outcome.status === "done") console.log(outcome.result.persons);
 * ```
 */
export class Pipeline {
  private loader?: ContentLoader;
  private extractor: ExtractionPrimitive;
  private consolidator?: ConsolidationPrimitive;
  private config: ResolvedPipelineConfig;
  private logger: Logger;
  readonly events: PipelineEventEmitter;

  private currentState: PipelineState = "idle";
  private runId = "";

  constructor(deps: PipelineDependencies) {
    this.loader = deps.loader;
    this.extractor = deps.extractor;
    this.consolidator = deps.consolidator;
    this.config = resolvePipelineConfig(deps.config);
    this.logger = deps.logger ?? defaultLogger(this.config.debug);
    this.events = deps.events ?? new PipelineEventEmitter();
  }

  get state(): PipelineState {
    return this.currentState;
  }

  /**
   * Load `source` through the configured loader and process it
   */
  async run(
    source: string,
    options: PipelineRunOptions = {}
  ): Promise<PipelineOutcome> {
    const startedAt = this.begin();
    this.transition("loading");

    let text: string;
    try {
      text = await this.load(source, options.signal);
    } catch (error) {
      return this.fail("loading", error);
    }

    return this.process(text, startedAt, options.signal);
  }

  /**
   * Process text that was loaded elsewhere
   */
  async runText(
    text: string,
    options: PipelineRunOptions = {}
  ): Promise<PipelineOutcome> {
    const startedAt = this.begin();
    this.transition("loading");

    if (!text.trim()) {
      return this.fail("loading", new LoadError("No content to process"));
    }

    return this.process(text, startedAt, options.signal);
  }

  // ===========================================================================
  // Stages
  // ===========================================================================

  private async load(source: string, signal?: AbortSignal): Promise<string> {
    if (!this.loader) {
      throw new LoadError("No content loader configured", source);
    }

    this.logger.info(`[Pipeline] Loading ${source}`);

    let content: string;
    try {
      content = await this.loader.load(source, signal);
    } catch (error) {
      if (error instanceof LoadError) throw error;
      throw new LoadError(`Failed to load ${source}`, source, error);
    }

    if (!content || !content.trim()) {
      throw new LoadError(`No content loaded from ${source}`, source);
    }

    this.logger.info(`[Pipeline] Loaded ${content.length} characters`);
    return content;
  }

  private async process(
    text: string,
    startedAt: number,
    signal?: AbortSignal
  ): Promise<PipelineOutcome> {
    this.transition("chunking");

    let chunks: Chunk[];
    let pool: WorkerPool;
    try {
      validatePipelineConfig(this.config);
      chunks = createChunker(this.config).split(text);
      pool = new WorkerPool({
        concurrency: this.config.concurrency,
        logger: this.logger,
        events: this.events,
      });
    } catch (error) {
      return this.fail("chunking", error);
    }

    this.logger.info(
      `[Pipeline] Document split into ${chunks.length} chunks of ~${this.config.chunkSize} characters`
    );

    this.transition("extracting");
    const results = await pool.run(chunks, this.extractor, { signal });
    const failedChunks = results.filter((r) => r.failed).length;

    this.transition("consolidating");
    let result: ConsolidatedResult;
    if (this.consolidator && this.config.consolidate && !signal?.aborted) {
      result = await mergeConsolidate(results, this.consolidator, {
        logger: this.logger,
        events: this.events,
      });
    } else {
      result = mergeUnion(results);
    }

    this.transition("done");
    this.events.emit("pipeline:done", { runId: this.runId, result });
    this.logger.info(
      `[Pipeline] Done: ${result.companies.length} companies, ${result.persons.length} persons, ${result.events.length} events`
    );

    return {
      status: "done",
      runId: this.runId,
      result,
      stats: {
        chunks: chunks.length,
        failedChunks,
        consolidated: result.summary !== undefined,
        durationMs: Date.now() - startedAt,
      },
    };
  }

  // ===========================================================================
  // State machine
  // ===========================================================================

  private begin(): number {
    if (!isTerminal(this.currentState) && this.currentState !== "idle") {
      throw new Error(`Pipeline is already running (state: ${this.currentState})`);
    }
    this.currentState = "idle";
    this.runId = uuidv4();
    return Date.now();
  }

  private transition(to: PipelineState): void {
    const from = this.currentState;
    if (!canTransition(from, to)) {
      throw new Error(`Illegal pipeline transition: ${from} -> ${to}`);
    }
    this.currentState = to;
    this.logger.debug(`[Pipeline] ${from} -> ${to}`, { runId: this.runId });
    this.events.emit("state:change", { runId: this.runId, from, to });
  }

  private fail(stage: FailedStage, thrown: unknown): PipelineOutcome {
    const cause = toError(thrown);
    this.transition("failed");
    this.logger.error(`[Pipeline] Run failed during ${stage}: ${cause.message}`);
    this.events.emit("pipeline:failed", {
      runId: this.runId,
      stage,
      error: cause,
    });

    return {
      status: "failed",
      runId: this.runId,
      stage,
      error: { name: cause.name, message: cause.message },
      cause,
    };
  }
}
