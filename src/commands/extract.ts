import * as path from "path";
import chalk from "chalk";
import { Command } from "commander";
import ora from "ora";
import { loadConfigFromEnv, type ChunkingStrategy } from "../config";
import { ConsoleLogger } from "../logger";
import { createProvider } from "../providers";
import { LLMConsolidator, LLMExtractor } from "../extraction";
import { FileLoader, HtmlLoader } from "../loaders";
import { JSONFileSink } from "../sinks";
import { Pipeline } from "../pipeline";
import {
  DEFAULT_OUTPUT_PATH,
  parseChunking,
  parseInteger,
  resolveProviderConfig,
  withInterrupt,
} from "./options";
import { printResult } from "./output";

interface ExtractOptions {
  file?: boolean;
  chunkSize?: number;
  overlap?: number;
  concurrency?: number;
  chunking?: ChunkingStrategy;
  consolidate: boolean;
  provider?: string;
  model?: string;
  output?: string;
  debug?: boolean;
}

export const extractCommand = new Command("extract")
  .description("Extract companies, persons and events from a document")
  .argument("<source>", "URL of the page, or a path with --file")
  .option("-f, --file", "Treat <source> as a local file path")
  .option("--chunk-size <chars>", "Maximum characters per chunk", parseInteger)
  .option("--overlap <chars>", "Characters shared by consecutive chunks", parseInteger)
  .option("-c, --concurrency <n>", "Extraction calls in flight", parseInteger)
  .option("--chunking <strategy>", "fixed or recursive", parseChunking)
  .option("--no-consolidate", "Skip the consolidation pass")
  .option("-p, --provider <name>", "openai, anthropic or ollama")
  .option("-m, --model <model>", "Model name")
  .option("-o, --output <path>", "Output JSON file")
  .option("--debug", "Verbose logging")
  .action(async (source: string, options: ExtractOptions) => {
    const spinner = ora("Preparing...").start();

    try {
      const env = loadConfigFromEnv();
      const debug = options.debug ?? env.pipeline.debug ?? false;
      const logger = new ConsoleLogger({ level: debug ? "debug" : "warn" });
      const provider = createProvider(resolveProviderConfig(options, env));
      // --no-consolidate always wins over DOCSIEVE_CONSOLIDATE
      const consolidate = options.consolidate && (env.pipeline.consolidate ?? true);

      const pipeline = new Pipeline({
        loader: options.file
          ? new FileLoader({ maxContentLength: env.maxContentLength })
          : new HtmlLoader({ maxContentLength: env.maxContentLength, logger }),
        extractor: new LLMExtractor(provider, { logger }),
        consolidator: new LLMConsolidator(provider, { logger }),
        config: {
          chunkSize: options.chunkSize ?? env.pipeline.chunkSize,
          chunkOverlap: options.overlap ?? env.pipeline.chunkOverlap,
          concurrency: options.concurrency ?? env.pipeline.concurrency,
          chunking: options.chunking ?? env.pipeline.chunking,
          consolidate,
          debug,
        },
        logger,
      });

      pipeline.events.on("state:change", ({ to }) => {
        if (to === "loading") spinner.text = `Loading ${source}...`;
        if (to === "chunking") spinner.text = "Splitting document...";
        if (to === "consolidating") spinner.text = "Consolidating results...";
      });
      pipeline.events.on("chunk:complete", ({ completed, total }) => {
        spinner.text = `Extracting chunks ${completed}/${total} (${provider.getName()}:${provider.getModel()})`;
      });

      const outcome = await withInterrupt(
        (signal) => pipeline.run(source, { signal }),
        () => {
          spinner.text = "Cancelling, waiting for running chunks...";
        }
      );

      if (outcome.status === "failed") {
        spinner.fail(`Extraction failed during ${outcome.stage}`);
        console.error(chalk.red(outcome.error.message));
        process.exitCode = 1;
        return;
      }

      const { stats } = outcome;
      const note = stats.failedChunks > 0
        ? chalk.yellow(`, ${stats.failedChunks} failed`)
        : "";
      spinner.succeed(
        `Processed ${stats.chunks} chunks in ${(stats.durationMs / 1000).toFixed(1)}s${note}`
      );
      if (!stats.consolidated && consolidate) {
        console.log(chalk.yellow("Consolidation unavailable, showing the union of chunk results"));
      }

      printResult(outcome.result);

      const sink = new JSONFileSink({
        path: options.output ?? env.outputPath ?? DEFAULT_OUTPUT_PATH,
      });
      await sink.write(outcome.result);
      console.log(chalk.green(`\nResults saved to ${path.resolve(sink.outputPath)}`));
    } catch (error) {
      spinner.fail(`Error: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    }
  });
