import * as path from "path";
import chalk from "chalk";
import { Command } from "commander";
import ora from "ora";
import { loadConfigFromEnv } from "../config";
import { ConsoleLogger } from "../logger";
import { PipelineEventEmitter } from "../events";
import { createProvider } from "../providers";
import { HtmlLoader } from "../loaders";
import { AgentExtractor, FetchContentTool, ToolRegistry } from "../agent";
import { JSONFileSink } from "../sinks";
import {
  DEFAULT_OUTPUT_PATH,
  parseInteger,
  resolveProviderConfig,
  withInterrupt,
} from "./options";
import { printResult } from "./output";

interface AgentOptions {
  provider?: string;
  model?: string;
  maxIterations?: number;
  output?: string;
  debug?: boolean;
}

export const agentCommand = new Command("agent")
  .description("Let a tool-calling model fetch and analyze a page")
  .argument("<url>", "URL of the page")
  .option("-p, --provider <name>", "openai or ollama")
  .option("-m, --model <model>", "Model name")
  .option("--max-iterations <n>", "Maximum tool rounds", parseInteger)
  .option("-o, --output <path>", "Output JSON file")
  .option("--debug", "Verbose logging")
  .action(async (url: string, options: AgentOptions) => {
    const spinner = ora(`Analyzing ${url}...`).start();

    try {
      const env = loadConfigFromEnv();
      const debug = options.debug ?? env.pipeline.debug ?? false;
      const logger = new ConsoleLogger({ level: debug ? "debug" : "warn" });
      const events = new PipelineEventEmitter();
      const provider = createProvider(resolveProviderConfig(options, env));

      const registry = new ToolRegistry().register(
        new FetchContentTool(
          new HtmlLoader({ maxContentLength: env.maxContentLength, logger })
        )
      );
      const agent = new AgentExtractor(provider, registry, {
        maxIterations: options.maxIterations,
        logger,
        events,
      });

      events.on("tool:call", ({ tool, iteration }) => {
        spinner.text = `Iteration ${iteration}: running ${tool}...`;
      });

      const result = await withInterrupt(
        (signal) => agent.extract(url, signal),
        () => {
          spinner.text = "Cancelling...";
        }
      );
      spinner.succeed("Analysis complete");

      printResult(result);

      const sink = new JSONFileSink({
        path: options.output ?? env.outputPath ?? DEFAULT_OUTPUT_PATH,
      });
      await sink.write(result);
      console.log(chalk.green(`\nResults saved to ${path.resolve(sink.outputPath)}`));
    } catch (error) {
      spinner.fail(`Error: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    }
  });
