import { describe, it, expect } from "vitest";
import { AgentExtractor, FetchContentTool, ToolRegistry } from "../src/agent";
import { BaseProvider } from "../src/providers";
import { PipelineEventEmitter } from "../src/events";
import { ConfigurationError, ToolError } from "../src/errors";
import { NullLogger } from "../src/logger";
import type {
  ChatMessage,
  ChatOptions,
  ChatResult,
  CompletionOptions,
  CompletionResult,
  ContentLoader,
  ToolCall,
} from "../src/types";

const logger = new NullLogger();
const usage = { inputTokens: 0, outputTokens: 0 };

class ScriptedChatProvider extends BaseProvider {
  readonly transcripts: ChatMessage[][] = [];

  constructor(
    private replies: Array<{ content: string; toolCalls?: ToolCall[] }>,
    private tools = true
  ) {
    super({});
  }

  getDefaultModel(): string {
    return "scripted";
  }

  getName(): string {
    return "scripted";
  }

  supportsTools(): boolean {
    return this.tools;
  }

  protected requiresApiKey(): boolean {
    return false;
  }

  async complete(_options: CompletionOptions): Promise<CompletionResult> {
    throw new Error("complete is not used by the agent");
  }

  async chat(options: ChatOptions): Promise<ChatResult> {
    this.transcripts.push([...options.messages]);
    const reply = this.replies.shift();
    if (!reply) throw new Error("no scripted reply left");
    return { content: reply.content, toolCalls: reply.toolCalls ?? [], usage };
  }
}

function pageLoader(pages: Record<string, string>): ContentLoader & { loaded: string[] } {
  const loaded: string[] = [];
  return {
    loaded,
    async load(source) {
      loaded.push(source);
      const page = pages[source];
      if (page === undefined) throw new Error(`no page at ${source}`);
      return page;
    },
  };
}

const fetchCall = (url: string, id = "call_1"): ToolCall => ({
  id,
  name: "fetch_url_content",
  arguments: { url },
});

describe("FetchContentTool", () => {
  it("should load the requested url", async () => {
    const loader = pageLoader({ "https://news.test/a": "Article text" });
    const tool = new FetchContentTool(loader);

    expect(tool.capability).toBe("content:fetch");
    expect(await tool.execute({ url: " https://news.test/a " })).toBe("Article text");
  });

  it("should reject a missing url", async () => {
    const tool = new FetchContentTool(pageLoader({}));
    await expect(tool.execute({})).rejects.toThrow(
      'fetch_url_content requires a non-empty "url" string'
    );
  });

  it("should wrap loader failures in ToolError", async () => {
    const tool = new FetchContentTool(pageLoader({}));
    await expect(tool.execute({ url: "https://news.test/x" })).rejects.toBeInstanceOf(
      ToolError
    );
  });
});

describe("ToolRegistry", () => {
  it("should expose definitions and capabilities", () => {
    const registry = new ToolRegistry().register(new FetchContentTool(pageLoader({})));

    expect(registry.has("fetch_url_content")).toBe(true);
    expect(registry.get("other")).toBeUndefined();
    expect(registry.definitions().map((d) => d.name)).toEqual(["fetch_url_content"]);
    expect(registry.capabilities()).toEqual(["content:fetch"]);
  });

  it("should refuse duplicate names", () => {
    const registry = new ToolRegistry().register(new FetchContentTool(pageLoader({})));
    expect(() => registry.register(new FetchContentTool(pageLoader({})))).toThrow(
      'Tool "fetch_url_content" is already registered'
    );
  });
});

describe("AgentExtractor", () => {
  it("should run the tool and parse the final answer", async () => {
    const loader = pageLoader({ "https://news.test/a": "Ana Gómez leads Acme." });
    const provider = new ScriptedChatProvider([
      { content: "", toolCalls: [fetchCall("https://news.test/a")] },
      { content: '{"personas": ["Ana Gómez"], "empresas": ["Acme"], "eventos": []}' },
    ]);
    const events = new PipelineEventEmitter();
    const toolEvents: Array<{ tool: string; iteration: number }> = [];
    events.on("tool:call", (data) => toolEvents.push(data));

    const agent = new AgentExtractor(
      provider,
      new ToolRegistry().register(new FetchContentTool(loader)),
      { logger, events }
    );
    const result = await agent.extract("https://news.test/a");

    expect(result).toEqual({ companies: ["Acme"], persons: ["Ana Gómez"], events: [] });
    expect(loader.loaded).toEqual(["https://news.test/a"]);
    expect(toolEvents).toEqual([{ tool: "fetch_url_content", iteration: 1 }]);

    const second = provider.transcripts[1];
    expect(second).toHaveLength(4);
    expect(second[2]).toEqual({
      role: "assistant",
      content: "",
      toolCalls: [fetchCall("https://news.test/a")],
    });
    expect(second[3]).toEqual({
      role: "tool",
      name: "fetch_url_content",
      content: "Ana Gómez leads Acme.",
      toolCallId: "call_1",
    });
  });

  it("should stop requesting tools after maxIterations", async () => {
    const loader = pageLoader({ "https://news.test/a": "text" });
    const provider = new ScriptedChatProvider([
      { content: "", toolCalls: [fetchCall("https://news.test/a")] },
      { content: "", toolCalls: [fetchCall("https://news.test/a")] },
      { content: '{"persons": []}', toolCalls: [fetchCall("https://news.test/a")] },
    ]);

    const agent = new AgentExtractor(
      provider,
      new ToolRegistry().register(new FetchContentTool(loader)),
      { maxIterations: 2, logger }
    );
    const result = await agent.extract("https://news.test/a");

    expect(provider.transcripts).toHaveLength(3);
    expect(loader.loaded).toHaveLength(2);
    expect(result).toEqual({ companies: [], persons: [], events: [] });
  });

  it("should fail on an unknown tool", async () => {
    const provider = new ScriptedChatProvider([
      { content: "", toolCalls: [{ name: "delete_everything", arguments: {} }] },
    ]);
    const agent = new AgentExtractor(provider, new ToolRegistry(), { logger });

    await expect(agent.extract("https://news.test/a")).rejects.toThrow(
      'Tool "delete_everything" is not registered'
    );
  });

  it("should require a tool-capable provider", () => {
    const provider = new ScriptedChatProvider([], false);
    expect(() => new AgentExtractor(provider, new ToolRegistry())).toThrow(
      ConfigurationError
    );
  });
});
