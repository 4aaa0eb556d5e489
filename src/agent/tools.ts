import type { ContentLoader, ToolDefinition } from "../types";
import { ToolError } from "../errors";

/**
 * What a tool is allowed to do. Executors declare exactly one capability,
 * so the registry can tell what a model is able to trigger.
 */
export type ToolCapability = "content:fetch";

export interface ToolExecutor<C extends ToolCapability = ToolCapability> {
  readonly capability: C;
  readonly definition: ToolDefinition;
  execute(args: Record<string, unknown>, signal?: AbortSignal): Promise<string>;
}

export const FETCH_URL_CONTENT = "fetch_url_content";

/**
 * Exposes a ContentLoader to the model as `fetch_url_content(url)`
 */
export class FetchContentTool implements ToolExecutor<"content:fetch"> {
  readonly capability = "content:fetch";
  readonly definition: ToolDefinition = {
    name: FETCH_URL_CONTENT,
    description:
      "Fetch a web page and return its readable text content, without scripts, navigation or page chrome.",
    parameters: {
      type: "object",
      properties: {
        url: {
          type: "string",
          description: "Absolute URL of the page to fetch",
        },
      },
      required: ["url"],
    },
  };

  constructor(private loader: ContentLoader) {}

  async execute(
    args: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<string> {
    const url = args.url;
    if (typeof url !== "string" || url.trim() === "") {
      throw new ToolError(
        `${FETCH_URL_CONTENT} requires a non-empty "url" string`,
        FETCH_URL_CONTENT
      );
    }
    try {
      return await this.loader.load(url.trim(), signal);
    } catch (error) {
      throw new ToolError(
        `${FETCH_URL_CONTENT} failed for ${url.trim()}`,
        FETCH_URL_CONTENT,
        error
      );
    }
  }
}

/**
 * Name → executor lookup for the agent loop
 */
export class ToolRegistry {
  private tools = new Map<string, ToolExecutor>();

  register(tool: ToolExecutor): this {
    const name = tool.definition.name;
    if (this.tools.has(name)) {
      throw new ToolError(`Tool "${name}" is already registered`, name);
    }
    this.tools.set(name, tool);
    return this;
  }

  get(name: string): ToolExecutor | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((tool) => tool.definition);
  }

  capabilities(): ToolCapability[] {
    return [...new Set([...this.tools.values()].map((tool) => tool.capability))];
  }

  get size(): number {
    return this.tools.size;
  }
}
