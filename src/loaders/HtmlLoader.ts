import type { ContentLoader } from "../types";
import { LoadError } from "../errors";
import { DEFAULT_MAX_CONTENT_LENGTH } from "../config";
import { defaultLogger, type Logger } from "../logger";
import { decodeBody, htmlToText, truncateContent } from "./html";

export interface HtmlLoaderConfig {
  /** Maximum characters of text returned (default: 50000) */
  maxContentLength?: number;
  /** Request timeout in milliseconds (default: 60000) */
  timeoutMs?: number;
  /** Extra request headers */
  headers?: Record<string, string>;
  logger?: Logger;
}

/**
 * Fetches a web page and returns its readable text.
 */
export class HtmlLoader implements ContentLoader {
  private maxContentLength: number;
  private timeoutMs: number;
  private headers: Record<string, string>;
  private logger: Logger;

  constructor(config: HtmlLoaderConfig = {}) {
    this.maxContentLength =
      config.maxContentLength ?? DEFAULT_MAX_CONTENT_LENGTH;
    this.timeoutMs = config.timeoutMs ?? 60000;
    this.headers = config.headers ?? {};
    this.logger = config.logger ?? defaultLogger();
  }

  async load(source: string, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) {
      throw new LoadError(`Fetching ${source} was cancelled`, source);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    let html: string;
    try {
      const response = await fetch(source, {
        headers: { Accept: "text/html,*/*", ...this.headers },
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new LoadError(
          `Failed to fetch ${source}: HTTP ${response.status}`,
          source
        );
      }
      html = decodeBody(
        new Uint8Array(await response.arrayBuffer()),
        response.headers.get("content-type")
      );
    } catch (error) {
      if (error instanceof LoadError) throw error;
      if (error instanceof Error && error.name === "AbortError") {
        throw new LoadError(
          signal?.aborted
            ? `Fetching ${source} was cancelled`
            : `Timed out fetching ${source} after ${this.timeoutMs}ms`,
          source
        );
      }
      throw new LoadError(`Failed to fetch ${source}`, source, error);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }

    const text = htmlToText(html);
    if (text.length > this.maxContentLength) {
      this.logger.warn(
        `[HtmlLoader] Content truncated from ${text.length} to ${this.maxContentLength} characters`
      );
    }
    this.logger.debug(`[HtmlLoader] Loaded ${source}`, { length: text.length });
    return truncateContent(text, this.maxContentLength);
  }
}
