import * as fs from "fs/promises";
import * as path from "path";
import type { ContentLoader } from "../types";
import { LoadError } from "../errors";
import { DEFAULT_MAX_CONTENT_LENGTH } from "../config";
import { htmlToText, truncateContent } from "./html";

export interface FileLoaderConfig {
  /** Maximum characters of text returned (default: 50000) */
  maxContentLength?: number;
  /** Strip markup from .html/.htm files (default: true) */
  stripHtml?: boolean;
}

/**
 * Reads a document from the local filesystem as UTF-8 text
 */
export class FileLoader implements ContentLoader {
  private maxContentLength: number;
  private stripHtml: boolean;

  constructor(config: FileLoaderConfig = {}) {
    this.maxContentLength =
      config.maxContentLength ?? DEFAULT_MAX_CONTENT_LENGTH;
    this.stripHtml = config.stripHtml ?? true;
  }

  async load(source: string, signal?: AbortSignal): Promise<string> {
    let content: string;
    try {
      content = await fs.readFile(source, { encoding: "utf-8", signal });
    } catch (error) {
      throw new LoadError(`Failed to read ${source}`, source, error);
    }

    const ext = path.extname(source).toLowerCase();
    const text =
      this.stripHtml && (ext === ".html" || ext === ".htm")
        ? htmlToText(content)
        : content;
    return truncateContent(text, this.maxContentLength);
  }
}
