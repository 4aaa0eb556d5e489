import * as fs from "fs/promises";
import * as path from "path";
import { BaseSink, toOutputDocument } from "./BaseSink";
import type { ConsolidatedResult } from "../types";

export interface JSONFileSinkConfig {
  /** Output file path */
  path: string;
  /** Pretty print with two-space indentation (default: true) */
  prettyPrint?: boolean;
}

/**
 * Writes the result as a UTF-8 JSON document, creating parent
 * directories as needed. Non-ASCII characters are written as-is.
 */
export class JSONFileSink extends BaseSink {
  private filePath: string;
  private prettyPrint: boolean;

  constructor(config: JSONFileSinkConfig) {
    super();
    this.filePath = config.path;
    this.prettyPrint = config.prettyPrint ?? true;
  }

  get outputPath(): string {
    return this.filePath;
  }

  async write(result: ConsolidatedResult): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const content = this.prettyPrint
      ? JSON.stringify(toOutputDocument(result), null, 2)
      : JSON.stringify(toOutputDocument(result));
    await fs.writeFile(this.filePath, content, "utf-8");
  }
}
