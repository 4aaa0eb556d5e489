import { BaseSink, toOutputDocument, type OutputDocument } from "./BaseSink";
import type { ConsolidatedResult } from "../types";

/**
 * Keeps written results in memory. Useful for tests and embedding.
 */
export class InMemorySink extends BaseSink {
  private documents: OutputDocument[] = [];

  async write(result: ConsolidatedResult): Promise<void> {
    this.documents.push(toOutputDocument(result));
  }

  get results(): readonly OutputDocument[] {
    return this.documents;
  }

  get last(): OutputDocument | undefined {
    return this.documents[this.documents.length - 1];
  }

  clear(): void {
    this.documents = [];
  }
}
