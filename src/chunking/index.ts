import type { ChunkingStrategy } from "../config";
import { FixedChunker } from "./FixedChunker";
import { RecursiveChunker } from "./RecursiveChunker";
import type { Chunker } from "./types";

export { FixedChunker, splitText } from "./FixedChunker";
export {
  RecursiveChunker,
  splitTextRecursive,
  DEFAULT_SEPARATORS,
} from "./RecursiveChunker";
export type { Chunker } from "./types";

/**
 * Create a chunker for the given strategy.
 * Throws ConfigurationError for invalid size/overlap.
 */
export function createChunker(config: {
  chunking: ChunkingStrategy;
  chunkSize: number;
  chunkOverlap: number;
}): Chunker {
  const options = { chunkSize: config.chunkSize, overlap: config.chunkOverlap };
  switch (config.chunking) {
    case "recursive":
      return new RecursiveChunker(options);
    case "fixed":
      return new FixedChunker(options);
  }
}
