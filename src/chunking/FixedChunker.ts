import type { Chunk } from "../types";
import { validateChunkParameters } from "../config";
import type { Chunker } from "./types";

/**
 * Split text into fixed-size character windows.
 *
 * Each window starts `chunkSize - overlap` characters after the previous one,
 * so consecutive chunks share exactly `overlap` characters. The last chunk may
 * be shorter. Empty text yields no chunks.
 *
 * @throws ConfigurationError when `overlap >= chunkSize` or either value is invalid
 */
export function splitText(
  text: string,
  chunkSize: number,
  overlap: number
): Chunk[] {
  validateChunkParameters(chunkSize, overlap);

  const chunks: Chunk[] = [];
  const step = chunkSize - overlap;

  for (let start = 0; start < text.length; start += step) {
    const end = Math.min(start + chunkSize, text.length);
    chunks.push({
      index: chunks.length,
      text: text.slice(start, end),
      startOffset: start,
      endOffset: end,
    });
  }

  return chunks;
}

export class FixedChunker implements Chunker {
  private chunkSize: number;
  private overlap: number;

  constructor(config: { chunkSize: number; overlap: number }) {
    validateChunkParameters(config.chunkSize, config.overlap);
    this.chunkSize = config.chunkSize;
    this.overlap = config.overlap;
  }

  split(text: string): Chunk[] {
    return splitText(text, this.chunkSize, this.overlap);
  }
}
