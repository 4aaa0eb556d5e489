import type { Chunk } from "../types";
import { validateChunkParameters } from "../config";
import type { Chunker } from "./types";

/**
 * Break preferences, strongest first: paragraph, line, sentence, word.
 * When none fits the window the chunk is cut at the size limit.
 */
export const DEFAULT_SEPARATORS: readonly string[] = ["\n\n", "\n", ". ", " "];

/**
 * Find the cut position for a chunk that must end in (floor, limit].
 * The cut lands right after the strongest separator that fits.
 */
function findBreak(
  text: string,
  floor: number,
  limit: number,
  separators: readonly string[]
): number {
  for (const separator of separators) {
    if (!separator || limit - separator.length < 0) continue;

    const idx = text.lastIndexOf(separator, limit - separator.length);
    if (idx < 0) continue;

    const cut = idx + separator.length;
    if (cut > floor && cut <= limit) {
      return cut;
    }
  }
  return limit;
}

/**
 * Greedily pack text into chunks of at most `chunkSize` characters,
 * preferring natural boundaries.
 *
 * Chunk `i + 1` always starts `overlap` characters before the end of chunk
 * `i`, and generation stops once a chunk reaches the end of the text, so the
 * overlap and coverage guarantees of {@link splitText} still hold.
 */
export function splitTextRecursive(
  text: string,
  chunkSize: number,
  overlap: number,
  separators: readonly string[] = DEFAULT_SEPARATORS
): Chunk[] {
  validateChunkParameters(chunkSize, overlap);

  const chunks: Chunk[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);
    if (end < text.length) {
      // Cutting at or before start + overlap would not advance the next chunk
      end = findBreak(text, start + overlap, end, separators);
    }

    chunks.push({
      index: chunks.length,
      text: text.slice(start, end),
      startOffset: start,
      endOffset: end,
    });

    if (end >= text.length) break;
    start = end - overlap;
  }

  return chunks;
}

export class RecursiveChunker implements Chunker {
  private chunkSize: number;
  private overlap: number;
  private separators: readonly string[];

  constructor(config: {
    chunkSize: number;
    overlap: number;
    separators?: readonly string[];
  }) {
    validateChunkParameters(config.chunkSize, config.overlap);
    this.chunkSize = config.chunkSize;
    this.overlap = config.overlap;
    this.separators = config.separators ?? DEFAULT_SEPARATORS;
  }

  split(text: string): Chunk[] {
    return splitTextRecursive(
      text,
      this.chunkSize,
      this.overlap,
      this.separators
    );
  }
}
