import type { Chunk } from "../types";

export interface Chunker {
  /** Split text into ordered, overlapping chunks */
  split(text: string): Chunk[];
}
