import type { ConsolidatedResult } from "../types";

/**
 * Serialized form of a result. Key order is fixed: summary (only when
 * present), then companies, persons and events.
 */
export interface OutputDocument {
  summary?: string;
  companies: string[];
  persons: string[];
  events: string[];
}

export function toOutputDocument(result: ConsolidatedResult): OutputDocument {
  return {
    ...(result.summary !== undefined ? { summary: result.summary } : {}),
    companies: [...result.companies],
    persons: [...result.persons],
    events: [...result.events],
  };
}

/**
 * Abstract base class for result sinks.
 */
export abstract class BaseSink {
  /**
   * Persist a finished result
   */
  abstract write(result: ConsolidatedResult): Promise<void>;
}
