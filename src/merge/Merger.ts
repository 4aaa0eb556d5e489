import type {
  ConsolidatedResult,
  ConsolidationPrimitive,
  EntityLists,
  PartialResult,
  RawEntities,
} from "../types";
import { ConsolidationError } from "../errors";
import { defaultLogger, type Logger } from "../logger";
import type { PipelineEventEmitter } from "../events";
import { validateConsolidationResult } from "../extraction/parser";

/**
 * Key used to detect duplicates: trimmed, NFC-normalized, lower-cased.
 */
export function normalizeEntityKey(item: string): string {
  return item.trim().normalize("NFC").toLowerCase();
}

/**
 * Deduplicate by normalized key, keeping the first occurrence (trimmed,
 * original casing) and dropping items that normalize to an empty string.
 */
export function dedupeEntities(items: Iterable<string>): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];

  for (const item of items) {
    const key = normalizeEntityKey(item);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    unique.push(item.trim());
  }

  return unique;
}

function byChunkIndex(results: readonly PartialResult[]): PartialResult[] {
  return [...results].sort((a, b) => a.chunkIndex - b.chunkIndex);
}

function unionLists(results: readonly PartialResult[]): EntityLists {
  const ordered = byChunkIndex(results);
  return {
    companies: dedupeEntities(ordered.flatMap((r) => r.companies)),
    persons: dedupeEntities(ordered.flatMap((r) => r.persons)),
    events: dedupeEntities(ordered.flatMap((r) => r.events)),
  };
}

/**
 * Union merge: flatten every category in chunk order and deduplicate.
 * Pure and deterministic; never carries a summary.
 */
export function mergeUnion(results: readonly PartialResult[]): ConsolidatedResult {
  return unionLists(results);
}

export interface MergeConsolidateOptions {
  logger?: Logger;
  events?: PipelineEventEmitter;
}

/**
 * Refine the union merge with a consolidation pass.
 *
 * The consolidator is called once with the deduplicated raw sets. If it
 * rejects or returns something malformed, the union merge is returned
 * instead and the failure is logged.
 */
export async function mergeConsolidate(
  results: readonly PartialResult[],
  consolidator: ConsolidationPrimitive,
  options: MergeConsolidateOptions = {}
): Promise<ConsolidatedResult> {
  const logger = options.logger ?? defaultLogger();
  const union = unionLists(results);
  const raw: RawEntities = {
    rawCompanies: union.companies,
    rawPersons: union.persons,
    rawEvents: union.events,
  };

  logger.debug(
    `[Merger] Consolidating ${raw.rawCompanies.length} companies, ${raw.rawPersons.length} persons, ${raw.rawEvents.length} events`
  );

  try {
    const consolidated = validateConsolidationResult(
      await consolidator.consolidate(raw)
    );
    return {
      summary: consolidated.summary,
      companies: dedupeEntities(consolidated.companies),
      persons: dedupeEntities(consolidated.persons),
      events: dedupeEntities(consolidated.events),
    };
  } catch (cause) {
    const error = new ConsolidationError(
      "Consolidation failed, falling back to union merge",
      cause
    );
    logger.warn(`[Merger] ${error.message}`);
    options.events?.emit("consolidation:fallback", { error });
    return union;
  }
}
