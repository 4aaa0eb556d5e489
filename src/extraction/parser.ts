import type { EntityCategory, EntityLists } from "../types";
import { MalformedOutputError } from "../errors";

/**
 * Keys a model may use for each category, matched case-insensitively.
 * The first alias present in the payload wins.
 */
export const CATEGORY_ALIASES: Record<EntityCategory, readonly string[]> = {
  persons: ["persons", "personas", "people", "individuos"],
  companies: ["companies", "empresas", "organizations", "organizaciones"],
  events: ["events", "eventos", "hechos", "acontecimientos"],
};

const CATEGORIES: readonly EntityCategory[] = ["companies", "persons", "events"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is string | number | boolean {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

/**
 * Coerce a category value into a list of non-empty, trimmed strings.
 * Nested objects and arrays inside a list are skipped.
 */
export function coerceList(value: unknown): string[] {
  if (value === null || value === undefined) return [];

  if (Array.isArray(value)) {
    return value
      .filter(isScalar)
      .map((item) => String(item).trim())
      .filter((item) => item.length > 0);
  }

  if (isScalar(value)) {
    const item = String(value).trim();
    return item ? [item] : [];
  }

  return [];
}

/**
 * Locate the key used for a category, if any
 */
function findCategoryKey(
  payload: Record<string, unknown>,
  category: EntityCategory
): string | undefined {
  const lowered = new Map<string, string>();
  for (const key of Object.keys(payload)) {
    const lower = key.toLowerCase();
    if (!lowered.has(lower)) lowered.set(lower, key);
  }

  for (const alias of CATEGORY_ALIASES[category]) {
    const key = lowered.get(alias);
    if (key !== undefined) return key;
  }
  return undefined;
}

/**
 * Map a decoded model payload onto the canonical entity lists.
 * Unknown keys are ignored; missing categories become empty lists
 * unless `requireAll` is set.
 */
export function parseEntityPayload(
  payload: unknown,
  options: { requireAll?: boolean } = {}
): EntityLists {
  if (!isRecord(payload)) {
    throw new MalformedOutputError("Model response is not a JSON object");
  }

  const lists: EntityLists = { companies: [], persons: [], events: [] };
  for (const category of CATEGORIES) {
    const key = findCategoryKey(payload, category);
    if (key === undefined) {
      if (options.requireAll) {
        throw new MalformedOutputError(
          `Model response is missing the "${category}" list`
        );
      }
      continue;
    }
    lists[category] = coerceList(payload[key]);
  }
  return lists;
}

/**
 * Decode model text as JSON, tolerating a surrounding markdown code fence
 */
export function decodeJson(content: string): unknown {
  let text = content.trim();
  const fenced = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/.exec(text);
  if (fenced) {
    text = fenced[1].trim();
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedOutputError(
      `Model response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      content
    );
  }
}

/**
 * Parse the raw text of an extraction response
 */
export function parseEntityResponse(content: string): EntityLists {
  return parseEntityPayload(decodeJson(content));
}

/**
 * Parse the raw text of a consolidation response.
 * All three categories and a string summary are required.
 */
export function parseConsolidationResponse(
  content: string
): EntityLists & { summary: string } {
  const payload = decodeJson(content);
  const lists = parseEntityPayload(payload, { requireAll: true });

  const summary = isRecord(payload) ? findSummary(payload) : undefined;
  if (summary === undefined) {
    throw new MalformedOutputError(
      "Consolidation response is missing a summary",
      content
    );
  }
  return { summary, ...lists };
}

function findSummary(payload: Record<string, unknown>): string | undefined {
  for (const [key, value] of Object.entries(payload)) {
    const lower = key.toLowerCase();
    if ((lower === "summary" || lower === "resumen") && typeof value === "string") {
      return value.trim();
    }
  }
  return undefined;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Check the value returned by any consolidation primitive
 */
export function validateConsolidationResult(
  value: unknown
): EntityLists & { summary: string } {
  if (!isRecord(value)) {
    throw new MalformedOutputError("Consolidation result is not an object");
  }
  const { summary, companies, persons, events } = value;
  if (typeof summary !== "string") {
    throw new MalformedOutputError("Consolidation result has no summary");
  }
  if (!isStringArray(companies) || !isStringArray(persons) || !isStringArray(events)) {
    throw new MalformedOutputError(
      "Consolidation result lists must be arrays of strings"
    );
  }
  return { summary, companies, persons, events };
}
