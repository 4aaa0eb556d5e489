/**
 * Prompts for the extraction, consolidation and agent passes.
 * Every prompt asks for a bare JSON object so responses go through the
 * same parser.
 */

import type { RawEntities } from "../types";

/**
 * System prompt for per-fragment extraction
 */
export const EXTRACTION_SYSTEM_PROMPT = `You are a precise data extractor. You extract structured entities from a fragment of a larger document.

Identify:
- persons: full names of individuals mentioned
- companies: companies, organizations, institutions or other entities
- events: facts, resolutions, agreements or other relevant happenings

If a category has no data, return an empty list for it.
Answer ONLY with valid JSON in this format:
{
  "companies": ["..."],
  "persons": ["..."],
  "events": ["..."]
}`;

export function buildExtractionPrompt(fragment: string): string {
  return `Text to analyze:\n${fragment}`;
}

/**
 * System prompt for the consolidation pass
 */
export const CONSOLIDATION_SYSTEM_PROMPT = `You are an expert editor. Your job is to clean and consolidate data extracted from fragments of one document.

1. Deduplicate entities (e.g. "John Smith" and "J. Smith" are the same person).
2. Normalize company names (use the official name).
3. Keep the most relevant events and remove redundancies.
4. Write a two-sentence summary of the whole document.

Answer ONLY with valid JSON in this format:
{
  "summary": "...",
  "companies": ["..."],
  "persons": ["..."],
  "events": ["..."]
}`;

export function buildConsolidationPrompt(raw: RawEntities): string {
  return [
    "Here is the raw extracted data:",
    `Raw companies: ${JSON.stringify(raw.rawCompanies)}`,
    `Raw persons: ${JSON.stringify(raw.rawPersons)}`,
    `Raw events: ${JSON.stringify(raw.rawEvents)}`,
    "",
    "Please consolidate and clean this information.",
  ].join("\n");
}

/**
 * System prompt for the tool-calling agent
 */
export const AGENT_SYSTEM_PROMPT = `You are an expert analyst who extracts structured information from web documents.
Identify persons (full names), companies (legal names) and relevant events.
If you need the document content, call the \`fetch_url_content\` tool with the exact URL.
ALWAYS answer with valid JSON in this format:
{
  "companies": ["..."],
  "persons": ["..."],
  "events": ["..."]
}`;

export function buildAgentPrompt(url: string): string {
  return [
    "Analyze the content of the following URL and extract:",
    "- Persons: names of individuals mentioned",
    "- Companies: organizations, companies or entities",
    "- Events: facts, resolutions, agreements or important happenings",
    "",
    `Target URL: ${url}`,
  ].join("\n");
}
