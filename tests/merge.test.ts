import { describe, it, expect } from "vitest";
import {
  mergeUnion,
  mergeConsolidate,
  dedupeEntities,
  normalizeEntityKey,
} from "../src/merge";
import { PipelineEventEmitter } from "../src/events";
import { ConsolidationError } from "../src/errors";
import { NullLogger } from "../src/logger";
import type {
  ConsolidatedResult,
  ConsolidationPrimitive,
  PartialResult,
  RawEntities,
} from "../src/types";

const logger = new NullLogger();

function partial(
  chunkIndex: number,
  lists: Partial<Pick<PartialResult, "companies" | "persons" | "events">>,
  failed = false
): PartialResult {
  return {
    chunkIndex,
    companies: lists.companies ?? [],
    persons: lists.persons ?? [],
    events: lists.events ?? [],
    failed,
  };
}

function rewrap(result: ConsolidatedResult): PartialResult {
  return partial(0, result);
}

describe("normalizeEntityKey", () => {
  it("should trim, lower-case and NFC-normalize", () => {
    expect(normalizeEntityKey("  ACME Corp ")).toBe("acme corp");
    expect(normalizeEntityKey("José")).toBe(normalizeEntityKey("José"));
  });
});

describe("dedupeEntities", () => {
  it("should keep the first occurrence with its casing", () => {
    expect(dedupeEntities(["Ecopetrol", " ecopetrol ", "ECOPETROL", "Avianca"])).toEqual([
      "Ecopetrol",
      "Avianca",
    ]);
  });

  it("should drop blank items", () => {
    expect(dedupeEntities(["", "   ", "Bogotá"])).toEqual(["Bogotá"]);
  });
});

describe("mergeUnion", () => {
  it("should merge Ecopetrol variants into one entry", () => {
    const result = mergeUnion([
      partial(0, { companies: ["Ecopetrol"] }),
      partial(1, { companies: [" ecopetrol "] }),
    ]);
    expect(result.companies).toEqual(["Ecopetrol"]);
  });

  it("should merge person names case-insensitively", () => {
    const result = mergeUnion([
      partial(0, { persons: ["Juan Pérez"] }),
      partial(1, { persons: ["juan pérez"] }),
    ]);
    expect(result).toEqual({ companies: [], persons: ["Juan Pérez"], events: [] });
  });

  it("should order by chunk index regardless of input order", () => {
    const result = mergeUnion([
      partial(2, { events: ["third"] }),
      partial(0, { events: ["first"] }),
      partial(1, { events: ["second", "First"] }),
    ]);
    expect(result.events).toEqual(["first", "second", "third"]);
  });

  it("should include data from successful chunks around a failed one", () => {
    const result = mergeUnion([
      partial(0, { companies: ["Alpha"] }),
      partial(1, {}, true),
      partial(2, { companies: ["Gamma"] }),
    ]);
    expect(result.companies).toEqual(["Alpha", "Gamma"]);
  });

  it("should be idempotent", () => {
    const once = mergeUnion([
      partial(0, { companies: ["Ecopetrol", "Avianca"], persons: ["Ana"] }),
      partial(1, { companies: ["avianca"], persons: [" ana", "Luis"], events: ["Merger"] }),
    ]);
    const twice = mergeUnion([rewrap(once)]);

    expect(twice).toEqual(once);
    expect(once.summary).toBeUndefined();
  });

  it("should return empty lists for no results", () => {
    expect(mergeUnion([])).toEqual({ companies: [], persons: [], events: [] });
  });
});

describe("mergeConsolidate", () => {
  const results = [
    partial(0, { companies: ["Ecopetrol S.A."], persons: ["Juan Pérez"] }),
    partial(1, { companies: ["ecopetrol s.a."], persons: ["J. Pérez"], events: ["Board meeting"] }),
  ];

  it("should send the deduplicated union to the consolidator", async () => {
    let received: RawEntities | undefined;
    const consolidator: ConsolidationPrimitive = {
      async consolidate(raw) {
        received = raw;
        return {
          summary: "A board meeting took place.",
          companies: ["Ecopetrol S.A."],
          persons: ["Juan Pérez", "juan pérez"],
          events: ["Board meeting"],
        };
      },
    };

    const result = await mergeConsolidate(results, consolidator, { logger });

    expect(received).toEqual({
      rawCompanies: ["Ecopetrol S.A."],
      rawPersons: ["Juan Pérez", "J. Pérez"],
      rawEvents: ["Board meeting"],
    });
    expect(result).toEqual({
      summary: "A board meeting took place.",
      companies: ["Ecopetrol S.A."],
      persons: ["Juan Pérez"],
      events: ["Board meeting"],
    });
  });

  it("should fall back to the union merge when the consolidator rejects", async () => {
    const events = new PipelineEventEmitter();
    const fallbacks: ConsolidationError[] = [];
    events.on("consolidation:fallback", ({ error }) => fallbacks.push(error));

    const result = await mergeConsolidate(
      results,
      {
        async consolidate() {
          throw new Error("rate limited");
        },
      },
      { logger, events }
    );

    expect(result).toEqual(mergeUnion(results));
    expect(result.summary).toBeUndefined();
    expect(fallbacks).toHaveLength(1);
    expect(fallbacks[0].message).toBe(
      "Consolidation failed, falling back to union merge: rate limited"
    );
  });

  it("should fall back when the consolidator returns malformed output", async () => {
    const malformed: ConsolidationPrimitive = {
      async consolidate() {
        return JSON.parse('{"summary": 42, "companies": [], "persons": [], "events": []}');
      },
    };

    const result = await mergeConsolidate(results, malformed, { logger });

    expect(result).toEqual(mergeUnion(results));
    expect("summary" in result).toBe(false);
  });
});
