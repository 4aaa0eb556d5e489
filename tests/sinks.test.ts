import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { JSONFileSink, InMemorySink, toOutputDocument } from "../src/sinks";

describe("toOutputDocument", () => {
  it("should put the summary first when present", () => {
    const doc = toOutputDocument({
      events: ["Merger"],
      persons: ["Ana"],
      companies: ["Acme"],
      summary: "Acme merged.",
    });
    expect(Object.keys(doc)).toEqual(["summary", "companies", "persons", "events"]);
  });

  it("should omit an absent summary", () => {
    const doc = toOutputDocument({ companies: [], persons: [], events: [] });
    expect(Object.keys(doc)).toEqual(["companies", "persons", "events"]);
  });
});

describe("JSONFileSink", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "docsieve-sink-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should write indented UTF-8 JSON and create parent directories", async () => {
    const file = path.join(dir, "out", "nested", "data.json");
    const sink = new JSONFileSink({ path: file });

    await sink.write({
      companies: ["Ecopetrol"],
      persons: ["Juan Pérez"],
      events: [],
    });

    const written = await fs.readFile(file, "utf-8");
    expect(written).toBe(
      [
        "{",
        '  "companies": [',
        '    "Ecopetrol"',
        "  ],",
        '  "persons": [',
        '    "Juan Pérez"',
        "  ],",
        '  "events": []',
        "}",
      ].join("\n")
    );
  });

  it("should write compact JSON when prettyPrint is off", async () => {
    const file = path.join(dir, "compact.json");
    const sink = new JSONFileSink({ path: file, prettyPrint: false });

    await sink.write({ summary: "Short.", companies: [], persons: ["Ana"], events: [] });

    expect(await fs.readFile(file, "utf-8")).toBe(
      '{"summary":"Short.","companies":[],"persons":["Ana"],"events":[]}'
    );
  });
});

describe("InMemorySink", () => {
  it("should keep written documents", async () => {
    const sink = new InMemorySink();
    await sink.write({ companies: ["A"], persons: [], events: [] });
    await sink.write({ summary: "s", companies: [], persons: [], events: ["E"] });

    expect(sink.results).toHaveLength(2);
    expect(sink.last).toEqual({ summary: "s", companies: [], persons: [], events: ["E"] });

    sink.clear();
    expect(sink.last).toBeUndefined();
  });
});
