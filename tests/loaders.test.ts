import { describe, it, expect, vi, afterEach, beforeEach } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import {
  HtmlLoader,
  FileLoader,
  htmlToText,
  decodeEntities,
  detectCharset,
  truncateContent,
} from "../src/loaders";
import { LoadError } from "../src/errors";
import { NullLogger } from "../src/logger";

const PAGE = `<!DOCTYPE html>
<html>
<head><title>Board news</title><style>body { color: red; }</style></head>
<body>
<header><a href="/">Home</a></header>
<nav><ul><li>Menu</li></ul></nav>
<!-- tracking pixel -->
<main>
<h1>Acme &amp; Sons appoint a director</h1>
<p>Ana   Gómez joined the <b>board</b>.</p>
<script>window.track("view");</script>
<p>Shares rose&nbsp;5&#37;.</p>
</main>
<aside>Related stories</aside>
<footer>Contact us</footer>
</body>
</html>`;

describe("htmlToText", () => {
  it("should keep readable text and drop page chrome", () => {
    expect(htmlToText(PAGE)).toBe(
      [
        "Board news",
        "Acme & Sons appoint a director",
        "Ana Gómez joined the board.",
        "Shares rose 5%.",
      ].join("\n")
    );
  });

  it("should decode named and numeric entities", () => {
    expect(decodeEntities("&lt;b&gt; &quot;x&quot; &#233; &#xE9; &unknown;")).toBe(
      '<b> "x" é é &unknown;'
    );
  });

  it("should decode accented Spanish entities", () => {
    expect(
      htmlToText(
        "<p>Juan P&eacute;rez, Ministerio de Minas y Energ&iacute;a, Espa&ntilde;a</p>"
      )
    ).toBe("Juan Pérez, Ministerio de Minas y Energía, España");
    expect(decodeEntities("Resoluci&oacute;n &Aacute;rea &uuml;")).toBe("Resolución Área ü");
  });
});

describe("detectCharset", () => {
  it("should prefer the Content-Type header", () => {
    const bytes = Buffer.from('<meta charset="utf-8">', "latin1");
    expect(detectCharset("text/html; charset=ISO-8859-1", bytes)).toBe("iso-8859-1");
  });

  it("should fall back to a meta declaration, then utf-8", () => {
    const declared = Buffer.from(
      '<meta http-equiv="Content-Type" content="text/html; charset=windows-1252">',
      "latin1"
    );
    expect(detectCharset("text/html", declared)).toBe("windows-1252");
    expect(detectCharset(null, Buffer.from("<p>x</p>", "latin1"))).toBe("utf-8");
  });
});

describe("truncateContent", () => {
  it("should cut long text and mark it", () => {
    expect(truncateContent("abcdef", 4)).toBe("abcd\n\n[Content truncated...]");
    expect(truncateContent("abcd", 4)).toBe("abcd");
  });
});

describe("HtmlLoader", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should fetch a page and return its text", async () => {
    const fetchMock = vi.fn(
      async () => new Response(PAGE, { status: 200, headers: { "Content-Type": "text/html" } })
    );
    vi.stubGlobal("fetch", fetchMock);

    const loader = new HtmlLoader({ logger: new NullLogger() });
    const text = await loader.load("https://news.test/article");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(text.split("\n")[1]).toBe("Acme & Sons appoint a director");
  });

  it("should decode pages served as ISO-8859-1", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        async () =>
          new Response(Buffer.from("<p>Juan Pérez</p>", "latin1"), {
            status: 200,
            headers: { "Content-Type": "text/html; charset=ISO-8859-1" },
          })
      )
    );

    const loader = new HtmlLoader({ logger: new NullLogger() });
    expect(await loader.load("https://news.test/latin1")).toBe("Juan Pérez");
  });

  it("should honour a meta charset when the header has none", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        async () =>
          new Response(
            Buffer.from('<head><meta charset="iso-8859-1"></head><p>Energía</p>', "latin1"),
            { status: 200, headers: { "Content-Type": "text/html" } }
          )
      )
    );

    const loader = new HtmlLoader({ logger: new NullLogger() });
    expect(await loader.load("https://news.test/meta")).toBe("Energía");
  });

  it("should not fetch when the signal is already aborted", async () => {
    const fetchMock = vi.fn(async () => new Response(PAGE, { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);
    const controller = new AbortController();
    controller.abort();

    const loader = new HtmlLoader({ logger: new NullLogger() });
    await expect(
      loader.load("https://news.test/article", controller.signal)
    ).rejects.toThrow("Fetching https://news.test/article was cancelled");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("should truncate to maxContentLength", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("<p>0123456789</p>", { status: 200 }))
    );

    const loader = new HtmlLoader({ maxContentLength: 5, logger: new NullLogger() });
    expect(await loader.load("https://news.test/long")).toBe(
      "01234\n\n[Content truncated...]"
    );
  });

  it("should raise LoadError on HTTP errors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("missing", { status: 404 }))
    );

    const loader = new HtmlLoader({ logger: new NullLogger() });
    const error = await loader.load("https://news.test/gone").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LoadError);
    expect(error).toMatchObject({
      message: "Failed to fetch https://news.test/gone: HTTP 404",
      source: "https://news.test/gone",
    });
  });

  it("should wrap network failures", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );

    const loader = new HtmlLoader({ logger: new NullLogger() });
    await expect(loader.load("https://news.test/down")).rejects.toThrow(
      "Failed to fetch https://news.test/down: fetch failed"
    );
  });
});

describe("FileLoader", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "docsieve-loader-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should read text files as-is", async () => {
    const file = path.join(dir, "minutes.txt");
    await fs.writeFile(file, "Línea uno\nLínea dos", "utf-8");

    expect(await new FileLoader().load(file)).toBe("Línea uno\nLínea dos");
  });

  it("should strip markup from HTML files", async () => {
    const file = path.join(dir, "page.html");
    await fs.writeFile(file, "<nav>Menu</nav><p>Body text</p>", "utf-8");

    expect(await new FileLoader().load(file)).toBe("Body text");
  });

  it("should truncate long files", async () => {
    const file = path.join(dir, "long.txt");
    await fs.writeFile(file, "abcdefghij", "utf-8");

    expect(await new FileLoader({ maxContentLength: 3 }).load(file)).toBe(
      "abc\n\n[Content truncated...]"
    );
  });

  it("should raise LoadError for a missing file", async () => {
    await expect(
      new FileLoader().load(path.join(dir, "missing.txt"))
    ).rejects.toBeInstanceOf(LoadError);
  });
});
