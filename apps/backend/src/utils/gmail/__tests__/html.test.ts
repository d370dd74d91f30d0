import { parseDocument } from "htmlparser2";
import { describe, it, expect, vi, afterEach } from "vitest";

import { htmlToText } from "../html";

vi.mock("htmlparser2", async (importOriginal) => {
  const actual = await importOriginal<typeof import("htmlparser2")>();
  return {
    ...actual,
    parseDocument: vi.fn(actual.parseDocument),
  };
});

describe("htmlToText", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should extract text from a single element", () => {
    expect(htmlToText("<h1>Hello</h1>")).toBe("Hello");
  });

  it("should put each text node on its own line", () => {
    expect(htmlToText("<p>First</p><p>Second</p>")).toBe("First\nSecond");
    expect(htmlToText("<div>Line one<br>Line two</div>")).toBe(
      "Line one\nLine two"
    );
  });

  it("should trim each text node and drop whitespace-only nodes", () => {
    const html = "<ul>\n  <li>  One </li>\n  <li>Two</li>\n</ul>";
    expect(htmlToText(html)).toBe("One\nTwo");
  });

  it("should skip scripts, styles and the document head", () => {
    const html = [
      "<html><head><title>Newsletter</title>",
      "<style>p { color: red; }</style></head>",
      "<body><p>Visible</p><script>var hidden = 1;</script>",
      "<noscript>Enable JavaScript</noscript><p>Also visible</p></body></html>",
    ].join("");
    expect(htmlToText(html)).toBe("Visible\nAlso visible");
  });

  it("should skip a title outside an explicit head", () => {
    expect(htmlToText("<title>Newsletter</title><p>Body</p>")).toBe("Body");
  });

  it("should skip comments", () => {
    expect(htmlToText("<p>Before<!-- tracking -->After</p>")).toBe(
      "Before\nAfter"
    );
  });

  it("should decode entities", () => {
    expect(htmlToText("<p>Fish &amp; Chips&nbsp;</p>")).toBe("Fish & Chips");
  });

  it("should tolerate unclosed tags", () => {
    expect(htmlToText("<p>Unclosed <b>bold")).toBe("Unclosed\nbold");
  });

  it("should return empty string for empty input", () => {
    expect(htmlToText("")).toBe("");
    expect(htmlToText("<div>   </div>")).toBe("");
  });

  it("should return empty string when parsing fails", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.mocked(parseDocument).mockImplementationOnce(() => {
      throw new Error("parser exploded");
    });

    expect(htmlToText("<p>Hello</p>")).toBe("");
    expect(warnSpy).toHaveBeenCalledWith("[htmlToText] Failed to parse HTML:", {
      error: "parser exploded",
    });
  });
});
