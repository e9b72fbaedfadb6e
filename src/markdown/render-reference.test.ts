import { describe, it, expect } from "vitest";
import { renderReference } from "./render-reference";
import { extractReferences } from "./extract-references";
import type { MarkdownImageReference } from "../types";

function markdownRef(
  overrides: Partial<MarkdownImageReference> = {},
): MarkdownImageReference {
  return {
    kind: "markdown",
    url: "https://example.com/logo.png",
    raw: "![logo](https://example.com/logo.png)",
    start: 0,
    end: 37,
    alt: "logo",
    title: null,
    ...overrides,
  };
}

describe("renderReference", () => {
  describe("markdown images", () => {
    it("points the image at the local path", () => {
      expect(renderReference(markdownRef(), "images/logo.png")).toBe(
        "![logo](images/logo.png)",
      );
    });

    it("keeps and escapes the title", () => {
      const ref = markdownRef({ alt: "a", title: 'Say "hi"' });
      expect(renderReference(ref, "images/a.png")).toBe(
        '![a](images/a.png "Say \\"hi\\"")',
      );
    });

    it("escapes brackets in alt text", () => {
      const ref = markdownRef({ alt: "a [b]" });
      expect(renderReference(ref, "x.png")).toBe("![a \\[b\\]](x.png)");
    });

    it("wraps destinations containing spaces in angle brackets", () => {
      const ref = markdownRef({ alt: "a" });
      expect(renderReference(ref, "my images/a.png")).toBe(
        "![a](<my images/a.png>)",
      );
    });

    it("renders text that parses back to a local image", () => {
      const ref = markdownRef({ alt: "a", title: "T" });
      const rendered = renderReference(ref, "../my images/a (1).png");

      expect(extractReferences(rendered)).toEqual([]);
    });
  });

  describe("html images", () => {
    it("replaces only the src attribute", () => {
      const [ref] = extractReferences(
        '<img src="https://example.com/b.png" alt="B">',
      );
      expect(renderReference(ref, "images/b.png")).toBe(
        '<img src="images/b.png" alt="B">',
      );
    });
  });
});
