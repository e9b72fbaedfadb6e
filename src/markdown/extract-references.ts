/**
 * Reference Extractor
 * Finds remote image references in Markdown text
 *
 * The text is parsed as CommonMark, so image syntax inside fenced code,
 * indented code and inline code spans never yields a reference.
 */

import { unified } from "unified";
import remarkParse from "remark-parse";
import { visit } from "unist-util-visit";
import type { Html, Image, Root } from "mdast";
import { isRemoteUrl } from "../utils";
import { readImageSource } from "./html-image";
import type {
  HtmlImageReference,
  ImageReference,
  MarkdownImageReference,
} from "../types";

const IMG_TAG_PATTERN = /<img\b[^>]*>/gi;
const HTML_COMMENT_PATTERN = /<!--[\s\S]*?(?:-->|$)/g;
const BYTE_ORDER_MARK = 0xfeff;

function parseMarkdown(text: string): Root {
  return unified().use(remarkParse).parse(text);
}

/**
 * Source span of a node in `text`
 * `shift` accounts for a leading byte order mark, which the parser drops
 */
function spanOf(
  node: Image | Html,
  shift: number,
): { start: number; end: number } | null {
  const start = node.position?.start.offset;
  const end = node.position?.end.offset;
  if (start === undefined || end === undefined) return null;
  return { start: start + shift, end: end + shift };
}

/**
 * Blank out HTML comments without moving any other character
 */
function maskComments(source: string): string {
  return source.replace(HTML_COMMENT_PATTERN, (comment) =>
    " ".repeat(comment.length),
  );
}

function fromImageNode(
  text: string,
  node: Image,
  shift: number,
): MarkdownImageReference | null {
  const span = spanOf(node, shift);
  if (!span || !isRemoteUrl(node.url)) return null;
  const { start, end } = span;

  return {
    kind: "markdown",
    url: node.url.trim(),
    raw: text.slice(start, end),
    start,
    end,
    alt: node.alt ?? "",
    title: node.title ?? null,
  };
}

function fromHtmlNode(
  text: string,
  node: Html,
  shift: number,
): HtmlImageReference[] {
  const span = spanOf(node, shift);
  if (!span) return [];
  const { start, end } = span;

  // Scan the source slice: inside block quotes node.value has the markers
  // stripped, so its indexes do not map back to the text
  const source = maskComments(text.slice(start, end));

  const references: HtmlImageReference[] = [];
  for (const match of source.matchAll(IMG_TAG_PATTERN)) {
    const src = readImageSource(match[0]);
    if (!src || !isRemoteUrl(src) || match.index === undefined) continue;

    references.push({
      kind: "html",
      url: src.trim(),
      raw: match[0],
      start: start + match.index,
      end: start + match.index + match[0].length,
    });
  }
  return references;
}

/**
 * Extract remote image references in document order
 *
 * @example
 * extractReferences("![logo](https://example.com/logo.png)")
 * // [{ kind: "markdown", url: "https://example.com/logo.png", start: 0, end: 37, ... }]
 */
export function extractReferences(text: string): ImageReference[] {
  const shift = text.charCodeAt(0) === BYTE_ORDER_MARK ? 1 : 0;
  const tree = parseMarkdown(text.slice(shift));
  const references: ImageReference[] = [];

  visit(tree, (node) => {
    if (node.type === "image") {
      const reference = fromImageNode(text, node, shift);
      if (reference) references.push(reference);
    } else if (node.type === "html") {
      references.push(...fromHtmlNode(text, node, shift));
    }
  });

  return references.sort((a, b) => a.start - b.start);
}
