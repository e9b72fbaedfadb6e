/**
 * HTML <img> helpers backed by Cheerio
 */

import { load } from "cheerio";

/**
 * Read the src attribute of a single <img> tag (entities decoded)
 */
export function readImageSource(tag: string): string | undefined {
  const $ = load(tag, null, false);
  return $("img").first().attr("src");
}

/**
 * Re-serialize a single <img> tag with a new src attribute
 */
export function replaceImageSource(tag: string, src: string): string {
  const $ = load(tag, null, false);
  $("img").first().attr("src", src);
  return $.html();
}
