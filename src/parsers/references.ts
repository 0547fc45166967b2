/**
 * Asset reference extraction utilities
 */

import * as cheerio from "cheerio";
import { localizeAssetUrl } from "../processors/rewriter.js";

/**
 * Find `<script src>` and `<link href>` values that still point at one of
 * `hosts`, e.g. single-quoted attributes the rewriter cannot see.
 * Images are left out since they are meant to stay remote.
 */
export function findRemoteReferences(
  html: string,
  hosts: readonly string[],
): string[] {
  const $ = cheerio.load(html);
  const found = new Set<string>();
  const check = (value: string | undefined) => {
    const url = (value || "").trim();
    if (url && localizeAssetUrl(url, hosts) !== null) found.add(url);
  };
  $("script[src]").each((_, el) => check($(el).attr("src")));
  $("link[href]").each((_, el) => check($(el).attr("href")));
  return Array.from(found);
}
