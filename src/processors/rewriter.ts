/**
 * Asset reference rewriting for the entry document.
 *
 * Matching is regex based and only sees double-quoted attributes. The
 * `DocumentRewriter` seam lets a structural implementation replace it
 * without changing how hosts are matched.
 */

import { isImagePath, relativeToHost } from "../utils/url.js";

export interface DocumentRewriter {
  /** `hosts` arrive in match-priority order */
  rewrite(html: string, hosts: readonly string[]): string;
}

const SCRIPT_SRC_RE = /<script[^>]+src="([^"]+)"/g;
const LINK_HREF_RE = /<link[^>]+href="([^"]+)"/g;
const CSS_IMPORT_RE = /@import\s+url\(["']?(https?:\/\/[^)"']+)["']?\)/g;
const NEXT_STATIC_ABSOLUTE_RE = /https?:\/\/[^/]+\/_next\/static\//g;
const NEXT_STATIC_PROTOCOL_RELATIVE_RE = /\/\/[^/]+\/_next\/static\//g;
const INTEGRITY_RE = /\s+integrity="[^"]*"/g;
const CROSSORIGIN_RE = /\s+crossorigin="[^"]*"/g;

/**
 * Rewrite one asset URL to a local path, or return null to leave it alone
 */
export function localizeAssetUrl(
  url: string,
  hosts: readonly string[],
): string | null {
  if (isImagePath(url)) return null;
  const host = hosts.find((h) => url.includes(h));
  return host === undefined ? null : relativeToHost(url, host);
}

function rewriteAttribute(
  match: string,
  url: string,
  hosts: readonly string[],
): string {
  const local = localizeAssetUrl(url, hosts);
  // function replacer: `$` in URLs must not be read as a pattern
  return local === null ? match : match.replaceAll(url, () => local);
}

/**
 * Everything after the third `/`: `https://host/a/b.css` -> `a/b.css`
 */
function pathAfterAuthority(url: string): string {
  const parts = url.split("/");
  return parts.length > 3 ? parts.slice(3).join("/") : parts[parts.length - 1];
}

export const regexRewriter: DocumentRewriter = {
  rewrite(html, hosts) {
    return html
      .replace(SCRIPT_SRC_RE, (m, url: string) => rewriteAttribute(m, url, hosts))
      .replace(LINK_HREF_RE, (m, url: string) => rewriteAttribute(m, url, hosts))
      .replace(
        CSS_IMPORT_RE,
        (_m, url: string) => `@import url("./${pathAfterAuthority(url)}")`,
      )
      .replace(NEXT_STATIC_ABSOLUTE_RE, "./_next/static/")
      .replace(NEXT_STATIC_PROTOCOL_RELATIVE_RE, "./_next/static/")
      .replace(INTEGRITY_RE, "")
      .replace(CROSSORIGIN_RE, "");
  },
};
