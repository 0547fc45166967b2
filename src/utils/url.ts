/**
 * URL manipulation utilities
 */

export const IMAGE_EXTENSIONS = [
  ".png",
  ".jpg",
  ".jpeg",
  ".gif",
  ".webp",
  ".svg",
  ".ico",
] as const;

/**
 * Case-insensitive check against the image extensions that are never mirrored
 */
export function isImagePath(p: string): boolean {
  const lower = p.toLowerCase();
  return IMAGE_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/**
 * Parse a URL, returning null instead of throwing
 */
export function tryParseUrl(raw: string): URL | null {
  try {
    return new URL(raw);
  } catch {
    return null;
  }
}

const AUTHORITY_RE = /^[a-z][a-z0-9+.-]*:\/\/([^/?#]*)/i;

/**
 * The authority exactly as written in `raw` (case and port kept), minus any
 * `user@` part. Empty when the URL has none, e.g. `data:` URLs.
 */
export function urlAuthority(raw: string): string {
  const m = raw.match(AUTHORITY_RE);
  if (!m) return "";
  const authority = m[1];
  return authority.slice(authority.lastIndexOf("@") + 1);
}

/**
 * Percent-decode each run of valid `%XX` escapes on its own, so a stray `%`
 * elsewhere does not stop the rest from decoding. Invalid UTF-8 becomes U+FFFD.
 */
export function decodePath(p: string): string {
  return p.replace(/(?:%[0-9A-Fa-f]{2})+/g, (run) =>
    Buffer.from(run.replace(/%/g, ""), "hex").toString("utf8"),
  );
}

/**
 * Map a URL to a file path relative to the extraction directory.
 * The query is dropped; an empty path becomes `<host>/index.html`.
 */
export function urlToLocalPath(url: URL, host: string = url.host): string {
  const p = decodePath(url.pathname.replace(/^\/+/, ""));
  return p === "" ? `${host}/index.html` : p;
}

/**
 * Longest host first, so `static.cdn.example.com` is tried before `cdn.example.com`
 */
export function orderHosts(hosts: Iterable<string>): string[] {
  return [...new Set(hosts)].sort((a, b) =>
    b.length !== a.length ? b.length - a.length : a < b ? -1 : a > b ? 1 : 0,
  );
}

/**
 * Strip everything up to and including the first occurrence of `host`,
 * making the remainder relative to the document (`./path?query`)
 */
export function relativeToHost(url: string, host: string): string {
  const at = url.indexOf(host);
  const rest = at === -1 ? url : url.slice(at + host.length);
  return `./${rest.replace(/^\/+/, "")}`;
}
