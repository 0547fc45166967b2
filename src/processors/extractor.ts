/**
 * HAR extraction: writes every recorded response body under an output
 * directory and collects the hosts the session talked to
 */

import path from "node:path";
import { readHar, type HarEntry } from "../parsers/har.js";
import { isInside, writeFileEnsuringDir } from "../utils/filesystem.js";
import {
  isImagePath,
  tryParseUrl,
  urlAuthority,
  urlToLocalPath,
} from "../utils/url.js";

export const HOSTS_FILENAME = "extracted_hosts.txt";

export type EntryResult =
  | { kind: "written"; url: string; file: string }
  | { kind: "skipped-image"; url: string; file: string }
  | { kind: "skipped-no-body"; url: string; status?: number }
  | { kind: "failed"; url: string; file: string; reason: string };

export interface ExtractionSummary {
  /** Sorted, distinct URL authorities */
  hosts: string[];
  results: EntryResult[];
  written: number;
  hostsFile: string;
}

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode a base64 body; whitespace is ignored, bad characters or padding throw
 */
export function decodeBase64(text: string): Buffer {
  const compact = text.replace(/\s+/g, "");
  if (!BASE64_RE.test(compact) || compact.length % 4 !== 0) {
    throw new Error("invalid base64 body");
  }
  return Buffer.from(compact, "base64");
}

async function writeEntry(
  entry: HarEntry,
  url: string,
  outDir: string,
  relPath: string,
): Promise<EntryResult> {
  const file = path.join(outDir, relPath);
  if (entry.text === undefined) {
    console.log(`SKIP (no body): ${url} (status ${entry.status ?? "unknown"})`);
    return { kind: "skipped-no-body", url, status: entry.status };
  }
  if (!isInside(outDir, file)) {
    const reason = "resolved path escapes the output directory";
    console.warn(`ERROR writing ${file} ${reason}`);
    return { kind: "failed", url, file, reason };
  }
  try {
    if (entry.encoding === "base64") {
      await writeFileEnsuringDir(file, decodeBase64(entry.text));
    } else {
      await writeFileEnsuringDir(file, entry.text);
    }
    console.log(`WROTE: ${file}`);
    return { kind: "written", url, file };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`ERROR writing ${file} ${reason}`);
    return { kind: "failed", url, file, reason };
  }
}

/**
 * Extract every non-image response body in the HAR into `outDir`.
 * Images and bodiless entries are not written but still add their host.
 */
export async function extractHar(
  harPath: string,
  outDir: string,
): Promise<ExtractionSummary> {
  console.log(`Reading HAR: ${harPath}`);
  const entries = await readHar(harPath);

  const hosts = new Set<string>();
  const results: EntryResult[] = [];

  for (const entry of entries) {
    if (!entry.url) continue;
    const host = urlAuthority(entry.url);
    const url = tryParseUrl(entry.url);
    if (!url || host === "") continue;
    hosts.add(host);

    const relPath = urlToLocalPath(url, host);
    if (isImagePath(relPath)) {
      results.push({
        kind: "skipped-image",
        url: entry.url,
        file: path.join(outDir, relPath),
      });
      continue;
    }
    results.push(await writeEntry(entry, entry.url, outDir, relPath));
  }

  const written = results.filter((r) => r.kind === "written").length;
  console.log(
    `\nExtraction complete: wrote ${written} non-image files to ${outDir}`,
  );

  const sorted = [...hosts].sort();
  const hostsFile = path.join(outDir, HOSTS_FILENAME);
  await writeFileEnsuringDir(hostsFile, sorted.join("\n"));

  return { hosts: sorted, results, written, hostsFile };
}
