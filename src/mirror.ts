/**
 * Extract-then-patch pipeline
 */

import path from "node:path";
import { type PatchOptions, type PatchResult, patchIndex } from "./processors/html.js";
import { type ExtractionSummary, extractHar } from "./processors/extractor.js";
import { copyTree, ensureDir, pathExists } from "./utils/filesystem.js";
import { orderHosts } from "./utils/url.js";

export const STAGING_DIRNAME = "out_extracted";
export const ENTRY_FILENAME = "index.html";

export interface MirrorOptions extends PatchOptions {
  /** Base for relative entry candidates (default `process.cwd()`) */
  cwd?: string;
  /**
   * Where to look for the entry document, first existing wins.
   * Defaults to `<siteRoot>/index.html`, then `./index.html`.
   */
  entryCandidates?: string[];
}

export interface MirrorResult {
  extraction: ExtractionSummary;
  copied: number;
  patch: PatchResult;
}

/**
 * First existing candidate, or the last one so the patcher can report it missing
 */
export async function locateEntryDocument(candidates: string[]): Promise<string> {
  if (candidates.length === 0) {
    throw new Error("No entry document candidates given");
  }
  for (const candidate of candidates) {
    if (await pathExists(candidate)) return candidate;
  }
  return candidates[candidates.length - 1];
}

export async function mirrorHar(
  harPath: string,
  siteRoot: string,
  options: MirrorOptions = {},
): Promise<MirrorResult> {
  const cwd = options.cwd ?? process.cwd();
  const root = path.resolve(cwd, siteRoot);
  const staging = path.join(root, STAGING_DIRNAME);

  await ensureDir(staging);
  const extraction = await extractHar(path.resolve(cwd, harPath), staging);

  let copied = 0;
  if (path.resolve(staging) !== path.resolve(root)) {
    console.log(`Copying extracted files from ${staging} -> ${root}`);
    copied = (await copyTree(staging, root)).length;
    console.log("Copy complete.");
  } else {
    console.log("Extraction directory equals target; nothing to copy.");
  }

  const candidates = (
    options.entryCandidates ?? [path.join(root, ENTRY_FILENAME), ENTRY_FILENAME]
  ).map((c) => path.resolve(cwd, c));
  const indexPath = await locateEntryDocument(candidates);

  const patch = await patchIndex(indexPath, orderHosts(extraction.hosts), {
    backup: options.backup,
    rewriter: options.rewriter,
    now: options.now,
  });

  return { extraction, copied, patch };
}
