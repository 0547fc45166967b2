/**
 * Entry document patching
 * Points script and stylesheet references at the mirrored copies
 */

import fs from "node:fs/promises";
import { findRemoteReferences } from "../parsers/references.js";
import { pathExists } from "../utils/filesystem.js";
import { backupStamp } from "../utils/time.js";
import { type DocumentRewriter, regexRewriter } from "./rewriter.js";

export interface PatchOptions {
  /** Write `<file>.bak-<stamp>` before patching (default true) */
  backup?: boolean;
  rewriter?: DocumentRewriter;
  now?: () => Date;
}

export type PatchResult =
  | { status: "missing"; indexPath: string }
  | {
      status: "patched";
      indexPath: string;
      backupPath: string | null;
      changed: boolean;
      /** References to collected hosts left after rewriting */
      unresolved: string[];
    };

/**
 * Patch the entry document in place. A missing file is reported, not thrown;
 * read and write failures propagate.
 */
export async function patchIndex(
  indexPath: string,
  hosts: readonly string[],
  opts: PatchOptions = {},
): Promise<PatchResult> {
  if (!(await pathExists(indexPath))) {
    console.log(`index.html not found at: ${indexPath}`);
    return { status: "missing", indexPath };
  }

  const html = await fs.readFile(indexPath, "utf8");

  let backupPath: string | null = null;
  if (opts.backup ?? true) {
    const now = opts.now ?? (() => new Date());
    backupPath = `${indexPath}.bak-${backupStamp(now())}`;
    await fs.writeFile(backupPath, html, "utf8");
    console.log(`Backed up index to: ${backupPath}`);
  }

  const rewriter = opts.rewriter ?? regexRewriter;
  const patched = rewriter.rewrite(html, hosts);
  await fs.writeFile(indexPath, patched, "utf8");
  console.log("Patched index.html (scripts & CSS → local, images left on CDN).");

  const unresolved = findRemoteReferences(patched, hosts);
  for (const url of unresolved) {
    console.warn(`Still remote: ${url}`);
  }

  return {
    status: "patched",
    indexPath,
    backupPath,
    changed: patched !== html,
    unresolved,
  };
}
