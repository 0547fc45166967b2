/**
 * Filesystem utility functions
 */

import fs from "node:fs/promises";
import path from "node:path";

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

export async function pathExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write a file, creating its parent directories first
 */
export async function writeFileEnsuringDir(
  file: string,
  data: string | Uint8Array,
): Promise<void> {
  await ensureDir(path.dirname(file));
  if (typeof data === "string") {
    await fs.writeFile(file, data, "utf8");
  } else {
    await fs.writeFile(file, data);
  }
}

/**
 * True when `child` resolves to a location strictly inside `parent`
 */
export function isInside(parent: string, child: string): boolean {
  const rel = path.relative(path.resolve(parent), path.resolve(child));
  return (
    rel !== "" &&
    rel !== ".." &&
    !rel.startsWith(`..${path.sep}`) &&
    !path.isAbsolute(rel)
  );
}

/**
 * List every regular file below `dir`, as paths relative to it
 */
export async function listFiles(dir: string): Promise<string[]> {
  const files: string[] = [];
  async function walk(current: string): Promise<void> {
    const entries = await fs.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) await walk(full);
      else if (entry.isFile()) files.push(path.relative(dir, full));
    }
  }
  await walk(dir);
  return files.sort();
}

/**
 * Copy every file below `from` into `to`, keeping the directory layout.
 * Existing files are overwritten. Returns the relative paths copied.
 */
export async function copyTree(from: string, to: string): Promise<string[]> {
  const files = await listFiles(from);
  for (const rel of files) {
    const dest = path.join(to, rel);
    await ensureDir(path.dirname(dest));
    await fs.copyFile(path.join(from, rel), dest);
  }
  return files;
}
