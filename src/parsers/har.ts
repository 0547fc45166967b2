/**
 * HAR loading
 *
 * Only the fields the mirror needs are read. Anything missing, or of the
 * wrong JSON type, is treated as absent rather than rejected.
 */

import fs from "node:fs/promises";

export interface HarEntry {
  url?: string;
  status?: number;
  text?: string;
  encoding?: string;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(value: unknown, key: string): unknown {
  return isObject(value) ? value[key] : undefined;
}

function stringField(value: unknown, key: string): string | undefined {
  const v = field(value, key);
  return typeof v === "string" ? v : undefined;
}

function toEntry(raw: unknown): HarEntry {
  const response = field(raw, "response");
  const content = field(response, "content");
  const status = field(response, "status");
  return {
    url: stringField(field(raw, "request"), "url"),
    status: typeof status === "number" ? status : undefined,
    text: stringField(content, "text"),
    encoding: stringField(content, "encoding"),
  };
}

/**
 * Pull `log.entries` out of an already parsed HAR document
 */
export function harEntries(doc: unknown): HarEntry[] {
  const entries = field(field(doc, "log"), "entries");
  return Array.isArray(entries) ? entries.map(toEntry) : [];
}

/**
 * Read and parse a HAR file. Invalid JSON throws.
 */
export async function readHar(harPath: string): Promise<HarEntry[]> {
  const raw = await fs.readFile(harPath, "utf8");
  const doc: unknown = JSON.parse(raw);
  return harEntries(doc);
}
