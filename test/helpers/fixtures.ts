/**
 * Shared test fixtures: temp directories and HAR documents
 */

import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';

export interface FakeEntry {
    url?: string;
    status?: number;
    text?: string;
    encoding?: string;
}

/**
 * Creates a temporary directory with a unique name for isolation
 */
export async function createTempDir(prefix = 'har-mirror-test'): Promise<string> {
    const dir = join(
        tmpdir(),
        prefix,
        `test-${Date.now()}-${Math.random().toString(36).slice(2)}`,
    );
    await mkdir(dir, { recursive: true });
    return dir;
}

export async function removeDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

/**
 * Builds a minimal HAR document from a list of entries
 */
export function buildHar(entries: FakeEntry[]): unknown {
    return {
        log: {
            version: '1.2',
            entries: entries.map((e) => ({
                request: { method: 'GET', url: e.url },
                response: {
                    status: e.status ?? 200,
                    content: {
                        mimeType: 'application/octet-stream',
                        ...(e.text !== undefined ? { text: e.text } : {}),
                        ...(e.encoding !== undefined ? { encoding: e.encoding } : {}),
                    },
                },
            })),
        },
    };
}

export async function writeHar(
    dir: string,
    entries: FakeEntry[],
    name = 'site.har',
): Promise<string> {
    const file = join(dir, name);
    await writeFile(file, JSON.stringify(buildHar(entries)), 'utf-8');
    return file;
}
