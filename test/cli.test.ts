/**
 * Tests for cli.ts
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { runCLI, USAGE } from '../src/cli.js';
import { createTempDir, removeDir, writeHar } from './helpers/fixtures.js';

describe('runCLI', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
        vi.spyOn(process, 'exit').mockImplementation(() => {
            throw new Error('process.exit');
        });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    test('should print usage and exit 1 without a HAR file', async () => {
        await expect(runCLI([])).rejects.toThrow('process.exit');
        expect(console.error).toHaveBeenCalledWith(USAGE);
        expect(process.exit).toHaveBeenCalledWith(1);
    });

    test('should print usage for --help', async () => {
        await expect(runCLI(['--help', 'site.har'])).rejects.toThrow('process.exit');
        expect(console.error).toHaveBeenCalledWith(USAGE);
    });

    test('should mirror into the given site root', async () => {
        const root = await createTempDir();
        try {
            const har = await writeHar(root, [
                {
                    url: 'https://www.example.com/index.html',
                    text: '<script src="https://cdn.example.com/js/app.js"></script>',
                },
                { url: 'https://cdn.example.com/js/app.js', text: 'run()' },
            ]);

            await runCLI([har, root]);

            expect(await readFile(join(root, 'js/app.js'), 'utf-8')).toBe('run()');
            expect(await readFile(join(root, 'index.html'), 'utf-8')).toBe(
                '<script src="./js/app.js"></script>',
            );
            expect(await readFile(join(root, 'out_extracted/extracted_hosts.txt'), 'utf-8')).toBe(
                'cdn.example.com\nwww.example.com',
            );
        } finally {
            await removeDir(root);
        }
    });
});
