import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { main } from './cli';

describe('main', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'bacon-cli-'));
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        rmSync(dir, { recursive: true, force: true });
    });

    it('exits with 1 and one stderr line when the file is missing', async () => {
        const file = join(dir, 'missing.txt');

        await expect(main([file], {})).resolves.toBe(1);
        expect(console.error).toHaveBeenCalledTimes(1);
        expect(console.error).toHaveBeenCalledWith(`[BaconGraph] File was not found: ${file}`);
    });

    it('exits with 1 when the reference actor is absent', async () => {
        const file = join(dir, 'movies.txt');
        writeFileSync(file, '<a>X\n<t>M1\n');

        await expect(main([file], {})).resolves.toBe(1);
        expect(console.error).toHaveBeenCalledTimes(1);
        expect(console.error).toHaveBeenCalledWith('[BaconGraph] Reference actor "Bacon, Kevin (I)" was not found');
    });

    it('exits with 1 on an unknown flag', async () => {
        await expect(main(['movies.txt', '--verbose'], {})).resolves.toBe(1);
        expect(console.error).toHaveBeenCalledTimes(1);
        expect(console.error).toHaveBeenCalledWith(expect.stringMatching(/^\[BaconGraph\] Invalid configuration: /));
    });

    it('exits with 1 on a blank capacity hint', async () => {
        await expect(main(['movies.txt', '--actors='], {})).resolves.toBe(1);
        expect(console.error).toHaveBeenCalledWith(
            "[BaconGraph] Invalid configuration: expectedActors: capacity hint can't be blank",
        );
    });
});
