// ─────────────────────────────────────────────────────────────
// PyForm  ·  Output Sink Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { writeOutput } from '../bridge/output';
import { captureLogger } from './helpers';

let dir: string;

beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pyform-out-'));
});

afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
});

describe('writeOutput', () => {
    it('prints when no file is given', async () => {
        const { logger, lines } = captureLogger();
        const result = await writeOutput('np.sin(x)', {}, logger);
        expect(result).toEqual({ ok: true, path: null, diagnostics: [] });
        expect(lines.log).toEqual(['np.sin(x)']);
    });

    it('creates missing directories', async () => {
        const file = join(dir, 'gen', 'deep', 'out.py');
        const result = await writeOutput('x*y', { file });
        expect(result.ok).toBe(true);
        expect(await readFile(file, 'utf-8')).toBe('x*y');
    });

    it('overwrites by default', async () => {
        const file = join(dir, 'out.py');
        await writeOutput('first', { file });
        await writeOutput('second', { file });
        expect(await readFile(file, 'utf-8')).toBe('second');
    });

    it('appends with the separator', async () => {
        const file = join(dir, 'out.py');
        await writeOutput('a', { file, append: true });
        await writeOutput('b', { file, append: true });
        await writeOutput('c', { file, append: true, separator: '\n\n' });
        expect(await readFile(file, 'utf-8')).toBe('a\nb\nc\n\n');
    });

    it('reports I/O errors as diagnostics', async () => {
        const result = await writeOutput('x', { file: dir });
        expect(result.ok).toBe(false);
        expect(result.diagnostics).toHaveLength(1);
        expect(result.diagnostics[0].kind).toBe('WriteFailure');
        expect(result.diagnostics[0].message).toBe(`Could not write to file ${dir}.`);
        expect(result.diagnostics[0].path).toBe(dir);
    });
});
