// ─────────────────────────────────────────────────────────────
// PyForm  ·  Output Sink
// Print, create or append generated code; I/O errors become diagnostics
// ─────────────────────────────────────────────────────────────

import { appendFile, mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { WriteFailure } from '../core/diagnostics';
import type { Logger } from './console';

export interface OutputDestination {
    /** Empty string prints instead of writing. */
    file: string;
    append: boolean;
    /** Written after the text in append mode only. */
    separator: string;
}

export interface WriteResult {
    ok: boolean;
    path: string | null;
    diagnostics: WriteFailure[];
}

const DEFAULT_DESTINATION: OutputDestination = {
    file: '',
    append: false,
    separator: '\n',
};

export async function writeOutput(
    text: string,
    destination: Partial<OutputDestination> = {},
    logger: Logger = console,
): Promise<WriteResult> {
    const dest = { ...DEFAULT_DESTINATION, ...destination };

    if (dest.file === '') {
        logger.log(text);
        return { ok: true, path: null, diagnostics: [] };
    }

    try {
        const dir = dirname(dest.file);
        if (dir !== '' && dir !== '.') await mkdir(dir, { recursive: true });

        if (dest.append) await appendFile(dest.file, text + dest.separator, 'utf-8');
        else await writeFile(dest.file, text, 'utf-8');

        return { ok: true, path: dest.file, diagnostics: [] };
    } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        return {
            ok: false,
            path: dest.file,
            diagnostics: [{
                kind: 'WriteFailure',
                severity: 'error',
                message: `Could not write to file ${dest.file}.`,
                path: dest.file,
                reason,
            }],
        };
    }
}
