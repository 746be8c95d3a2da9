// ─────────────────────────────────────────────────────────────
// PyForm  ·  Console Reporting
// Presentation of diagnostics; the core itself never prints
// ─────────────────────────────────────────────────────────────

import type { Diagnostic } from '../core/diagnostics';
import { hostForm } from '../core/pretty';

export interface Logger {
    log(...args: unknown[]): void;
    warn(...args: unknown[]): void;
    error(...args: unknown[]): void;
}

const MAX_LISTED = 5;

export function formatDiagnostic(d: Diagnostic): string {
    return `${d.kind} (${d.severity}): ${d.message}`;
}

export function reportDiagnostics(diagnostics: readonly Diagnostic[], logger: Logger = console): void {
    for (const d of diagnostics) {
        const line = formatDiagnostic(d);
        if (d.severity === 'error') logger.error(line);
        else if (d.severity === 'warning') logger.warn(line);
        else logger.log(line);

        if (d.kind === 'UnknownSigns') {
            logger.log('Unknown sign expressions found:');
            for (const e of d.expressions.slice(0, MAX_LISTED)) {
                logger.log(`  ${hostForm(e)} has sign: unknown`);
            }
            if (d.expressions.length > MAX_LISTED) {
                logger.log(`  ... and ${d.expressions.length - MAX_LISTED} more expressions`);
            }
        }
    }
}
