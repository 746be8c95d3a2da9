// ─────────────────────────────────────────────────────────────
// PyForm  ·  Command Line
// pyform [options] <request.json>
// ─────────────────────────────────────────────────────────────

import { readFile } from 'fs/promises';
import { AssumptionSyntaxError } from '../core/assumptions';
import { isTargetName, resolveTarget, TARGETS, type RadicalStyle } from '../core/targets';
import { reportDiagnostics, type Logger } from '../bridge/console';
import type { OddNegativePolicy } from '../engine/radicals';
import { translateBatch } from '../translate';
import { prepareRequest, TranslationRequestSchema } from './request';

export interface CliOptions {
    input: string | null;
    target: string | null;
    radical: RadicalStyle | null;
    oddNegatives: OddNegativePolicy;
    out: string;
    append: boolean;
    help: boolean;
}

export class CliUsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CliUsageError';
    }
}

const USAGE = `
pyform - translate symbolic expressions into Python source

Usage:
  pyform [options] <request.json>

Options:
  --target <name>           Target preset (${Object.keys(TARGETS).join(', ')})
  --radical <call|power>    Emit square roots as calls or as **(1/2)
  --odd-negatives <mode>    preserve (default) or decline
  --out <file>              Write to a file instead of printing
  --append                  Append to the output file
  --help, -h                Show this help message
`;

export function parseArgs(args: readonly string[]): CliOptions {
    const options: CliOptions = {
        input: null,
        target: null,
        radical: null,
        oddNegatives: 'preserve',
        out: '',
        append: false,
        help: false,
    };

    const valueOf = (i: number, flag: string): string => {
        const value = args[i + 1];
        if (value === undefined || value.startsWith('--')) throw new CliUsageError(`Missing value for ${flag}`);
        return value;
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--target') {
            options.target = valueOf(i++, arg);
        } else if (arg === '--radical') {
            const value = valueOf(i++, arg);
            if (value !== 'call' && value !== 'power') throw new CliUsageError(`Invalid --radical '${value}'`);
            options.radical = value;
        } else if (arg === '--odd-negatives') {
            const value = valueOf(i++, arg);
            if (value !== 'preserve' && value !== 'decline') throw new CliUsageError(`Invalid --odd-negatives '${value}'`);
            options.oddNegatives = value;
        } else if (arg === '--out') {
            options.out = valueOf(i++, arg);
        } else if (arg === '--append') {
            options.append = true;
        } else if (arg === '--help' || arg === '-h') {
            options.help = true;
        } else if (!arg.startsWith('-') && options.input === null) {
            options.input = arg;
        } else {
            throw new CliUsageError(`Unknown option: ${arg}`);
        }
    }

    return options;
}

/** Resolves to the process exit code. */
export async function runCli(args: readonly string[], logger: Logger = console): Promise<number> {
    try {
        const options = parseArgs(args);
        if (options.help) {
            logger.log(USAGE);
            return 0;
        }
        if (options.input === null) throw new CliUsageError('No request file specified');

        let text: string;
        try {
            text = await readFile(options.input, 'utf-8');
        } catch (err: unknown) {
            const reason = err instanceof Error ? err.message : String(err);
            logger.error(`Error: Could not read request file ${options.input}: ${reason}`);
            return 1;
        }

        const raw: unknown = JSON.parse(text);
        const parsed = TranslationRequestSchema.safeParse(raw);
        if (!parsed.success) {
            for (const issue of parsed.error.issues) {
                logger.error(`${options.input}: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
            }
            return 1;
        }

        const request = prepareRequest(parsed.data);
        const targetName = options.target ?? request.target ?? 'numpy';
        if (!isTargetName(targetName)) throw new CliUsageError(`Unknown target '${targetName}'`);
        const base = resolveTarget(targetName);
        const target = options.radical === null ? base : resolveTarget(base, { radical: options.radical });

        const entries = await translateBatch(request.units, request.store, {
            target,
            combine: request.combine,
            combineOptions: { oddNegatives: options.oddNegatives },
            file: options.out,
            append: options.append,
            logger,
        });

        for (const entry of entries) {
            if (entry.result.diagnostics.length === 0) continue;
            logger.log(`── ${entry.label}`);
            reportDiagnostics(entry.result.diagnostics, logger);
        }
        return entries.every(e => e.result.ok) ? 0 : 1;
    } catch (err: unknown) {
        if (err instanceof CliUsageError) {
            logger.error(`Error: ${err.message}`);
            logger.log(USAGE);
            return 2;
        }
        if (err instanceof AssumptionSyntaxError || err instanceof SyntaxError) {
            logger.error(`Error: ${err.message}`);
            return 1;
        }
        throw err;
    }
}
