// ─────────────────────────────────────────────────────────────
// PyForm  ·  Translation Pipeline
// definition → signature → (radical combination) → emitter → sink
// ─────────────────────────────────────────────────────────────

import type { AssumptionSet } from './core/assumptions';
import { hasErrors, type Diagnostic } from './core/diagnostics';
import type { Expr } from './core/expr';
import { resolveTarget, type TargetConfig } from './core/targets';
import type { Logger } from './bridge/console';
import { writeOutput } from './bridge/output';
import { emitExpression, emitFunction } from './emitters/python';
import { combineRadicals, type CombineOptions } from './engine/radicals';
import { extractSignature, type DefinitionStore } from './parser/definitions';

export interface TranslateOptions {
    target: TargetConfig | string;
    /** Assumptions for the radical pass; `null` skips it. */
    combine: AssumptionSet | null;
    combineOptions: Partial<CombineOptions>;
    file: string;
    append: boolean;
    logger: Logger;
}

export interface TranslationResult {
    ok: boolean;
    code: string | null;
    diagnostics: Diagnostic[];
}

export type TranslationUnit =
    | { kind: 'expression'; label: string; expr: Expr }
    | { kind: 'function'; symbol: string };

export interface BatchEntry {
    label: string;
    result: TranslationResult;
}

const DEFAULT_OPTIONS: TranslateOptions = {
    target: 'numpy',
    combine: null,
    combineOptions: {},
    file: '',
    append: false,
    logger: console,
};

const EXPRESSION_SEPARATOR = '\n';
const FUNCTION_SEPARATOR = '\n\n';

// ── Pure stages ─────────────────────────────────────────────

function prepare(expr: Expr, opts: TranslateOptions, diagnostics: Diagnostic[]): Expr {
    if (!opts.combine) return expr;
    const combined = combineRadicals(expr, opts.combine, opts.combineOptions);
    diagnostics.push(...combined.diagnostics);
    return combined.result;
}

function expressionCode(expr: Expr, opts: TranslateOptions): TranslationResult {
    const diagnostics: Diagnostic[] = [];
    const tree = prepare(expr, opts, diagnostics);
    const emitted = emitExpression(tree, { target: opts.target });
    diagnostics.push(...emitted.diagnostics);
    return { ok: !hasErrors(diagnostics), code: emitted.code, diagnostics };
}

function functionCode(symbol: string, store: DefinitionStore, opts: TranslateOptions): TranslationResult {
    const extracted = extractSignature(symbol, store.rulesFor(symbol), resolveTarget(opts.target));
    if (!extracted.ok) return { ok: false, code: null, diagnostics: extracted.diagnostics };

    const diagnostics: Diagnostic[] = [...extracted.diagnostics];
    const body = prepare(extracted.signature.body, opts, diagnostics);
    const emitted = emitFunction({ ...extracted.signature, body }, { target: opts.target });
    diagnostics.push(...emitted.diagnostics);
    return { ok: !hasErrors(diagnostics), code: emitted.code, diagnostics };
}

async function deliver(result: TranslationResult, opts: TranslateOptions, separator: string): Promise<TranslationResult> {
    if (result.code === null) return result;
    const written = await writeOutput(result.code, { file: opts.file, append: opts.append, separator }, opts.logger);
    if (written.ok) return result;
    return { ok: false, code: result.code, diagnostics: [...result.diagnostics, ...written.diagnostics] };
}

// ── Public entry points ─────────────────────────────────────

export async function translateExpression(expr: Expr, options: Partial<TranslateOptions> = {}): Promise<TranslationResult> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    return deliver(expressionCode(expr, opts), opts, EXPRESSION_SEPARATOR);
}

export async function translateFunction(
    symbol: string,
    store: DefinitionStore,
    options: Partial<TranslateOptions> = {},
): Promise<TranslationResult> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    return deliver(functionCode(symbol, store, opts), opts, FUNCTION_SEPARATOR);
}

/**
 * Translates every unit independently and writes the successful ones
 * together. A unit that fails only carries its own diagnostics.
 */
export async function translateBatch(
    units: readonly TranslationUnit[],
    store: DefinitionStore,
    options: Partial<TranslateOptions> = {},
): Promise<BatchEntry[]> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const entries: BatchEntry[] = units.map(unit => unit.kind === 'expression'
        ? { label: unit.label, result: expressionCode(unit.expr, opts) }
        : { label: unit.symbol, result: functionCode(unit.symbol, store, opts) });

    const codes = entries.flatMap(e => e.result.code === null ? [] : [e.result.code]);
    if (codes.length === 0) return entries;

    const written = await writeOutput(codes.join(FUNCTION_SEPARATOR), {
        file: opts.file,
        append: opts.append,
        separator: FUNCTION_SEPARATOR,
    }, opts.logger);
    if (written.ok) return entries;

    return entries.map(e => e.result.code === null ? e : {
        label: e.label,
        result: { ok: false, code: e.result.code, diagnostics: [...e.result.diagnostics, ...written.diagnostics] },
    });
}
