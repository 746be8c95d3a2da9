// ─────────────────────────────────────────────────────────────
// PyForm  ·  Function Signature Extraction
// Host rule `f[x_, y_] := body` → { name, params, body }
// ─────────────────────────────────────────────────────────────

import type { Diagnostic } from '../core/diagnostics';
import { children, type Expr, type FunctionSignature, type StoredRule } from '../core/expr';
import { normalizeIdentifier } from '../core/identifiers';
import { DEFAULT_TARGET, type TargetConfig } from '../core/targets';

export interface DefinitionStore {
    rulesFor(symbol: string): readonly StoredRule[];
}

// ── In-memory definition store ──────────────────────────────

export class InMemoryDefinitionStore implements DefinitionStore {
    private rules = new Map<string, StoredRule[]>();

    define(symbol: string, rule: StoredRule) {
        const list = this.rules.get(symbol);
        if (list) list.push(rule);
        else this.rules.set(symbol, [rule]);
    }

    rulesFor(symbol: string): readonly StoredRule[] {
        return this.rules.get(symbol) ?? [];
    }

    symbols(): string[] {
        return [...this.rules.keys()];
    }
}

// ── Extraction ──────────────────────────────────────────────

export type ExtractResult =
    | { ok: true; signature: FunctionSignature; diagnostics: Diagnostic[] }
    | { ok: false; diagnostics: Diagnostic[] };

/**
 * Uses the first stored rule only. Parameters are the lhs pattern
 * variables in order of appearance, normalized for the target.
 */
export function extractSignature(
    symbol: string,
    rules: readonly StoredRule[],
    target: TargetConfig = DEFAULT_TARGET,
): ExtractResult {
    if (rules.length === 0) {
        return {
            ok: false,
            diagnostics: [{
                kind: 'NoDefinitionFound',
                severity: 'error',
                message: `No definition found for the symbol ${symbol}.`,
                symbol,
            }],
        };
    }

    const { lhs, rhs } = rules[0];
    const pattern = unwrapHoldPattern(lhs);
    const name = normalizeIdentifier(pattern.tag === 'Call' ? pattern.head : symbol, target);

    const rawParams = collectPatterns(pattern);
    const params = rawParams.map(p => normalizeIdentifier(p, target));
    const duplicates = [...new Set(params.filter((p, i) => params.indexOf(p) !== i))];
    if (duplicates.length > 0) {
        return {
            ok: false,
            diagnostics: [{
                kind: 'AmbiguousSignature',
                severity: 'error',
                message: `Signature of ${name} repeats parameter${duplicates.length > 1 ? 's' : ''} ${duplicates.join(', ')}`,
                name,
                duplicates,
            }],
        };
    }

    return { ok: true, signature: { name, params, rawParams, body: rhs }, diagnostics: [] };
}

function unwrapHoldPattern(lhs: Expr): Expr {
    return lhs.tag === 'Call' && lhs.head === 'HoldPattern' && lhs.args.length === 1 ? lhs.args[0] : lhs;
}

function collectPatterns(e: Expr, out: string[] = []): string[] {
    if (e.tag === 'Pattern') out.push(e.name);
    for (const c of children(e)) collectPatterns(c, out);
    return out;
}
