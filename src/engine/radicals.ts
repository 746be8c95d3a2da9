// ─────────────────────────────────────────────────────────────
// PyForm  ·  Radical Combination
// a^(n/2) * b^(m/2) → Sqrt[a^n * b^m], gated by sign assumptions
// ─────────────────────────────────────────────────────────────

import { NO_ASSUMPTIONS, type AssumptionSet } from '../core/assumptions';
import type { Diagnostic } from '../core/diagnostics';
import { exprEqual, isHalfInteger, isOne, mk, nodeCount, type Expr, type Mul } from '../core/expr';
import { hostForm } from '../core/pretty';
import { factSignOracle, type SignOracle } from './sign';

/**
 * What to do when the negative bases leave an odd power of i. `preserve`
 * applies (-1)^floor(k/2) regardless; `decline` leaves the product alone.
 */
export type OddNegativePolicy = 'preserve' | 'decline';

export interface CombineOptions {
    oracle: SignOracle;
    oddNegatives: OddNegativePolicy;
}

export interface CombineResult {
    result: Expr;
    diagnostics: Diagnostic[];
    passes: number;
}

const DEFAULT_OPTIONS: CombineOptions = {
    oracle: factSignOracle,
    oddNegatives: 'preserve',
};

interface PassContext {
    assumptions: AssumptionSet;
    opts: CombineOptions;
    diagnostics: Diagnostic[];
    changed: boolean;
}

interface Radical {
    base: Expr;
    n: number;
}

// ── Fixed-point driver ──────────────────────────────────────

/**
 * Rewrites every product holding two or more half-integer powers until a
 * pass changes nothing. Diagnostics describe the final tree.
 */
export function combineRadicals(
    expr: Expr,
    assumptions: AssumptionSet = NO_ASSUMPTIONS,
    options: Partial<CombineOptions> = {},
): CombineResult {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    // Every productive pass removes at least one radical factor
    const maxPasses = nodeCount(expr) + 1;

    let current = expr;
    for (let pass = 1; ; pass++) {
        const ctx: PassContext = { assumptions, opts, diagnostics: [], changed: false };
        const next = rewrite(current, ctx);
        if (!ctx.changed || pass >= maxPasses) {
            return { result: next, diagnostics: ctx.diagnostics, passes: pass };
        }
        current = next;
    }
}

// ── One bottom-up pass ──────────────────────────────────────

function rewriteAll(items: readonly Expr[], ctx: PassContext): readonly Expr[] {
    const out = items.map(item => rewrite(item, ctx));
    return out.every((item, i) => item === items[i]) ? items : out;
}

function rewrite(node: Expr, ctx: PassContext): Expr {
    switch (node.tag) {
        case 'Num':
        case 'Symbol':
        case 'Pattern':
            return node;

        case 'Add': {
            const terms = rewriteAll(node.terms, ctx);
            return terms === node.terms ? node : { tag: 'Add', terms };
        }

        case 'Mul': {
            const factors = rewriteAll(node.factors, ctx);
            const rebuilt = factors === node.factors ? node : mk.mul(...factors);
            return rebuilt.tag === 'Mul' ? combineProduct(rebuilt, ctx) : rebuilt;
        }

        case 'Pow': {
            const base = rewrite(node.base, ctx);
            const exponent = rewrite(node.exponent, ctx);
            return base === node.base && exponent === node.exponent ? node : mk.pow(base, exponent);
        }

        case 'Call': {
            const args = rewriteAll(node.args, ctx);
            return args === node.args ? node : { tag: 'Call', head: node.head, args };
        }

        case 'Negate': {
            const inner = rewrite(node.inner, ctx);
            return inner === node.inner ? node : { tag: 'Negate', inner };
        }

        case 'List': {
            const items = rewriteAll(node.items, ctx);
            return items === node.items ? node : { tag: 'List', items };
        }
    }
}

// ── Combining one product ───────────────────────────────────

/** Flattens nested products and strips `Negate` wrappers; true when an odd number were stripped. */
function liftSigns(factors: readonly Expr[], out: Expr[]): boolean {
    let negated = false;
    for (const factor of factors) {
        let f = factor;
        while (f.tag === 'Negate') {
            negated = !negated;
            f = f.inner;
        }
        if (f.tag === 'Mul') {
            if (liftSigns(f.factors, out)) negated = !negated;
        } else {
            out.push(f);
        }
    }
    return negated;
}

function withSign(e: Expr, negative: boolean): Expr {
    return negative ? mk.neg(e) : e;
}

function combineProduct(node: Mul, ctx: PassContext): Expr {
    const flat: Expr[] = [];
    const negated = liftSigns(node.factors, flat);

    const radicals: Radical[] = [];
    const others: Expr[] = [];
    for (const f of flat) {
        if (f.tag === 'Pow' && isHalfInteger(f.exponent)) radicals.push({ base: f.base, n: f.exponent.num });
        else others.push(f);
    }
    if (radicals.length < 2) return node;

    const radical = sqrtOf(radicandOf(radicals));

    if (ctx.assumptions.tag === 'None') {
        ctx.changed = true;
        return withSign(mk.mul(...others, radical), negated);
    }

    const { oracle } = ctx.opts;
    const signs = radicals.map(r => oracle.signOf(r.base, ctx.assumptions));

    const unknown = distinct(radicals.filter((_, i) => signs[i] === 'Unknown').map(r => r.base));
    if (unknown.length > 0) {
        const suggestions = unknown.map(e => `${hostForm(e)} > 0`);
        ctx.diagnostics.push({
            kind: 'UnknownSigns',
            severity: 'warning',
            message: `Variables with unknown signs: {${unknown.map(hostForm).join(', ')}}. Cannot combine square roots safely without knowing their signs.`,
            expressions: unknown,
        });
        ctx.diagnostics.push({
            kind: 'SuggestAssumptions',
            severity: 'info',
            message: `Try adding assumptions like: ${suggestions.join(' && ')}`,
            suggestions,
        });
        return node;
    }

    // Each negative base contributes a phase of i^n
    const negatives = radicals.filter((_, i) => signs[i] === 'Negative');
    const quarterTurns = negatives.reduce((sum, r) => sum + r.n, 0);
    if (Math.abs(quarterTurns) % 2 === 1 && ctx.opts.oddNegatives === 'decline') {
        const bases = distinct(negatives.map(r => r.base));
        ctx.diagnostics.push({
            kind: 'OddNegativeBases',
            severity: 'warning',
            message: `Odd number of negative bases under radicals: {${bases.map(hostForm).join(', ')}}. Combination left undone.`,
            expressions: bases,
        });
        return node;
    }

    ctx.changed = true;
    const flips = Math.abs(Math.floor(quarterTurns / 2)) % 2 === 1;
    return withSign(mk.mul(...others, radical), flips !== negated);
}

/** Π base_i^(n_i); equal bases add their exponents. */
function radicandOf(radicals: readonly Radical[]): Expr {
    const merged: Radical[] = [];
    for (const r of radicals) {
        const same = merged.find(m => exprEqual(m.base, r.base));
        if (same) same.n += r.n;
        else merged.push({ ...r });
    }
    return mk.mul(...merged
        .filter(m => m.n !== 0)
        .map(m => m.n === 1 ? m.base : mk.pow(m.base, mk.num(m.n))));
}

function sqrtOf(radicand: Expr): Expr {
    return isOne(radicand) ? radicand : mk.sqrt(radicand);
}

function distinct(exprs: readonly Expr[]): Expr[] {
    const out: Expr[] = [];
    for (const e of exprs) {
        if (!out.some(o => exprEqual(o, e))) out.push(e);
    }
    return out;
}
