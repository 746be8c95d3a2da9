// ─────────────────────────────────────────────────────────────
// PyForm  ·  Numeric Evaluator
// Complex-valued evaluation and QuickCheck-style spot checks
// ─────────────────────────────────────────────────────────────

import type { AssumptionSet, Fact } from '../core/assumptions';
import { freeSymbols, type Expr } from '../core/expr';

export interface Complex {
    re: number;
    im: number;
}

export type Value = Complex | null;
export type Env = Record<string, number | Complex>;

const c = (re: number, im = 0): Complex => ({ re, im });

export const CONSTANTS: Record<string, Complex> = {
    Pi: c(Math.PI),
    E: c(Math.E),
    I: c(0, 1),
    Degree: c(Math.PI / 180),
    GoldenRatio: c((1 + Math.sqrt(5)) / 2),
};

// ── Complex arithmetic (principal branch throughout) ───────

const add = (a: Complex, b: Complex): Complex => c(a.re + b.re, a.im + b.im);
const mul = (a: Complex, b: Complex): Complex => c(a.re * b.re - a.im * b.im, a.re * b.im + a.im * b.re);
const neg = (a: Complex): Complex => c(-a.re, -a.im);
const modulus = (a: Complex): number => Math.hypot(a.re, a.im);
const isReal = (a: Complex): boolean => a.im === 0;

function div(a: Complex, b: Complex): Value {
    const d = b.re * b.re + b.im * b.im;
    if (d === 0) return null;
    return c((a.re * b.re + a.im * b.im) / d, (a.im * b.re - a.re * b.im) / d);
}

function exp(a: Complex): Complex {
    const m = Math.exp(a.re);
    return a.im === 0 ? c(m) : c(m * Math.cos(a.im), m * Math.sin(a.im));
}

function log(a: Complex): Value {
    if (a.re === 0 && a.im === 0) return null;
    return c(Math.log(modulus(a)), Math.atan2(a.im, a.re));
}

function pow(base: Complex, e: Complex): Value {
    if (isReal(e) && Number.isInteger(e.re) && Math.abs(e.re) <= 64) {
        let result = c(1);
        let b = base;
        let n = Math.abs(e.re);
        while (n > 0) {
            if (n % 2 === 1) result = mul(result, b);
            b = mul(b, b);
            n = Math.floor(n / 2);
        }
        return e.re < 0 ? div(c(1), result) : result;
    }
    if (isReal(base) && isReal(e) && base.re > 0) return c(Math.pow(base.re, e.re));
    if (base.re === 0 && base.im === 0) return e.re > 0 ? c(0) : null;
    const l = log(base);
    return l === null ? null : exp(mul(e, l));
}

function realOnly(a: Complex, f: (x: number) => number): Value {
    return isReal(a) ? c(f(a.re)) : null;
}

function applyCall(head: string, args: Complex[]): Value {
    if (head === 'Log' && args.length === 2) {
        const lx = log(args[1]);
        const lb = log(args[0]);
        return lx && lb ? div(lx, lb) : null;
    }
    if (head === 'ArcTan' && args.length === 2) {
        return isReal(args[0]) && isReal(args[1]) ? c(Math.atan2(args[1].re, args[0].re)) : null;
    }
    if ((head === 'Min' || head === 'Max') && args.length > 0) {
        if (!args.every(isReal)) return null;
        const reals = args.map(a => a.re);
        return c(head === 'Min' ? Math.min(...reals) : Math.max(...reals));
    }
    if (args.length !== 1) return null;
    const [z] = args;
    const iz = c(-z.im, z.re);
    switch (head) {
        case 'Sin': return c(Math.sin(z.re) * Math.cosh(z.im), Math.cos(z.re) * Math.sinh(z.im));
        case 'Cos': return c(Math.cos(z.re) * Math.cosh(z.im), -Math.sin(z.re) * Math.sinh(z.im));
        case 'Tan': {
            const s = applyCall('Sin', [z]);
            const k = applyCall('Cos', [z]);
            return s && k ? div(s, k) : null;
        }
        case 'Exp': return exp(z);
        case 'Log': return log(z);
        case 'Sqrt': return pow(z, c(0.5));
        case 'Sinh': return mul(c(0, -1), applyCall('Sin', [iz]) ?? c(NaN));
        case 'Cosh': return applyCall('Cos', [iz]);
        case 'Tanh': {
            const s = applyCall('Sinh', [z]);
            const k = applyCall('Cosh', [z]);
            return s && k ? div(s, k) : null;
        }
        case 'Abs': return c(modulus(z));
        case 'ArcSin': return isReal(z) && Math.abs(z.re) <= 1 ? c(Math.asin(z.re)) : null;
        case 'ArcCos': return isReal(z) && Math.abs(z.re) <= 1 ? c(Math.acos(z.re)) : null;
        case 'ArcTan': return realOnly(z, Math.atan);
        case 'ArcSinh': return realOnly(z, Math.asinh);
        case 'ArcCosh': return isReal(z) && z.re >= 1 ? c(Math.acosh(z.re)) : null;
        case 'ArcTanh': return isReal(z) && Math.abs(z.re) < 1 ? c(Math.atanh(z.re)) : null;
        case 'Sign': return realOnly(z, Math.sign);
        case 'Floor': return realOnly(z, Math.floor);
        case 'Ceiling': return realOnly(z, Math.ceil);
        case 'Round': return realOnly(z, Math.round);
        default: return null;
    }
}

// ── Evaluate an expression under variable bindings ─────────

export function evaluate(expr: Expr, env: Env): Value {
    const v = evalNode(expr, env);
    if (v === null || !Number.isFinite(v.re) || !Number.isFinite(v.im)) return null;
    return v;
}

function lookup(name: string, env: Env): Value {
    const bound = env[name];
    if (bound !== undefined) return typeof bound === 'number' ? c(bound) : bound;
    return CONSTANTS[name] ?? null;
}

function evalAll(items: readonly Expr[], env: Env): Complex[] | null {
    const out: Complex[] = [];
    for (const item of items) {
        const v = evalNode(item, env);
        if (v === null) return null;
        out.push(v);
    }
    return out;
}

function evalNode(expr: Expr, env: Env): Value {
    switch (expr.tag) {
        case 'Num':
            return c(expr.num / expr.den);

        case 'Symbol':
        case 'Pattern':
            return lookup(expr.name, env);

        case 'Add': {
            const terms = evalAll(expr.terms, env);
            return terms && terms.reduce(add, c(0));
        }

        case 'Mul': {
            const factors = evalAll(expr.factors, env);
            return factors && factors.reduce(mul, c(1));
        }

        case 'Pow': {
            const base = evalNode(expr.base, env);
            const e = evalNode(expr.exponent, env);
            return base && e ? pow(base, e) : null;
        }

        case 'Negate': {
            const v = evalNode(expr.inner, env);
            return v && neg(v);
        }

        case 'Call': {
            const args = evalAll(expr.args, env);
            return args && applyCall(expr.head, args);
        }

        case 'List':
            return null; // Not a scalar
    }
}

export function approxEqual(a: Complex, b: Complex, tol = 1e-9): boolean {
    const scale = 1 + Math.max(modulus(a), modulus(b));
    return modulus(c(a.re - b.re, a.im - b.im)) <= tol * scale;
}

// ── Assumption-consistent sampling ──────────────────────────

interface Range {
    lo: number;
    hi: number;
    exact: number | null;
}

const SPAN = 10;

function rangeFor(name: string, facts: readonly Fact[]): Range {
    let lo = -Infinity;
    let hi = Infinity;
    let exact: number | null = null;
    for (const f of facts) {
        if (f.subject.tag !== 'Symbol' || f.subject.name !== name) continue;
        if (f.relation === '>' || f.relation === '>=') lo = Math.max(lo, f.bound);
        if (f.relation === '<' || f.relation === '<=') hi = Math.min(hi, f.bound);
        if (f.relation === '==') exact = f.bound;
    }
    if (lo === -Infinity && hi === Infinity) return { lo: -SPAN, hi: SPAN, exact };
    if (lo === -Infinity) return { lo: hi - SPAN, hi, exact };
    if (hi === Infinity) return { lo, hi: lo + SPAN, exact };
    return { lo, hi, exact };
}

// mulberry32
function seededRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

function sample(r: Range, rand: () => number): number {
    if (r.exact !== null) return r.exact;
    // Keep clear of the endpoints so strict bounds hold
    const margin = (r.hi - r.lo) * 1e-3;
    return r.lo + margin + rand() * (r.hi - r.lo - 2 * margin);
}

function holds(f: Fact, env: Env): boolean | null {
    const v = evaluate(f.subject, env);
    if (v === null || !isReal(v)) return null;
    switch (f.relation) {
        case '>': return v.re > f.bound;
        case '>=': return v.re >= f.bound;
        case '<': return v.re < f.bound;
        case '<=': return v.re <= f.bound;
        case '==': return v.re === f.bound;
        case '!=': return v.re !== f.bound;
    }
}

// ── Spot check: are two trees numerically equal? ──────────

export interface SpotCheckReport {
    totalTests: number;
    passed: number;
    failed: number;
    skipped: number;
    preconditionSkipped: number;
    counterexamples: Array<{ witness: Record<string, number>; expected: Complex; actual: Complex }>;
    classification: 'equivalent' | 'inequivalent' | 'indeterminate';
}

export interface SpotCheckOptions {
    trials: number;
    tolerance: number;
    seed: number;
}

const DEFAULT_SPOT_CHECK: SpotCheckOptions = {
    trials: 200,
    tolerance: 1e-9,
    seed: 0x5eed,
};

/**
 * Samples assignments consistent with `assumptions` and compares the
 * two expressions at each. Non-scalar or undefined values are skipped.
 */
export function spotCheck(
    original: Expr,
    rewritten: Expr,
    assumptions: AssumptionSet,
    options: Partial<SpotCheckOptions> = {},
): SpotCheckReport {
    const opts = { ...DEFAULT_SPOT_CHECK, ...options };
    const facts = assumptions.tag === 'Facts' ? assumptions.facts : [];
    const names = [...new Set([...freeSymbols(original), ...freeSymbols(rewritten)])]
        .filter(n => CONSTANTS[n] === undefined);
    const ranges = new Map(names.map(n => [n, rangeFor(n, facts)]));
    const rand = seededRandom(opts.seed);

    let passed = 0;
    let failed = 0;
    let skipped = 0;
    let preconditionSkipped = 0;
    const counterexamples: SpotCheckReport['counterexamples'] = [];

    for (let i = 0; i < opts.trials; i++) {
        const env: Record<string, number> = {};
        for (const [name, range] of ranges) env[name] = sample(range, rand);

        if (facts.some(f => holds(f, env) === false)) {
            preconditionSkipped++;
            continue;
        }

        const expected = evaluate(original, env);
        const actual = evaluate(rewritten, env);
        if (expected === null || actual === null) {
            skipped++;
            continue;
        }
        if (approxEqual(expected, actual, opts.tolerance)) {
            passed++;
        } else {
            failed++;
            if (counterexamples.length < 5) counterexamples.push({ witness: { ...env }, expected, actual });
        }
    }

    const classification = failed > 0 ? 'inequivalent' : passed > 0 ? 'equivalent' : 'indeterminate';
    return { totalTests: passed + failed, passed, failed, skipped, preconditionSkipped, counterexamples, classification };
}
