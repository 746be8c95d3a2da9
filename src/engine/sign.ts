// ─────────────────────────────────────────────────────────────
// PyForm  ·  Sign Oracle
// Decides the sign of a sub-expression under an assumption set
// ─────────────────────────────────────────────────────────────

import type { AssumptionSet, Fact } from '../core/assumptions';
import { exprEqual, type Expr } from '../core/expr';

export type Sign = 'Positive' | 'Negative' | 'Zero' | 'Unknown';

export interface SignOracle {
    signOf(expr: Expr, assumptions: AssumptionSet): Sign;
}

const POSITIVE_CONSTANTS = new Set(['Pi', 'E', 'Degree', 'GoldenRatio', 'EulerGamma', 'Catalan']);

// Heads f with sign(f(x)) = sign(x)
const SIGN_PRESERVING = new Set(['Sign', 'Sinh', 'Tanh', 'ArcTan', 'ArcSinh', 'ArcTanh']);

export function signOf(expr: Expr, assumptions: AssumptionSet): Sign {
    if (assumptions.tag === 'Facts') {
        const fromFacts = signFromFacts(assumptions.facts.filter(f => exprEqual(f.subject, expr)));
        if (fromFacts !== 'Unknown') return fromFacts;
    }
    return structuralSign(expr, assumptions);
}

export const factSignOracle: SignOracle = { signOf };

// ── Interval of a subject from its facts ────────────────────

interface Bound {
    value: number;
    strict: boolean;
}

function signFromFacts(facts: readonly Fact[]): Sign {
    if (facts.length === 0) return 'Unknown';

    let lo: Bound = { value: -Infinity, strict: true };
    let hi: Bound = { value: Infinity, strict: true };
    let excludesZero = false;

    const raise = (b: Bound) => {
        if (b.value > lo.value || (b.value === lo.value && b.strict)) lo = b;
    };
    const lower = (b: Bound) => {
        if (b.value < hi.value || (b.value === hi.value && b.strict)) hi = b;
    };

    for (const f of facts) {
        switch (f.relation) {
            case '>': raise({ value: f.bound, strict: true }); break;
            case '>=': raise({ value: f.bound, strict: false }); break;
            case '<': lower({ value: f.bound, strict: true }); break;
            case '<=': lower({ value: f.bound, strict: false }); break;
            case '==':
                raise({ value: f.bound, strict: false });
                lower({ value: f.bound, strict: false });
                break;
            case '!=':
                if (f.bound === 0) excludesZero = true;
                break;
        }
    }

    // Contradictory facts say nothing usable
    if (lo.value > hi.value || (lo.value === hi.value && (lo.strict || hi.strict))) return 'Unknown';
    if (excludesZero && lo.value === 0 && hi.value === 0) return 'Unknown';

    if (lo.value > 0 || (lo.value === 0 && (lo.strict || excludesZero))) return 'Positive';
    if (hi.value < 0 || (hi.value === 0 && (hi.strict || excludesZero))) return 'Negative';
    if (lo.value === 0 && hi.value === 0) return 'Zero';
    return 'Unknown';
}

// ── Structural propagation ──────────────────────────────────

function flip(s: Sign): Sign {
    if (s === 'Positive') return 'Negative';
    if (s === 'Negative') return 'Positive';
    return s;
}

function numberSign(v: number): Sign {
    if (Number.isNaN(v)) return 'Unknown';
    return v > 0 ? 'Positive' : v < 0 ? 'Negative' : 'Zero';
}

function structuralSign(expr: Expr, a: AssumptionSet): Sign {
    switch (expr.tag) {
        case 'Num':
            return numberSign(expr.num);

        case 'Symbol':
            return POSITIVE_CONSTANTS.has(expr.name) ? 'Positive' : 'Unknown';

        case 'Negate':
            return flip(signOf(expr.inner, a));

        case 'Mul': {
            const signs = expr.factors.map(f => signOf(f, a));
            if (signs.includes('Zero')) return 'Zero';
            if (signs.includes('Unknown')) return 'Unknown';
            const negatives = signs.filter(s => s === 'Negative').length;
            return negatives % 2 === 0 ? 'Positive' : 'Negative';
        }

        case 'Add': {
            const signs = expr.terms.map(t => signOf(t, a));
            if (signs.includes('Unknown')) return 'Unknown';
            const pos = signs.includes('Positive');
            const neg = signs.includes('Negative');
            if (pos && neg) return 'Unknown';
            return pos ? 'Positive' : neg ? 'Negative' : 'Zero';
        }

        case 'Pow': {
            const base = signOf(expr.base, a);
            const e = expr.exponent;
            if (base === 'Positive') return 'Positive';
            if (e.tag !== 'Num') return 'Unknown';
            if (base === 'Zero') return e.num / e.den > 0 ? 'Zero' : 'Unknown';
            if (base === 'Negative' && e.den === 1 && Number.isInteger(e.num)) {
                return e.num % 2 === 0 ? 'Positive' : 'Negative';
            }
            return 'Unknown';
        }

        case 'Call': {
            if (expr.args.length !== 1) return 'Unknown';
            if (expr.head === 'Exp' || expr.head === 'Cosh') return 'Positive';
            const inner = signOf(expr.args[0], a);
            if (expr.head === 'Abs') return inner === 'Zero' || inner === 'Unknown' ? inner : 'Positive';
            if (expr.head === 'Sqrt') return inner === 'Negative' ? 'Unknown' : inner;
            if (SIGN_PRESERVING.has(expr.head)) return inner;
            return 'Unknown';
        }

        case 'List':
        case 'Pattern':
            return 'Unknown';
    }
}
