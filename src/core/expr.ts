// ─────────────────────────────────────────────────────────────
// PyForm  ·  Expression IR
// The host's algebraic AST as consumed by the emitter and rewriter
// ─────────────────────────────────────────────────────────────

// ── Expression nodes ────────────────────────────────────────

export type Expr =
    | Num
    | Sym
    | Add
    | Mul
    | Pow
    | Call
    | Negate
    | List
    | Pattern;

/** Exact rational when `num` is an integer; a real literal otherwise (`den` is then 1). */
export interface Num {
    tag: 'Num';
    num: number;
    den: number;
}

export interface Sym {
    tag: 'Symbol';
    name: string;
}

export interface Add {
    tag: 'Add';
    terms: readonly Expr[];
}

export interface Mul {
    tag: 'Mul';
    factors: readonly Expr[];
}

export interface Pow {
    tag: 'Pow';
    base: Expr;
    exponent: Expr;
}

export interface Call {
    tag: 'Call';
    head: string;
    args: readonly Expr[];
}

export interface Negate {
    tag: 'Negate';
    inner: Expr;
}

export interface List {
    tag: 'List';
    items: readonly Expr[];
}

/** A bound pattern variable on a rule's left-hand side: `x_` or `x_Real`. */
export interface Pattern {
    tag: 'Pattern';
    name: string;
    head?: string;
}

// ── Host definitions ────────────────────────────────────────

export interface StoredRule {
    lhs: Expr;
    rhs: Expr;
}

export interface FunctionSignature {
    name: string;
    params: string[];
    /** Pattern names as written, parallel to `params`. */
    rawParams: string[];
    body: Expr;
}

// ── Smart constructors ──────────────────────────────────────

function gcd(a: number, b: number): number {
    a = Math.abs(a);
    b = Math.abs(b);
    while (b !== 0) { [a, b] = [b, a % b]; }
    return a;
}

function rational(num: number, den: number): Num {
    if (den === 0) return { tag: 'Num', num: NaN, den: 1 };
    if (!Number.isInteger(num) || !Number.isInteger(den)) return { tag: 'Num', num: num / den, den: 1 };
    const g = gcd(num, den) || 1;
    const sign = den < 0 ? -1 : 1;
    return { tag: 'Num', num: (sign * num) / g, den: (sign * den) / g };
}

export const mk = {
    num: (value: number): Num => ({ tag: 'Num', num: value, den: 1 }),
    rat: (num: number, den: number): Num => rational(num, den),
    sym: (name: string): Sym => ({ tag: 'Symbol', name }),
    add: (...terms: Expr[]): Expr => {
        const flat = terms.flatMap(t => t.tag === 'Add' ? t.terms : [t]);
        if (flat.length === 0) return mk.num(0);
        return flat.length === 1 ? flat[0] : { tag: 'Add', terms: flat };
    },
    mul: (...factors: Expr[]): Expr => {
        const flat = factors
            .flatMap(f => f.tag === 'Mul' ? f.factors : [f])
            .filter(f => !isOne(f));
        if (flat.length === 0) return mk.num(1);
        return flat.length === 1 ? flat[0] : { tag: 'Mul', factors: flat };
    },
    pow: (base: Expr, exponent: Expr): Pow => ({ tag: 'Pow', base, exponent }),
    sqrt: (base: Expr): Pow => ({ tag: 'Pow', base, exponent: rational(1, 2) }),
    call: (head: string, ...args: Expr[]): Call => ({ tag: 'Call', head, args }),
    neg: (inner: Expr): Expr => {
        if (inner.tag === 'Num') return { tag: 'Num', num: -inner.num, den: inner.den };
        if (inner.tag === 'Negate') return inner.inner;
        return { tag: 'Negate', inner };
    },
    list: (...items: Expr[]): List => ({ tag: 'List', items }),
    pattern: (name: string, head?: string): Pattern => head === undefined ? { tag: 'Pattern', name } : { tag: 'Pattern', name, head },
    rule: (lhs: Expr, rhs: Expr): StoredRule => ({ lhs, rhs }),
};

// ── Predicates ──────────────────────────────────────────────

export function isOne(e: Expr): boolean {
    return e.tag === 'Num' && e.num === 1 && e.den === 1;
}

export function isInteger(e: Expr): e is Num {
    return e.tag === 'Num' && e.den === 1 && Number.isInteger(e.num);
}

/** `n/2` with `n` an integer, i.e. a reduced rational with denominator two. */
export function isHalfInteger(e: Expr): e is Num {
    return e.tag === 'Num' && e.den === 2 && Number.isInteger(e.num);
}

export function numValue(n: Num): number {
    return n.num / n.den;
}

// ── Structural equality ─────────────────────────────────────

export function exprEqual(a: Expr, b: Expr): boolean {
    if (a === b) return true;
    switch (a.tag) {
        case 'Num':
            return b.tag === 'Num' && a.num === b.num && a.den === b.den;
        case 'Symbol':
            return b.tag === 'Symbol' && a.name === b.name;
        case 'Add':
            return b.tag === 'Add' && seqEqual(a.terms, b.terms);
        case 'Mul':
            return b.tag === 'Mul' && seqEqual(a.factors, b.factors);
        case 'Pow':
            return b.tag === 'Pow' && exprEqual(a.base, b.base) && exprEqual(a.exponent, b.exponent);
        case 'Call':
            return b.tag === 'Call' && a.head === b.head && seqEqual(a.args, b.args);
        case 'Negate':
            return b.tag === 'Negate' && exprEqual(a.inner, b.inner);
        case 'List':
            return b.tag === 'List' && seqEqual(a.items, b.items);
        case 'Pattern':
            return b.tag === 'Pattern' && a.name === b.name && a.head === b.head;
    }
}

function seqEqual(a: readonly Expr[], b: readonly Expr[]): boolean {
    return a.length === b.length && a.every((x, i) => exprEqual(x, b[i]));
}

// ── Traversal ───────────────────────────────────────────────

export function children(e: Expr): readonly Expr[] {
    switch (e.tag) {
        case 'Num': case 'Symbol': case 'Pattern': return [];
        case 'Add': return e.terms;
        case 'Mul': return e.factors;
        case 'Pow': return [e.base, e.exponent];
        case 'Call': return e.args;
        case 'Negate': return [e.inner];
        case 'List': return e.items;
    }
}

export function nodeCount(e: Expr): number {
    let n = 1;
    for (const c of children(e)) n += nodeCount(c);
    return n;
}

/** Symbol names in order of first appearance. */
export function freeSymbols(e: Expr): string[] {
    const seen = new Set<string>();
    const walk = (x: Expr) => {
        if (x.tag === 'Symbol') seen.add(x.name);
        for (const c of children(x)) walk(c);
    };
    walk(e);
    return [...seen];
}
