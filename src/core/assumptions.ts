// ─────────────────────────────────────────────────────────────
// PyForm  ·  Assumption Sets
// Conjunctions of sign / relational facts, or the syntactic sentinel
// ─────────────────────────────────────────────────────────────

import { mk, type Expr } from './expr';
import { hostForm } from './pretty';

export type Relation = '>' | '>=' | '<' | '<=' | '==' | '!=';

export interface Fact {
    subject: Expr;
    relation: Relation;
    bound: number;
}

export type AssumptionSet =
    | { tag: 'None' }
    | { tag: 'Facts'; facts: readonly Fact[] };

export const NO_ASSUMPTIONS: AssumptionSet = Object.freeze({ tag: 'None' });

export function assuming(...facts: Fact[]): AssumptionSet {
    return Object.freeze({ tag: 'Facts', facts: Object.freeze([...facts]) });
}

function subjectOf(s: Expr | string): Expr {
    return typeof s === 'string' ? mk.sym(s) : s;
}

export const fact = {
    gt: (subject: Expr | string, bound = 0): Fact => ({ subject: subjectOf(subject), relation: '>', bound }),
    ge: (subject: Expr | string, bound = 0): Fact => ({ subject: subjectOf(subject), relation: '>=', bound }),
    lt: (subject: Expr | string, bound = 0): Fact => ({ subject: subjectOf(subject), relation: '<', bound }),
    le: (subject: Expr | string, bound = 0): Fact => ({ subject: subjectOf(subject), relation: '<=', bound }),
    eq: (subject: Expr | string, bound = 0): Fact => ({ subject: subjectOf(subject), relation: '==', bound }),
    ne: (subject: Expr | string, bound = 0): Fact => ({ subject: subjectOf(subject), relation: '!=', bound }),
};

export function formatFact(f: Fact): string {
    return `${hostForm(f.subject)} ${f.relation} ${f.bound}`;
}

export function formatAssumptions(a: AssumptionSet): string {
    return a.tag === 'None' ? 'True' : a.facts.map(formatFact).join(' && ');
}

// ── Textual form: "a > 0 && b < 0" ──────────────────────────

export class AssumptionSyntaxError extends Error {
    constructor(message: string, public readonly clause: string) {
        super(message);
        this.name = 'AssumptionSyntaxError';
    }
}

const RELATION_TOKENS: Array<[string, Relation]> = [
    ['>=', '>='], ['≥', '>='], ['<=', '<='], ['≤', '<='],
    ['==', '=='], ['!=', '!='], ['≠', '!='], ['>', '>'], ['<', '<'],
];

const FLIPPED: Record<Relation, Relation> = { '>': '<', '>=': '<=', '<': '>', '<=': '>=', '==': '==', '!=': '!=' };

const NAME_REGEX = /^(?:[A-Za-z$`]|\\\[[A-Za-z0-9]+\])(?:[A-Za-z0-9$`]|\\\[[A-Za-z0-9]+\])*$/;

/**
 * Parses a conjunction of `symbol <rel> number` clauses joined by `&&` or commas.
 * `True` and the empty string give the syntactic sentinel.
 */
export function parseAssumptions(source: string): AssumptionSet {
    const trimmed = source.trim();
    if (trimmed === '' || trimmed === 'True') return NO_ASSUMPTIONS;

    const facts = trimmed
        .split(/&&|,/)
        .map(c => c.trim())
        .filter(c => c !== '')
        .map(parseClause);
    return assuming(...facts);
}

function parseClause(clause: string): Fact {
    for (const [token, relation] of RELATION_TOKENS) {
        const at = clause.indexOf(token);
        if (at < 0) continue;
        const left = clause.slice(0, at).trim();
        const right = clause.slice(at + token.length).trim();

        const rightNum = parseBound(right);
        if (rightNum !== null && NAME_REGEX.test(left)) return { subject: mk.sym(left), relation, bound: rightNum };

        const leftNum = parseBound(left);
        if (leftNum !== null && NAME_REGEX.test(right)) return { subject: mk.sym(right), relation: FLIPPED[relation], bound: leftNum };

        throw new AssumptionSyntaxError(`Expected '<symbol> ${token} <number>' in '${clause}'`, clause);
    }
    throw new AssumptionSyntaxError(`No relation found in '${clause}'`, clause);
}

function parseBound(text: string): number | null {
    if (!/^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/.test(text)) return null;
    return Number(text);
}
