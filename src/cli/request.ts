// ─────────────────────────────────────────────────────────────
// PyForm  ·  Translation Request Schema
// JSON input for the command line, validated with zod
// ─────────────────────────────────────────────────────────────

import { z } from 'zod';
import { parseAssumptions, type AssumptionSet } from '../core/assumptions';
import { mk, type Expr } from '../core/expr';
import { InMemoryDefinitionStore } from '../parser/definitions';
import type { TranslationUnit } from '../translate';

// Bare numbers and strings are shorthand for Num and Symbol nodes
export type ExprJson =
    | number
    | string
    | { tag: 'Num'; num: number; den?: number }
    | { tag: 'Symbol'; name: string }
    | { tag: 'Add'; terms: ExprJson[] }
    | { tag: 'Mul'; factors: ExprJson[] }
    | { tag: 'Pow'; base: ExprJson; exponent: ExprJson }
    | { tag: 'Call'; head: string; args: ExprJson[] }
    | { tag: 'Negate'; inner: ExprJson }
    | { tag: 'List'; items: ExprJson[] }
    | { tag: 'Pattern'; name: string; head?: string };

export const ExprSchema: z.ZodType<ExprJson> = z.lazy(() => z.union([
    z.number(),
    z.string().min(1),
    z.discriminatedUnion('tag', [
        z.object({ tag: z.literal('Num'), num: z.number(), den: z.number().int().optional() }),
        z.object({ tag: z.literal('Symbol'), name: z.string().min(1) }),
        z.object({ tag: z.literal('Add'), terms: z.array(ExprSchema) }),
        z.object({ tag: z.literal('Mul'), factors: z.array(ExprSchema) }),
        z.object({ tag: z.literal('Pow'), base: ExprSchema, exponent: ExprSchema }),
        z.object({ tag: z.literal('Call'), head: z.string().min(1), args: z.array(ExprSchema) }),
        z.object({ tag: z.literal('Negate'), inner: ExprSchema }),
        z.object({ tag: z.literal('List'), items: z.array(ExprSchema) }),
        z.object({ tag: z.literal('Pattern'), name: z.string().min(1), head: z.string().optional() }),
    ]),
]));

export const TranslationRequestSchema = z.object({
    target: z.string().optional(),
    /** Host-syntax facts such as `a > 0 && b < 0`; `True` combines syntactically. Absent skips the radical pass. */
    assumptions: z.string().optional(),
    expressions: z.array(z.object({ label: z.string(), expr: ExprSchema })).default([]),
    definitions: z.array(z.object({ symbol: z.string().min(1), lhs: ExprSchema, rhs: ExprSchema })).default([]),
    /** Symbols to emit as functions; every defined symbol when omitted. */
    functions: z.array(z.string().min(1)).optional(),
});

export type TranslationRequest = z.infer<typeof TranslationRequestSchema>;

export function toExpr(json: ExprJson): Expr {
    if (typeof json === 'number') return mk.num(json);
    if (typeof json === 'string') return mk.sym(json);
    switch (json.tag) {
        case 'Num': return mk.rat(json.num, json.den ?? 1);
        case 'Symbol': return mk.sym(json.name);
        case 'Add': return mk.add(...json.terms.map(toExpr));
        case 'Mul': return mk.mul(...json.factors.map(toExpr));
        case 'Pow': return mk.pow(toExpr(json.base), toExpr(json.exponent));
        case 'Call': return mk.call(json.head, ...json.args.map(toExpr));
        case 'Negate': return mk.neg(toExpr(json.inner));
        case 'List': return mk.list(...json.items.map(toExpr));
        case 'Pattern': return mk.pattern(json.name, json.head);
    }
}

export interface PreparedRequest {
    target: string | undefined;
    combine: AssumptionSet | null;
    units: TranslationUnit[];
    store: InMemoryDefinitionStore;
}

/** Expressions first, then functions, each in request order. */
export function prepareRequest(request: TranslationRequest): PreparedRequest {
    const store = new InMemoryDefinitionStore();
    for (const d of request.definitions) store.define(d.symbol, { lhs: toExpr(d.lhs), rhs: toExpr(d.rhs) });

    const units: TranslationUnit[] = [
        ...request.expressions.map((e): TranslationUnit => ({ kind: 'expression', label: e.label, expr: toExpr(e.expr) })),
        ...(request.functions ?? store.symbols()).map((symbol): TranslationUnit => ({ kind: 'function', symbol })),
    ];

    return {
        target: request.target,
        combine: request.assumptions === undefined ? null : parseAssumptions(request.assumptions),
        units,
        store,
    };
}
