// ─────────────────────────────────────────────────────────────
// PyForm  ·  Python Emitter
// Structural, precedence-aware rendering of the IR as Python source
// ─────────────────────────────────────────────────────────────

import { mk, type Expr, type FunctionSignature, type Num } from '../core/expr';
import type { Diagnostic } from '../core/diagnostics';
import { IdentifierScope } from '../core/identifiers';
import { resolveTarget, type TargetConfig } from '../core/targets';

export interface EmitterResult {
    language: 'python';
    target: string;
    fileExtension: '.py';
    code: string;
    diagnostics: Diagnostic[];
}

export interface EmitOptions {
    target: TargetConfig | string;
}

const DEFAULT_OPTIONS: EmitOptions = {
    target: 'numpy',
};

// Python binding strength: `-x**2` is `-(x**2)`, `**` is right-associative
const Prec = { Add: 1, Mul: 2, Unary: 3, Pow: 4, Atom: 5 } as const;
type Prec = typeof Prec[keyof typeof Prec];

interface Printed {
    text: string;
    prec: Prec;
    /** The operand of a leading unary minus, when the rendering has one. */
    magnitude?: Printed;
}

function wrap(p: Printed, min: Prec): string {
    return p.prec < min ? `(${p.text})` : p.text;
}

// `-a*b` reads as `(-a)*b`, which is the same value; a sum needs parentheses
function negative(magnitude: Printed): Printed {
    const m: Printed = magnitude.prec < Prec.Mul ? { text: `(${magnitude.text})`, prec: Prec.Atom } : magnitude;
    const prec = m.prec < Prec.Unary ? m.prec : Prec.Unary;
    return { text: `-${m.text}`, prec, magnitude: m };
}

// ── Emitter state for one translation unit ──────────────────

class PythonEmitter {
    private readonly scope: IdentifierScope;
    private readonly unmapped = new Set<string>();
    private readonly diagnostics: Diagnostic[] = [];

    constructor(private readonly target: TargetConfig) {
        this.scope = new IdentifierScope(target);
    }

    finish(): Diagnostic[] {
        return [...this.diagnostics, ...this.scope.collisions()];
    }

    emit(expr: Expr): string {
        return this.render(expr).text;
    }

    bind(rawName: string): string {
        return this.scope.resolve(rawName);
    }

    private render(expr: Expr): Printed {
        switch (expr.tag) {
            case 'Num':
                return this.renderNum(expr);

            case 'Symbol': {
                const constant = this.target.constants[expr.name];
                if (constant !== undefined) return { text: constant, prec: Prec.Atom };
                return { text: this.scope.resolve(expr.name), prec: Prec.Atom };
            }

            case 'Pattern':
                return { text: this.scope.resolve(expr.name), prec: Prec.Atom };

            case 'Negate':
                if (expr.inner.tag === 'Mul') return this.renderProduct([expr]);
                return negative({ text: wrap(this.render(expr.inner), Prec.Pow), prec: Prec.Pow });

            case 'Add':
                return this.renderSum(expr.terms);

            case 'Mul':
                return this.renderProduct(expr.factors);

            case 'Pow': {
                const e = expr.exponent;
                if (e.tag === 'Num' && e.num < 0) return this.renderProduct([expr]);
                if (e.tag === 'Num' && e.num === 1 && e.den === 2 && this.target.radical === 'call') {
                    return { text: `${this.target.radicalCall}(${this.emit(expr.base)})`, prec: Prec.Atom };
                }
                return {
                    text: `${wrap(this.render(expr.base), Prec.Atom)}**${wrap(this.render(e), Prec.Unary)}`,
                    prec: Prec.Pow,
                };
            }

            case 'Call':
                return this.renderCall(expr.head, expr.args);

            case 'List':
                return this.renderList(expr.items, true);
        }
    }

    private renderNum(n: Num): Printed {
        if (Number.isNaN(n.num)) return { text: this.target.nan, prec: Prec.Atom };
        if (n.num < 0 || Object.is(n.num, -0)) return negative(this.renderNum({ ...n, num: -n.num }));
        if (!Number.isFinite(n.num)) return { text: this.target.infinity, prec: Prec.Atom };
        if (n.den !== 1) return { text: `${n.num}/${n.den}`, prec: Prec.Mul };
        return { text: String(n.num), prec: Prec.Atom };
    }

    // ── Sums: negative terms become subtraction ────────────

    private renderSum(terms: readonly Expr[]): Printed {
        let text = '';
        terms.forEach((term, i) => {
            const p = this.render(term);
            if (i === 0) {
                text = wrap(p, Prec.Add);
            } else if (p.magnitude) {
                text += ` - ${wrap(p.magnitude, Prec.Mul)}`;
            } else {
                text += ` + ${wrap(p, Prec.Mul)}`;
            }
        });
        return { text, prec: Prec.Add };
    }

    // ── Products: signs pulled out, negative powers divide ─

    private renderProduct(factors: readonly Expr[]): Printed {
        let negate = false;
        const numer: Printed[] = [];
        const denom: Printed[] = [];

        const queue = [...factors];
        while (queue.length > 0) {
            const f = queue.shift();
            if (f === undefined) break;

            if (f.tag === 'Mul') {
                queue.unshift(...f.factors);
            } else if (f.tag === 'Negate') {
                negate = !negate;
                queue.unshift(f.inner);
            } else if (f.tag === 'Num' && !Number.isNaN(f.num)) {
                const abs = Math.abs(f.num);
                if (f.num < 0 || Object.is(f.num, -0)) negate = !negate;
                if (f.den !== 1) {
                    if (abs !== 1) numer.push({ text: String(abs), prec: Prec.Atom });
                    denom.push({ text: String(f.den), prec: Prec.Atom });
                } else if (abs !== 1) {
                    numer.push(this.renderNum({ tag: 'Num', num: abs, den: 1 }));
                }
            } else if (f.tag === 'Pow' && f.exponent.tag === 'Num' && f.exponent.num < 0) {
                const e = f.exponent;
                const flipped = e.num === -1 && e.den === 1 ? f.base : mk.pow(f.base, mk.rat(-e.num, e.den));
                denom.push(this.render(flipped));
            } else {
                numer.push(this.render(f));
            }
        }

        let body: Printed;
        if (numer.length === 0 && denom.length === 0) {
            body = { text: '1', prec: Prec.Atom };
        } else {
            const top = numer.length === 0 ? '1' : numer.map(p => wrap(p, Prec.Pow)).join('*');
            if (denom.length === 0) {
                body = numer.length === 1 ? numer[0] : { text: top, prec: Prec.Mul };
            } else {
                const bottom = denom.length === 1
                    ? wrap(denom[0], Prec.Pow)
                    : `(${denom.map(p => wrap(p, Prec.Pow)).join('*')})`;
                body = { text: `${top}/${bottom}`, prec: Prec.Mul };
            }
        }
        return negate ? negative(body) : body;
    }

    // ── Calls, with the two-argument host forms ───────────

    private renderCall(head: string, args: readonly Expr[]): Printed {
        const fn = this.target.functions[head];

        if (head === 'Log' && args.length === 2 && fn !== undefined) {
            const [base, x] = args;
            return { text: `${fn}(${this.emit(x)})/${fn}(${this.emit(base)})`, prec: Prec.Mul };
        }
        if (head === 'ArcTan' && args.length === 2) {
            const [x, y] = args;
            return { text: `${this.target.arctan2Call}(${this.emit(y)}, ${this.emit(x)})`, prec: Prec.Atom };
        }

        if (fn !== undefined && args.length > 2 && this.target.binaryFunctions.includes(head)) {
            const [first, ...rest] = args;
            return { text: `${fn}(${this.emit(first)}, ${this.renderCall(head, rest).text})`, prec: Prec.Atom };
        }

        const callee = fn ?? head;
        if (fn === undefined && !this.unmapped.has(head)) {
            this.unmapped.add(head);
            this.diagnostics.push({
                kind: 'UnmappedFunction',
                severity: 'warning',
                message: `No ${this.target.name} mapping for '${head}'; emitted verbatim`,
                name: head,
            });
        }
        return { text: `${callee}(${args.map(a => this.emit(a)).join(', ')})`, prec: Prec.Atom };
    }

    private renderList(items: readonly Expr[], outermost: boolean): Printed {
        const inner = items
            .map(item => item.tag === 'List' ? this.renderList(item.items, false).text : this.emit(item))
            .join(', ');
        const ctor = this.target.arrayConstructor;
        const text = outermost && ctor !== null ? `${ctor}([${inner}])` : `[${inner}]`;
        return { text, prec: Prec.Atom };
    }
}

// ── Public API ──────────────────────────────────────────────

export function emitExpression(expr: Expr, options: Partial<EmitOptions> = {}): EmitterResult {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const target = resolveTarget(opts.target);
    const emitter = new PythonEmitter(target);
    const code = emitter.emit(expr);
    return { language: 'python', target: target.name, fileExtension: '.py', code, diagnostics: emitter.finish() };
}

/**
 * Renders `def name(params):\n    return body`. Parameters are bound in the
 * unit's scope before the body, so a free symbol spelled differently but
 * normalizing to a parameter name is reported as a collision.
 */
export function emitFunction(signature: FunctionSignature, options: Partial<EmitOptions> = {}): EmitterResult {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const target = resolveTarget(opts.target);
    const emitter = new PythonEmitter(target);
    const params = signature.rawParams.map(raw => emitter.bind(raw));
    const body = emitter.emit(signature.body);
    const code = `def ${signature.name}(${params.join(', ')}):\n    return ${body}`;
    return { language: 'python', target: target.name, fileExtension: '.py', code, diagnostics: emitter.finish() };
}
