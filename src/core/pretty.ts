// ─────────────────────────────────────────────────────────────
// PyForm  ·  Host-Form Printer
// Renders the IR back in host notation for messages and suggestions
// ─────────────────────────────────────────────────────────────

import type { Expr, Num } from './expr';

const Prec = { Add: 1, Mul: 2, Unary: 3, Pow: 4, Atom: 5 } as const;
type Prec = typeof Prec[keyof typeof Prec];

export function hostForm(expr: Expr): string {
    return print(expr).text;
}

interface Printed {
    text: string;
    prec: Prec;
}

function wrap(p: Printed, min: Prec): string {
    return p.prec < min ? `(${p.text})` : p.text;
}

function printNum(n: Num): Printed {
    if (n.den !== 1) {
        return { text: `${n.num}/${n.den}`, prec: n.num < 0 ? Prec.Unary : Prec.Mul };
    }
    const text = Number.isFinite(n.num) ? String(n.num) : Number.isNaN(n.num) ? 'Indeterminate' : n.num > 0 ? 'Infinity' : '-Infinity';
    return { text, prec: n.num < 0 || Object.is(n.num, -0) ? Prec.Unary : Prec.Atom };
}

function print(expr: Expr): Printed {
    switch (expr.tag) {
        case 'Num':
            return printNum(expr);

        case 'Symbol':
            return { text: expr.name, prec: Prec.Atom };

        case 'Pattern':
            return { text: `${expr.name}_${expr.head ?? ''}`, prec: Prec.Atom };

        case 'Add': {
            let text = '';
            expr.terms.forEach((term, i) => {
                if (i > 0 && term.tag === 'Negate') {
                    text += ` - ${wrap(print(term.inner), Prec.Mul)}`;
                    return;
                }
                const p = print(term);
                if (i === 0) text = p.text;
                else if (p.text.startsWith('-')) text += ` - ${p.text.slice(1)}`;
                else text += ` + ${p.text}`;
            });
            return { text, prec: Prec.Add };
        }

        case 'Mul':
            return {
                text: expr.factors.map((f, i) => wrap(print(f), i === 0 ? Prec.Unary : Prec.Pow)).join('*'),
                prec: Prec.Mul,
            };

        case 'Pow': {
            const e = expr.exponent;
            if (e.tag === 'Num' && e.num === 1 && e.den === 2) {
                return { text: `Sqrt[${hostForm(expr.base)}]`, prec: Prec.Atom };
            }
            return { text: `${wrap(print(expr.base), Prec.Atom)}^${wrap(print(e), Prec.Atom)}`, prec: Prec.Pow };
        }

        case 'Call':
            return { text: `${expr.head}[${expr.args.map(hostForm).join(', ')}]`, prec: Prec.Atom };

        case 'Negate':
            return { text: `-${wrap(print(expr.inner), Prec.Pow)}`, prec: Prec.Unary };

        case 'List':
            return { text: `{${expr.items.map(hostForm).join(', ')}}`, prec: Prec.Atom };
    }
}
