// ─────────────────────────────────────────────────────────────
// PyForm  ·  Host-Form Printer Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { hostForm } from '../core/pretty';
import { mk } from '../core/expr';

const a = mk.sym('a');
const b = mk.sym('b');
const x = mk.sym('x');

describe('hostForm', () => {
    it('prints calls with brackets', () => {
        expect(hostForm(mk.call('Sin', x))).toBe('Sin[x]');
        expect(hostForm(mk.call('Log', mk.num(2), x))).toBe('Log[2, x]');
    });

    it('prints products and half powers', () => {
        expect(hostForm(mk.mul(a, b))).toBe('a*b');
        expect(hostForm(mk.sqrt(mk.mul(a, b)))).toBe('Sqrt[a*b]');
    });

    it('parenthesizes rational exponents', () => {
        expect(hostForm(mk.pow(x, mk.rat(3, 2)))).toBe('x^(3/2)');
    });

    it('parenthesizes sums inside products and powers', () => {
        expect(hostForm(mk.mul(mk.add(a, b), x))).toBe('(a + b)*x');
        expect(hostForm(mk.pow(mk.add(a, b), mk.num(2)))).toBe('(a + b)^2');
    });

    it('prints subtraction for negated and negative terms', () => {
        expect(hostForm(mk.add(x, mk.neg(a)))).toBe('x - a');
        expect(hostForm(mk.add(x, mk.num(-2)))).toBe('x - 2');
    });

    it('prints lists and patterns', () => {
        expect(hostForm(mk.list(mk.num(1), mk.num(2)))).toBe('{1, 2}');
        expect(hostForm(mk.pattern('x'))).toBe('x_');
        expect(hostForm(mk.pattern('x', 'Real'))).toBe('x_Real');
    });

    it('prints special values', () => {
        expect(hostForm(mk.num(Infinity))).toBe('Infinity');
        expect(hostForm(mk.num(NaN))).toBe('Indeterminate');
    });
});
