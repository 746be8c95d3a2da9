// ─────────────────────────────────────────────────────────────
// PyForm  ·  Sign Oracle Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { signOf } from '../engine/sign';
import { assuming, fact, NO_ASSUMPTIONS } from '../core/assumptions';
import { mk } from '../core/expr';

const a = mk.sym('a');
const b = mk.sym('b');
const x = mk.sym('x');

describe('signs from facts', () => {
    it('reads strict bounds', () => {
        expect(signOf(a, assuming(fact.gt('a')))).toBe('Positive');
        expect(signOf(a, assuming(fact.lt('a', -2)))).toBe('Negative');
    });

    it('needs zero excluded for a non-strict bound', () => {
        expect(signOf(a, assuming(fact.ge('a')))).toBe('Unknown');
        expect(signOf(a, assuming(fact.ge('a'), fact.ne('a')))).toBe('Positive');
        expect(signOf(a, assuming(fact.le('a'), fact.ne('a')))).toBe('Negative');
    });

    it('recognizes an exact zero', () => {
        expect(signOf(a, assuming(fact.eq('a')))).toBe('Zero');
    });

    it('treats contradictions as unknown', () => {
        expect(signOf(a, assuming(fact.gt('a', 1), fact.lt('a', 0)))).toBe('Unknown');
        expect(signOf(a, assuming(fact.eq('a'), fact.ne('a')))).toBe('Unknown');
    });

    it('does not decide a bound that straddles zero', () => {
        expect(signOf(a, assuming(fact.gt('a', -1)))).toBe('Unknown');
    });

    it('matches facts about compound subjects', () => {
        const sum = mk.add(a, b);
        expect(signOf(sum, assuming(fact.gt(sum)))).toBe('Positive');
    });
});

describe('structural signs', () => {
    const mixed = assuming(fact.gt('a'), fact.lt('b'));

    it('reads literals and positive constants', () => {
        expect(signOf(mk.num(-3), NO_ASSUMPTIONS)).toBe('Negative');
        expect(signOf(mk.num(0), NO_ASSUMPTIONS)).toBe('Zero');
        expect(signOf(mk.sym('Pi'), NO_ASSUMPTIONS)).toBe('Positive');
        expect(signOf(x, NO_ASSUMPTIONS)).toBe('Unknown');
    });

    it('multiplies signs through products', () => {
        expect(signOf(mk.mul(a, b), mixed)).toBe('Negative');
        expect(signOf(mk.mul(b, b), mixed)).toBe('Positive');
        expect(signOf(mk.mul(a, x), mixed)).toBe('Unknown');
    });

    it('decides sums only when all terms agree', () => {
        expect(signOf(mk.add(a, mk.num(2)), mixed)).toBe('Positive');
        expect(signOf(mk.add(a, b), mixed)).toBe('Unknown');
    });

    it('flips negation', () => {
        expect(signOf(mk.neg(a), mixed)).toBe('Negative');
    });

    it('follows exponent parity for negative bases', () => {
        expect(signOf(mk.pow(b, mk.num(2)), mixed)).toBe('Positive');
        expect(signOf(mk.pow(b, mk.num(3)), mixed)).toBe('Negative');
        expect(signOf(mk.sqrt(b), mixed)).toBe('Unknown');
        expect(signOf(mk.sqrt(a), mixed)).toBe('Positive');
    });

    it('knows the sign of common functions', () => {
        expect(signOf(mk.call('Exp', x), NO_ASSUMPTIONS)).toBe('Positive');
        expect(signOf(mk.call('Abs', x), NO_ASSUMPTIONS)).toBe('Unknown');
        expect(signOf(mk.call('Abs', b), mixed)).toBe('Positive');
        expect(signOf(mk.call('Tanh', b), mixed)).toBe('Negative');
        expect(signOf(mk.call('Sqrt', b), mixed)).toBe('Unknown');
        expect(signOf(mk.call('Sin', a), mixed)).toBe('Unknown');
    });
});
