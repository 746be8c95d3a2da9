// ─────────────────────────────────────────────────────────────
// PyForm  ·  Signature Extraction Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { extractSignature, InMemoryDefinitionStore } from '../parser/definitions';
import { mk } from '../core/expr';

const x = mk.sym('x');
const y = mk.sym('y');
const z = mk.sym('z');

describe('extractSignature', () => {
    it('reads parameters in order of appearance', () => {
        const lhs = mk.call('f', mk.list(mk.pattern('x'), mk.pattern('y')), mk.pattern('z', 'Real'));
        const result = extractSignature('f', [mk.rule(lhs, mk.add(x, y, z))]);
        expect(result).toEqual({
            ok: true,
            signature: { name: 'f', params: ['x', 'y', 'z'], rawParams: ['x', 'y', 'z'], body: mk.add(x, y, z) },
            diagnostics: [],
        });
    });

    it('normalizes the function and parameter names', () => {
        const lhs = mk.call('Global`lambda', mk.pattern('\\[Alpha]'));
        const result = extractSignature('lambda', [mk.rule(lhs, mk.sym('\\[Alpha]'))]);
        expect(result.ok && result.signature.name).toBe('lambda_');
        expect(result.ok && result.signature.params).toEqual(['alpha']);
        expect(result.ok && result.signature.rawParams).toEqual(['\\[Alpha]']);
    });

    it('unwraps HoldPattern', () => {
        const lhs = mk.call('HoldPattern', mk.call('g', mk.pattern('t')));
        const result = extractSignature('g', [mk.rule(lhs, mk.sym('t'))]);
        expect(result.ok && result.signature.params).toEqual(['t']);
    });

    it('uses the first rule when several are stored', () => {
        const first = mk.rule(mk.call('h', mk.pattern('x')), x);
        const second = mk.rule(mk.call('h', mk.pattern('x'), mk.pattern('y')), mk.mul(x, y));
        const result = extractSignature('h', [first, second]);
        expect(result.ok && result.signature.params).toEqual(['x']);
    });

    it('reports a symbol without rules', () => {
        expect(extractSignature('q', [])).toEqual({
            ok: false,
            diagnostics: [{
                kind: 'NoDefinitionFound',
                severity: 'error',
                message: 'No definition found for the symbol q.',
                symbol: 'q',
            }],
        });
    });

    it('rejects repeated parameters', () => {
        const lhs = mk.call('f', mk.pattern('x'), mk.pattern('x'));
        expect(extractSignature('f', [mk.rule(lhs, x)])).toEqual({
            ok: false,
            diagnostics: [{
                kind: 'AmbiguousSignature',
                severity: 'error',
                message: 'Signature of f repeats parameter x',
                name: 'f',
                duplicates: ['x'],
            }],
        });
    });

    it('rejects parameters that normalize to the same name', () => {
        const lhs = mk.call('f', mk.pattern('x$1'), mk.pattern('x1'));
        const result = extractSignature('f', [mk.rule(lhs, x)]);
        expect(result.ok).toBe(false);
        expect(result.diagnostics.map(d => d.kind)).toEqual(['AmbiguousSignature']);
    });
});

describe('InMemoryDefinitionStore', () => {
    it('keeps rules per symbol in definition order', () => {
        const store = new InMemoryDefinitionStore();
        const r1 = mk.rule(mk.call('f', mk.pattern('x')), x);
        const r2 = mk.rule(mk.call('f', mk.pattern('y')), y);
        store.define('f', r1);
        store.define('g', r1);
        store.define('f', r2);
        expect(store.rulesFor('f')).toEqual([r1, r2]);
        expect(store.rulesFor('missing')).toEqual([]);
        expect(store.symbols()).toEqual(['f', 'g']);
    });
});
