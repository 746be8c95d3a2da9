// ─────────────────────────────────────────────────────────────
// PyForm  ·  Python Emitter Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { emitExpression, emitFunction } from '../emitters/python';
import { mk, type Expr } from '../core/expr';
import { resolveTarget } from '../core/targets';

const a = mk.sym('a');
const b = mk.sym('b');
const c = mk.sym('c');
const x = mk.sym('x');
const y = mk.sym('y');
const z = mk.sym('z');

const py = (e: Expr) => emitExpression(e).code;

describe('Python emitter', () => {
    it('emits mapped calls and normalized names', () => {
        const result = emitExpression(mk.call('Sin', mk.sym('\\[Alpha]')));
        expect(result.code).toBe('np.sin(alpha)');
        expect(result.language).toBe('python');
        expect(result.fileExtension).toBe('.py');
        expect(result.target).toBe('numpy');
        expect(result.diagnostics).toEqual([]);
    });

    it('emits constants through the target table', () => {
        expect(py(mk.sym('Pi'))).toBe('np.pi');
        expect(py(mk.mul(mk.num(2), mk.sym('I')))).toBe('2*1j');
        expect(emitExpression(mk.sym('Pi'), { target: 'math' }).code).toBe('math.pi');
    });

    it('renders special numbers', () => {
        expect(py(mk.num(NaN))).toBe('np.nan');
        expect(py(mk.num(Infinity))).toBe('np.inf');
        expect(py(mk.num(-Infinity))).toBe('-np.inf');
        expect(py(mk.num(0.5))).toBe('0.5');
        expect(py(mk.rat(3, 2))).toBe('3/2');
    });
});

describe('sums and products', () => {
    it('turns negative terms into subtraction', () => {
        expect(py(mk.add(x, mk.neg(y)))).toBe('x - y');
        expect(py(mk.add(x, mk.mul(mk.num(-2), y)))).toBe('x - 2*y');
        expect(py(mk.add(a, mk.mul(b, mk.neg(c))))).toBe('a - b*c');
    });

    it('keeps a leading negative term', () => {
        expect(py(mk.add(mk.neg(a), b))).toBe('-a + b');
    });

    it('parenthesizes negated sums', () => {
        expect(py(mk.neg(mk.add(a, b)))).toBe('-(a + b)');
        expect(py(mk.add(a, mk.neg(mk.add(b, c))))).toBe('a - (b + c)');
        expect(py(mk.mul(mk.num(-1), mk.add(a, b)))).toBe('-(a + b)');
    });

    it('pulls signs out of products', () => {
        expect(py(mk.mul(mk.num(-1), x))).toBe('-x');
        expect(py(mk.mul(a, mk.neg(b)))).toBe('-a*b');
        expect(py(mk.neg(mk.mul(a, b)))).toBe('-a*b');
        expect(py(mk.add(x, mk.neg(mk.mul(a, b))))).toBe('x - a*b');
        expect(py(mk.pow(mk.neg(mk.mul(a, b)), mk.num(2)))).toBe('(-a*b)**2');
    });

    it('parenthesizes sums inside products', () => {
        expect(py(mk.mul(mk.add(a, b), c))).toBe('(a + b)*c');
    });

    it('writes negative powers as division', () => {
        expect(py(mk.mul(x, mk.pow(y, mk.num(-1))))).toBe('x/y');
        expect(py(mk.pow(y, mk.num(-1)))).toBe('1/y');
        expect(py(mk.pow(x, mk.num(-2)))).toBe('1/x**2');
        expect(py(mk.mul(x, mk.pow(mk.add(a, b), mk.num(-1))))).toBe('x/(a + b)');
        expect(py(mk.mul(x, mk.pow(y, mk.num(-1)), mk.pow(z, mk.num(-1))))).toBe('x/(y*z)');
    });

    it('splits rational coefficients', () => {
        expect(py(mk.mul(mk.rat(1, 2), x))).toBe('x/2');
        expect(py(mk.mul(mk.rat(3, 2), x))).toBe('3*x/2');
        expect(py(mk.mul(mk.rat(-3, 2), x))).toBe('-3*x/2');
    });
});

describe('powers', () => {
    it('uses ** with Python binding', () => {
        expect(py(mk.pow(x, mk.num(2)))).toBe('x**2');
        expect(py(mk.pow(mk.neg(x), mk.num(2)))).toBe('(-x)**2');
        expect(py(mk.neg(mk.pow(x, mk.num(2))))).toBe('-x**2');
        expect(py(mk.pow(x, mk.neg(y)))).toBe('x**-y');
    });

    it('groups by associativity', () => {
        expect(py(mk.pow(x, mk.pow(y, z)))).toBe('x**y**z');
        expect(py(mk.pow(mk.pow(x, y), z))).toBe('(x**y)**z');
    });

    it('parenthesizes rational exponents and negative bases', () => {
        expect(py(mk.pow(x, mk.rat(3, 2)))).toBe('x**(3/2)');
        expect(py(mk.pow(mk.num(-8), mk.rat(1, 3)))).toBe('(-8)**(1/3)');
    });

    it('emits square roots by the target radical style', () => {
        expect(py(mk.sqrt(x))).toBe('np.sqrt(x)');
        const power = resolveTarget('numpy', { radical: 'power' });
        expect(emitExpression(mk.sqrt(x), { target: power }).code).toBe('x**(1/2)');
    });
});

describe('calls and lists', () => {
    it('emits two-argument host forms', () => {
        expect(py(mk.call('Log', b, x))).toBe('np.log(x)/np.log(b)');
        expect(py(mk.call('ArcTan', x, y))).toBe('np.arctan2(y, x)');
    });

    it('passes unmapped heads through with one warning each', () => {
        const result = emitExpression(mk.add(mk.call('BesselJ', mk.num(0), x), mk.call('BesselJ', mk.num(1), x)));
        expect(result.code).toBe('BesselJ(0, x) + BesselJ(1, x)');
        expect(result.diagnostics).toEqual([{
            kind: 'UnmappedFunction',
            severity: 'warning',
            message: "No numpy mapping for 'BesselJ'; emitted verbatim",
            name: 'BesselJ',
        }]);
    });

    it('uses the target function table', () => {
        const result = emitExpression(mk.call('Sign', x), { target: 'math' });
        expect(result.code).toBe('Sign(x)');
        expect(result.diagnostics.map(d => d.kind)).toEqual(['UnmappedFunction']);
        expect(emitExpression(mk.call('ArcSin', x), { target: 'math' }).code).toBe('math.asin(x)');
    });

    it('nests binary host functions for longer calls', () => {
        expect(py(mk.call('Min', x, y))).toBe('np.minimum(x, y)');
        expect(py(mk.call('Max', x, y, z))).toBe('np.maximum(x, np.maximum(y, z))');
        expect(emitExpression(mk.call('Max', x, y, z), { target: 'math' }).code).toBe('max(x, y, z)');
    });

    it('wraps only the outermost list in the array constructor', () => {
        const nested = mk.list(mk.num(1), mk.list(x, y));
        expect(py(nested)).toBe('np.array([1, [x, y]])');
        expect(emitExpression(nested, { target: 'math' }).code).toBe('[1, [x, y]]');
    });
});

describe('identifiers', () => {
    it('suffixes reserved words', () => {
        expect(py(mk.add(mk.sym('lambda'), mk.sym('np')))).toBe('lambda_ + np_');
    });

    it('reports colliding names', () => {
        const result = emitExpression(mk.add(mk.sym('x$1'), mk.sym('x1')));
        expect(result.code).toBe('x1 + x1');
        expect(result.diagnostics.map(d => d.kind)).toEqual(['IdentifierCollision']);
        expect(result.diagnostics[0].severity).toBe('error');
    });
});

describe('emitFunction', () => {
    it('renders a def with a return', () => {
        const result = emitFunction({ name: 'f', params: ['x', 'y'], rawParams: ['x', 'y'], body: mk.mul(x, y) });
        expect(result.code).toBe('def f(x, y):\n    return x*y');
    });

    it('renders the body through the target', () => {
        const result = emitFunction({ name: 'g', params: ['x'], rawParams: ['x'], body: mk.call('Exp', x) }, { target: 'math' });
        expect(result.code).toBe('def g(x):\n    return math.exp(x)');
    });

    it('binds parameters before the body', () => {
        const alpha = '\\[Alpha]';
        const result = emitFunction({
            name: 'f',
            params: ['alpha'],
            rawParams: [alpha],
            body: mk.mul(mk.sym(alpha), mk.sym('alpha')),
        });
        expect(result.code).toBe('def f(alpha):\n    return alpha*alpha');
        expect(result.diagnostics).toEqual([{
            kind: 'IdentifierCollision',
            severity: 'error',
            message: `Names ${alpha}, alpha all normalize to 'alpha'`,
            identifier: 'alpha',
            names: [alpha, 'alpha'],
        }]);
    });
});
