// ─────────────────────────────────────────────────────────────
// PyForm  ·  Python Expression Reader
// Recursive descent over the emitted subset, back into the IR
// ─────────────────────────────────────────────────────────────

import { mk, isInteger, type Expr } from '../core/expr';
import { DEFAULT_TARGET, type TargetConfig } from '../core/targets';

// ── Token types ─────────────────────────────────────────────

type TokenType =
    | 'NUMBER' | 'IMAGINARY' | 'IDENT'
    | 'LPAREN' | 'RPAREN' | 'LBRACKET' | 'RBRACKET'
    | 'PLUS' | 'MINUS' | 'STAR' | 'POWER' | 'SLASH' | 'COMMA'
    | 'EOF';

interface Token {
    type: TokenType;
    value: string;
    pos: number;
}

export class TargetSyntaxError extends Error {
    constructor(message: string, public readonly pos: number) {
        super(message);
        this.name = 'TargetSyntaxError';
    }
}

// ── Tokenizer ───────────────────────────────────────────────

const SINGLE_CHARS: Record<string, TokenType> = {
    '(': 'LPAREN', ')': 'RPAREN', '[': 'LBRACKET', ']': 'RBRACKET',
    '+': 'PLUS', '-': 'MINUS', '/': 'SLASH', ',': 'COMMA',
};

function tokenize(input: string): Token[] {
    const tokens: Token[] = [];
    let i = 0;

    while (i < input.length) {
        const ch = input[i];

        if (/\s/.test(ch)) {
            i++;
            continue;
        }

        // 12, 1.5, 1e-07, 2j
        const num = /^(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?(j)?/.exec(input.slice(i));
        if (num) {
            tokens.push({ type: num[3] ? 'IMAGINARY' : 'NUMBER', value: num[3] ? num[0].slice(0, -1) : num[0], pos: i });
            i += num[0].length;
            continue;
        }

        // Dotted names: np.sin, math.pi
        const ident = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*/.exec(input.slice(i));
        if (ident) {
            tokens.push({ type: 'IDENT', value: ident[0], pos: i });
            i += ident[0].length;
            continue;
        }

        if (ch === '*') {
            const isPow = input[i + 1] === '*';
            tokens.push({ type: isPow ? 'POWER' : 'STAR', value: isPow ? '**' : '*', pos: i });
            i += isPow ? 2 : 1;
            continue;
        }

        const single = SINGLE_CHARS[ch];
        if (single) {
            tokens.push({ type: single, value: ch, pos: i });
            i++;
            continue;
        }

        throw new TargetSyntaxError(`Unexpected character '${ch}' at ${i}`, i);
    }

    tokens.push({ type: 'EOF', value: '', pos: i });
    return tokens;
}

// ── Parser ──────────────────────────────────────────────────

class ExprReader {
    private pos = 0;
    private readonly functions: Map<string, string>;
    private readonly constants: Map<string, string>;

    constructor(private readonly tokens: Token[], private readonly target: TargetConfig) {
        this.functions = new Map(Object.entries(target.functions).map(([host, py]) => [py, host]));
        this.constants = new Map(Object.entries(target.constants).map(([host, py]) => [py, host]));
    }

    private peek(): Token {
        return this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1];
    }

    private advance(): Token {
        const tok = this.peek();
        if (tok.type !== 'EOF') this.pos++;
        return tok;
    }

    private match(type: TokenType): boolean {
        if (this.peek().type !== type) return false;
        this.advance();
        return true;
    }

    private expect(type: TokenType): Token {
        const tok = this.peek();
        if (tok.type !== type) {
            throw new TargetSyntaxError(`Expected ${type} but got ${tok.type} ('${tok.value}') at ${tok.pos}`, tok.pos);
        }
        return this.advance();
    }

    parse(): Expr {
        const e = this.parseSum();
        this.expect('EOF');
        return e;
    }

    // a + b, a - b
    private parseSum(): Expr {
        const terms = [this.parseProduct()];
        while (true) {
            if (this.match('PLUS')) terms.push(this.parseProduct());
            else if (this.match('MINUS')) terms.push(mk.neg(this.parseProduct()));
            else break;
        }
        return mk.add(...terms);
    }

    // a * b, a / b
    private parseProduct(): Expr {
        let left = this.parseUnary();
        while (true) {
            if (this.match('STAR')) {
                left = mk.mul(left, this.parseUnary());
            } else if (this.match('SLASH')) {
                const right = this.parseUnary();
                left = isInteger(left) && isInteger(right) && right.num !== 0
                    ? mk.rat(left.num, right.num)
                    : mk.mul(left, mk.pow(right, mk.num(-1)));
            } else {
                break;
            }
        }
        return left;
    }

    // -x binds looser than ** on its right: -x**2 is -(x**2)
    private parseUnary(): Expr {
        if (this.match('MINUS')) return mk.neg(this.parseUnary());
        if (this.match('PLUS')) return this.parseUnary();
        return this.parsePower();
    }

    // Right-associative; the exponent may itself be unary
    private parsePower(): Expr {
        const base = this.parsePrimary();
        if (this.match('POWER')) return mk.pow(base, this.parseUnary());
        return base;
    }

    private parsePrimary(): Expr {
        const tok = this.advance();
        switch (tok.type) {
            case 'NUMBER':
                return mk.num(Number(tok.value));

            case 'IMAGINARY':
                return Number(tok.value) === 1 ? mk.sym('I') : mk.mul(mk.num(Number(tok.value)), mk.sym('I'));

            case 'LPAREN': {
                const inner = this.parseSum();
                this.expect('RPAREN');
                return inner;
            }

            case 'LBRACKET':
                return mk.list(...this.parseSequence('RBRACKET'));

            case 'IDENT':
                if (this.match('LPAREN')) return this.parseCall(tok.value, this.parseSequence('RPAREN'));
                return this.readName(tok.value);

            default:
                throw new TargetSyntaxError(`Unexpected ${tok.type} ('${tok.value}') at ${tok.pos}`, tok.pos);
        }
    }

    private parseSequence(close: TokenType): Expr[] {
        const items: Expr[] = [];
        if (this.match(close)) return items;
        do {
            items.push(this.parseSum());
        } while (this.match('COMMA'));
        this.expect(close);
        return items;
    }

    private readName(name: string): Expr {
        if (name === this.target.nan) return mk.num(NaN);
        const host = this.constants.get(name);
        if (host !== undefined) return mk.sym(host);
        if (name === this.target.infinity) return mk.num(Infinity);
        return mk.sym(name);
    }

    private parseCall(name: string, args: Expr[]): Expr {
        if (name === this.target.radicalCall && args.length === 1) return mk.sqrt(args[0]);
        if (name === this.target.arctan2Call && args.length === 2) return mk.call('ArcTan', args[1], args[0]);
        if (name === this.target.arrayConstructor && args.length === 1 && args[0].tag === 'List') return args[0];
        return mk.call(this.functions.get(name) ?? name, ...args);
    }
}

// ── Public reader ───────────────────────────────────────────

export function parsePython(code: string, target: TargetConfig = DEFAULT_TARGET): Expr {
    return new ExprReader(tokenize(code), target).parse();
}
